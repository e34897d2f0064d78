import { describe, expect, it, vi } from "vitest";

import { GitHubAlertSource, mapDependabotAlert } from "../src/githubAlertSource.js";
import { GitHubClient, validateGitHubToken, type DependabotAlertRecord } from "../src/githubClient.js";
import { extractPackageInfo } from "../src/packageInfoExtractor.js";

function record(overrides: Partial<DependabotAlertRecord> = {}): DependabotAlertRecord {
  return {
    number: 17,
    state: "open",
    packageName: "pyfoo",
    ecosystem: "pip",
    manifestPath: "requirements.txt",
    severity: "high",
    summary: "Arbitrary code execution via crafted documents",
    description: "Loading untrusted input runs attacker-controlled code.",
    ghsaId: "GHSA-aaaa-bbbb-cccc",
    cveId: "CVE-2024-99999",
    vulnerableRange: "< 5.4.1",
    firstPatchedVersion: "5.4.1",
    htmlUrl: "https://github.test/acme/app/security/dependabot/17",
    ...overrides,
  };
}

describe("mapDependabotAlert", () => {
  it("renders the structured alert as alert text", () => {
    expect(mapDependabotAlert(record())).toEqual({
      id: "17",
      kind: "dependency",
      severity: "high",
      state: "active",
      title: "Update pyfoo to fix CVE-2024-99999",
      description: [
        "Arbitrary code execution via crafted documents",
        "",
        "Vulnerable package: pyfoo",
        "Affected versions: < 5.4.1",
        "Manifest: requirements.txt",
        "Advisory: GHSA-aaaa-bbbb-cccc, CVE-2024-99999",
        "",
        "Loading untrusted input runs attacker-controlled code.",
      ].join("\n"),
      recommendations: ["Upgrade to version 5.4.1 or later"],
    });
  });

  it("maps unknown severities and missing patches", () => {
    const alert = mapDependabotAlert(
      record({ severity: "moderate", firstPatchedVersion: null, cveId: null, state: "dismissed" })
    );

    expect(alert.title).toBe("Update pyfoo to fix GHSA-aaaa-bbbb-cccc");
    expect(alert.severity).toBe("unknown");
    expect(alert.state).toBe("dismissed");
    expect(alert.recommendations).toEqual([]);
    expect(alert.description).toContain("Advisory: GHSA-aaaa-bbbb-cccc\n");
  });

  it("produces text the extractor reads back", () => {
    const result = extractPackageInfo(mapDependabotAlert(record()));

    expect(result.status).toBe("found");
    if (result.status !== "found") return;
    expect(result.fact.name).toBe("pyfoo");
    expect(result.fact.fixedVersion).toBe("5.4.1");
    expect(result.fact.cve).toBe("CVE-2024-99999");
    expect(result.fact.sources.name).toBe("title-phrase");
  });

  it("keeps package names in the advisory summary from replacing the affected package", () => {
    const result = extractPackageInfo(
      mapDependabotAlert(
        record({
          packageName: "nbconvert",
          summary: "Markdown cells in nbconvert render unsanitised HTML",
          firstPatchedVersion: "7.2.9",
        })
      )
    );

    expect(result.status).toBe("found");
    if (result.status !== "found") return;
    expect(result.fact.name).toBe("nbconvert");
    expect(result.fact.fixedVersion).toBe("7.2.9");
  });

  it("falls back to the summary as title when the package is unknown", () => {
    expect(mapDependabotAlert(record({ packageName: null })).title).toBe(
      "Arbitrary code execution via crafted documents"
    );
  });
});

describe("GitHubAlertSource", () => {
  it("lists open alerts through the client and maps them", async () => {
    const client = new GitHubClient("ghs_test-secret");
    const list = vi
      .spyOn(client, "listOpenDependabotAlerts")
      .mockResolvedValue([record(), record({ number: 18, severity: "critical" })]);

    const alerts = await new GitHubAlertSource(client, "acme", "app").fetchAlerts();

    expect(list).toHaveBeenCalledWith("acme", "app");
    expect(alerts.map((alert) => [alert.id, alert.severity])).toEqual([
      ["17", "high"],
      ["18", "critical"],
    ]);
  });
});

describe("validateGitHubToken", () => {
  it("accepts known token prefixes", () => {
    expect(() => validateGitHubToken("ghp_test-secret")).not.toThrow();
    expect(() => validateGitHubToken("github_pat_test-secret")).not.toThrow();
  });

  it("names the variable in the error", () => {
    expect(() => validateGitHubToken("test-secret", "GITHUB_TOKEN")).toThrow(
      "Invalid GITHUB_TOKEN format. GitHub tokens should start with one of: ghp_, gho_, ghu_, ghs_, ghr_, github_pat_"
    );
  });

  it("is applied to tokens taken from the environment", async () => {
    await expect(GitHubClient.createFromGhCli({ GH_TOKEN: "test-secret" })).rejects.toThrow(
      "Invalid GH_TOKEN format."
    );
    await expect(
      GitHubClient.createFromGhCli({ GITHUB_TOKEN: "ghs_test-secret" })
    ).resolves.toBeInstanceOf(GitHubClient);
  });
});
