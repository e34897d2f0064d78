import { describe, expect, it } from "vitest";

import {
  buildKnownPackages,
  extractCve,
  extractPackageInfo,
  loadKnownPackages,
} from "../src/packageInfoExtractor.js";
import type { ExtractionResult, PackageFact } from "../src/types.js";
import { makeAlert } from "./helpers/fakes.js";

function factOf(result: ExtractionResult): PackageFact {
  if (result.status !== "found") {
    throw new Error(`expected a fact, got ${result.reason}`);
  }
  return result.fact;
}

describe("extractPackageInfo", () => {
  it("reads name, fixed version and CVE from an update title and upgrade recommendation", () => {
    const fact = factOf(
      extractPackageInfo(
        makeAlert({
          id: "1",
          title: "Update requests to fix CVE-2023-32681",
          recommendations: ["Upgrade to version 2.31.0 or later"],
        })
      )
    );

    expect(fact).toEqual({
      name: "requests",
      currentVersion: null,
      fixedVersion: "2.31.0",
      cve: "CVE-2023-32681",
      sources: {
        name: "title-known-package",
        currentVersion: null,
        fixedVersion: "recommendation",
        cve: "text",
      },
      confidence: "high",
    });
  });

  it("falls back to title phrasing for packages outside the known list", () => {
    const fact = factOf(
      extractPackageInfo(
        makeAlert({
          id: "2",
          title: "Update acme-widgets to fix CVE-2024-1234",
          recommendations: ["Upgrade to version 4.0.1 or later"],
        })
      )
    );

    expect(fact.name).toBe("acme-widgets");
    expect(fact.fixedVersion).toBe("4.0.1");
    expect(fact.sources.name).toBe("title-phrase");
    expect(fact.confidence).toBe("medium");
  });

  it("reads the package from the description when the title does not name it", () => {
    const fact = factOf(
      extractPackageInfo(
        makeAlert({
          id: "3",
          title: "Denial of service via crafted input",
          description: "Vulnerable package: pyfoo\nInstalled version: 1.2.3\nThis issue was fixed in version 1.2.4.",
        })
      )
    );

    expect(fact.name).toBe("pyfoo");
    expect(fact.sources.name).toBe("description-phrase");
    expect(fact.confidence).toBe("low");
    expect(fact.currentVersion).toBe("1.2.3");
    expect(fact.sources.currentVersion).toBe("description-text");
    expect(fact.fixedVersion).toBe("1.2.4");
    expect(fact.sources.fixedVersion).toBe("description");
  });

  it("prefers a pin in the code snippet for the current version", () => {
    const fact = factOf(
      extractPackageInfo(
        makeAlert({
          id: "4",
          title: "Security vulnerability in requests",
          description: "Installed version: 2.19.0",
          codeSnippet: "flask==2.0.1\nrequests==2.25.0",
        })
      )
    );

    expect(fact.currentVersion).toBe("2.25.0");
    expect(fact.sources.currentVersion).toBe("code-snippet");
  });

  it("falls back to the manifests for the current version", () => {
    const fact = factOf(
      extractPackageInfo(makeAlert({ id: "5", title: "Security vulnerability in requests" }), [
        { path: "requirements.txt", dialect: "requirements-line", content: "requests==2.20.0\n" },
      ])
    );

    expect(fact.currentVersion).toBe("2.20.0");
    expect(fact.sources.currentVersion).toBe("manifest");
    expect(fact.fixedVersion).toBeNull();
  });

  it("takes the target of a from-to upgrade recommendation", () => {
    const fact = factOf(
      extractPackageInfo(
        makeAlert({
          id: "12",
          title: "Vulnerable package: requests",
          recommendations: ["Upgrade requests from 2.25.0 to 2.31.0"],
        })
      )
    );

    expect(fact.name).toBe("requests");
    expect(fact.fixedVersion).toBe("2.31.0");
    expect(fact.sources.fixedVersion).toBe("recommendation");
  });

  it("takes the fixed version from a bump title", () => {
    const fact = factOf(
      extractPackageInfo(makeAlert({ id: "6", title: "Bump jinja2 from 2.11.3 to 3.1.4" }))
    );

    expect(fact.name).toBe("jinja2");
    expect(fact.fixedVersion).toBe("3.1.4");
    expect(fact.sources.fixedVersion).toBe("title-from-to");
  });

  it("reports no-package-name when nothing names a package", () => {
    expect(
      extractPackageInfo(makeAlert({ id: "7", title: "Something odd happened" }))
    ).toEqual({ status: "not-found", reason: "no-package-name" });
  });

  it("rejects generic words captured by the phrase patterns", () => {
    expect(
      extractPackageInfo(makeAlert({ id: "8", title: "Update dependencies to fix CVE-2024-0001" }))
    ).toEqual({ status: "not-found", reason: "no-package-name" });
  });

  it("returns the canonical spelling from a custom known-package list", () => {
    const fact = factOf(
      extractPackageInfo(
        makeAlert({ id: "9", title: "Security vulnerability in internal_lib" }),
        [],
        buildKnownPackages(["Internal-Lib"])
      )
    );

    expect(fact.name).toBe("Internal-Lib");
  });
});

describe("extractCve", () => {
  it("finds and uppercases a CVE anywhere in the alert", () => {
    expect(
      extractCve(makeAlert({ id: "10", title: "Log4Shell", recommendations: ["See cve-2021-44228"] }))
    ).toBe("CVE-2021-44228");
    expect(extractCve(makeAlert({ id: "11", title: "No identifier" }))).toBeNull();
  });
});

describe("loadKnownPackages", () => {
  it("loads the bundled package list keyed by normalised name", () => {
    const known = loadKnownPackages();
    expect(known.get("requests")).toBe("requests");
    expect(known.get("charset-normalizer")).toBe("charset-normalizer");
  });
});
