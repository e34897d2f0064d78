import { writeFileSync } from "fs";
import { join } from "path";
import { describe, expect, it } from "vitest";

import { FileAlertSource, parseAlertFile } from "../src/fileAlertSource.js";
import { filterReason } from "../src/orchestrator.js";
import { makeTempRepo } from "./helpers/fakes.js";

describe("parseAlertFile", () => {
  it("reads an object with a value array", () => {
    const alerts = parseAlertFile(
      {
        value: [
          {
            alertId: 101,
            alertType: "Dependency",
            severity: "High",
            state: "Active",
            title: "Update requests to fix CVE-2023-32681",
            description: "Proxy credentials leak.",
            recommendations: [{ text: "Upgrade to version 2.31.0 or later" }],
          },
        ],
      },
      "alerts.json"
    );

    expect(alerts).toEqual([
      {
        id: "101",
        kind: "dependency",
        severity: "high",
        state: "active",
        title: "Update requests to fix CVE-2023-32681",
        description: "Proxy credentials leak.",
        recommendations: ["Upgrade to version 2.31.0 or later"],
      },
    ]);
  });

  it("fills defaults for missing fields", () => {
    const [alert] = parseAlertFile(
      [{ id: "a-1", title: "Hard-coded secret", kind: "secret", severity: "moderate", codeSnippet: "key = 1" }],
      "alerts.json"
    );

    expect(alert).toEqual({
      id: "a-1",
      kind: "other",
      severity: "unknown",
      state: "unknown",
      title: "Hard-coded secret",
      description: "",
      recommendations: [],
      codeSnippet: "key = 1",
    });
  });

  it("keeps alerts without a state out of processing", () => {
    const [alert] = parseAlertFile(
      [{ id: 7, kind: "dependency", severity: "high", title: "Update requests to fix CVE-2023-32681" }],
      "alerts.json"
    );

    expect(alert.state).toBe("unknown");
    expect(filterReason(alert, "high")).toBe("not-active");
  });

  it("recognises code alerts", () => {
    const [alert] = parseAlertFile([{ id: 5, kind: "code_scanning", title: "SQL injection" }], "alerts.json");

    expect(alert.kind).toBe("code");
  });

  it("drops invalid records and keeps the rest", () => {
    const alerts = parseAlertFile(
      [{ title: "No identifier" }, { id: 3 }, { id: 4, title: "Kept" }],
      "alerts.json"
    );

    expect(alerts.map((alert) => alert.id)).toEqual(["4"]);
  });

  it("rejects files of the wrong shape", () => {
    expect(() => parseAlertFile({ alerts: [] }, "alerts.json")).toThrow(
      'Alerts file alerts.json must hold an array of alerts or an object with a "value" array.'
    );
  });
});

describe("FileAlertSource", () => {
  it("reads alerts from disk", async () => {
    const dir = makeTempRepo();
    const path = join(dir, "alerts.json");
    writeFileSync(path, JSON.stringify([{ id: 9, title: "Security vulnerability in urllib3" }]), "utf-8");

    const alerts = await new FileAlertSource(path).fetchAlerts();

    expect(alerts.map((alert) => [alert.id, alert.kind])).toEqual([["9", "other"]]);
  });

  it("reports malformed JSON with the file path", async () => {
    const dir = makeTempRepo({ "alerts.json": "{ not json" });
    const path = join(dir, "alerts.json");

    await expect(new FileAlertSource(path).fetchAlerts()).rejects.toThrow(
      `Alerts file ${path} is not valid JSON:`
    );
  });
});
