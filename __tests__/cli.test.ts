import { describe, expect, it } from "vitest";

import { parseCliArgs, UsageError } from "../src/cli.js";

describe("parseCliArgs", () => {
  it("returns empty options for no arguments", () => {
    expect(parseCliArgs([])).toEqual({ command: "run", options: {} });
  });

  it("maps every flag onto the run options", () => {
    expect(
      parseCliArgs([
        "--severity",
        "medium",
        "--max-prs=3",
        "--dry-run",
        "--alerts",
        "alerts.json",
        "--repo-dir",
        "/tmp/checkout",
        "--summary",
        "out/summary.json",
      ])
    ).toEqual({
      command: "run",
      options: {
        severity: "medium",
        maxPrs: "3",
        dryRun: true,
        alertsFile: "alerts.json",
        repoDir: "/tmp/checkout",
        summaryPath: "out/summary.json",
      },
    });
  });

  it("recognises help", () => {
    expect(parseCliArgs(["-h"])).toEqual({ command: "help" });
    expect(parseCliArgs(["--dry-run", "--help"])).toEqual({ command: "help" });
  });

  it("raises a usage error for unknown flags and stray arguments", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow(UsageError);
    expect(() => parseCliArgs(["run"])).toThrow(UsageError);
  });

  it("raises a usage error when a value is missing", () => {
    expect(() => parseCliArgs(["--severity"])).toThrow(UsageError);
  });
});
