import { homedir } from "os";
import { join, resolve } from "path";
import { describe, expect, it } from "vitest";

import { loadConfig, splitRepo } from "../src/config.js";
import { DEFAULT_IGNORE_PATTERNS } from "../src/manifestLocator.js";

const BASE_ENV = { REMEDIATOR_GITHUB_REPO: "acme/app" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({}, { ...BASE_ENV });

    expect(config).toEqual({
      githubRepo: "acme/app",
      repoDir: resolve("."),
      baseBranch: null,
      severityFloor: "high",
      dryRun: false,
      limits: { maxPrs: 10, maxFilesPerPr: 10, maxLinesPerFile: 50 },
      branchPrefix: "security/dependency-update",
      prLabels: ["security", "dependencies"],
      ignorePatterns: [...DEFAULT_IGNORE_PATTERNS],
      alertsFile: null,
      summaryPath: resolve(process.cwd(), "dependency-fix-summary.json"),
      dbPath: join(homedir(), ".dependency-alert-remediator", "state.db"),
      pythonExecutable: "python3",
      resolverTimeoutMs: 300_000,
      logLevel: "info",
      logFormat: "text",
    });
  });

  it("reads settings from the environment", () => {
    const config = loadConfig(
      {},
      {
        GITHUB_REPOSITORY: "octo/service",
        REMEDIATOR_BASE_BRANCH: "develop",
        REMEDIATOR_SEVERITY: "Medium",
        REMEDIATOR_DRY_RUN: "yes",
        REMEDIATOR_MAX_PRS: "3",
        REMEDIATOR_MAX_FILES_PER_PR: "4",
        REMEDIATOR_MAX_LINES_PER_FILE: "20",
        REMEDIATOR_BRANCH_PREFIX: "deps/",
        REMEDIATOR_PR_LABELS: "security, automated",
        REMEDIATOR_IGNORE: "vendor/**, third_party",
        PIPELINE_WORKSPACE: "/tmp/pipeline",
        REMEDIATOR_RESOLVER_TIMEOUT: "60",
        REMEDIATOR_LOG_FORMAT: "json",
      }
    );

    expect(config.githubRepo).toBe("octo/service");
    expect(config.baseBranch).toBe("develop");
    expect(config.severityFloor).toBe("medium");
    expect(config.dryRun).toBe(true);
    expect(config.limits).toEqual({ maxPrs: 3, maxFilesPerPr: 4, maxLinesPerFile: 20 });
    expect(config.branchPrefix).toBe("deps");
    expect(config.prLabels).toEqual(["security", "automated"]);
    expect(config.ignorePatterns.slice(-2)).toEqual(["vendor/**", "third_party"]);
    expect(config.summaryPath).toBe(resolve("/tmp/pipeline", "dependency-fix-summary.json"));
    expect(config.resolverTimeoutMs).toBe(60_000);
    expect(config.logFormat).toBe("json");
  });

  it("lets command-line options win over the environment", () => {
    const config = loadConfig(
      {
        severity: "critical",
        maxPrs: "1",
        dryRun: true,
        alertsFile: "alerts.json",
        repoDir: "/tmp/checkout",
        summaryPath: "/tmp/out/summary.json",
      },
      {
        ...BASE_ENV,
        REMEDIATOR_SEVERITY: "low",
        REMEDIATOR_MAX_PRS: "9",
        REMEDIATOR_DRY_RUN: "false",
        REMEDIATOR_SUMMARY_PATH: "/tmp/ignored.json",
      }
    );

    expect(config.severityFloor).toBe("critical");
    expect(config.limits.maxPrs).toBe(1);
    expect(config.dryRun).toBe(true);
    expect(config.alertsFile).toBe(resolve("alerts.json"));
    expect(config.repoDir).toBe(resolve("/tmp/checkout"));
    expect(config.summaryPath).toBe(resolve("/tmp/out/summary.json"));
  });

  it("requires the repository", () => {
    expect(() => loadConfig({}, {})).toThrow(
      "Configuration error: REMEDIATOR_GITHUB_REPO (or GITHUB_REPOSITORY) must be set."
    );
    expect(() => loadConfig({}, { REMEDIATOR_GITHUB_REPO: "just-a-name" })).toThrow(
      'Configuration error: Expected repository in "owner/repo" form but got "just-a-name".'
    );
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ severity: "severe" }, { ...BASE_ENV })).toThrow(
      'Configuration error: Invalid severity "severe". Valid severities: critical, high, medium, low'
    );
    expect(() => loadConfig({ maxPrs: "0" }, { ...BASE_ENV })).toThrow(
      'Configuration error: Expected a positive integer but got "0".'
    );
    expect(() => loadConfig({ maxPrs: "2.5" }, { ...BASE_ENV })).toThrow(
      'Configuration error: Expected a positive integer but got "2.5".'
    );
    expect(() => loadConfig({}, { ...BASE_ENV, REMEDIATOR_DRY_RUN: "maybe" })).toThrow(
      'Configuration error: Expected a boolean but got "maybe".'
    );
    expect(() => loadConfig({}, { ...BASE_ENV, REMEDIATOR_LOG_LEVEL: "trace" })).toThrow(
      'Configuration error: Invalid log level "trace". Valid levels: debug, info, warn, error'
    );
  });
});

describe("splitRepo", () => {
  it("splits owner and repository name", () => {
    expect(splitRepo("acme/app")).toEqual({ owner: "acme", repo: "app" });
  });
});
