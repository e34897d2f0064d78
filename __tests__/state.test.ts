import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { RunHistoryStore } from "../src/state.js";
import type { RunSummary } from "../src/types.js";

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    timestamp: "2026-03-01T12:00:00.000Z",
    dryRun: false,
    status: "success",
    severityFloor: "high",
    limits: { maxPrs: 10, maxFilesPerPr: 10, maxLinesPerFile: 50 },
    counts: {
      alertsFound: 2,
      alertsMatchingFilter: 2,
      alertsProcessed: 2,
      prsCreated: 1,
      skipped: { "validation-failed": 1 },
    },
    outcomes: [
      {
        alertId: "42",
        severity: "high",
        title: "Update requests to fix CVE-2023-32681",
        outcome: "pr-created",
        packageName: "requests",
        fixedVersion: "2.31.0",
        branch: "security/dependency-update/requests-2.31.0",
        pullRequest: { number: 7, url: "https://github.test/acme/app/pull/7" },
      },
      {
        alertId: "43",
        severity: "critical",
        title: "Security vulnerability in urllib3",
        outcome: "skipped",
        reason: "validation-failed",
        packageName: "urllib3",
        fixedVersion: "2.0.7",
      },
    ],
    ...overrides,
  };
}

describe("RunHistoryStore", () => {
  let store: RunHistoryStore;

  beforeEach(() => {
    store = new RunHistoryStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("records runs and lists the most recent first", () => {
    const first = store.recordRun("acme/app", summary());
    const second = store.recordRun(
      "acme/app",
      summary({ timestamp: "2026-03-02T12:00:00.000Z", dryRun: true, status: "dry-run" })
    );
    store.recordRun("acme/other", summary());

    expect(second).toBeGreaterThan(first);
    expect(store.getRecentRuns("acme/app")).toEqual([
      {
        id: second,
        repo: "acme/app",
        startedAt: "2026-03-02T12:00:00.000Z",
        status: "dry-run",
        dryRun: true,
        alertsFound: 2,
        prsCreated: 1,
      },
      {
        id: first,
        repo: "acme/app",
        startedAt: "2026-03-01T12:00:00.000Z",
        status: "success",
        dryRun: false,
        alertsFound: 2,
        prsCreated: 1,
      },
    ]);
    expect(store.getRecentRuns("acme/app", 1).map((run) => run.id)).toEqual([second]);
  });

  it("returns the history of one alert", () => {
    const runId = store.recordRun("acme/app", summary());

    expect(store.getOutcomesForAlert("acme/app", "42")).toEqual([
      {
        runId,
        startedAt: "2026-03-01T12:00:00.000Z",
        dryRun: false,
        outcome: "pr-created",
        reason: null,
        packageName: "requests",
        fixedVersion: "2.31.0",
        branch: "security/dependency-update/requests-2.31.0",
        prNumber: 7,
        prUrl: "https://github.test/acme/app/pull/7",
      },
    ]);
    expect(store.getOutcomesForAlert("acme/app", "43")[0]).toMatchObject({
      outcome: "skipped",
      reason: "validation-failed",
      branch: null,
      prNumber: null,
    });
    expect(store.getOutcomesForAlert("acme/other", "42")).toEqual([]);
  });
});
