// Run summary accumulation and output.
// The orchestrator records one outcome per alert as it goes; the summary is
// handed out once, as a frozen snapshot, for logging, the JSON artifact and
// the run history store.

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";

import type {
  AlertOutcome,
  RunLimits,
  RunStatus,
  RunSummary,
  Severity,
  SkipReason,
} from "./types.js";

export interface RunReporterSettings {
  dryRun: boolean;
  severityFloor: Severity;
  limits: RunLimits;
  startedAt: Date;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class RunReporter {
  private settings: RunReporterSettings;
  private outcomes: AlertOutcome[] = [];
  private alertsFound = 0;
  private alertsMatchingFilter = 0;
  private alertsProcessed = 0;
  private fetchError: string | null = null;

  constructor(settings: RunReporterSettings) {
    this.settings = settings;
  }

  setAlertsFound(count: number): void {
    this.alertsFound = count;
  }

  setAlertsMatchingFilter(count: number): void {
    this.alertsMatchingFilter = count;
  }

  // `processed` marks alerts that entered per-alert processing, as opposed
  // to those filtered out up front or cut off by the PR limit.
  record(outcome: AlertOutcome, processed: boolean): void {
    this.outcomes.push({ ...outcome });
    if (processed) {
      this.alertsProcessed++;
    }
  }

  markFetchFailed(message: string): void {
    this.fetchError = message;
  }

  snapshot(): RunSummary {
    const skipped: Partial<Record<SkipReason, number>> = {};
    let prsCreated = 0;
    for (const outcome of this.outcomes) {
      if (outcome.outcome === "pr-created") {
        prsCreated++;
      } else if (outcome.reason) {
        skipped[outcome.reason] = (skipped[outcome.reason] ?? 0) + 1;
      }
    }

    const summary: RunSummary = {
      timestamp: this.settings.startedAt.toISOString(),
      dryRun: this.settings.dryRun,
      status: this.status(prsCreated),
      severityFloor: this.settings.severityFloor,
      limits: { ...this.settings.limits },
      counts: {
        alertsFound: this.alertsFound,
        alertsMatchingFilter: this.alertsMatchingFilter,
        alertsProcessed: this.alertsProcessed,
        prsCreated,
        skipped,
      },
      outcomes: structuredClone(this.outcomes),
    };
    if (this.fetchError !== null) {
      summary.error = this.fetchError;
    }
    return deepFreeze(summary);
  }

  private status(prsCreated: number): RunStatus {
    if (this.fetchError !== null) return "fetch-failed";
    if (this.settings.dryRun) return "dry-run";
    return prsCreated > 0 ? "success" : "no-prs-created";
  }
}

export function formatRunSummary(summary: RunSummary): string {
  const verb = summary.dryRun ? "Would have created" : "Created";
  const lines = [
    `${verb} ${summary.counts.prsCreated} pull request(s) from ${summary.counts.alertsMatchingFilter} matching alert(s) (${summary.counts.alertsFound} fetched).`,
  ];

  for (const outcome of summary.outcomes) {
    const subject = outcome.packageName
      ? `${outcome.packageName}${outcome.fixedVersion ? ` -> ${outcome.fixedVersion}` : ""}`
      : outcome.title;
    if (outcome.outcome === "pr-created") {
      const target = outcome.pullRequest ? outcome.pullRequest.url : outcome.branch ?? "";
      lines.push(`  [${outcome.severity}] #${outcome.alertId} ${subject}: PR ${target}`.trimEnd());
    } else {
      lines.push(`  [${outcome.severity}] #${outcome.alertId} ${subject}: skipped (${outcome.reason ?? "unknown"})`);
    }
  }

  return lines.join("\n");
}

export async function writeRunSummary(path: string, summary: RunSummary): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(summary, null, 2)}\n`, "utf-8");
}
