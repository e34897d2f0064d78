// SQLite-based run history for the dependency alert remediator.
// Records every run and the outcome of each alert in it, so later runs can
// report what happened to an alert before (the PR that was opened for it,
// or why it was skipped).
// Limitations: Single-process only; concurrent runs are prevented by the
//   lock file in main.ts rather than by the database.

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

import { logger } from "./logger.js";
import type { RunStatus, RunSummary } from "./types.js";

export interface RunRecord {
  id: number;
  repo: string;
  startedAt: string;
  status: RunStatus;
  dryRun: boolean;
  alertsFound: number;
  prsCreated: number;
}

export interface AlertHistoryRecord {
  runId: number;
  startedAt: string;
  dryRun: boolean;
  outcome: string;
  reason: string | null;
  packageName: string | null;
  fixedVersion: string | null;
  branch: string | null;
  prNumber: number | null;
  prUrl: string | null;
}

interface RunRow {
  id: number;
  repo: string;
  started_at: string;
  status: RunStatus;
  dry_run: number;
  alerts_found: number;
  prs_created: number;
}

interface AlertHistoryRow {
  run_id: number;
  started_at: string;
  dry_run: number;
  outcome: string;
  reason: string | null;
  package_name: string | null;
  fixed_version: string | null;
  branch: string | null;
  pr_number: number | null;
  pr_url: string | null;
}

export class RunHistoryStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.initializeSchema();

    logger.debug("Run history store initialized.", { dbPath });
  }

  // ============================================================
  // Schema initialization
  // ============================================================

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        repo TEXT NOT NULL,
        started_at TEXT NOT NULL,
        status TEXT NOT NULL,
        dry_run INTEGER NOT NULL,
        severity_floor TEXT NOT NULL,
        alerts_found INTEGER NOT NULL,
        alerts_matching INTEGER NOT NULL,
        prs_created INTEGER NOT NULL,
        summary_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS alert_outcomes (
        run_id INTEGER NOT NULL REFERENCES runs (id) ON DELETE CASCADE,
        alert_id TEXT NOT NULL,
        severity TEXT NOT NULL,
        outcome TEXT NOT NULL,
        reason TEXT,
        package_name TEXT,
        fixed_version TEXT,
        branch TEXT,
        pr_number INTEGER,
        pr_url TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_alert_outcomes_alert
        ON alert_outcomes (alert_id);
    `);
  }

  // ============================================================
  // Recording
  // ============================================================

  recordRun(repo: string, summary: RunSummary): number {
    const insertRun = this.db.prepare(
      `INSERT INTO runs
       (repo, started_at, status, dry_run, severity_floor, alerts_found, alerts_matching, prs_created, summary_json)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertOutcome = this.db.prepare(
      `INSERT INTO alert_outcomes
       (run_id, alert_id, severity, outcome, reason, package_name, fixed_version, branch, pr_number, pr_url)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const transaction = this.db.transaction((): number => {
      const result = insertRun.run(
        repo,
        summary.timestamp,
        summary.status,
        summary.dryRun ? 1 : 0,
        summary.severityFloor,
        summary.counts.alertsFound,
        summary.counts.alertsMatchingFilter,
        summary.counts.prsCreated,
        JSON.stringify(summary)
      );
      const runId = Number(result.lastInsertRowid);
      for (const outcome of summary.outcomes) {
        insertOutcome.run(
          runId,
          outcome.alertId,
          outcome.severity,
          outcome.outcome,
          outcome.reason ?? null,
          outcome.packageName ?? null,
          outcome.fixedVersion ?? null,
          outcome.branch ?? null,
          outcome.pullRequest?.number ?? null,
          outcome.pullRequest?.url ?? null
        );
      }
      return runId;
    });

    const runId = transaction();

    logger.debug("Recorded run.", {
      runId,
      repo,
      status: summary.status,
      outcomes: summary.outcomes.length,
    });

    return runId;
  }

  // ============================================================
  // Queries
  // ============================================================

  getRecentRuns(repo: string, limit = 5): RunRecord[] {
    const rows = this.db
      .prepare<[string, number], RunRow>(
        `SELECT id, repo, started_at, status, dry_run, alerts_found, prs_created
         FROM runs WHERE repo = ? ORDER BY id DESC LIMIT ?`
      )
      .all(repo, limit);

    return rows.map((row) => ({
      id: row.id,
      repo: row.repo,
      startedAt: row.started_at,
      status: row.status,
      dryRun: row.dry_run === 1,
      alertsFound: row.alerts_found,
      prsCreated: row.prs_created,
    }));
  }

  getOutcomesForAlert(repo: string, alertId: string): AlertHistoryRecord[] {
    const rows = this.db
      .prepare<[string, string], AlertHistoryRow>(
        `SELECT o.run_id, r.started_at, r.dry_run, o.outcome, o.reason, o.package_name,
                o.fixed_version, o.branch, o.pr_number, o.pr_url
         FROM alert_outcomes o JOIN runs r ON r.id = o.run_id
         WHERE r.repo = ? AND o.alert_id = ?
         ORDER BY o.run_id DESC`
      )
      .all(repo, alertId);

    return rows.map((row) => ({
      runId: row.run_id,
      startedAt: row.started_at,
      dryRun: row.dry_run === 1,
      outcome: row.outcome,
      reason: row.reason,
      packageName: row.package_name,
      fixedVersion: row.fixed_version,
      branch: row.branch,
      prNumber: row.pr_number,
      prUrl: row.pr_url,
    }));
  }

  // ============================================================
  // Cleanup
  // ============================================================

  close(): void {
    this.db.close();
    logger.debug("Run history store closed.");
  }
}
