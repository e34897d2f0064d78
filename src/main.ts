#!/usr/bin/env node
// Main entry point for the dependency alert remediator.
// Runs a single remediation pass: fetches open vulnerability alerts, opens
// one pinned-version pull request per fixable alert, and writes the run
// summary to disk and to the run history database.
// Exit codes: 0 when the run completes (even with zero PRs), 1 when alerts
//   could not be fetched, 2 on configuration, usage or startup errors.
// Limitations: Single-threaded; one run per machine at a time.

import { execFile } from "child_process";
import { closeSync, mkdirSync, openSync, readFileSync, unlinkSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { promisify } from "util";

import { ChangeValidator } from "./changeValidator.js";
import { parseCliArgs, USAGE } from "./cli.js";
import { loadConfig, splitRepo } from "./config.js";
import { FileAlertSource } from "./fileAlertSource.js";
import { GitHubAlertSource } from "./githubAlertSource.js";
import { GitHubClient } from "./githubClient.js";
import { GitHubHost } from "./gitHubHost.js";
import { GitWorkspace } from "./gitWorkspace.js";
import { errorMessage, logger, setLogFormat, setLogLevel } from "./logger.js";
import { AlertFetchError, RemediationOrchestrator } from "./orchestrator.js";
import { PipResolver } from "./pipResolver.js";
import { formatRunSummary, writeRunSummary } from "./runReporter.js";
import { RunHistoryStore } from "./state.js";
import type { AlertSource, Config, RunSummary } from "./types.js";

const execFileAsync = promisify(execFile);

const EXIT_OK = 0;
const EXIT_FETCH_FAILED = 1;
const EXIT_USAGE = 2;

class Remediator {
  private config: Config;
  private history: RunHistoryStore;
  private owner: string;
  private repo: string;

  constructor(config: Config) {
    this.config = config;
    this.history = new RunHistoryStore(config.dbPath);
    const { owner, repo } = splitRepo(config.githubRepo);
    this.owner = owner;
    this.repo = repo;
  }

  // ============================================================
  // Prerequisites check
  // ============================================================

  private async verifyPrerequisites(): Promise<void> {
    try {
      await execFileAsync("git", ["--version"]);
    } catch {
      throw new Error("git is not available. Install git first.");
    }

    try {
      const { stdout } = await execFileAsync(this.config.pythonExecutable, ["-m", "pip", "--version"]);
      logger.debug("pip version.", { version: stdout.trim() });
    } catch {
      throw new Error(
        `pip is not available via "${this.config.pythonExecutable} -m pip". Set REMEDIATOR_PYTHON to a Python with pip installed.`
      );
    }
  }

  // ============================================================
  // Wiring
  // ============================================================

  async createOrchestrator(): Promise<RemediationOrchestrator> {
    logger.info("Configuration loaded.", {
      repo: this.config.githubRepo,
      repoDir: this.config.repoDir,
      severityFloor: this.config.severityFloor,
      limits: this.config.limits,
      dryRun: this.config.dryRun,
      alertsFile: this.config.alertsFile ?? "(dependabot)",
    });

    await this.verifyPrerequisites();

    const github = await GitHubClient.createFromGhCli();
    const baseBranch =
      this.config.baseBranch ?? (await github.getDefaultBranch(this.owner, this.repo));

    const alertSource: AlertSource = this.config.alertsFile
      ? new FileAlertSource(this.config.alertsFile)
      : new GitHubAlertSource(github, this.owner, this.repo);

    const workspace = new GitWorkspace(this.config.repoDir);
    const resolver = new PipResolver({
      python: this.config.pythonExecutable,
      repoDir: this.config.repoDir,
      timeoutMs: this.config.resolverTimeoutMs,
    });

    this.logPreviousRun();

    return new RemediationOrchestrator(
      {
        repoDir: this.config.repoDir,
        baseBranch,
        severityFloor: this.config.severityFloor,
        dryRun: this.config.dryRun,
        limits: this.config.limits,
        branchPrefix: this.config.branchPrefix,
        prLabels: this.config.prLabels,
        ignorePatterns: this.config.ignorePatterns,
      },
      {
        alertSource,
        host: new GitHubHost(github, workspace, this.owner, this.repo),
        validator: new ChangeValidator(resolver),
      }
    );
  }

  // ============================================================
  // Single run
  // ============================================================

  async run(orchestrator: RemediationOrchestrator): Promise<number> {
    let summary: RunSummary;
    try {
      summary = await orchestrator.run();
    } catch (error) {
      if (error instanceof AlertFetchError) {
        await this.persist(error.summary);
        return EXIT_FETCH_FAILED;
      }
      throw error;
    }

    await this.persist(summary);
    this.logEarlierPullRequests(summary);
    logger.info(formatRunSummary(summary));
    return EXIT_OK;
  }

  private async persist(summary: RunSummary): Promise<void> {
    try {
      await writeRunSummary(this.config.summaryPath, summary);
      logger.info(`Run summary written to ${this.config.summaryPath}.`);
    } catch (error) {
      logger.warn("Failed to write run summary.", {
        path: this.config.summaryPath,
        error: errorMessage(error),
      });
    }

    try {
      this.history.recordRun(this.config.githubRepo, summary);
    } catch (error) {
      logger.warn("Failed to record run history.", { error: errorMessage(error) });
    }
  }

  private logPreviousRun(): void {
    const [previous] = this.history.getRecentRuns(this.config.githubRepo, 1);
    if (previous) {
      logger.info(`Previous run ${previous.startedAt}: ${previous.status}.`, {
        dryRun: previous.dryRun,
        alertsFound: previous.alertsFound,
        prsCreated: previous.prsCreated,
      });
    }
  }

  private logEarlierPullRequests(summary: RunSummary): void {
    for (const outcome of summary.outcomes) {
      if (outcome.reason !== "branch-already-exists") continue;
      const earlier = this.history
        .getOutcomesForAlert(this.config.githubRepo, outcome.alertId)
        .find((record) => record.prUrl !== null);
      if (earlier) {
        logger.info(`Alert #${outcome.alertId} already has PR #${earlier.prNumber}.`, {
          url: earlier.prUrl,
          openedAt: earlier.startedAt,
        });
      }
    }
  }

  close(): void {
    this.history.close();
  }
}

// ============================================================
// Single-instance lock
// ============================================================

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

function writeLock(lockPath: string): void {
  const fd = openSync(lockPath, "wx");
  writeFileSync(fd, String(process.pid));
  closeSync(fd);
}

function acquireLock(dbPath: string): string {
  const lockDir = dbPath === ":memory:" ? process.cwd() : dirname(dbPath);
  mkdirSync(lockDir, { recursive: true });
  const lockPath = join(lockDir, "remediator.lock");
  try {
    writeLock(lockPath);
    return lockPath;
  } catch (error) {
    if (!isAlreadyExists(error)) {
      throw error;
    }

    const existingPid = readFileSync(lockPath, "utf-8").trim();
    const pid = parseInt(existingPid, 10);
    if (!isNaN(pid) && isProcessRunning(pid)) {
      throw new Error(
        `Another run is already in progress (PID ${existingPid}, lock: ${lockPath}).`
      );
    }

    // Stale lock file from a crashed process; reclaim it.
    try {
      unlinkSync(lockPath);
      writeLock(lockPath);
    } catch {
      throw new Error(`Another run is already in progress (lock: ${lockPath}).`);
    }
    return lockPath;
  }
}

function releaseLock(lockPath: string): void {
  try {
    unlinkSync(lockPath);
  } catch (error) {
    logger.debug("Lock file already removed.", { lockPath, error: errorMessage(error) });
  }
}

// ============================================================
// Entry point
// ============================================================

async function main(argv: string[]): Promise<number> {
  let config: Config;
  try {
    const cli = parseCliArgs(argv);
    if (cli.command === "help") {
      console.log(USAGE);
      return EXIT_OK;
    }
    config = loadConfig(cli.options);
  } catch (error) {
    console.error(`[FATAL] ${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  setLogLevel(config.logLevel);
  setLogFormat(config.logFormat);

  let lockPath: string | null = null;
  let remediator: Remediator | null = null;
  try {
    lockPath = acquireLock(config.dbPath);
    remediator = new Remediator(config);

    let orchestrator: RemediationOrchestrator;
    try {
      orchestrator = await remediator.createOrchestrator();
    } catch (error) {
      logger.error("Startup failed.", { error: errorMessage(error) });
      return EXIT_USAGE;
    }

    return await remediator.run(orchestrator);
  } catch (error) {
    console.error(`[FATAL] ${errorMessage(error)}`);
    return EXIT_USAGE;
  } finally {
    remediator?.close();
    if (lockPath) releaseLock(lockPath);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[FATAL] ${errorMessage(error)}`);
    process.exitCode = EXIT_USAGE;
  }
);
