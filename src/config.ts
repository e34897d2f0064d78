// Configuration loader for the dependency alert remediator.
// Reads environment variables (with dotenv support), applies command-line
// overrides and validates required settings. Provides sensible defaults for
// optional values.
// Limitations: Only supports environment variable and CLI configuration,
//   no config file support.

import { config as dotenvConfig } from "dotenv";
import { homedir } from "os";
import { join, resolve } from "path";

import { DEFAULT_IGNORE_PATTERNS } from "./manifestLocator.js";
import { DEFAULT_BRANCH_PREFIX } from "./pullRequestContent.js";
import type { Config, LogFormat, LogLevel, Severity } from "./types.js";

const VALID_LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const VALID_LOG_FORMATS: readonly LogFormat[] = ["text", "json"];
export const VALID_SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low"];

export const SUMMARY_FILE_NAME = "dependency-fix-summary.json";

export interface CliOptions {
  severity?: string;
  maxPrs?: string;
  dryRun?: boolean;
  alertsFile?: string;
  repoDir?: string;
  summaryPath?: string;
}

type Env = Record<string, string | undefined>;

export function loadConfig(cli: CliOptions = {}, env: Env = process.env): Config {
  if (env === process.env) {
    dotenvConfig();
  }

  const githubRepo = env.REMEDIATOR_GITHUB_REPO?.trim() || env.GITHUB_REPOSITORY?.trim() || "";
  if (!githubRepo) {
    throw new Error(
      "Configuration error: REMEDIATOR_GITHUB_REPO (or GITHUB_REPOSITORY) must be set."
    );
  }
  if (!/^[\w.-]+\/[\w.-]+$/.test(githubRepo)) {
    throw new Error(
      `Configuration error: Expected repository in "owner/repo" form but got "${githubRepo}".`
    );
  }

  const repoDir = resolve(cli.repoDir?.trim() || env.REMEDIATOR_REPO_DIR?.trim() || ".");
  const baseBranch = env.REMEDIATOR_BASE_BRANCH?.trim() || null;

  const severityFloor = parseSeverity(cli.severity ?? env.REMEDIATOR_SEVERITY);
  const dryRun = cli.dryRun === true || parseBoolean(env.REMEDIATOR_DRY_RUN, false);

  const limits = {
    maxPrs: parsePositiveInt(cli.maxPrs ?? env.REMEDIATOR_MAX_PRS, 10),
    maxFilesPerPr: parsePositiveInt(env.REMEDIATOR_MAX_FILES_PER_PR, 10),
    maxLinesPerFile: parsePositiveInt(env.REMEDIATOR_MAX_LINES_PER_FILE, 50),
  };

  const branchPrefix =
    env.REMEDIATOR_BRANCH_PREFIX?.trim().replace(/\/+$/, "") || DEFAULT_BRANCH_PREFIX;

  const labels = parseCommaSeparated(env.REMEDIATOR_PR_LABELS);
  const prLabels = labels.length > 0 ? labels : ["security", "dependencies"];

  const ignorePatterns = [
    ...DEFAULT_IGNORE_PATTERNS,
    ...parseCommaSeparated(env.REMEDIATOR_IGNORE),
  ];

  const alertsFileValue = cli.alertsFile?.trim() || env.REMEDIATOR_ALERTS_FILE?.trim();
  const alertsFile = alertsFileValue ? resolve(alertsFileValue) : null;

  const defaultSummaryDir = env.PIPELINE_WORKSPACE?.trim() || process.cwd();
  const summaryPath = resolve(
    cli.summaryPath?.trim() ||
      env.REMEDIATOR_SUMMARY_PATH?.trim() ||
      join(defaultSummaryDir, SUMMARY_FILE_NAME)
  );

  const defaultDbPath = join(homedir(), ".dependency-alert-remediator", "state.db");
  const dbPath = env.REMEDIATOR_DB_PATH?.trim() || defaultDbPath;

  const pythonExecutable = env.REMEDIATOR_PYTHON?.trim() || "python3";
  const resolverTimeoutMs = parsePositiveInt(env.REMEDIATOR_RESOLVER_TIMEOUT, 300) * 1000;

  const logLevel = parseLogLevel(env.REMEDIATOR_LOG_LEVEL);
  const logFormat = parseLogFormat(env.REMEDIATOR_LOG_FORMAT);

  return {
    githubRepo,
    repoDir,
    baseBranch,
    severityFloor,
    dryRun,
    limits,
    branchPrefix,
    prLabels,
    ignorePatterns,
    alertsFile,
    summaryPath,
    dbPath,
    pythonExecutable,
    resolverTimeoutMs,
    logLevel,
    logFormat,
  };
}

export function splitRepo(githubRepo: string): { owner: string; repo: string } {
  const [owner, repo] = githubRepo.split("/");
  return { owner, repo };
}

function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === "") {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInt(
  value: string | undefined,
  defaultValue: number
): number {
  if (!value || value.trim() === "") {
    return defaultValue;
  }
  const trimmed = value.trim();
  const parsed = parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || isNaN(parsed) || parsed <= 0) {
    throw new Error(
      `Configuration error: Expected a positive integer but got "${value}".`
    );
  }
  return parsed;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value || value.trim() === "") {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(
    `Configuration error: Expected a boolean but got "${value}".`
  );
}

function isOneOf<T extends string>(values: readonly T[], candidate: string): candidate is T {
  return values.some((value) => value === candidate);
}

function parseSeverity(value: string | undefined): Severity {
  const severity = value?.trim().toLowerCase() || "high";
  if (!isOneOf(VALID_SEVERITIES, severity)) {
    throw new Error(
      `Configuration error: Invalid severity "${value}". Valid severities: ${VALID_SEVERITIES.join(", ")}`
    );
  }
  return severity;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase() || "info";
  if (!isOneOf(VALID_LOG_LEVELS, level)) {
    throw new Error(
      `Configuration error: Invalid log level "${value}". Valid levels: ${VALID_LOG_LEVELS.join(", ")}`
    );
  }
  return level;
}

function parseLogFormat(value: string | undefined): LogFormat {
  const format = value?.trim().toLowerCase() || "text";
  if (!isOneOf(VALID_LOG_FORMATS, format)) {
    throw new Error(
      `Configuration error: Invalid log format "${value}". Valid formats: ${VALID_LOG_FORMATS.join(", ")}`
    );
  }
  return format;
}
