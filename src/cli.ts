// Command-line argument parsing.
// Flags override the matching environment settings; validation of the
// values themselves happens in loadConfig.

import { parseArgs } from "util";

import type { CliOptions } from "./config.js";

export const USAGE = `Usage: dependency-alert-remediator [options]

Options:
  --severity <level>   Minimum alert severity: critical, high, medium, low (default: high)
  --max-prs <n>        Maximum pull requests to open in one run (default: 10)
  --dry-run            Report what would change without touching the repository
  --alerts <file>      Read alerts from a JSON file instead of Dependabot
  --repo-dir <dir>     Repository checkout to remediate (default: current directory)
  --summary <file>     Where to write the JSON run summary
  -h, --help           Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type ParsedCli =
  | { command: "help" }
  | { command: "run"; options: CliOptions };

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      severity: { type: "string" },
      "max-prs": { type: "string" },
      "dry-run": { type: "boolean" },
      alerts: { type: "string" },
      "repo-dir": { type: "string" },
      summary: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseCliArgs(argv: string[]): ParsedCli {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(message);
  }

  if (values.help) {
    return { command: "help" };
  }

  const options: CliOptions = {};
  if (values.severity !== undefined) options.severity = values.severity;
  if (values["max-prs"] !== undefined) options.maxPrs = values["max-prs"];
  if (values["dry-run"]) options.dryRun = true;
  if (values.alerts !== undefined) options.alertsFile = values.alerts;
  if (values["repo-dir"] !== undefined) options.repoDir = values["repo-dir"];
  if (values.summary !== undefined) options.summaryPath = values.summary;

  return { command: "run", options };
}
