// Dependabot alert source.
// Converts GitHub's structured Dependabot alerts into the free-text alert
// shape the extractor reads, so both alert sources flow through the same
// extraction path.

import type { DependabotAlertRecord, GitHubClient } from "./githubClient.js";
import type { Alert, AlertSeverity, AlertSource } from "./types.js";

const SEVERITIES: readonly AlertSeverity[] = ["critical", "high", "medium", "low"];

function toSeverity(value: string): AlertSeverity {
  const normalized = value.trim().toLowerCase();
  return SEVERITIES.find((severity) => severity === normalized) ?? "unknown";
}

// The title names only the affected package, so package names that appear
// in the advisory summary cannot be mistaken for it during extraction.
function alertTitle(record: DependabotAlertRecord): string {
  if (!record.packageName) {
    return record.summary;
  }
  return `Update ${record.packageName} to fix ${record.cveId ?? record.ghsaId}`;
}

export function mapDependabotAlert(record: DependabotAlertRecord): Alert {
  const description: string[] = [];
  if (record.packageName && record.summary.trim()) {
    description.push(record.summary.trim(), "");
  }
  if (record.packageName) {
    description.push(`Vulnerable package: ${record.packageName}`);
  }
  if (record.vulnerableRange) {
    description.push(`Affected versions: ${record.vulnerableRange}`);
  }
  if (record.manifestPath) {
    description.push(`Manifest: ${record.manifestPath}`);
  }
  const ids = [record.ghsaId, record.cveId].filter((id): id is string => Boolean(id));
  if (ids.length > 0) {
    description.push(`Advisory: ${ids.join(", ")}`);
  }
  if (record.description.trim()) {
    description.push("", record.description.trim());
  }

  return {
    id: String(record.number),
    kind: "dependency",
    severity: toSeverity(record.severity),
    state: record.state === "open" ? "active" : record.state,
    title: alertTitle(record),
    description: description.join("\n"),
    recommendations: record.firstPatchedVersion
      ? [`Upgrade to version ${record.firstPatchedVersion} or later`]
      : [],
  };
}

export class GitHubAlertSource implements AlertSource {
  readonly name = "dependabot";
  private client: GitHubClient;
  private owner: string;
  private repo: string;

  constructor(client: GitHubClient, owner: string, repo: string) {
    this.client = client;
    this.owner = owner;
    this.repo = repo;
  }

  async fetchAlerts(): Promise<Alert[]> {
    const records = await this.client.listOpenDependabotAlerts(this.owner, this.repo);
    return records.map(mapDependabotAlert);
  }
}
