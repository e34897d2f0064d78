// Branch names, commit messages and pull request text for remediations.
// The branch name is a pure function of package and fixed version, which is
// what makes repeated runs idempotent.

import { normalizePackageName } from "./manifestUpdater.js";
import type { Alert, AlertSeverity, PackageFact } from "./types.js";

export const DEFAULT_BRANCH_PREFIX = "security/dependency-update";

// GitHub rejects pull request bodies over 65,536 characters.
export const MAX_DESCRIPTION_LENGTH = 60_000;

const SEVERITY_ICON: Record<AlertSeverity, string> = {
  critical: "\u{1F534}",
  high: "\u{1F7E0}",
  medium: "\u{1F7E1}",
  low: "\u{1F7E2}",
  unknown: "\u{26AB}",
};

function refSafe(text: string): string {
  return text
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/\.{2,}/g, ".")
    .replace(/^[-.]+|[-.]+$/g, "");
}

export function truncate(text: string, length: number): string {
  return text.length > length ? `${text.substring(0, length)}...` : text;
}

export function branchNameFor(
  packageName: string,
  fixedVersion: string,
  prefix: string = DEFAULT_BRANCH_PREFIX
): string {
  const cleanPrefix = prefix.replace(/\/+$/, "");
  return `${cleanPrefix}/${refSafe(normalizePackageName(packageName))}-${refSafe(fixedVersion)}`;
}

export interface RemediationDetails {
  alert: Alert;
  fact: PackageFact & { fixedVersion: string };
  files: string[];
  lockfiles: string[];
}

export function pullRequestTitle(packageName: string, fixedVersion: string): string {
  return `[Security] Update ${packageName} to ${fixedVersion}`;
}

export function commitMessage({ alert, fact, files, lockfiles }: RemediationDetails): string {
  let message = `fix(deps): update ${fact.name} to ${fact.fixedVersion}\n\n`;
  message += `Resolves security vulnerability (Alert #${alert.id})\n`;
  message += `Severity: ${alert.severity}\n`;
  if (fact.cve) {
    message += `CVE: ${fact.cve}\n`;
  }
  message += "\nUpdated files:\n";
  for (const file of [...files, ...lockfiles]) {
    message += `- ${file}\n`;
  }
  return message;
}

export function pullRequestLabels(severity: AlertSeverity, extra: readonly string[]): string[] {
  return [...new Set([...extra, `severity-${severity}`])];
}

export function pullRequestBody({ alert, fact, files, lockfiles }: RemediationDetails): string {
  const icon = SEVERITY_ICON[alert.severity];
  const fileList = files.map((file) => `- \`${file}\``).join("\n");
  const lockList = lockfiles.length > 0
    ? `\n\n### Regenerated Lockfiles\n${lockfiles.map((file) => `- \`${file}\``).join("\n")}`
    : "";
  const cveLine = fact.cve
    ? `| **CVE** | [${fact.cve}](https://www.cve.org/CVERecord?id=${fact.cve}) |\n`
    : "";

  return `## Security: Update ${fact.name}

| Field | Value |
|-------|-------|
| **Alert** | #${alert.id} |
| **Severity** | ${icon} ${alert.severity.toUpperCase()} |
${cveLine}| **Package** | \`${fact.name}\` |
| **Current Version** | \`${fact.currentVersion ?? "unknown"}\` |
| **Fixed Version** | \`${fact.fixedVersion}\` |

### Vulnerability Details

${truncate(alert.description.trim() || alert.title, MAX_DESCRIPTION_LENGTH)}

### Files Updated
${fileList}${lockList}

### Review Checklist

- [ ] Test suite passes with the upgraded dependency
- [ ] Changelog checked for breaking changes between \`${fact.currentVersion ?? "current"}\` and \`${fact.fixedVersion}\`
- [ ] Advisory details reviewed

---
<!-- dependency-alert-remediator | alert ${alert.id} | ${fact.name}==${fact.fixedVersion} -->
`;
}
