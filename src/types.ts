// Data models and type definitions for the dependency alert remediator.
// Defines shared interfaces for configuration, vulnerability alerts,
// extracted package facts, manifest edits, and the run summary.
// Limitations: Only Python manifests (requirements files and
//   pyproject.toml) are modelled.

// ============================================================
// Configuration
// ============================================================

export interface Config {
  githubRepo: string;
  repoDir: string;
  baseBranch: string | null;
  severityFloor: Severity;
  dryRun: boolean;
  limits: RunLimits;
  branchPrefix: string;
  prLabels: string[];
  ignorePatterns: string[];
  alertsFile: string | null;
  summaryPath: string;
  dbPath: string;
  pythonExecutable: string;
  resolverTimeoutMs: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "text" | "json";

export interface RunLimits {
  maxPrs: number;
  maxFilesPerPr: number;
  maxLinesPerFile: number;
}

// ============================================================
// Alerts
// ============================================================

export type Severity = "critical" | "high" | "medium" | "low";

export type AlertSeverity = Severity | "unknown";

export type AlertKind = "dependency" | "code" | "other";

export interface Alert {
  readonly id: string;
  readonly kind: AlertKind;
  readonly severity: AlertSeverity;
  readonly state: string;
  readonly title: string;
  readonly description: string;
  readonly codeSnippet?: string;
  readonly recommendations?: readonly string[];
}

export interface AlertSource {
  readonly name: string;
  fetchAlerts(): Promise<Alert[]>;
}

// ============================================================
// Extraction
// ============================================================

export type FactConfidence = "high" | "medium" | "low";

export interface PackageFact {
  name: string;
  currentVersion: string | null;
  fixedVersion: string | null;
  cve: string | null;
  sources: {
    name: string;
    currentVersion: string | null;
    fixedVersion: string | null;
    cve: string | null;
  };
  confidence: FactConfidence;
}

export type ExtractionResult =
  | { status: "found"; fact: PackageFact }
  | { status: "not-found"; reason: "no-package-name" };

// ============================================================
// Manifests
// ============================================================

export type ManifestDialect = "requirements-line" | "pyproject-table";

export interface DiscoveredManifest {
  path: string;
  absolutePath: string;
  dialect: ManifestDialect;
  content: string;
}

export type LocateResult =
  | { status: "found"; manifests: DiscoveredManifest[] }
  | { status: "not-found"; root: string }
  | { status: "failed"; root: string; error: string };

export interface ManifestTarget {
  path: string;
  dialect: ManifestDialect;
  currentVersion: string | null;
}

export interface LineRange {
  start: number;
  end: number;
}

export interface ManifestUpdate {
  changed: boolean;
  matchedEntries: number;
  content: string;
  changedRanges: LineRange[];
  changedLineCount: number;
  previousVersions: string[];
}

// ============================================================
// Change sets
// ============================================================

export interface FileWrite {
  path: string;
  content: string;
}

export interface FileChange {
  target: ManifestTarget;
  oldContent: string;
  newContent: string;
  changedRanges: LineRange[];
  changedLineCount: number;
}

export interface ChangeSet {
  alertId: string;
  branch: string;
  files: FileChange[];
  lockfiles: FileWrite[];
}

// ============================================================
// External collaborators
// ============================================================

export interface ManifestSnapshot {
  path: string;
  dialect: ManifestDialect;
  content: string;
}

export interface ResolverVerdict {
  ok: boolean;
  diagnostics: string;
}

export interface DependencyResolver {
  validate(manifest: ManifestSnapshot): Promise<ResolverVerdict>;
  generateLockfile(manifest: ManifestSnapshot): Promise<FileWrite | null>;
}

export interface PullRequestRequest {
  title: string;
  body: string;
  head: string;
  base: string;
  labels: string[];
}

export interface PullRequestRef {
  number: number;
  url: string;
}

export interface VersionControlHost {
  branchExists(branch: string): Promise<boolean>;
  createBranch(branch: string, base: string): Promise<void>;
  commitFiles(branch: string, message: string, files: FileWrite[]): Promise<string>;
  openPullRequest(request: PullRequestRequest): Promise<PullRequestRef>;
  discardBranch(branch: string, base: string): Promise<void>;
}

// ============================================================
// Run outcome
// ============================================================

export type SkipReason =
  | "not-dependency-kind"
  | "not-active"
  | "below-severity-filter"
  | "extraction-failed"
  | "no-fixed-version"
  | "no-manifest-found"
  | "package-not-in-any-manifest"
  | "already-remediated"
  | "too-many-files"
  | "too-many-changed-lines"
  | "validation-failed"
  | "branch-already-exists"
  | "publish-failed"
  | "run-limit-reached";

export interface AlertOutcome {
  alertId: string;
  severity: AlertSeverity;
  title: string;
  outcome: "pr-created" | "skipped";
  reason?: SkipReason;
  detail?: string;
  packageName?: string;
  currentVersion?: string | null;
  fixedVersion?: string;
  cve?: string | null;
  branch?: string;
  files?: string[];
  lockfiles?: string[];
  pullRequest?: PullRequestRef | null;
}

export type RunStatus = "success" | "no-prs-created" | "dry-run" | "fetch-failed";

export interface RunCounts {
  alertsFound: number;
  alertsMatchingFilter: number;
  alertsProcessed: number;
  prsCreated: number;
  skipped: Partial<Record<SkipReason, number>>;
}

export interface RunSummary {
  timestamp: string;
  dryRun: boolean;
  status: RunStatus;
  severityFloor: Severity;
  limits: RunLimits;
  counts: RunCounts;
  outcomes: AlertOutcome[];
  error?: string;
}
