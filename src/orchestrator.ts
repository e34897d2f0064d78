// Remediation orchestrator.
// Fetches alerts, filters and orders them, then walks each eligible alert
// through extraction, manifest rewriting, resolver validation and
// publication, stopping once the pull request budget is spent. Every alert
// ends up in the run summary, either with a pull request or a skip reason.
// Limitations: Alerts are processed sequentially; one pull request per
//   alert, never grouped.

import { extractPackageInfo } from "./packageInfoExtractor.js";
import type { ChangeValidator } from "./changeValidator.js";
import { errorMessage, logger } from "./logger.js";
import { locateManifests } from "./manifestLocator.js";
import type { LocateOptions } from "./manifestLocator.js";
import { findPinnedVersion, updateManifest } from "./manifestUpdater.js";
import {
  branchNameFor,
  commitMessage,
  pullRequestBody,
  pullRequestLabels,
  pullRequestTitle,
  truncate,
} from "./pullRequestContent.js";
import type { RemediationDetails } from "./pullRequestContent.js";
import { RunReporter } from "./runReporter.js";
import type {
  Alert,
  AlertOutcome,
  AlertSeverity,
  AlertSource,
  ChangeSet,
  DiscoveredManifest,
  ExtractionResult,
  FileChange,
  LocateResult,
  ManifestSnapshot,
  PackageFact,
  PullRequestRef,
  RunLimits,
  RunSummary,
  Severity,
  SkipReason,
  VersionControlHost,
} from "./types.js";

export const SEVERITY_RANK: Record<AlertSeverity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
  unknown: 0,
};

const MAX_DETAIL_LENGTH = 1000;

const alertIdCollator = new Intl.Collator("en", { numeric: true });

export class AlertFetchError extends Error {
  readonly summary: RunSummary;

  constructor(message: string, summary: RunSummary) {
    super(message);
    this.name = "AlertFetchError";
    this.summary = summary;
  }
}

export interface OrchestratorOptions {
  repoDir: string;
  baseBranch: string;
  severityFloor: Severity;
  dryRun: boolean;
  limits: RunLimits;
  branchPrefix: string;
  prLabels: string[];
  ignorePatterns: string[];
}

export interface OrchestratorDeps {
  alertSource: AlertSource;
  host: VersionControlHost;
  validator: ChangeValidator;
  locate?: (root: string, options: LocateOptions) => Promise<LocateResult>;
  extract?: (alert: Alert, manifests: readonly ManifestSnapshot[]) => ExtractionResult;
  now?: () => Date;
}

export interface RunContext {
  readonly prsCreated: number;
  readonly halted: boolean;
  // Branches this run has opened, or would have opened in dry-run.
  readonly plannedBranches: ReadonlySet<string>;
}

interface StepResult {
  context: RunContext;
  outcome: AlertOutcome;
}

type FixablePackage = PackageFact & { fixedVersion: string };

type OutcomeDetails = Partial<
  Pick<AlertOutcome, "packageName" | "currentVersion" | "fixedVersion" | "cve" | "branch" | "files" | "lockfiles">
>;

export function compareAlerts(a: Alert, b: Alert): number {
  const bySeverity = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
  return bySeverity !== 0 ? bySeverity : alertIdCollator.compare(a.id, b.id);
}

export function filterReason(alert: Alert, floor: Severity): SkipReason | null {
  if (alert.kind !== "dependency") return "not-dependency-kind";
  if (alert.state !== "active") return "not-active";
  if (SEVERITY_RANK[alert.severity] < SEVERITY_RANK[floor]) return "below-severity-filter";
  return null;
}

export class RemediationOrchestrator {
  private options: OrchestratorOptions;
  private alertSource: AlertSource;
  private host: VersionControlHost;
  private validator: ChangeValidator;
  private locate: (root: string, options: LocateOptions) => Promise<LocateResult>;
  private extract: (alert: Alert, manifests: readonly ManifestSnapshot[]) => ExtractionResult;
  private now: () => Date;

  constructor(options: OrchestratorOptions, deps: OrchestratorDeps) {
    this.options = options;
    this.alertSource = deps.alertSource;
    this.host = deps.host;
    this.validator = deps.validator;
    this.locate = deps.locate ?? locateManifests;
    this.extract = deps.extract ?? ((alert, manifests) => extractPackageInfo(alert, manifests));
    this.now = deps.now ?? (() => new Date());
  }

  // ============================================================
  // Run
  // ============================================================

  async run(): Promise<RunSummary> {
    const { dryRun, severityFloor, limits } = this.options;
    const reporter = new RunReporter({ dryRun, severityFloor, limits, startedAt: this.now() });

    let alerts: Alert[];
    try {
      alerts = await this.alertSource.fetchAlerts();
    } catch (error) {
      const message = `Failed to fetch alerts from ${this.alertSource.name}: ${errorMessage(error)}`;
      logger.error(message);
      reporter.markFetchFailed(message);
      throw new AlertFetchError(message, reporter.snapshot());
    }
    reporter.setAlertsFound(alerts.length);

    const eligible: Alert[] = [];
    for (const alert of alerts) {
      const reason = filterReason(alert, severityFloor);
      if (reason) {
        reporter.record(this.skipped(alert, reason), false);
      } else {
        eligible.push(alert);
      }
    }
    eligible.sort(compareAlerts);
    reporter.setAlertsMatchingFilter(eligible.length);

    logger.info(`Processing ${eligible.length} of ${alerts.length} alert(s).`, {
      source: this.alertSource.name,
      severityFloor,
      maxPrs: limits.maxPrs,
      dryRun,
    });

    let context: RunContext = { prsCreated: 0, halted: false, plannedBranches: new Set() };
    let located: LocateResult | null = null;

    for (const alert of eligible) {
      if (context.halted || context.prsCreated >= limits.maxPrs) {
        if (!context.halted) {
          logger.info(`Reached maximum PR limit (${limits.maxPrs}); skipping remaining alerts.`);
          context = { ...context, halted: true };
        }
        reporter.record(
          this.skipped(alert, "run-limit-reached", `PR limit of ${limits.maxPrs} reached`),
          false
        );
        continue;
      }

      located ??= await this.locateOnce();

      const step = await this.processAlert(alert, context, located);
      reporter.record(step.outcome, true);
      context = step.context;
    }

    return reporter.snapshot();
  }

  // ============================================================
  // Per-alert pipeline
  // ============================================================

  private async processAlert(
    alert: Alert,
    context: RunContext,
    located: LocateResult
  ): Promise<StepResult> {
    const skip = (reason: SkipReason, detail?: string, extra: OutcomeDetails = {}): StepResult => {
      logger.info(`Skipping alert #${alert.id}: ${reason}.`, detail ? { detail } : undefined);
      return { context, outcome: { ...this.skipped(alert, reason, detail), ...extra } };
    };

    const manifests = located.status === "found" ? located.manifests : [];
    const extraction = this.extract(alert, manifests);
    if (extraction.status === "not-found") {
      return skip("extraction-failed", "No package name found in alert text");
    }

    const fact = extraction.fact;
    const factFields: OutcomeDetails = {
      packageName: fact.name,
      currentVersion: fact.currentVersion,
      cve: fact.cve,
    };

    const fixedVersion = fact.fixedVersion;
    if (fixedVersion === null) {
      return skip("no-fixed-version", `No fixed version found for ${fact.name}`, factFields);
    }
    const fixable: FixablePackage = { ...fact, fixedVersion };
    factFields.fixedVersion = fixedVersion;

    if (located.status === "not-found") {
      return skip("no-manifest-found", `No manifests under ${located.root}`, factFields);
    }
    if (located.status === "failed") {
      return skip(
        "no-manifest-found",
        truncate(`Failed to read manifests under ${located.root}: ${located.error}`, MAX_DETAIL_LENGTH),
        factFields
      );
    }

    const { matched, changes, currentVersion: onDisk } = this.planChanges(manifests, fixable);
    if (matched === 0) {
      return skip("package-not-in-any-manifest", `${fact.name} is not declared in any manifest`, factFields);
    }

    // Versions on disk are authoritative over those named in the alert.
    if (onDisk !== null && fact.currentVersion !== null && onDisk !== fact.currentVersion) {
      logger.debug("Alert names a different current version than the manifest.", {
        alertId: alert.id,
        alertVersion: fact.currentVersion,
        manifestVersion: onDisk,
      });
    }
    const currentVersion = onDisk ?? fact.currentVersion;
    factFields.currentVersion = currentVersion;

    if (changes.length === 0) {
      return skip(
        "already-remediated",
        `Every ${fact.name} entry already allows ${fixedVersion} or later`,
        factFields
      );
    }

    const { maxFilesPerPr, maxLinesPerFile } = this.options.limits;
    if (changes.length > maxFilesPerPr) {
      return skip(
        "too-many-files",
        `${changes.length} files would change; limit is ${maxFilesPerPr}`,
        factFields
      );
    }
    const oversized = changes.find((change) => change.changedLineCount > maxLinesPerFile);
    if (oversized) {
      return skip(
        "too-many-changed-lines",
        `${oversized.target.path} would change ${oversized.changedLineCount} lines; limit is ${maxLinesPerFile}`,
        factFields
      );
    }

    const branch = branchNameFor(fact.name, fixedVersion, this.options.branchPrefix);
    const files = changes.map((change) => change.target.path);
    const branchFields = { ...factFields, branch, files };

    const draft: ChangeSet = { alertId: alert.id, branch, files: changes, lockfiles: [] };
    const validation = await this.validator.validate(draft);
    if (!validation.ok) {
      return skip(
        "validation-failed",
        truncate(`${validation.path}: ${validation.diagnostics}`, MAX_DETAIL_LENGTH),
        branchFields
      );
    }
    const changeSet: ChangeSet = { ...draft, lockfiles: validation.lockfiles };
    const lockfiles = changeSet.lockfiles.map((lockfile) => lockfile.path);

    if (context.plannedBranches.has(branch)) {
      return skip("branch-already-exists", `Branch ${branch} was opened earlier in this run`, branchFields);
    }
    try {
      if (await this.host.branchExists(branch)) {
        return skip("branch-already-exists", `Branch ${branch} already exists`, branchFields);
      }
    } catch (error) {
      return skip("publish-failed", `Branch lookup failed: ${errorMessage(error)}`, branchFields);
    }

    const details: RemediationDetails = {
      alert,
      fact: { ...fixable, currentVersion },
      files,
      lockfiles,
    };
    const created: AlertOutcome = {
      alertId: alert.id,
      severity: alert.severity,
      title: alert.title,
      outcome: "pr-created",
      ...branchFields,
      lockfiles,
      pullRequest: null,
    };
    const nextContext: RunContext = {
      ...context,
      prsCreated: context.prsCreated + 1,
      plannedBranches: new Set([...context.plannedBranches, branch]),
    };

    if (this.options.dryRun) {
      logger.info(`[dry-run] Would create PR for alert #${alert.id}.`, {
        title: pullRequestTitle(fact.name, fixedVersion),
        branch,
        files,
      });
      return { context: nextContext, outcome: created };
    }

    try {
      const pullRequest = await this.publish(changeSet, details);
      logger.info(`Created PR #${pullRequest.number} for alert #${alert.id}.`, {
        url: pullRequest.url,
        branch,
      });
      return { context: nextContext, outcome: { ...created, pullRequest } };
    } catch (error) {
      logger.error(`Failed to publish remediation for alert #${alert.id}.`, {
        branch,
        error: errorMessage(error),
      });
      await this.discard(branch);
      return skip("publish-failed", truncate(errorMessage(error), MAX_DETAIL_LENGTH), {
        ...branchFields,
        lockfiles,
      });
    }
  }

  private async locateOnce(): Promise<LocateResult> {
    const root = this.options.repoDir;
    try {
      return await this.locate(root, { ignore: this.options.ignorePatterns });
    } catch (error) {
      logger.error("Failed to scan the checkout for manifests.", { root, error: errorMessage(error) });
      return { status: "failed", root, error: errorMessage(error) };
    }
  }

  private planChanges(
    manifests: readonly DiscoveredManifest[],
    fact: FixablePackage
  ): { matched: number; changes: FileChange[]; currentVersion: string | null } {
    let matched = 0;
    let currentVersion: string | null = null;
    const changes: FileChange[] = [];
    for (const manifest of manifests) {
      const update = updateManifest(manifest.dialect, manifest.content, fact.name, fact.fixedVersion);
      if (update.matchedEntries === 0) {
        continue;
      }
      matched++;
      const pinned = findPinnedVersion(manifest.dialect, manifest.content, fact.name);
      currentVersion ??= pinned;
      if (!update.changed) {
        continue;
      }
      changes.push({
        target: { path: manifest.path, dialect: manifest.dialect, currentVersion: pinned },
        oldContent: manifest.content,
        newContent: update.content,
        changedRanges: update.changedRanges,
        changedLineCount: update.changedLineCount,
      });
    }
    return { matched, changes, currentVersion };
  }

  private async publish(changeSet: ChangeSet, details: RemediationDetails): Promise<PullRequestRef> {
    const { baseBranch, prLabels } = this.options;
    const writes = [
      ...changeSet.files.map((change) => ({ path: change.target.path, content: change.newContent })),
      ...changeSet.lockfiles,
    ];

    await this.host.createBranch(changeSet.branch, baseBranch);
    const sha = await this.host.commitFiles(changeSet.branch, commitMessage(details), writes);
    logger.debug(`Committed ${writes.length} file(s) to ${changeSet.branch}.`, { sha });

    return this.host.openPullRequest({
      title: pullRequestTitle(details.fact.name, details.fact.fixedVersion),
      body: pullRequestBody(details),
      head: changeSet.branch,
      base: baseBranch,
      labels: pullRequestLabels(details.alert.severity, prLabels),
    });
  }

  private async discard(branch: string): Promise<void> {
    try {
      await this.host.discardBranch(branch, this.options.baseBranch);
    } catch (error) {
      logger.warn(`Failed to clean up branch ${branch}.`, { error: errorMessage(error) });
    }
  }

  private skipped(alert: Alert, reason: SkipReason, detail?: string): AlertOutcome {
    const outcome: AlertOutcome = {
      alertId: alert.id,
      severity: alert.severity,
      title: alert.title,
      outcome: "skipped",
      reason,
    };
    if (detail !== undefined) {
      outcome.detail = detail;
    }
    return outcome;
  }
}
