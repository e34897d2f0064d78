// GitHub API client for the dependency alert remediator.
// Wraps Octokit to provide typed operations for reading Dependabot alerts,
// checking remediation branches and opening labelled pull requests.
// Uses GH_TOKEN, GITHUB_TOKEN or the gh CLI auth token for authentication.
// Limitations: Rate limiting and transient 5xx errors are handled by
//   Octokit's bundled throttling and retry plugins.

import { execFile } from "child_process";
import { Octokit, RequestError } from "octokit";
import { promisify } from "util";

import { logger } from "./logger.js";
import type { PullRequestRef, PullRequestRequest } from "./types.js";

const execFileAsync = promisify(execFile);

const MAX_RATE_LIMIT_RETRIES = 4;

export interface DependabotAlertRecord {
  number: number;
  state: string;
  packageName: string | null;
  ecosystem: string | null;
  manifestPath: string | null;
  severity: string;
  summary: string;
  description: string;
  ghsaId: string;
  cveId: string | null;
  vulnerableRange: string | null;
  firstPatchedVersion: string | null;
  htmlUrl: string;
}

export class GitHubClient {
  private octokit: Octokit;

  constructor(token?: string) {
    this.octokit = new Octokit({
      auth: token,
      throttle: {
        onRateLimit: (retryAfter, options, _octokit, retryCount) => {
          logger.warn(`Rate limit hit for ${options.method} ${options.url}.`, {
            retryAfter,
            retry: retryCount + 1,
          });
          return retryCount < MAX_RATE_LIMIT_RETRIES;
        },
        onSecondaryRateLimit: (retryAfter, options) => {
          logger.warn(`Secondary rate limit for ${options.method} ${options.url}.`, {
            retryAfter,
          });
          return true;
        },
      },
      retry: { doNotRetry: ["429"] },
    });
  }

  // ============================================================
  // Factory: Create client using GH_TOKEN, GITHUB_TOKEN or gh CLI
  // ============================================================

  static async createFromGhCli(env: Record<string, string | undefined> = process.env): Promise<GitHubClient> {
    for (const variable of ["GH_TOKEN", "GITHUB_TOKEN"]) {
      const envToken = env[variable]?.trim();
      if (envToken) {
        validateGitHubToken(envToken, variable);
        logger.info(`GitHub client authenticated via ${variable} environment variable.`);
        return new GitHubClient(envToken);
      }
    }

    try {
      const { stdout } = await execFileAsync("gh", ["auth", "token"]);
      const token = stdout.trim();
      if (!token) {
        throw new Error("gh auth token returned empty string.");
      }
      logger.info("GitHub client authenticated via gh CLI.");
      return new GitHubClient(token);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(
        `Failed to get GitHub token. Set GH_TOKEN environment variable or run 'gh auth login'. Error: ${message}`
      );
    }
  }

  // ============================================================
  // Dependabot alerts
  // ============================================================

  async listOpenDependabotAlerts(
    owner: string,
    repo: string,
    ecosystem = "pip"
  ): Promise<DependabotAlertRecord[]> {
    logger.debug("Listing open Dependabot alerts.", { owner, repo, ecosystem });

    const alerts = await this.octokit.paginate(
      this.octokit.rest.dependabot.listAlertsForRepo,
      { owner, repo, state: "open", ecosystem, per_page: 100 }
    );

    logger.debug(`Found ${alerts.length} open Dependabot alert(s).`, { owner, repo });

    return alerts.map((alert) => ({
      number: alert.number,
      state: alert.state,
      packageName: alert.dependency.package?.name ?? null,
      ecosystem: alert.dependency.package?.ecosystem ?? null,
      manifestPath: alert.dependency.manifest_path ?? null,
      severity: alert.security_advisory.severity,
      summary: alert.security_advisory.summary,
      description: alert.security_advisory.description,
      ghsaId: alert.security_advisory.ghsa_id,
      cveId: alert.security_advisory.cve_id ?? null,
      vulnerableRange: alert.security_vulnerability.vulnerable_version_range ?? null,
      firstPatchedVersion: alert.security_vulnerability.first_patched_version?.identifier ?? null,
      htmlUrl: alert.html_url,
    }));
  }

  // ============================================================
  // Repository and branches
  // ============================================================

  async getDefaultBranch(owner: string, repo: string): Promise<string> {
    const { data } = await this.octokit.rest.repos.get({ owner, repo });
    return data.default_branch;
  }

  async branchExists(owner: string, repo: string, branch: string): Promise<boolean> {
    try {
      await this.octokit.rest.repos.getBranch({ owner, repo, branch });
      return true;
    } catch (error) {
      if (error instanceof RequestError && error.status === 404) {
        return false;
      }
      throw error;
    }
  }

  // ============================================================
  // Pull Requests
  // ============================================================

  async findOpenPullRequest(
    owner: string,
    repo: string,
    head: string
  ): Promise<PullRequestRef | null> {
    const { data } = await this.octokit.rest.pulls.list({
      owner,
      repo,
      state: "open",
      head: `${owner}:${head}`,
      per_page: 1,
    });
    const pr = data[0];
    return pr ? { number: pr.number, url: pr.html_url } : null;
  }

  async createPullRequest(
    owner: string,
    repo: string,
    request: PullRequestRequest
  ): Promise<PullRequestRef> {
    logger.debug("Creating pull request.", { owner, repo, head: request.head });

    const { data } = await this.octokit.rest.pulls.create({
      owner,
      repo,
      title: request.title,
      body: request.body,
      head: request.head,
      base: request.base,
    });

    if (request.labels.length > 0) {
      try {
        await this.octokit.rest.issues.addLabels({
          owner,
          repo,
          issue_number: data.number,
          labels: request.labels,
        });
      } catch (error) {
        logger.warn(`Failed to label PR #${data.number}.`, {
          labels: request.labels,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return { number: data.number, url: data.html_url };
  }
}

// ============================================================
// Token validation utility
// ============================================================

export function validateGitHubToken(token: string, variable = "GH_TOKEN"): void {
  const validPrefixes = ["ghp_", "gho_", "ghu_", "ghs_", "ghr_", "github_pat_"];
  const hasValidPrefix = validPrefixes.some((prefix) => token.startsWith(prefix));
  if (!hasValidPrefix) {
    throw new Error(
      `Invalid ${variable} format. GitHub tokens should start with one of: ${validPrefixes.join(", ")}`
    );
  }
}
