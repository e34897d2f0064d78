// Version-control host backed by a local git checkout and the GitHub API.
// Branch and pull request lookups go to the API; commits are made locally
// and pushed. After a commit the checkout returns to the branch it was cut
// from.

import type { GitHubClient } from "./githubClient.js";
import type { GitWorkspace } from "./gitWorkspace.js";
import { logger } from "./logger.js";
import type {
  FileWrite,
  PullRequestRef,
  PullRequestRequest,
  VersionControlHost,
} from "./types.js";

export class GitHubHost implements VersionControlHost {
  private client: GitHubClient;
  private workspace: GitWorkspace;
  private owner: string;
  private repo: string;
  private branchBases = new Map<string, string>();

  constructor(client: GitHubClient, workspace: GitWorkspace, owner: string, repo: string) {
    this.client = client;
    this.workspace = workspace;
    this.owner = owner;
    this.repo = repo;
  }

  async branchExists(branch: string): Promise<boolean> {
    if (await this.client.branchExists(this.owner, this.repo, branch)) {
      return true;
    }
    const openPr = await this.client.findOpenPullRequest(this.owner, this.repo, branch);
    if (openPr) {
      logger.debug(`Open PR #${openPr.number} already uses ${branch}.`);
      return true;
    }
    return false;
  }

  async createBranch(branch: string, base: string): Promise<void> {
    await this.workspace.createBranch(branch, base);
    this.branchBases.set(branch, base);
  }

  async commitFiles(branch: string, message: string, files: FileWrite[]): Promise<string> {
    const sha = await this.workspace.commitFiles(branch, message, files);
    const base = this.branchBases.get(branch);
    if (base) {
      await this.workspace.checkout(base);
    }
    return sha;
  }

  async openPullRequest(request: PullRequestRequest): Promise<PullRequestRef> {
    const pr = await this.client.createPullRequest(this.owner, this.repo, request);
    this.branchBases.delete(request.head);
    return pr;
  }

  async discardBranch(branch: string, base: string): Promise<void> {
    this.branchBases.delete(branch);
    await this.workspace.discardBranch(branch, base);
  }
}
