// Local git operations on the repository checkout.
// Creates remediation branches from the remote base, writes and commits the
// rewritten files, pushes, and puts the checkout back on the base branch so
// every remediation starts from the same tree.
// Limitations: Assumes a single remote named "origin" and a git identity
//   already configured for the checkout.

import { execFile } from "child_process";
import { mkdir, writeFile } from "fs/promises";
import { dirname, isAbsolute, relative, resolve } from "path";
import { promisify } from "util";

import { logger } from "./logger.js";
import { withRetry } from "./retry.js";
import type { FileWrite } from "./types.js";

const execFileAsync = promisify(execFile);

export class GitWorkspace {
  private repoDir: string;
  private remote: string;

  constructor(repoDir: string, remote = "origin") {
    this.repoDir = repoDir;
    this.remote = remote;
  }

  // ============================================================
  // Branches
  // ============================================================

  async createBranch(branch: string, base: string): Promise<void> {
    if (await this.hasUncommittedChanges()) {
      throw new Error(`Working tree at ${this.repoDir} has uncommitted changes.`);
    }
    await withRetry(`git fetch ${base}`, () =>
      this.execGit(["fetch", this.remote, base])
    );

    // Manifests were read from the working tree; committing them on top of a
    // different base would revert whatever changed in between.
    const head = (await this.execGit(["rev-parse", "HEAD"])).trim();
    const remoteBase = (await this.execGit(["rev-parse", `${this.remote}/${base}`])).trim();
    if (head !== remoteBase) {
      throw new Error(
        `Checkout at ${this.repoDir} is not at ${this.remote}/${base}; update it before remediating.`
      );
    }

    await this.execGit(["checkout", "-B", branch, `${this.remote}/${base}`]);
  }

  async checkout(branch: string): Promise<void> {
    await this.execGit(["checkout", "-f", branch]);
  }

  async remoteBranchExists(branch: string): Promise<boolean> {
    const output = await withRetry(`git ls-remote ${branch}`, () =>
      this.execGit(["ls-remote", "--heads", this.remote, branch])
    );
    return output.trim().length > 0;
  }

  async discardBranch(branch: string, base: string): Promise<void> {
    await this.checkout(base);

    try {
      await this.execGit(["branch", "-D", branch]);
    } catch (error) {
      logger.debug(`No local branch ${branch} to delete.`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (await this.remoteBranchExists(branch)) {
      await this.execGit(["push", this.remote, "--delete", branch]);
    }
  }

  // ============================================================
  // Commit and push
  // ============================================================

  async commitFiles(branch: string, message: string, files: FileWrite[]): Promise<string> {
    for (const file of files) {
      const absolute = this.resolveInside(file.path);
      await mkdir(dirname(absolute), { recursive: true });
      await writeFile(absolute, file.content, "utf-8");
    }

    await this.execGit(["add", "--", ...files.map((file) => file.path)]);
    await this.execGit(["commit", "-m", message]);

    const sha = (await this.execGit(["rev-parse", "HEAD"])).trim();

    await withRetry(`git push ${branch}`, () =>
      this.execGit(["push", "-u", this.remote, branch])
    );

    return sha;
  }

  private resolveInside(path: string): string {
    const absolute = resolve(this.repoDir, path);
    const rel = relative(this.repoDir, absolute);
    if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
      throw new Error(`Refusing to write outside the repository: ${path}`);
    }
    return absolute;
  }

  private async hasUncommittedChanges(): Promise<boolean> {
    const result = await this.execGit(["status", "--porcelain", "--untracked-files=no"]);
    return result.trim().length > 0;
  }

  private async execGit(args: string[]): Promise<string> {
    logger.debug(`git ${args.join(" ")}`, { cwd: this.repoDir });
    const { stdout } = await execFileAsync("git", args, {
      cwd: this.repoDir,
      maxBuffer: 10 * 1024 * 1024,
      timeout: 2 * 60 * 1000,
    });
    return stdout;
  }
}
