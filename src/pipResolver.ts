// pip-backed dependency resolver.
// Checks that a rewritten manifest's requirements resolve by running
// `pip install --dry-run` against a scratch copy, and regenerates PEP 751
// lockfiles with `pip lock` where the repository already tracks one.
// Limitations: Requires network access to the package index. Option lines
//   (-r, -c, -e, --hash) are not carried into the scratch copy, so nested
//   requirement files are not resolved together with their parent.

import { execFile } from "child_process";
import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { basename, join, posix } from "path";
import { promisify } from "util";

import { logger } from "./logger.js";
import { listRequirements } from "./manifestUpdater.js";
import { isTransientFailure, withRetry } from "./retry.js";
import type {
  DependencyResolver,
  FileWrite,
  ManifestSnapshot,
  ResolverVerdict,
} from "./types.js";

const execFileAsync = promisify(execFile);

export interface PipResolverOptions {
  python: string;
  repoDir: string;
  timeoutMs: number;
}

export function lockfilePathFor(manifestPath: string): string {
  const dir = posix.dirname(manifestPath);
  const name = basename(manifestPath);
  const lockName =
    name === "pyproject.toml"
      ? "pylock.toml"
      : `pylock.${name.replace(/\.txt$/, "").toLowerCase().replace(/[^a-z0-9-]+/g, "-")}.toml`;
  return dir === "." ? lockName : posix.join(dir, lockName);
}

function commandOutput(error: unknown): string {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const { stderr } = error;
    if (typeof stderr === "string" && stderr.trim() !== "") {
      return stderr.trim();
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export class PipResolver implements DependencyResolver {
  private options: PipResolverOptions;

  constructor(options: PipResolverOptions) {
    this.options = options;
  }

  async validate(manifest: ManifestSnapshot): Promise<ResolverVerdict> {
    const requirements = listRequirements(manifest.dialect, manifest.content);
    if (requirements.length === 0) {
      return { ok: true, diagnostics: "" };
    }

    return this.withScratchRequirements(requirements, async (file) => {
      try {
        await this.runPip(`pip check of ${manifest.path}`, [
          "install",
          "--dry-run",
          "--ignore-installed",
          "--quiet",
          "-r",
          file,
        ]);
        return { ok: true, diagnostics: "" };
      } catch (error) {
        if (isTransientFailure(error)) {
          throw error;
        }
        return { ok: false, diagnostics: commandOutput(error) };
      }
    });
  }

  async generateLockfile(manifest: ManifestSnapshot): Promise<FileWrite | null> {
    const lockPath = lockfilePathFor(manifest.path);
    if (!existsSync(join(this.options.repoDir, lockPath))) {
      logger.debug("No tracked lockfile for manifest; skipping lock.", {
        manifest: manifest.path,
        lockfile: lockPath,
      });
      return null;
    }

    const requirements = listRequirements(manifest.dialect, manifest.content);
    return this.withScratchRequirements(requirements, async (file, dir) => {
      const output = join(dir, "pylock.toml");
      await this.runPip(`pip lock of ${manifest.path}`, [
        "lock",
        "--quiet",
        "-o",
        output,
        "-r",
        file,
      ]);
      return { path: lockPath, content: await readFile(output, "utf-8") };
    });
  }

  private async withScratchRequirements<T>(
    requirements: string[],
    fn: (file: string, dir: string) => Promise<T>
  ): Promise<T> {
    const dir = await mkdtemp(join(tmpdir(), "remediator-"));
    try {
      const file = join(dir, "requirements.txt");
      await writeFile(file, `${requirements.join("\n")}\n`, "utf-8");
      return await fn(file, dir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private async runPip(operation: string, args: string[]): Promise<string> {
    const fullArgs = ["-m", "pip", ...args, "--disable-pip-version-check"];
    return withRetry(operation, async () => {
      logger.debug(`${this.options.python} ${fullArgs.join(" ")}`);
      const { stdout } = await execFileAsync(this.options.python, fullArgs, {
        cwd: this.options.repoDir,
        maxBuffer: 10 * 1024 * 1024,
        timeout: this.options.timeoutMs,
      });
      return stdout;
    });
  }
}
