// Manifest discovery for a repository checkout.
// Walks the tree below a root, prunes anything matched by the ignore globs,
// and returns every recognised Python manifest in a stable order so that
// repeated runs produce identical change sets.
// Limitations: Symlinked directories are not followed.

import type { Dirent } from "fs";
import { readdir, readFile } from "fs/promises";
import { minimatch } from "minimatch";
import { basename, dirname, join, posix, relative, sep } from "path";

import { logger } from "./logger.js";
import type { DiscoveredManifest, LocateResult, ManifestDialect } from "./types.js";

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  "**/.git",
  "**/.hg",
  "**/.svn",
  "**/node_modules",
  "**/__pycache__",
  "**/.tox",
  "**/.nox",
  "**/.mypy_cache",
  "**/.pytest_cache",
  "**/venv",
  "**/.venv",
  "**/env",
  "**/site-packages",
  "**/dist",
  "**/build",
];

export interface LocateOptions {
  ignore?: readonly string[];
}

export function detectDialect(relativePath: string): ManifestDialect | null {
  const name = basename(relativePath);
  if (name === "pyproject.toml") {
    return "pyproject-table";
  }
  if (!name.endsWith(".txt")) {
    return null;
  }
  if (name.startsWith("requirements") || basename(dirname(relativePath)) === "requirements") {
    return "requirements-line";
  }
  return null;
}

function isIgnored(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
}

function toPosix(path: string): string {
  return path.split(sep).join(posix.sep);
}

export async function locateManifests(
  root: string,
  options: LocateOptions = {}
): Promise<LocateResult> {
  const ignore = options.ignore ?? DEFAULT_IGNORE_PATTERNS;
  const found: Array<{ path: string; dialect: ManifestDialect }> = [];

  // Only the root must be readable; unreadable subdirectories are skipped.
  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === root) {
        throw error;
      }
      logger.warn("Skipping unreadable directory.", {
        dir: toPosix(relative(root, dir)),
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    for (const entry of entries) {
      const absolute = join(dir, entry.name);
      const rel = toPosix(relative(root, absolute));
      if (isIgnored(rel, ignore)) {
        continue;
      }
      if (entry.isDirectory()) {
        await walk(absolute);
      } else if (entry.isFile()) {
        const dialect = detectDialect(rel);
        if (dialect) {
          found.push({ path: rel, dialect });
        }
      }
    }
  }

  await walk(root);

  if (found.length === 0) {
    logger.debug("No manifests found.", { root });
    return { status: "not-found", root };
  }

  found.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  const manifests: DiscoveredManifest[] = [];
  for (const { path, dialect } of found) {
    const absolutePath = join(root, path);
    manifests.push({
      path,
      absolutePath,
      dialect,
      content: await readFile(absolutePath, "utf-8"),
    });
  }

  logger.debug(`Found ${manifests.length} manifest(s).`, {
    root,
    manifests: manifests.map((m) => m.path),
  });

  return { status: "found", manifests };
}
