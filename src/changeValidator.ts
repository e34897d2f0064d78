// Change set validation against an external dependency resolver.
// Every rewritten manifest must resolve cleanly before anything is written;
// a single failure rejects the whole change set. On success the resolver
// regenerates lockfiles, which are returned for the caller to commit.

import { errorMessage, logger } from "./logger.js";
import type { ChangeSet, DependencyResolver, FileWrite } from "./types.js";

export type ValidationResult =
  | { ok: true; lockfiles: FileWrite[] }
  | { ok: false; path: string; diagnostics: string };

export class ChangeValidator {
  private resolver: DependencyResolver;

  constructor(resolver: DependencyResolver) {
    this.resolver = resolver;
  }

  async validate(changeSet: ChangeSet): Promise<ValidationResult> {
    const snapshots = changeSet.files.map((file) => ({
      path: file.target.path,
      dialect: file.target.dialect,
      content: file.newContent,
    }));

    for (const snapshot of snapshots) {
      try {
        const verdict = await this.resolver.validate(snapshot);
        if (!verdict.ok) {
          logger.warn("Resolver rejected rewritten manifest.", {
            alertId: changeSet.alertId,
            path: snapshot.path,
            diagnostics: verdict.diagnostics.substring(0, 500),
          });
          return { ok: false, path: snapshot.path, diagnostics: verdict.diagnostics };
        }
      } catch (error) {
        return {
          ok: false,
          path: snapshot.path,
          diagnostics: `Resolver failed: ${errorMessage(error)}`,
        };
      }
    }

    const lockfiles: FileWrite[] = [];
    for (const snapshot of snapshots) {
      try {
        const lockfile = await this.resolver.generateLockfile(snapshot);
        if (lockfile) {
          lockfiles.push(lockfile);
        }
      } catch (error) {
        return {
          ok: false,
          path: snapshot.path,
          diagnostics: `Lockfile generation failed: ${errorMessage(error)}`,
        };
      }
    }

    logger.debug("Change set validated.", {
      alertId: changeSet.alertId,
      files: snapshots.map((s) => s.path),
      lockfiles: lockfiles.map((l) => l.path),
    });

    return { ok: true, lockfiles };
  }
}
