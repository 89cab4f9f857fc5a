import * as fs from 'fs';
import * as path from 'path';
import type { HostRuntime } from '@core/host/types';
import { joinSearchPath, splitSearchPath } from '@core/host/searchPath';
import { sessionLogger as logger } from '@core/utils/logger';

export const PACKAGE_DIRECTORY = 'Modules';

/**
 * Computes and installs the host search path for an environment.
 */
export class SearchPathManager {
  constructor(
    private readonly host: HostRuntime,
    private readonly exists: (candidate: string) => boolean = fs.existsSync
  ) {}

  static packageDirectory(environmentPath: string): string {
    return path.join(environmentPath, PACKAGE_DIRECTORY);
  }

  get variable(): string {
    return this.host.searchPathVariable;
  }

  /** Raw value of the host variable, null when unset */
  snapshot(): string | null {
    return this.host.readSearchPath();
  }

  entries(): string[] {
    return splitSearchPath(this.snapshot());
  }

  /**
   * Environment package directory first, then either the host's essential
   * directories or the system entries outside the user profile.
   * Entries missing on disk and duplicates are dropped.
   */
  computeSearchPath(
    environmentPath: string,
    includeSystemPaths: boolean,
    systemSearchPath: string | null = this.snapshot()
  ): string[] {
    const packageDir = path.resolve(SearchPathManager.packageDirectory(environmentPath));
    const tail = includeSystemPaths
      ? splitSearchPath(systemSearchPath).filter(entry => !this.isUserProfileEntry(entry))
      : this.host.getEssentialPaths();

    const result = [packageDir];
    const seen = new Set<string>([packageDir]);

    for (const entry of tail) {
      const resolved = path.resolve(entry);
      if (seen.has(resolved) || !this.exists(resolved)) {
        continue;
      }
      seen.add(resolved);
      result.push(resolved);
    }

    return result;
  }

  /**
   * Search path for an in-process import: the environment plus the host's
   * own core packages and nothing else.
   */
  computeImportPath(environmentPath: string): string[] {
    const packageDir = path.resolve(SearchPathManager.packageDirectory(environmentPath));
    const core = this.host.getCorePackagePaths()
      .map(entry => path.resolve(entry))
      .filter(entry => entry !== packageDir && this.exists(entry));
    return [packageDir, ...new Set(core)];
  }

  apply(entries: string[]): string {
    const value = joinSearchPath(entries);
    this.host.writeSearchPath(value);
    return value;
  }

  applyRaw(value: string | null): void {
    this.host.writeSearchPath(value);
  }

  /**
   * Put back a snapshot taken before activation. `undefined` means no
   * snapshot is on record; `null` means the variable was unset.
   */
  restoreOriginal(saved: string | null | undefined): boolean {
    if (saved === undefined) {
      logger.warn('No saved search path on record; nothing to restore');
      return false;
    }

    this.host.writeSearchPath(saved);
    logger.debug(`Restored ${this.variable}`, { value: saved });
    return true;
  }

  private isUserProfileEntry(entry: string): boolean {
    const profile = this.host.getUserProfileRoot();
    const resolved = path.resolve(entry);
    return resolved === profile || resolved.startsWith(profile + path.sep);
  }
}
