import type { PackageManifest } from '@core/host/manifest';

export interface RepositoryPackage {
  name: string;
  version: string;
  repository: string;
  /** Directory holding the package contents */
  location: string;
  manifest: PackageManifest;
}

export interface FindOptions {
  /** Version requirement; newest match wins when omitted */
  version?: string;
  allowPrerelease?: boolean;
}

/**
 * Client for a package source. Implementations may be remote; callers treat
 * every call as slow and fallible.
 */
export interface PackageRepository {
  readonly name: string;
  /** Matching versions, newest first */
  find(name: string, options?: FindOptions): Promise<RepositoryPackage[]>;
  /** Copy a package to <destination>/<name>/<version> and return that directory */
  save(pkg: RepositoryPackage, destination: string): Promise<string>;
}
