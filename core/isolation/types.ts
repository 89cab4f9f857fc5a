import type { AssemblyRef } from '@core/host/manifest';

export interface DependencyNode {
  name: string;
  requiredVersion?: string;
  /** Version declared by the manifest, when one was found */
  version?: string;
  resolvedManifestPath?: string;
  dependencies: DependencyNode[];
  requiredNativeAssemblies: AssemblyRef[];
  depth: number;
  /** Manifest found and every dependency branch resolved */
  resolved: boolean;
}

export interface DependencyTree {
  root: DependencyNode | null;
  /** Deepest occurrence of each package, keyed by lower-cased name */
  all: Map<string, DependencyNode>;
  count: number;
  unresolved: string[];
  warnings: string[];
}

export type ConflictType = 'VersionMismatch' | 'IdentityMismatch';

export interface AssemblyConflict {
  assemblyName: string;
  loadedVersion: string;
  requiredVersion: string;
  loadedLocation: string;
  requiredLocation: string;
  conflictType: ConflictType;
  /** Package declaring the required assembly */
  requiredBy: string;
  /** Loaded package (or earlier tree member) owning the loaded assembly */
  loadedBy: string;
}

export interface ConflictRemediation {
  /** Loaded packages to remove from the session before retrying */
  removeFromSession: string[];
  /** Assembly versions the environment's packages should agree on */
  installExact: Array<{ assemblyName: string; version: string }>;
}

export interface DependencyAnalysis {
  success: boolean;
  tree: DependencyTree;
  conflicts: AssemblyConflict[];
  loadOrder: DependencyNode[];
  remediation: ConflictRemediation;
}

export interface LoadFailure {
  name: string;
  error: string;
}

export interface LoadOutcome {
  loaded: string[];
  failed: LoadFailure[];
}
