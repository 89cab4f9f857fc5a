/**
 * Configuration types for modenv
 */

export type ImportStrategy = 'isolated' | 'in-process';

/**
 * Paths keyed by platform, with a fallback for platforms not listed.
 */
export type PlatformPaths = Partial<Record<NodeJS.Platform, string[]>> & { default?: string[] };

export interface HostConfig {
  /** Name of the process-global search path variable */
  searchPathVariable?: string;
  /** Directories holding the host's own core packages */
  corePaths?: PlatformPaths;
  /** Directories the host's built-in package manager needs to function */
  essentialPaths?: PlatformPaths;
}

export interface GuardConfig {
  /** Reconciliation tick, e.g. "150ms" */
  interval?: string | number;
  importBypass?: string | number;
  installBypass?: string | number;
}

export interface IsolationConfig {
  /** Soft limit on system search path exposure during installs */
  softTimeout?: string | number;
  /** Hard limit on the isolated import worker */
  workerTimeout?: string | number;
  strategy?: ImportStrategy;
}

export interface ResolverConfig {
  maxDepth?: number;
}

/**
 * Shape of ~/.modenv/config.json
 */
export interface ModEnvConfig {
  host?: HostConfig;
  guard?: GuardConfig;
  isolation?: IsolationConfig;
  resolver?: ResolverConfig;
  /** Repository name -> directory */
  repositories?: Record<string, string>;
}

// Runtime configuration after parsing and merging
export interface ResolvedConfig {
  homeDir: string;
  registryPath: string;
  environmentsDir: string;
  logsDir: string;
  host: {
    searchPathVariable: string;
    corePaths: string[];
    essentialPaths: string[];
  };
  guard: {
    intervalMs: number;
    importBypassSeconds: number;
    installBypassSeconds: number;
  };
  isolation: {
    softTimeoutMs: number;
    workerTimeoutMs: number;
    strategy: ImportStrategy;
  };
  resolver: {
    maxDepth: number;
  };
  repositories: Record<string, string>;
}
