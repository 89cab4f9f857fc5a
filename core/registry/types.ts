export interface ModuleEntry {
  name: string;
  version: string;
  installedAt: string;
  repository?: string;
}

export interface EnvironmentSettings {
  /** Keep the non-user system entries on the search path while active */
  includeSystemPaths: boolean;
  /** Activated when a new CLI process starts */
  autoActivate: boolean;
}

export interface Environment {
  name: string;
  /** Absolute root directory */
  path: string;
  created: string;
  description: string;
  modules: ModuleEntry[];
  settings: EnvironmentSettings;
}

export const ENVIRONMENT_CONFIG_FILE = 'config.json';
export const ENVIRONMENT_SUBDIRECTORIES = ['Modules', 'Scripts', 'Cache', 'Logs'] as const;
