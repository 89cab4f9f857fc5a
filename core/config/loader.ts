import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { ModEnvConfig, PlatformPaths, ResolvedConfig, ImportStrategy } from './types';
import { parseDuration } from './utils';
import { getErrorMessage } from '@core/errors';

export const TOOL_DIRECTORY = '.modenv';
export const DEFAULT_SEARCH_PATH_VARIABLE = 'MODULE_PATH';

const DEFAULT_STRATEGY: ImportStrategy = 'isolated';

const DEFAULTS = {
  guardInterval: '150ms',
  importBypass: '15s',
  installBypass: '45s',
  softTimeout: '60s',
  workerTimeout: '2m',
  maxDepth: 10
};

// Only the top level is checked; resolve() treats every section as optional
function isConfigObject(value: unknown): value is ModEnvConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ConfigLoaderOptions {
  /** Base directory holding .modenv; defaults to MODENV_HOME or the user's home */
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Load modenv configuration from defaults, the global config file and
 * environment variables (in increasing precedence).
 */
export class ConfigLoader {
  private readonly baseDir: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private cachedConfig?: ResolvedConfig;

  constructor(options: ConfigLoaderOptions = {}) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.baseDir = path.resolve(options.homeDir ?? this.env.MODENV_HOME ?? os.homedir());
  }

  get toolDir(): string {
    return path.join(this.baseDir, TOOL_DIRECTORY);
  }

  get configPath(): string {
    return path.join(this.toolDir, 'config.json');
  }

  load(): ResolvedConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const fileConfig = this.loadConfigFile(this.configPath);
    this.cachedConfig = this.resolve(fileConfig);
    return this.cachedConfig;
  }

  private loadConfigFile(filePath: string): ModEnvConfig {
    try {
      if (fs.existsSync(filePath)) {
        const content = fs.readFileSync(filePath, 'utf8');
        const parsed: unknown = JSON.parse(content);
        if (isConfigObject(parsed)) {
          return parsed;
        }
        console.warn(`Ignoring config ${filePath}: expected a JSON object`);
      }
    } catch (error) {
      console.warn(`Failed to load config from ${filePath}:`, getErrorMessage(error));
    }

    return {};
  }

  private resolve(config: ModEnvConfig): ResolvedConfig {
    const toolDir = this.toolDir;
    const strategy = config.isolation?.strategy;

    return {
      homeDir: toolDir,
      registryPath: path.join(toolDir, 'registry.json'),
      environmentsDir: path.join(toolDir, 'environments'),
      logsDir: path.join(toolDir, 'logs'),
      host: {
        searchPathVariable:
          this.env.MODENV_SEARCH_PATH_VAR ||
          config.host?.searchPathVariable ||
          DEFAULT_SEARCH_PATH_VARIABLE,
        corePaths: this.pickPlatformPaths(config.host?.corePaths),
        essentialPaths: this.pickPlatformPaths(config.host?.essentialPaths)
      },
      guard: {
        intervalMs: parseDuration(config.guard?.interval ?? DEFAULTS.guardInterval),
        importBypassSeconds: parseDuration(config.guard?.importBypass ?? DEFAULTS.importBypass) / 1000,
        installBypassSeconds: parseDuration(config.guard?.installBypass ?? DEFAULTS.installBypass) / 1000
      },
      isolation: {
        softTimeoutMs: parseDuration(config.isolation?.softTimeout ?? DEFAULTS.softTimeout),
        workerTimeoutMs: parseDuration(config.isolation?.workerTimeout ?? DEFAULTS.workerTimeout),
        strategy: strategy === 'in-process' || strategy === 'isolated' ? strategy : DEFAULT_STRATEGY
      },
      resolver: {
        maxDepth: config.resolver?.maxDepth ?? DEFAULTS.maxDepth
      },
      repositories: {
        default: path.join(toolDir, 'repository'),
        ...this.resolveRepositories(config.repositories)
      }
    };
  }

  private pickPlatformPaths(paths?: PlatformPaths): string[] {
    if (!paths) {
      return [];
    }
    const selected = paths[this.platform] ?? paths.default ?? [];
    return selected.map(entry => path.resolve(entry));
  }

  private resolveRepositories(repositories?: Record<string, string>): Record<string, string> {
    const resolved: Record<string, string> = {};
    for (const [name, location] of Object.entries(repositories ?? {})) {
      resolved[name] = path.resolve(this.toolDir, location);
    }
    return resolved;
  }
}
