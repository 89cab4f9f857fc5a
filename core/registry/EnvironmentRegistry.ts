import * as fs from 'fs';
import * as path from 'path';
import { EnvironmentNotFoundError, InvalidEnvironmentNameError, ModEnvError, ErrorSeverity, getErrorMessage } from '@core/errors';
import { registryLogger as logger } from '@core/utils/logger';
import { ENVIRONMENT_CONFIG_FILE, type Environment, type ModuleEntry } from './types';

const NAME_PATTERN = /^[A-Za-z0-9_-]{1,50}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toModuleEntry(value: unknown): ModuleEntry | undefined {
  if (!isRecord(value) || typeof value.name !== 'string' || typeof value.version !== 'string') {
    return undefined;
  }
  return {
    name: value.name,
    version: value.version,
    installedAt: typeof value.installedAt === 'string' ? value.installedAt : new Date(0).toISOString(),
    repository: typeof value.repository === 'string' ? value.repository : undefined
  };
}

/**
 * Normalize one registry record; undefined for anything without a name and
 * a path.
 */
export function toEnvironment(value: unknown): Environment | undefined {
  if (!isRecord(value) || typeof value.name !== 'string' || typeof value.path !== 'string') {
    return undefined;
  }

  const settings = isRecord(value.settings) ? value.settings : {};
  const modules = Array.isArray(value.modules)
    ? value.modules.map(toModuleEntry).filter((entry): entry is ModuleEntry => entry !== undefined)
    : [];

  return {
    name: value.name,
    path: value.path,
    created: typeof value.created === 'string' ? value.created : new Date(0).toISOString(),
    description: typeof value.description === 'string' ? value.description : '',
    modules,
    settings: {
      includeSystemPaths: settings.includeSystemPaths === true,
      autoActivate: settings.autoActivate === true
    }
  };
}

/**
 * JSON registry of environments at <home>/.modenv/registry.json. Every write
 * also mirrors the descriptor into the environment's own config.json.
 */
export class EnvironmentRegistry {
  private environments: Environment[] | null = null;

  constructor(private readonly registryPath: string) {}

  static isValidName(name: string): boolean {
    return NAME_PATTERN.test(name);
  }

  static assertValidName(name: string): void {
    if (!EnvironmentRegistry.isValidName(name)) {
      throw new InvalidEnvironmentNameError(name);
    }
  }

  get filePath(): string {
    return this.registryPath;
  }

  list(): Environment[] {
    return this.load().map(environment => structuredClone(environment));
  }

  get(name: string): Environment | undefined {
    const found = this.find(name);
    return found ? structuredClone(found) : undefined;
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  /**
   * Insert or replace by name.
   */
  async save(environment: Environment): Promise<void> {
    EnvironmentRegistry.assertValidName(environment.name);
    const environments = this.load();
    const index = this.indexOf(environment.name);
    const copy = structuredClone(environment);

    if (index >= 0) {
      environments[index] = copy;
    } else {
      environments.push(copy);
    }

    await this.persist();
    await this.writeEnvironmentConfig(copy);
    logger.debug(`Saved environment ${environment.name}`);
  }

  async remove(name: string): Promise<boolean> {
    const index = this.indexOf(name);
    if (index < 0) {
      return false;
    }
    this.load().splice(index, 1);
    await this.persist();
    logger.debug(`Removed environment ${name} from registry`);
    return true;
  }

  async update(name: string, mutate: (environment: Environment) => void): Promise<Environment> {
    const current = this.find(name);
    if (!current) {
      throw new EnvironmentNotFoundError(name);
    }
    const next = structuredClone(current);
    mutate(next);
    await this.save(next);
    return structuredClone(next);
  }

  /**
   * Record an installed package, replacing an entry with the same name and
   * version.
   */
  async recordModule(environmentName: string, entry: ModuleEntry): Promise<Environment> {
    return this.update(environmentName, environment => {
      environment.modules = environment.modules.filter(module =>
        !(sameName(module.name, entry.name) && module.version === entry.version)
      );
      environment.modules.push(entry);
    });
  }

  /**
   * Forget a package; every version when none is given.
   */
  async forgetModule(environmentName: string, moduleName: string, version?: string): Promise<Environment> {
    return this.update(environmentName, environment => {
      environment.modules = environment.modules.filter(module =>
        !(sameName(module.name, moduleName) && (version === undefined || module.version === version))
      );
    });
  }

  /**
   * Flag one environment for activation at startup and clear the flag on all
   * others; null clears every flag.
   */
  async setAutoActivate(name: string | null): Promise<void> {
    if (name !== null && !this.has(name)) {
      throw new EnvironmentNotFoundError(name);
    }

    let changed = false;
    for (const environment of this.load()) {
      const flagged = name !== null && sameName(environment.name, name);
      if (environment.settings.autoActivate !== flagged) {
        environment.settings.autoActivate = flagged;
        changed = true;
        await this.writeEnvironmentConfig(environment);
      }
    }

    if (changed) {
      await this.persist();
    }
  }

  getAutoActivate(): Environment | undefined {
    const flagged = this.load().find(environment => environment.settings.autoActivate);
    return flagged ? structuredClone(flagged) : undefined;
  }

  /** Drop the in-memory copy so the next call rereads the file */
  reload(): void {
    this.environments = null;
  }

  private load(): Environment[] {
    if (this.environments) {
      return this.environments;
    }

    if (!fs.existsSync(this.registryPath)) {
      this.environments = [];
      return this.environments;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.registryPath, 'utf8'));
    } catch (error) {
      throw new ModEnvError(`Registry ${this.registryPath} is unreadable: ${getErrorMessage(error)}`, {
        code: 'REGISTRY_UNREADABLE',
        severity: ErrorSeverity.Fatal,
        details: { registryPath: this.registryPath },
        cause: error
      });
    }

    const records = Array.isArray(raw) ? raw : [];
    const environments: Environment[] = [];
    for (const record of records) {
      const environment = toEnvironment(record);
      if (environment) {
        environments.push(environment);
      } else {
        logger.warn(`Skipping malformed registry entry in ${this.registryPath}`);
      }
    }

    this.environments = environments;
    return environments;
  }

  private find(name: string): Environment | undefined {
    return this.load().find(environment => sameName(environment.name, name));
  }

  private indexOf(name: string): number {
    return this.load().findIndex(environment => sameName(environment.name, name));
  }

  private async persist(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.registryPath), { recursive: true });
    await fs.promises.writeFile(this.registryPath, JSON.stringify(this.load(), null, 2));
  }

  private async writeEnvironmentConfig(environment: Environment): Promise<void> {
    if (!fs.existsSync(environment.path)) {
      return;
    }
    await fs.promises.writeFile(
      path.join(environment.path, ENVIRONMENT_CONFIG_FILE),
      JSON.stringify(environment, null, 2)
    );
  }
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
