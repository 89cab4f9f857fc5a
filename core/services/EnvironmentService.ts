import * as fs from 'fs';
import * as path from 'path';
import { minimatch } from 'minimatch';
import {
  ActiveEnvironmentConflictError,
  EnvironmentCorruptedError,
  EnvironmentExistsError,
  EnvironmentNotFoundError
} from '@core/errors';
import { SearchPathManager } from '@core/isolation/SearchPathManager';
import { EnvironmentRegistry } from '@core/registry/EnvironmentRegistry';
import { ENVIRONMENT_SUBDIRECTORIES, type Environment, type ModuleEntry } from '@core/registry/types';
import type { ActivationController } from '@core/session/ActivationController';
import { registryLogger as logger } from '@core/utils/logger';

export type ConfirmCallback = (message: string) => Promise<boolean>;

export interface CreateEnvironmentOptions {
  /** Root directory; defaults to <environmentsDir>/<name> */
  path?: string;
  includeSystemModules?: boolean;
  /** Existing environment whose packages are copied into the new one */
  baseEnvironment?: string;
  force?: boolean;
  description?: string;
}

export interface RemoveEnvironmentOptions {
  force?: boolean;
  confirm?: ConfirmCallback;
}

export interface ListEnvironmentsOptions {
  namePattern?: string;
  activeOnly?: boolean;
  detailed?: boolean;
}

export interface EnvironmentSummary {
  name: string;
  path: string;
  created: string;
  description: string;
  active: boolean;
  moduleCount: number;
  includeSystemPaths: boolean;
  autoActivate: boolean;
  /** Directory present on disk */
  healthy: boolean;
  /** Only with `detailed` */
  modules?: ModuleEntry[];
}

export class EnvironmentService {
  constructor(
    private readonly registry: EnvironmentRegistry,
    private readonly controller: Pick<ActivationController, 'getActiveSession'>,
    private readonly environmentsDir: string
  ) {}

  async create(name: string, options: CreateEnvironmentOptions = {}): Promise<Environment> {
    EnvironmentRegistry.assertValidName(name);

    const existing = this.registry.get(name);
    if (existing && !options.force) {
      throw new EnvironmentExistsError(name);
    }
    if (existing && this.isActive(existing.name)) {
      throw new ActiveEnvironmentConflictError(
        `Environment '${existing.name}' is active; deactivate it before replacing it`,
        existing.name
      );
    }

    if (existing && options.baseEnvironment?.toLowerCase() === existing.name.toLowerCase()) {
      throw new EnvironmentExistsError(
        existing.name,
        `Environment '${existing.name}' cannot be replaced by a copy of itself`
      );
    }

    const base = options.baseEnvironment ? this.requireHealthy(options.baseEnvironment) : undefined;
    const root = path.resolve(options.path ?? path.join(this.environmentsDir, name));

    // Only a registered environment's own directory is ever deleted
    if (existing) {
      if (path.resolve(existing.path) !== root && !(await isEmptyOrMissing(root))) {
        throw new EnvironmentExistsError(
          name,
          `Cannot replace environment '${existing.name}': ${root} is not empty`
        );
      }
      logger.info(`Replacing environment '${existing.name}'`);
      await fs.promises.rm(existing.path, { recursive: true, force: true });
    } else if (fs.existsSync(root) && !options.force) {
      throw new EnvironmentExistsError(name);
    }

    for (const directory of ENVIRONMENT_SUBDIRECTORIES) {
      await fs.promises.mkdir(path.join(root, directory), { recursive: true });
    }

    let modules: ModuleEntry[] = [];
    if (base) {
      const source = SearchPathManager.packageDirectory(base.path);
      if (fs.existsSync(source)) {
        await fs.promises.cp(source, SearchPathManager.packageDirectory(root), { recursive: true, force: true });
      }
      modules = base.modules.map(module => ({ ...module }));
      logger.debug(`Copied ${modules.length} package(s) from '${base.name}'`);
    }

    const environment: Environment = {
      name,
      path: root,
      created: new Date().toISOString(),
      description: options.description ?? '',
      modules,
      settings: {
        includeSystemPaths: options.includeSystemModules === true,
        autoActivate: false
      }
    };

    await this.registry.save(environment);
    logger.info(`Created environment '${name}' at ${root}`);
    return environment;
  }

  /**
   * Delete an environment and its directory. Returns false when the
   * confirmation is declined.
   */
  async remove(name: string, options: RemoveEnvironmentOptions = {}): Promise<boolean> {
    const environment = this.registry.get(name);
    if (!environment) {
      throw new EnvironmentNotFoundError(name);
    }
    if (this.isActive(environment.name)) {
      throw new ActiveEnvironmentConflictError(
        `Environment '${environment.name}' is active; deactivate it before removing it`,
        environment.name
      );
    }

    if (!options.force) {
      const confirmed = options.confirm
        ? await options.confirm(`Remove environment '${environment.name}' and delete ${environment.path}?`)
        : false;
      if (!confirmed) {
        logger.warn(`Removal of '${environment.name}' cancelled`);
        return false;
      }
    }

    await fs.promises.rm(environment.path, { recursive: true, force: true });
    await this.registry.remove(environment.name);
    logger.info(`Removed environment '${environment.name}'`);
    return true;
  }

  list(options: ListEnvironmentsOptions = {}): EnvironmentSummary[] {
    const pattern = options.namePattern;

    return this.registry.list()
      .filter(environment => !pattern || minimatch(environment.name, pattern, { nocase: true }))
      .map(environment => this.summarize(environment, options.detailed === true))
      .filter(summary => !options.activeOnly || summary.active)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  private summarize(environment: Environment, detailed: boolean): EnvironmentSummary {
    const summary: EnvironmentSummary = {
      name: environment.name,
      path: environment.path,
      created: environment.created,
      description: environment.description,
      active: this.isActive(environment.name),
      moduleCount: environment.modules.length,
      includeSystemPaths: environment.settings.includeSystemPaths,
      autoActivate: environment.settings.autoActivate,
      healthy: fs.existsSync(environment.path)
    };
    if (detailed) {
      summary.modules = environment.modules.map(module => ({ ...module }));
    }
    return summary;
  }

  private requireHealthy(name: string): Environment {
    const environment = this.registry.get(name);
    if (!environment) {
      throw new EnvironmentNotFoundError(name);
    }
    if (!fs.existsSync(environment.path)) {
      throw new EnvironmentCorruptedError(environment.name, environment.path);
    }
    return environment;
  }

  private isActive(name: string): boolean {
    const session = this.controller.getActiveSession();
    return session !== null && session.environmentName.toLowerCase() === name.toLowerCase();
  }
}

async function isEmptyOrMissing(directory: string): Promise<boolean> {
  try {
    return (await fs.promises.readdir(directory)).length === 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return true;
    }
    throw error;
  }
}
