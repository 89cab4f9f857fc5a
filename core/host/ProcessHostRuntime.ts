import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EnvironmentNotFoundError, ExternalOperationError, ModEnvError, getErrorMessage } from '@core/errors';
import { hostLogger as logger } from '@core/utils/logger';
import { safeSatisfies } from '@core/utils/version-checker';
import { assemblyConflict, locateManifest, MANIFEST_FILE } from './manifest';
import { splitSearchPath } from './searchPath';
import type { RepositoryPackage } from '@core/repository/types';
import type {
  HostImportOptions,
  HostInstallRequest,
  HostRuntime,
  InstalledPackage,
  LoadedAssembly,
  LoadedPackage
} from './types';

export interface ProcessHostRuntimeOptions {
  searchPathVariable: string;
  corePaths?: string[];
  essentialPaths?: string[];
  userProfileRoot?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Host runtime living in the current Node process: the search path is a
 * variable of process.env and the loaded-package tables are kept in memory.
 */
export class ProcessHostRuntime implements HostRuntime {
  readonly searchPathVariable: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly corePaths: string[];
  private readonly essentialPaths: string[];
  private readonly userProfileRoot: string;
  private readonly packages = new Map<string, LoadedPackage>();

  constructor(options: ProcessHostRuntimeOptions) {
    this.searchPathVariable = options.searchPathVariable;
    this.env = options.env ?? process.env;
    this.corePaths = options.corePaths ?? [];
    this.essentialPaths = options.essentialPaths ?? [];
    this.userProfileRoot = path.resolve(options.userProfileRoot ?? os.homedir());
  }

  readSearchPath(): string | null {
    return this.env[this.searchPathVariable] ?? null;
  }

  writeSearchPath(value: string | null): void {
    if (value === null) {
      delete this.env[this.searchPathVariable];
    } else {
      this.env[this.searchPathVariable] = value;
    }
  }

  getCorePackagePaths(): string[] {
    return [...this.corePaths];
  }

  getEssentialPaths(): string[] {
    return [...this.essentialPaths];
  }

  getUserProfileRoot(): string {
    return this.userProfileRoot;
  }

  listLoadedPackages(): LoadedPackage[] {
    return [...this.packages.values()];
  }

  getLoadedPackage(name: string): LoadedPackage | undefined {
    return this.packages.get(name.toLowerCase());
  }

  listLoadedAssemblies(): LoadedAssembly[] {
    const assemblies: LoadedAssembly[] = [];
    for (const pkg of this.packages.values()) {
      for (const assembly of pkg.assemblies) {
        assemblies.push({
          name: assembly.name,
          version: assembly.version,
          publicKeyToken: assembly.publicKeyToken,
          location: assembly.location ?? pkg.path,
          loadedBy: pkg.name
        });
      }
    }
    return assemblies;
  }

  attachPackage(descriptor: LoadedPackage): void {
    const key = descriptor.name.toLowerCase();

    for (const assembly of descriptor.assemblies) {
      const clash = this.listLoadedAssemblies().find(loaded =>
        loaded.loadedBy.toLowerCase() !== key &&
        loaded.name.toLowerCase() === assembly.name.toLowerCase() &&
        assemblyConflict(loaded, assembly) !== undefined
      );
      if (clash) {
        throw new ExternalOperationError(
          `Assembly ${assembly.name} ${clash.version} is already loaded by ${clash.loadedBy}; ` +
          `${descriptor.name} requires ${assembly.version}`,
          'import',
          undefined,
          { packageName: descriptor.name, assembly: assembly.name }
        );
      }
    }

    this.packages.set(key, descriptor);
    logger.debug(`Attached ${descriptor.name} ${descriptor.version}`, { source: descriptor.source });
  }

  unloadPackage(name: string): boolean {
    const removed = this.packages.delete(name.toLowerCase());
    if (removed) {
      logger.debug(`Unloaded ${name}`);
    }
    return removed;
  }

  async importPackage(name: string, options: HostImportOptions = {}): Promise<LoadedPackage> {
    const roots = splitSearchPath(this.readSearchPath());
    const located = await locateManifest(roots, name, options.requiredVersion);
    if (!located) {
      throw new EnvironmentNotFoundError(name, 'package');
    }

    const existing = this.getLoadedPackage(located.manifest.name);
    if (existing && !options.force) {
      if (existing.version === located.manifest.version) {
        return existing;
      }
      throw new ExternalOperationError(
        `${existing.name} ${existing.version} is already loaded; unload it before importing ${located.manifest.version}`,
        'import',
        undefined,
        { packageName: existing.name }
      );
    }
    if (existing) {
      this.unloadPackage(existing.name);
    }

    const descriptor: LoadedPackage = {
      name: located.manifest.name,
      version: located.manifest.version,
      path: located.packageDir,
      manifestPath: located.manifestPath,
      assemblies: located.manifest.requiredAssemblies.map(assembly => ({
        ...assembly,
        location: assembly.location ? path.resolve(located.packageDir, assembly.location) : undefined
      })),
      source: 'host',
      loadedAt: new Date().toISOString()
    };

    this.attachPackage(descriptor);
    return descriptor;
  }

  async installPackage(request: HostInstallRequest): Promise<InstalledPackage> {
    return this.installRecursive(request, new Set<string>());
  }

  private async installRecursive(request: HostInstallRequest, seen: Set<string>): Promise<InstalledPackage> {
    const { repository, destination } = request;
    seen.add(request.name.toLowerCase());

    let candidates: RepositoryPackage[];
    try {
      candidates = await repository.find(request.name, {
        version: request.version,
        allowPrerelease: request.allowPrerelease
      });
    } catch (error) {
      if (error instanceof ModEnvError) throw error;
      throw new ExternalOperationError(
        `Repository ${repository.name} failed to find ${request.name}: ${getErrorMessage(error)}`,
        'find',
        error
      );
    }

    const candidate = candidates[0];
    if (!candidate) {
      throw new ExternalOperationError(
        `No match found for ${request.name}${request.version ? ` ${request.version}` : ''} in repository ${repository.name}`,
        'find',
        undefined,
        { packageName: request.name, version: request.version, repository: repository.name }
      );
    }

    const target = path.join(destination, candidate.name, candidate.version);
    const alreadyPresent = fs.existsSync(path.join(target, MANIFEST_FILE));

    if (!alreadyPresent || request.force) {
      await repository.save(candidate, destination);
    }

    const dependencies: InstalledPackage[] = [];
    for (const required of candidate.manifest.requiredPackages) {
      if (seen.has(required.name.toLowerCase())) {
        continue;
      }
      const present = await locateManifest([destination], required.name, required.version);
      if (present && safeSatisfies(present.manifest.version, required.version)) {
        seen.add(required.name.toLowerCase());
        continue;
      }
      dependencies.push(await this.installRecursive({
        name: required.name,
        version: required.version,
        repository,
        destination,
        allowPrerelease: request.allowPrerelease
      }, seen));
    }

    return {
      name: candidate.name,
      version: candidate.version,
      path: target,
      repository: repository.name,
      status: alreadyPresent && !request.force ? 'existing' : 'installed',
      dependencies
    };
  }
}
