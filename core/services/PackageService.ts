import * as fs from 'fs';
import * as path from 'path';
import { minimatch } from 'minimatch';
import type { ImportStrategy } from '@core/config/types';
import {
  ActiveEnvironmentConflictError,
  DependencyConflictError,
  EnvironmentNotFoundError,
  getErrorMessage
} from '@core/errors';
import {
  findPackageDirectory,
  listVersionDirectories,
  readManifest,
  MANIFEST_FILE,
  type PackageManifest
} from '@core/host/manifest';
import type { HostRuntime, InstalledPackage, LoadedPackage } from '@core/host/types';
import type { DependencyResolver } from '@core/isolation/DependencyResolver';
import type { IsolatedLoader } from '@core/isolation/IsolatedLoader';
import { SearchPathManager } from '@core/isolation/SearchPathManager';
import type { DependencyAnalysis, LoadOutcome } from '@core/isolation/types';
import type { EnvironmentRegistry } from '@core/registry/EnvironmentRegistry';
import type { RepositoryCatalog } from '@core/repository/RepositoryCatalog';
import type { ActivationController } from '@core/session/ActivationController';
import type { EnvironmentLog } from '@core/session/EnvironmentLog';
import type { ActiveSession } from '@core/session/types';
import { repositoryLogger as logger } from '@core/utils/logger';
import { compareVersionStrings, isPrerelease } from '@core/utils/version-checker';
import type { ConfirmCallback } from './EnvironmentService';

export const DEFAULT_REPOSITORY = 'default';

export interface InstallPackageOptions {
  version?: string;
  repository?: string;
  force?: boolean;
  allowPrerelease?: boolean;
}

export interface UninstallPackageOptions {
  version?: string;
  force?: boolean;
  confirm?: ConfirmCallback;
}

export interface ListPackagesOptions {
  namePattern?: string;
  listAllVersions?: boolean;
}

export interface UpdatePackagesOptions {
  name?: string;
  force?: boolean;
  acceptLicense?: boolean;
}

export interface ImportPackageOptions {
  version?: string;
  strategy?: ImportStrategy;
}

export interface PackageInfo {
  name: string;
  version: string;
  path: string;
  description?: string;
  /** Currently loaded in the host at this version */
  loaded: boolean;
}

export type UpdateStatus = 'updated' | 'current' | 'skipped' | 'failed';

export interface UpdateDetail {
  name: string;
  from: string;
  to?: string;
  status: UpdateStatus;
  reason?: string;
}

export interface UpdateSummary {
  updated: number;
  current: number;
  skipped: number;
  failed: number;
  details: UpdateDetail[];
}

export interface ImportResult {
  package: LoadedPackage | undefined;
  analysis: DependencyAnalysis;
  outcome: LoadOutcome;
}

export interface PackageServiceDependencies {
  host: HostRuntime;
  registry: EnvironmentRegistry;
  controller: Pick<ActivationController, 'getActiveSession'>;
  resolver: DependencyResolver;
  loader: IsolatedLoader;
  repositories: RepositoryCatalog;
  log: EnvironmentLog;
  defaultStrategy?: ImportStrategy;
}

interface InstalledCopy {
  manifest: PackageManifest;
  directory: string;
}

/**
 * Package operations against the active environment.
 */
export class PackageService {
  constructor(private readonly deps: PackageServiceDependencies) {}

  async installPackage(name: string, options: InstallPackageOptions = {}): Promise<InstalledPackage> {
    const session = this.requireSession('installing packages');
    const repository = this.deps.repositories.get(options.repository ?? DEFAULT_REPOSITORY);

    const installed = await this.deps.loader.installToEnvironment({
      name,
      environmentPath: session.environmentPath,
      systemSearchPath: session.originalSearchPath,
      version: options.version,
      repository,
      force: options.force,
      allowPrerelease: options.allowPrerelease
    });

    for (const pkg of flatten(installed)) {
      if (pkg.status === 'installed' || !this.isRecorded(session.environmentName, pkg.name, pkg.version)) {
        await this.deps.registry.recordModule(session.environmentName, {
          name: pkg.name,
          version: pkg.version,
          installedAt: new Date().toISOString(),
          repository: pkg.repository
        });
      }
      await this.deps.log.modules(
        session.environmentPath,
        `${pkg.status === 'installed' ? 'Installed' : 'Already present'} ${pkg.name} ${pkg.version} from ${pkg.repository}`
      );
    }

    logger.info(`Installed ${installed.name} ${installed.version} into '${session.environmentName}'`);
    return installed;
  }

  /**
   * Remove one version, or every version, of a package from the active
   * environment. Returns the removed versions; empty when declined.
   */
  async uninstallPackage(name: string, options: UninstallPackageOptions = {}): Promise<string[]> {
    const session = this.requireSession('uninstalling packages');
    const packageRoot = SearchPathManager.packageDirectory(session.environmentPath);
    const packageDir = await findPackageDirectory(packageRoot, name);
    const copies = packageDir ? await this.installedCopies(packageDir) : [];
    const targets = copies.filter(copy => options.version === undefined || copy.manifest.version === options.version);

    if (targets.length === 0) {
      throw new EnvironmentNotFoundError(options.version ? `${name} ${options.version}` : name, 'package');
    }

    const label = `${targets[0].manifest.name} ${targets.map(copy => copy.manifest.version).join(', ')}`;
    if (!options.force) {
      const confirmed = options.confirm
        ? await options.confirm(`Uninstall ${label} from '${session.environmentName}'?`)
        : false;
      if (!confirmed) {
        logger.warn(`Uninstall of ${label} cancelled`);
        return [];
      }
    }

    const removed: string[] = [];
    for (const copy of targets) {
      const loaded = this.deps.host.getLoadedPackage(copy.manifest.name);
      if (loaded && loaded.version === copy.manifest.version) {
        this.deps.host.unloadPackage(loaded.name);
      }
      await fs.promises.rm(copy.directory === packageDir ? path.join(copy.directory, MANIFEST_FILE) : copy.directory, {
        recursive: true,
        force: true
      });
      removed.push(copy.manifest.version);
    }

    if (packageDir && copies.length === targets.length) {
      await fs.promises.rm(packageDir, { recursive: true, force: true });
    }

    await this.deps.registry.forgetModule(session.environmentName, targets[0].manifest.name, options.version);
    await this.deps.log.modules(session.environmentPath, `Uninstalled ${label}`);
    logger.info(`Uninstalled ${label} from '${session.environmentName}'`);
    return removed;
  }

  /**
   * Packages installed in the active environment, newest version per name
   * unless all versions are requested. Warns and returns an empty list when
   * nothing is active.
   */
  async listPackages(options: ListPackagesOptions = {}): Promise<PackageInfo[]> {
    const session = this.deps.controller.getActiveSession();
    if (!session) {
      logger.warn('No environment is active');
      return [];
    }
    return this.scan(session.environmentPath, options);
  }

  async updatePackages(options: UpdatePackagesOptions = {}): Promise<UpdateSummary> {
    const session = this.requireSession('updating packages');
    const installed = await this.scan(session.environmentPath, {});
    const targets = options.name
      ? installed.filter(pkg => pkg.name.toLowerCase() === options.name?.toLowerCase())
      : installed;

    if (options.name && targets.length === 0) {
      throw new EnvironmentNotFoundError(options.name, 'package');
    }

    const summary: UpdateSummary = { updated: 0, current: 0, skipped: 0, failed: 0, details: [] };
    const environment = this.deps.registry.get(session.environmentName);

    for (const pkg of targets) {
      const recorded = environment?.modules.find(module =>
        module.name.toLowerCase() === pkg.name.toLowerCase() && module.version === pkg.version
      );
      const repositoryName = recorded?.repository ?? DEFAULT_REPOSITORY;
      const detail = await this.updateOne(pkg, repositoryName, options);
      summary[detail.status]++;
      summary.details.push(detail);
    }

    await this.deps.log.modules(
      session.environmentPath,
      `Update: ${summary.updated} updated, ${summary.current} current, ${summary.skipped} skipped, ${summary.failed} failed`
    );
    return summary;
  }

  /**
   * Resolve the package's dependency closure inside the active environment
   * and load it. Assembly conflicts stop the import before anything loads.
   */
  async importPackage(name: string, options: ImportPackageOptions = {}): Promise<ImportResult> {
    const session = this.requireSession('importing packages');
    const analysis = await this.deps.resolver.analyze(
      name,
      session.environmentPath,
      this.deps.host.listLoadedAssemblies(),
      options.version
    );

    const root = analysis.tree.root;
    if (!root || root.resolvedManifestPath === undefined) {
      throw new EnvironmentNotFoundError(options.version ? `${name} ${options.version}` : name, 'package');
    }
    if (analysis.conflicts.length > 0) {
      throw new DependencyConflictError(root.name, analysis.conflicts, analysis.remediation);
    }
    for (const warning of analysis.tree.warnings) {
      logger.warn(warning);
    }

    const strategy = options.strategy ?? this.deps.defaultStrategy ?? 'isolated';
    let loaded: LoadedPackage | undefined;
    let outcome: LoadOutcome;

    if (strategy === 'in-process') {
      outcome = await this.deps.resolver.loadInOrder(analysis.loadOrder, node =>
        this.deps.loader.importFromEnvironment({
          name: node.name,
          version: node.version,
          environmentPath: session.environmentPath,
          strategy
        })
      );
      loaded = this.deps.host.getLoadedPackage(root.name);
    } else {
      const closure = await this.deps.loader.importClosure({
        name: root.name,
        version: root.version,
        environmentPath: session.environmentPath,
        strategy,
        pins: analysis.loadOrder.flatMap(node => node.version ? [{ name: node.name, version: node.version }] : [])
      });
      loaded = closure.package;
      outcome = {
        loaded: closure.loaded.map(pkg => pkg.name),
        failed: closure.unresolved.map(missing => ({ name: missing, error: 'Not found in the environment' }))
      };
    }

    await this.deps.log.modules(
      session.environmentPath,
      `Imported ${root.name}${root.version ? ` ${root.version}` : ''} (${strategy}, ${outcome.loaded.length} loaded, ${outcome.failed.length} failed)`
    );
    return { package: loaded, analysis, outcome };
  }

  private async updateOne(pkg: PackageInfo, repositoryName: string, options: UpdatePackagesOptions): Promise<UpdateDetail> {
    const detail: UpdateDetail = { name: pkg.name, from: pkg.version, status: 'failed' };

    try {
      const repository = this.deps.repositories.get(repositoryName);
      const candidates = await repository.find(pkg.name, { allowPrerelease: isPrerelease(pkg.version) });
      const newest = candidates[0];
      if (!newest) {
        return { ...detail, reason: `not found in repository ${repository.name}` };
      }

      detail.to = newest.version;
      if (compareVersionStrings(newest.version, pkg.version) <= 0 && !options.force) {
        return { ...detail, status: 'current' };
      }
      if (newest.manifest.requireLicenseAcceptance && !options.acceptLicense) {
        logger.warn(`${pkg.name} ${newest.version} requires license acceptance; skipped`);
        return { ...detail, status: 'skipped', reason: 'license acceptance required' };
      }

      await this.installPackage(pkg.name, {
        version: newest.version,
        repository: repository.name,
        force: options.force
      });
      return { ...detail, status: 'updated' };
    } catch (error) {
      logger.warn(`Update of ${pkg.name} failed: ${getErrorMessage(error)}`);
      return { ...detail, status: 'failed', reason: getErrorMessage(error) };
    }
  }

  private async scan(environmentPath: string, options: ListPackagesOptions): Promise<PackageInfo[]> {
    const packageRoot = SearchPathManager.packageDirectory(environmentPath);
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(packageRoot, { withFileTypes: true });
    } catch {
      return [];
    }

    const packages: PackageInfo[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) {
        continue;
      }
      const copies = await this.installedCopies(path.join(packageRoot, entry.name));
      const selected = options.listAllVersions ? copies : copies.slice(0, 1);

      for (const copy of selected) {
        if (options.namePattern && !minimatch(copy.manifest.name, options.namePattern, { nocase: true })) {
          continue;
        }
        const loaded = this.deps.host.getLoadedPackage(copy.manifest.name);
        packages.push({
          name: copy.manifest.name,
          version: copy.manifest.version,
          path: copy.directory,
          description: copy.manifest.description,
          loaded: loaded !== undefined && loaded.version === copy.manifest.version
        });
      }
    }

    return packages.sort((a, b) =>
      a.name.localeCompare(b.name) || compareVersionStrings(b.version, a.version)
    );
  }

  /**
   * Every copy of a package under its directory, newest first. The flat
   * layout counts as one more copy.
   */
  private async installedCopies(packageDir: string): Promise<InstalledCopy[]> {
    const copies: InstalledCopy[] = [];

    for (const version of await listVersionDirectories(packageDir)) {
      const directory = path.join(packageDir, version);
      const manifest = await this.tryReadManifest(path.join(directory, MANIFEST_FILE));
      if (manifest) {
        copies.push({ manifest, directory });
      }
    }

    const flat = path.join(packageDir, MANIFEST_FILE);
    if (fs.existsSync(flat)) {
      const manifest = await this.tryReadManifest(flat);
      if (manifest) {
        copies.push({ manifest, directory: packageDir });
      }
    }

    return copies.sort((a, b) => compareVersionStrings(b.manifest.version, a.manifest.version));
  }

  private async tryReadManifest(file: string): Promise<PackageManifest | undefined> {
    try {
      return await readManifest(file);
    } catch (error) {
      logger.warn(`Skipping ${file}: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  private isRecorded(environmentName: string, name: string, version: string): boolean {
    const environment = this.deps.registry.get(environmentName);
    return environment?.modules.some(module =>
      module.name.toLowerCase() === name.toLowerCase() && module.version === version
    ) ?? false;
  }

  private requireSession(operation: string): ActiveSession {
    const session = this.deps.controller.getActiveSession();
    if (!session) {
      throw new ActiveEnvironmentConflictError(`No environment is active; activate one before ${operation}`);
    }
    return session;
  }
}

function flatten(pkg: InstalledPackage): InstalledPackage[] {
  return [pkg, ...pkg.dependencies.flatMap(flatten)];
}
