import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ImportStrategy } from '@core/config/types';
import {
  EnvironmentNotFoundError,
  ExternalOperationError,
  IsolatedImportError,
  IsolationTimeoutError,
  ModEnvError,
  getErrorMessage
} from '@core/errors';
import { locateManifest } from '@core/host/manifest';
import type { HostRuntime, InstalledPackage, LoadedPackage } from '@core/host/types';
import type { PackageRepository } from '@core/repository/types';
import { loaderLogger as logger } from '@core/utils/logger';
import type { CallInterceptor } from './CallInterceptor';
import { DEFAULT_MAX_DEPTH } from './DependencyResolver';
import { SearchPathManager } from './SearchPathManager';
import { buildDriverScript, driverArgv, type PinnedVersion } from './worker/driver';
import { parseWorkerDescriptor, type WorkerPackage } from './worker/descriptor';
import { NodeWorkerLauncher, type WorkerExit, type WorkerLauncher } from './worker/launcher';

export const DEFAULT_SOFT_TIMEOUT_MS = 60_000;
export const DEFAULT_WORKER_TIMEOUT_MS = 120_000;

export interface IsolatedLoaderOptions {
  softTimeoutMs?: number;
  workerTimeoutMs?: number;
  maxDepth?: number;
  strategy?: ImportStrategy;
  launcher?: WorkerLauncher;
  /** Parent directory for worker scratch files */
  tempDir?: string;
}

export interface EnvironmentInstallRequest {
  name: string;
  environmentPath: string;
  /** Search path to expose while the repository is consulted */
  systemSearchPath: string | null;
  version?: string;
  repository: PackageRepository;
  force?: boolean;
  allowPrerelease?: boolean;
}

export interface EnvironmentImportRequest {
  name: string;
  environmentPath: string;
  version?: string;
  strategy?: ImportStrategy;
  /** Exact versions the isolated worker must load for these packages */
  pins?: PinnedVersion[];
}

export interface EnvironmentImportResult {
  package: LoadedPackage;
  /** Everything attached or already present, dependencies first and the root last */
  loaded: LoadedPackage[];
  /** Dependencies the worker could not find */
  unresolved: string[];
}

/**
 * Installs into and imports from an environment without letting the rest of
 * the session see the environment's packages, or the environment see the
 * session's.
 */
export class IsolatedLoader {
  private readonly softTimeoutMs: number;
  private readonly workerTimeoutMs: number;
  private readonly maxDepth: number;
  private readonly strategy: ImportStrategy;
  private readonly launcher: WorkerLauncher;
  private readonly tempDir: string;

  constructor(
    private readonly host: HostRuntime,
    private readonly searchPath: SearchPathManager,
    private readonly interceptor: Pick<CallInterceptor, 'importPackage' | 'installPackage'>,
    options: IsolatedLoaderOptions = {}
  ) {
    this.softTimeoutMs = options.softTimeoutMs ?? DEFAULT_SOFT_TIMEOUT_MS;
    this.workerTimeoutMs = options.workerTimeoutMs ?? DEFAULT_WORKER_TIMEOUT_MS;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.strategy = options.strategy ?? 'isolated';
    this.launcher = options.launcher ?? new NodeWorkerLauncher();
    this.tempDir = options.tempDir ?? os.tmpdir();
  }

  /**
   * Fetch a package into the environment. The system search path is exposed
   * only while the intercepted host install runs and is always replaced by
   * the protected value afterwards.
   */
  async installToEnvironment(request: EnvironmentInstallRequest): Promise<InstalledPackage> {
    const destination = SearchPathManager.packageDirectory(request.environmentPath);
    await fs.promises.mkdir(destination, { recursive: true });

    const protectedValue = this.searchPath.snapshot();
    const openedAt = Date.now();
    const softTimer = setTimeout(() => {
      const warning = new IsolationTimeoutError(`install ${request.name}`, Date.now() - openedAt);
      logger.warn(warning.message, { code: warning.code });
    }, this.softTimeoutMs);
    softTimer.unref?.();

    try {
      this.searchPath.applyRaw(request.systemSearchPath);
      logger.debug(`System search path exposed for install of ${request.name}`);

      return await this.interceptor.installPackage({
        name: request.name,
        version: request.version,
        repository: request.repository,
        destination,
        force: request.force,
        allowPrerelease: request.allowPrerelease
      });
    } catch (error) {
      if (error instanceof ModEnvError) {
        throw error;
      }
      throw new ExternalOperationError(
        `Failed to install ${request.name}: ${getErrorMessage(error)}`,
        'install',
        error,
        { packageName: request.name }
      );
    } finally {
      clearTimeout(softTimer);
      this.searchPath.applyRaw(protectedValue);
      logger.debug(`Search path closed after ${Date.now() - openedAt}ms`);
    }
  }

  async importFromEnvironment(request: EnvironmentImportRequest): Promise<LoadedPackage> {
    return (await this.importClosure(request)).package;
  }

  /**
   * Import a package and report the closure that actually loaded. With the
   * isolated strategy the whole closure attaches or none of it does.
   */
  async importClosure(request: EnvironmentImportRequest): Promise<EnvironmentImportResult> {
    const located = await locateManifest(
      [SearchPathManager.packageDirectory(request.environmentPath)],
      request.name,
      request.version
    );
    if (!located) {
      throw new EnvironmentNotFoundError(request.name, 'package');
    }

    const strategy = request.strategy ?? this.strategy;
    logger.debug(`Importing ${located.manifest.name} ${located.manifest.version}`, { strategy });

    if (strategy === 'in-process') {
      const loaded = await this.importInProcess(located.manifest.name, located.manifest.version, request.environmentPath);
      return { package: loaded, loaded: [loaded], unresolved: [] };
    }
    return this.importIsolated(located.manifest.name, located.manifest.version, request.environmentPath, request.pins ?? []);
  }

  private async importInProcess(name: string, version: string, environmentPath: string): Promise<LoadedPackage> {
    this.unloadOtherVersion(name, version);

    const protectedValue = this.searchPath.snapshot();
    try {
      this.searchPath.apply(this.searchPath.computeImportPath(environmentPath));
      return await this.interceptor.importPackage(name, { requiredVersion: version });
    } finally {
      this.searchPath.applyRaw(protectedValue);
    }
  }

  private async importIsolated(
    name: string,
    version: string,
    environmentPath: string,
    pins: PinnedVersion[]
  ): Promise<EnvironmentImportResult> {
    const workDir = await fs.promises.mkdtemp(path.join(this.tempDir, 'modenv-import-'));
    const scriptPath = path.join(workDir, 'driver.cjs');
    const outputFile = path.join(workDir, 'descriptor.json');
    const stderrFile = path.join(workDir, 'stderr.log');

    try {
      await fs.promises.writeFile(scriptPath, buildDriverScript(), 'utf8');

      const args = driverArgv(scriptPath, {
        packageName: name,
        outputFile,
        version,
        maxDepth: this.maxDepth,
        searchPathVariable: this.host.searchPathVariable,
        pins
      });
      const env = {
        [this.host.searchPathVariable]: SearchPathManager.packageDirectory(path.resolve(environmentPath))
      };

      let exit: WorkerExit;
      try {
        exit = await this.launcher.launch({
          command: process.execPath,
          args,
          env,
          stderrFile,
          timeoutMs: this.workerTimeoutMs,
          cwd: workDir
        });
      } catch (error) {
        throw new IsolatedImportError('spawn', name, `Could not start import worker for ${name}: ${getErrorMessage(error)}`, error);
      }

      const stderr = (await readIfPresent(stderrFile)).trim();
      if (exit.timedOut) {
        throw new IsolatedImportError('exit', name, `Import worker for ${name} timed out after ${this.workerTimeoutMs}ms`, undefined, stderr);
      }
      if (exit.code !== 0) {
        const status = exit.code !== null ? `code ${exit.code}` : `signal ${exit.signal ?? 'unknown'}`;
        throw new IsolatedImportError(
          'exit',
          name,
          `Import worker for ${name} exited with ${status}${stderr ? `: ${stderr.split('\n')[0]}` : ''}`,
          undefined,
          stderr
        );
      }

      const raw = await readIfPresent(outputFile);
      if (raw.trim().length === 0) {
        throw new IsolatedImportError('output', name, `Import worker for ${name} produced no output`, undefined, stderr);
      }
      const descriptor = parseWorkerDescriptor(raw);
      if (!descriptor) {
        throw new IsolatedImportError('output', name, `Import worker for ${name} produced an unreadable descriptor`, undefined, stderr);
      }

      if (descriptor.unresolved.length > 0) {
        logger.warn(`Unresolved dependencies of ${name}: ${descriptor.unresolved.join(', ')}`);
      }

      const loaded = this.attachAll([...descriptor.dependencies, descriptor.root]);
      return { package: loaded[loaded.length - 1], loaded, unresolved: descriptor.unresolved };
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }

  /**
   * Attach in order. When one package is refused, the ones attached before
   * it are detached and any version they displaced is put back.
   */
  private attachAll(packages: WorkerPackage[]): LoadedPackage[] {
    const loaded: LoadedPackage[] = [];
    const attached: LoadedPackage[] = [];
    const displaced: LoadedPackage[] = [];

    try {
      for (const pkg of packages) {
        const existing = this.host.getLoadedPackage(pkg.name);
        if (existing && existing.version === pkg.version) {
          loaded.push(existing);
          continue;
        }

        const descriptor: LoadedPackage = {
          ...pkg,
          source: 'isolated',
          loadedAt: new Date().toISOString()
        };
        this.host.attachPackage(descriptor);
        if (existing) {
          logger.info(`Replaced ${existing.name} ${existing.version} with ${pkg.version}`);
          displaced.push(existing);
        }
        attached.push(descriptor);
        loaded.push(descriptor);
      }
    } catch (error) {
      for (const pkg of attached.reverse()) {
        this.host.unloadPackage(pkg.name);
      }
      for (const pkg of displaced) {
        this.host.attachPackage(pkg);
      }
      logger.warn(`Rolled back ${attached.length} package(s) after a failed attach`);
      throw error;
    }

    return loaded;
  }

  private unloadOtherVersion(name: string, version: string): void {
    const existing = this.host.getLoadedPackage(name);
    if (existing && existing.version !== version) {
      logger.info(`Unloading ${existing.name} ${existing.version} before loading ${version}`);
      this.host.unloadPackage(existing.name);
    }
  }
}

async function readIfPresent(file: string): Promise<string> {
  try {
    return await fs.promises.readFile(file, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return '';
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
