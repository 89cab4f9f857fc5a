import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig } from '@core/config/types';
import { ProcessHostRuntime } from '@core/host/ProcessHostRuntime';
import type { HostRuntime, InstalledPackage, LoadedPackage } from '@core/host/types';
import { CallInterceptor } from '@core/isolation/CallInterceptor';
import { DependencyResolver } from '@core/isolation/DependencyResolver';
import { IsolatedLoader } from '@core/isolation/IsolatedLoader';
import { PathGuard, type GuardState, type PathGuardStats } from '@core/isolation/PathGuard';
import { SearchPathManager } from '@core/isolation/SearchPathManager';
import type { WorkerLauncher } from '@core/isolation/worker/launcher';
import { EnvironmentRegistry } from '@core/registry/EnvironmentRegistry';
import type { Environment } from '@core/registry/types';
import { RepositoryCatalog } from '@core/repository/RepositoryCatalog';
import { ActivationController } from '@core/session/ActivationController';
import { EnvironmentLog } from '@core/session/EnvironmentLog';
import type { ActivateOptions, ActiveSession, PromptDecorator } from '@core/session/types';
import {
  EnvironmentService,
  type CreateEnvironmentOptions,
  type EnvironmentSummary,
  type ListEnvironmentsOptions,
  type RemoveEnvironmentOptions
} from '@core/services/EnvironmentService';
import {
  PackageService,
  type ImportPackageOptions,
  type ImportResult,
  type InstallPackageOptions,
  type ListPackagesOptions,
  type PackageInfo,
  type UninstallPackageOptions,
  type UpdatePackagesOptions,
  type UpdateSummary
} from '@core/services/PackageService';

export interface ModEnvOptions {
  config?: ResolvedConfig;
  host?: HostRuntime;
  repositories?: RepositoryCatalog;
  launcher?: WorkerLauncher;
  prompt?: PromptDecorator;
}

export interface ModEnvStatus {
  session: ActiveSession | null;
  searchPathVariable: string;
  searchPath: string[];
  guard: { state: GuardState; stats: PathGuardStats };
  hooksEnabled: boolean;
  loadedPackages: LoadedPackage[];
}

/**
 * One isolation engine per process: every component wired from the
 * resolved configuration, with the operations exposed in one place.
 */
export class ModEnv {
  readonly config: ResolvedConfig;
  readonly host: HostRuntime;
  readonly registry: EnvironmentRegistry;
  readonly searchPath: SearchPathManager;
  readonly guard: PathGuard;
  readonly interceptor: CallInterceptor;
  readonly resolver: DependencyResolver;
  readonly loader: IsolatedLoader;
  readonly controller: ActivationController;
  readonly environments: EnvironmentService;
  readonly packages: PackageService;
  readonly repositories: RepositoryCatalog;

  constructor(options: ModEnvOptions = {}) {
    this.config = options.config ?? new ConfigLoader().load();
    const config = this.config;

    this.host = options.host ?? new ProcessHostRuntime({
      searchPathVariable: config.host.searchPathVariable,
      corePaths: config.host.corePaths,
      essentialPaths: config.host.essentialPaths
    });
    this.repositories = options.repositories ?? RepositoryCatalog.fromConfig(config.repositories);
    this.registry = new EnvironmentRegistry(config.registryPath);
    this.searchPath = new SearchPathManager(this.host);
    this.guard = new PathGuard(this.host, { intervalMs: config.guard.intervalMs });
    this.interceptor = new CallInterceptor(this.host, this.guard, {
      importBypassSeconds: config.guard.importBypassSeconds,
      installBypassSeconds: config.guard.installBypassSeconds
    });
    this.resolver = new DependencyResolver({ maxDepth: config.resolver.maxDepth });
    this.loader = new IsolatedLoader(this.host, this.searchPath, this.interceptor, {
      softTimeoutMs: config.isolation.softTimeoutMs,
      workerTimeoutMs: config.isolation.workerTimeoutMs,
      maxDepth: config.resolver.maxDepth,
      strategy: config.isolation.strategy,
      launcher: options.launcher
    });

    const log = new EnvironmentLog();
    this.controller = new ActivationController({
      registry: this.registry,
      searchPath: this.searchPath,
      guard: this.guard,
      interceptor: this.interceptor,
      prompt: options.prompt,
      log
    });
    this.environments = new EnvironmentService(this.registry, this.controller, config.environmentsDir);
    this.packages = new PackageService({
      host: this.host,
      registry: this.registry,
      controller: this.controller,
      resolver: this.resolver,
      loader: this.loader,
      repositories: this.repositories,
      log,
      defaultStrategy: config.isolation.strategy
    });
  }

  create(name: string, options?: CreateEnvironmentOptions): Promise<Environment> {
    return this.environments.create(name, options);
  }

  remove(name: string, options?: RemoveEnvironmentOptions): Promise<boolean> {
    return this.environments.remove(name, options);
  }

  activate(name: string, options?: ActivateOptions): Promise<ActiveSession> {
    return this.controller.activate(name, options);
  }

  /**
   * Deactivate the current session. Ending a Global activation also clears
   * the startup flag.
   */
  async deactivate(): Promise<boolean> {
    const session = this.controller.getActiveSession();
    const deactivated = await this.controller.deactivate();
    if (deactivated && session?.scope === 'Global') {
      await this.registry.setAutoActivate(null);
    }
    return deactivated;
  }

  list(options?: ListEnvironmentsOptions): EnvironmentSummary[] {
    return this.environments.list(options);
  }

  installPackage(name: string, options?: InstallPackageOptions): Promise<InstalledPackage> {
    return this.packages.installPackage(name, options);
  }

  uninstallPackage(name: string, options?: UninstallPackageOptions): Promise<string[]> {
    return this.packages.uninstallPackage(name, options);
  }

  listPackages(options?: ListPackagesOptions): Promise<PackageInfo[]> {
    return this.packages.listPackages(options);
  }

  updatePackages(options?: UpdatePackagesOptions): Promise<UpdateSummary> {
    return this.packages.updatePackages(options);
  }

  importPackage(name: string, options?: ImportPackageOptions): Promise<ImportResult> {
    return this.packages.importPackage(name, options);
  }

  restoreAutoActivated(): Promise<ActiveSession | undefined> {
    return this.controller.restoreAutoActivated();
  }

  status(): ModEnvStatus {
    return {
      session: this.controller.getActiveSession(),
      searchPathVariable: this.searchPath.variable,
      searchPath: this.searchPath.entries(),
      guard: { state: this.guard.getState(), stats: this.guard.getStats() },
      hooksEnabled: this.interceptor.isEnabled(),
      loadedPackages: this.host.listLoadedPackages()
    };
  }

  /**
   * Stop the guard and put the search path back without touching the
   * startup flag. Used when a CLI process ends.
   */
  async dispose(): Promise<void> {
    if (this.controller.isActive()) {
      await this.controller.deactivate();
    }
  }
}
