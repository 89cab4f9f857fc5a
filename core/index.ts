/**
 * Public library surface. The CLI is built on the same exports.
 */
export { ModEnv } from './ModEnv';
export type { ModEnvOptions, ModEnvStatus } from './ModEnv';

export { ConfigLoader, TOOL_DIRECTORY, DEFAULT_SEARCH_PATH_VARIABLE } from './config/loader';
export type { ConfigLoaderOptions } from './config/loader';
export type { ModEnvConfig, ResolvedConfig, ImportStrategy, PlatformPaths } from './config/types';

export * from './errors';

export { ProcessHostRuntime } from './host/ProcessHostRuntime';
export type { ProcessHostRuntimeOptions } from './host/ProcessHostRuntime';
export { MANIFEST_FILE, parseManifest, readManifest, locateManifest } from './host/manifest';
export type { PackageManifest, PackageReference, AssemblyRef, LocatedManifest } from './host/manifest';
export type {
  HostRuntime,
  LoadedPackage,
  LoadedAssembly,
  InstalledPackage,
  HostInstallRequest,
  HostImportOptions,
  LoadSource
} from './host/types';

export { SearchPathManager, PACKAGE_DIRECTORY } from './isolation/SearchPathManager';
export { PathGuard } from './isolation/PathGuard';
export type { GuardState, PathGuardOptions, PathGuardStats } from './isolation/PathGuard';
export { CallInterceptor } from './isolation/CallInterceptor';
export type { CallInterceptorOptions } from './isolation/CallInterceptor';
export { DependencyResolver } from './isolation/DependencyResolver';
export { IsolatedLoader } from './isolation/IsolatedLoader';
export type { IsolatedLoaderOptions } from './isolation/IsolatedLoader';
export type { WorkerLauncher, WorkerInvocation, WorkerExit } from './isolation/worker/launcher';
export type {
  DependencyNode,
  DependencyTree,
  DependencyAnalysis,
  AssemblyConflict,
  ConflictRemediation,
  ConflictType,
  LoadOutcome
} from './isolation/types';

export { EnvironmentRegistry } from './registry/EnvironmentRegistry';
export type { Environment, EnvironmentSettings, ModuleEntry } from './registry/types';

export { LocalDirectoryRepository } from './repository/LocalDirectoryRepository';
export { RepositoryCatalog } from './repository/RepositoryCatalog';
export type { PackageRepository, RepositoryPackage, FindOptions } from './repository/types';

export { ActivationController } from './session/ActivationController';
export type { ActivationScope, ActiveSession, ActivateOptions, PromptDecorator } from './session/types';

export type {
  CreateEnvironmentOptions,
  RemoveEnvironmentOptions,
  ListEnvironmentsOptions,
  EnvironmentSummary
} from './services/EnvironmentService';
export type {
  InstallPackageOptions,
  UninstallPackageOptions,
  ListPackagesOptions,
  UpdatePackagesOptions,
  ImportPackageOptions,
  PackageInfo,
  UpdateSummary,
  ImportResult
} from './services/PackageService';

export { version } from './version';
