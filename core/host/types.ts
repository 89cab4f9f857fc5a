import type { AssemblyRef } from './manifest';
import type { PackageRepository } from '@core/repository/types';

export type LoadSource = 'host' | 'in-process' | 'isolated';

export interface LoadedPackage {
  name: string;
  version: string;
  /** Directory the package was loaded from */
  path: string;
  manifestPath: string;
  assemblies: AssemblyRef[];
  source: LoadSource;
  loadedAt: string;
}

export interface LoadedAssembly {
  name: string;
  version: string;
  publicKeyToken?: string;
  location: string;
  /** Package that brought the assembly in */
  loadedBy: string;
}

export interface HostImportOptions {
  requiredVersion?: string;
  /** Replace an already loaded package of the same name */
  force?: boolean;
}

export interface HostInstallRequest {
  name: string;
  version?: string;
  repository: PackageRepository;
  /** Package directory receiving <name>/<version> */
  destination: string;
  force?: boolean;
  allowPrerelease?: boolean;
}

export interface InstalledPackage {
  name: string;
  version: string;
  path: string;
  repository: string;
  status: 'installed' | 'existing';
  dependencies: InstalledPackage[];
}

/**
 * The scripting host whose package resolution modenv isolates. The search
 * path lives in a process-global variable that the host itself may rewrite
 * at any time.
 */
export interface HostRuntime {
  readonly searchPathVariable: string;

  /** Raw variable value; null when the variable is unset */
  readSearchPath(): string | null;
  /** Write the variable; null unsets it */
  writeSearchPath(value: string | null): void;

  getCorePackagePaths(): string[];
  getEssentialPaths(): string[];
  getUserProfileRoot(): string;

  listLoadedPackages(): LoadedPackage[];
  getLoadedPackage(name: string): LoadedPackage | undefined;
  /** Replaces a loaded package of the same name; throws when an assembly clashes */
  attachPackage(descriptor: LoadedPackage): void;
  unloadPackage(name: string): boolean;
  listLoadedAssemblies(): LoadedAssembly[];

  /** Load a package through the live search path */
  importPackage(name: string, options?: HostImportOptions): Promise<LoadedPackage>;
  /** Fetch a package (and its required packages) from a repository */
  installPackage(request: HostInstallRequest): Promise<InstalledPackage>;
}
