import * as path from 'path';
import { getErrorMessage } from '@core/errors';
import { assemblyConflict, locateManifest, type LocatedManifest, type PackageReference } from '@core/host/manifest';
import type { LoadedAssembly } from '@core/host/types';
import { resolverLogger as logger } from '@core/utils/logger';
import { SearchPathManager } from './SearchPathManager';
import type {
  AssemblyConflict,
  ConflictRemediation,
  DependencyAnalysis,
  DependencyNode,
  DependencyTree,
  LoadOutcome
} from './types';

export const DEFAULT_MAX_DEPTH = 10;

export interface DependencyResolverOptions {
  maxDepth?: number;
}

interface ResolutionContext {
  packageDir: string;
  maxDepth: number;
  memo: Map<string, DependencyNode>;
  all: Map<string, DependencyNode>;
  truncated: Set<string>;
  warnings: string[];
}

interface DeclaredAssembly {
  version: string;
  publicKeyToken?: string;
  location: string;
  owner: string;
}

/**
 * Builds the dependency tree of a package from manifests inside one
 * environment, checks its native assemblies against what the host already
 * has loaded, and drives deepest-first loading.
 */
export class DependencyResolver {
  private readonly maxDepth: number;

  constructor(options: DependencyResolverOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  async resolve(
    packageName: string,
    environmentPath: string,
    maxDepth: number = this.maxDepth,
    requiredVersion?: string
  ): Promise<DependencyTree> {
    const context: ResolutionContext = {
      packageDir: SearchPathManager.packageDirectory(environmentPath),
      maxDepth,
      memo: new Map(),
      all: new Map(),
      truncated: new Set(),
      warnings: []
    };

    const root = await this.visit({ name: packageName, version: requiredVersion }, 0, context);

    const unresolved = new Set<string>(context.truncated);
    for (const node of context.all.values()) {
      if (!node.resolved) {
        unresolved.add(node.name);
      }
    }

    return {
      root,
      all: context.all,
      count: context.all.size,
      unresolved: [...unresolved].sort((a, b) => a.localeCompare(b)),
      warnings: context.warnings
    };
  }

  /**
   * Compare every declared native assembly with the assemblies loaded in the
   * host and with declarations made earlier in the same tree.
   */
  detectConflicts(tree: DependencyTree, loaded: LoadedAssembly[] = []): AssemblyConflict[] {
    const conflicts: AssemblyConflict[] = [];
    const declared = new Map<string, DeclaredAssembly>();

    for (const node of this.computeLoadOrder(tree)) {
      const nodeKey = node.name.toLowerCase();
      const nodeDir = node.resolvedManifestPath ? path.dirname(node.resolvedManifestPath) : '';

      for (const assembly of node.requiredNativeAssemblies) {
        const key = assembly.name.toLowerCase();
        const requiredLocation = assembly.location ?? nodeDir;
        const inProcess = loaded.find(entry =>
          entry.name.toLowerCase() === key && entry.loadedBy.toLowerCase() !== nodeKey
        );
        const baseline: DeclaredAssembly | undefined = inProcess
          ? {
              version: inProcess.version,
              publicKeyToken: inProcess.publicKeyToken,
              location: inProcess.location,
              owner: inProcess.loadedBy
            }
          : declared.get(key);

        if (baseline && baseline.owner.toLowerCase() !== nodeKey) {
          const conflictType = assemblyConflict(baseline, assembly);

          if (conflictType) {
            conflicts.push({
              assemblyName: assembly.name,
              loadedVersion: baseline.version,
              requiredVersion: assembly.version,
              loadedLocation: baseline.location,
              requiredLocation,
              conflictType,
              requiredBy: node.name,
              loadedBy: baseline.owner
            });
          }
        }

        if (!declared.has(key)) {
          declared.set(key, {
            version: assembly.version,
            publicKeyToken: assembly.publicKeyToken,
            location: requiredLocation,
            owner: node.name
          });
        }
      }
    }

    return conflicts;
  }

  /**
   * Deepest dependencies first, ties broken by name. Packages without a
   * manifest are left out.
   */
  computeLoadOrder(tree: DependencyTree): DependencyNode[] {
    return [...tree.all.values()]
      .filter(node => node.resolvedManifestPath !== undefined)
      .sort((a, b) => b.depth - a.depth || a.name.localeCompare(b.name));
  }

  /**
   * Sequential and best-effort: a failure is recorded and loading continues.
   */
  async loadInOrder(
    ordered: DependencyNode[],
    load: (node: DependencyNode) => Promise<unknown>
  ): Promise<LoadOutcome> {
    const outcome: LoadOutcome = { loaded: [], failed: [] };

    for (const node of ordered) {
      try {
        await load(node);
        outcome.loaded.push(node.name);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Failed to load ${node.name}: ${message}`);
        outcome.failed.push({ name: node.name, error: message });
      }
    }

    return outcome;
  }

  async analyze(
    packageName: string,
    environmentPath: string,
    loaded: LoadedAssembly[] = [],
    requiredVersion?: string
  ): Promise<DependencyAnalysis> {
    const tree = await this.resolve(packageName, environmentPath, this.maxDepth, requiredVersion);
    const conflicts = this.detectConflicts(tree, loaded);
    const loadedOwners = new Set(loaded.map(entry => entry.loadedBy));

    return {
      success: conflicts.length === 0 && tree.root?.resolvedManifestPath !== undefined,
      tree,
      conflicts,
      loadOrder: conflicts.length === 0 ? this.computeLoadOrder(tree) : [],
      remediation: this.buildRemediation(conflicts, loadedOwners)
    };
  }

  private buildRemediation(conflicts: AssemblyConflict[], loadedOwners: Set<string>): ConflictRemediation {
    const removeFromSession = new Set<string>();
    const installExact = new Map<string, { assemblyName: string; version: string }>();

    for (const conflict of conflicts) {
      if (loadedOwners.has(conflict.loadedBy)) {
        removeFromSession.add(conflict.loadedBy);
      }
      installExact.set(conflict.assemblyName.toLowerCase(), {
        assemblyName: conflict.assemblyName,
        version: conflict.loadedVersion
      });
    }

    return {
      removeFromSession: [...removeFromSession].sort((a, b) => a.localeCompare(b)),
      installExact: [...installExact.values()]
    };
  }

  private async visit(
    reference: PackageReference,
    depth: number,
    context: ResolutionContext
  ): Promise<DependencyNode | null> {
    if (depth > context.maxDepth) {
      const warning = `Maximum dependency depth ${context.maxDepth} exceeded at ${reference.name}; branch not resolved`;
      logger.warn(warning);
      context.warnings.push(warning);
      context.truncated.add(reference.name);
      return null;
    }

    const memoKey = `${reference.name.toLowerCase()}@${depth}`;
    const memoised = context.memo.get(memoKey);
    if (memoised) {
      return memoised;
    }

    const node: DependencyNode = {
      name: reference.name,
      requiredVersion: reference.version,
      dependencies: [],
      requiredNativeAssemblies: [],
      depth,
      resolved: false
    };
    context.memo.set(memoKey, node);

    const located = await this.locate(reference, context);
    if (!located) {
      this.record(node, context);
      return node;
    }

    const packageDir = path.dirname(located.manifestPath);
    node.name = located.manifest.name;
    node.version = located.manifest.version;
    node.resolvedManifestPath = located.manifestPath;
    node.requiredNativeAssemblies = located.manifest.requiredAssemblies.map(assembly => ({
      ...assembly,
      location: assembly.location ? path.resolve(packageDir, assembly.location) : undefined
    }));

    let complete = true;
    const children = [...located.manifest.requiredPackages, ...located.manifest.nestedPackages];
    for (const child of children) {
      const childNode = await this.visit(child, depth + 1, context);
      if (!childNode) {
        complete = false;
        continue;
      }
      node.dependencies.push(childNode);
      complete = complete && childNode.resolved;
    }

    node.resolved = complete;
    this.record(node, context);
    return node;
  }

  private async locate(reference: PackageReference, context: ResolutionContext): Promise<LocatedManifest | undefined> {
    try {
      const located = await locateManifest([context.packageDir], reference.name, reference.version);
      if (!located) {
        const warning = `Package ${reference.name}${reference.version ? ` ${reference.version}` : ''} not found in environment`;
        logger.warn(warning);
        context.warnings.push(warning);
      }
      return located;
    } catch (error) {
      const warning = `Unreadable manifest for ${reference.name}: ${getErrorMessage(error)}`;
      logger.warn(warning);
      context.warnings.push(warning);
      return undefined;
    }
  }

  private record(node: DependencyNode, context: ResolutionContext): void {
    const key = node.name.toLowerCase();
    const existing = context.all.get(key);
    if (!existing || node.depth > existing.depth) {
      context.all.set(key, node);
    }
  }
}
