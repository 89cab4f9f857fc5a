import type { AssemblyRef } from '@core/host/manifest';

export interface WorkerPackage {
  name: string;
  version: string;
  path: string;
  manifestPath: string;
  assemblies: AssemblyRef[];
}

/**
 * What the import worker writes back: the target package, its dependency
 * closure in load order, and the names it could not find.
 */
export interface WorkerDescriptor {
  root: WorkerPackage;
  dependencies: WorkerPackage[];
  unresolved: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAssembly(value: unknown): AssemblyRef | undefined {
  if (!isRecord(value) || typeof value.name !== 'string' || typeof value.version !== 'string') {
    return undefined;
  }
  return {
    name: value.name,
    version: value.version,
    publicKeyToken: typeof value.publicKeyToken === 'string' ? value.publicKeyToken : undefined,
    location: typeof value.location === 'string' ? value.location : undefined
  };
}

function toPackage(value: unknown): WorkerPackage | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const { name, version, path, manifestPath, assemblies } = value;
  if (
    typeof name !== 'string' ||
    typeof version !== 'string' ||
    typeof path !== 'string' ||
    typeof manifestPath !== 'string' ||
    !Array.isArray(assemblies)
  ) {
    return undefined;
  }

  const parsed: AssemblyRef[] = [];
  for (const entry of assemblies) {
    const assembly = toAssembly(entry);
    if (!assembly) {
      return undefined;
    }
    parsed.push(assembly);
  }

  return { name, version, path, manifestPath, assemblies: parsed };
}

/**
 * Validate worker output. Returns undefined for anything that is not a
 * complete descriptor.
 */
export function parseWorkerDescriptor(raw: string): WorkerDescriptor | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(value) || !Array.isArray(value.dependencies)) {
    return undefined;
  }

  const root = toPackage(value.root);
  if (!root) {
    return undefined;
  }

  const dependencies: WorkerPackage[] = [];
  for (const entry of value.dependencies) {
    const dependency = toPackage(entry);
    if (!dependency) {
      return undefined;
    }
    dependencies.push(dependency);
  }

  const unresolved = Array.isArray(value.unresolved)
    ? value.unresolved.filter((entry): entry is string => typeof entry === 'string')
    : [];

  return { root, dependencies, unresolved };
}
