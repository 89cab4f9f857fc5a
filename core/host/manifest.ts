import * as fs from 'fs';
import * as path from 'path';
import { ModEnvError, ErrorSeverity, getErrorMessage } from '@core/errors';
import { compareVersionStrings, safeSatisfies } from '@core/utils/version-checker';
import type { ConflictType } from '@core/isolation/types';

export const MANIFEST_FILE = 'manifest.json';

export interface PackageReference {
  name: string;
  /** Version requirement (exact, ^, ~, >= ...) */
  version?: string;
}

export interface AssemblyRef {
  name: string;
  version: string;
  publicKeyToken?: string;
  /** File location; relative paths are relative to the package directory */
  location?: string;
}

/**
 * How a required assembly clashes with the copy already present, if at all.
 * A token missing on either side never counts as an identity mismatch.
 */
export function assemblyConflict(
  present: Pick<AssemblyRef, 'version' | 'publicKeyToken'>,
  required: Pick<AssemblyRef, 'version' | 'publicKeyToken'>
): ConflictType | undefined {
  if (present.version !== required.version) {
    return 'VersionMismatch';
  }
  if (present.publicKeyToken && required.publicKeyToken && present.publicKeyToken !== required.publicKeyToken) {
    return 'IdentityMismatch';
  }
  return undefined;
}

export interface PackageManifest {
  name: string;
  version: string;
  description?: string;
  requiredPackages: PackageReference[];
  nestedPackages: PackageReference[];
  requiredAssemblies: AssemblyRef[];
  requireLicenseAcceptance: boolean;
}

export interface LocatedManifest {
  manifest: PackageManifest;
  manifestPath: string;
  packageDir: string;
  layout: 'versioned' | 'flat';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(file: string, reason: string): ModEnvError {
  return new ModEnvError(`Invalid manifest ${file}: ${reason}`, {
    code: 'INVALID_MANIFEST',
    severity: ErrorSeverity.Recoverable,
    details: { file }
  });
}

function parseReferences(value: unknown, field: string, file: string): PackageReference[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalid(file, `'${field}' must be an array`);
  }

  return value.map((entry): PackageReference => {
    if (typeof entry === 'string' && entry.trim().length > 0) {
      return { name: entry.trim() };
    }
    if (isRecord(entry) && typeof entry.name === 'string' && entry.name.trim().length > 0) {
      return {
        name: entry.name.trim(),
        version: typeof entry.version === 'string' ? entry.version : undefined
      };
    }
    throw invalid(file, `'${field}' entries must be names or {name, version}`);
  });
}

function parseAssemblies(value: unknown, file: string): AssemblyRef[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalid(file, `'requiredAssemblies' must be an array`);
  }

  return value.map((entry): AssemblyRef => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.version !== 'string') {
      throw invalid(file, `'requiredAssemblies' entries need a name and a version`);
    }
    return {
      name: entry.name,
      version: entry.version,
      publicKeyToken: typeof entry.publicKeyToken === 'string' ? entry.publicKeyToken : undefined,
      location: typeof entry.location === 'string' ? entry.location : undefined
    };
  });
}

export function parseManifest(content: string, file: string): PackageManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw invalid(file, getErrorMessage(error));
  }

  if (!isRecord(raw)) {
    throw invalid(file, 'expected a JSON object');
  }
  if (typeof raw.name !== 'string' || raw.name.length === 0) {
    throw invalid(file, `missing 'name'`);
  }
  if (typeof raw.version !== 'string' || raw.version.length === 0) {
    throw invalid(file, `missing 'version'`);
  }

  return {
    name: raw.name,
    version: raw.version,
    description: typeof raw.description === 'string' ? raw.description : undefined,
    requiredPackages: parseReferences(raw.requiredPackages, 'requiredPackages', file),
    nestedPackages: parseReferences(raw.nestedPackages, 'nestedPackages', file),
    requiredAssemblies: parseAssemblies(raw.requiredAssemblies, file),
    requireLicenseAcceptance: raw.requireLicenseAcceptance === true
  };
}

export async function readManifest(manifestPath: string): Promise<PackageManifest> {
  const content = await fs.promises.readFile(manifestPath, 'utf8');
  return parseManifest(content, manifestPath);
}

/**
 * Directory of a package under a root, matching the name case-insensitively
 * when there is no exact match.
 */
export async function findPackageDirectory(root: string, name: string): Promise<string | undefined> {
  const exact = path.join(root, name);
  if (await isDirectory(exact)) {
    return exact;
  }

  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(root, { withFileTypes: true });
  } catch {
    return undefined;
  }

  const wanted = name.toLowerCase();
  const match = entries.find(entry => entry.isDirectory() && entry.name.toLowerCase() === wanted);
  return match ? path.join(root, match.name) : undefined;
}

/**
 * Versions installed side by side under a package directory, newest first.
 */
export async function listVersionDirectories(packageDir: string): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(packageDir, { withFileTypes: true });
  } catch {
    return [];
  }

  const versions: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory() && fs.existsSync(path.join(packageDir, entry.name, MANIFEST_FILE))) {
      versions.push(entry.name);
    }
  }

  return versions.sort((a, b) => compareVersionStrings(b, a));
}

/**
 * Locate a package manifest under the given roots only. Versioned layouts
 * are tried newest-first, the flat layout last.
 */
export async function locateManifest(
  roots: string[],
  name: string,
  requirement?: string
): Promise<LocatedManifest | undefined> {
  for (const root of roots) {
    const packageDir = await findPackageDirectory(root, name);
    if (!packageDir) {
      continue;
    }

    for (const version of await listVersionDirectories(packageDir)) {
      if (!safeSatisfies(version, requirement)) {
        continue;
      }
      const manifestPath = path.join(packageDir, version, MANIFEST_FILE);
      return {
        manifest: await readManifest(manifestPath),
        manifestPath,
        packageDir: path.dirname(manifestPath),
        layout: 'versioned'
      };
    }

    const flatPath = path.join(packageDir, MANIFEST_FILE);
    if (fs.existsSync(flatPath)) {
      const manifest = await readManifest(flatPath);
      if (safeSatisfies(manifest.version, requirement)) {
        return { manifest, manifestPath: flatPath, packageDir, layout: 'flat' };
      }
    }
  }

  return undefined;
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}
