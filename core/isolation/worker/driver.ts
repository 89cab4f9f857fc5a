import { MANIFEST_FILE } from '@core/host/manifest';

export interface PinnedVersion {
  name: string;
  version: string;
}

export interface DriverArguments {
  packageName: string;
  outputFile: string;
  /** Version requirement of the root; newest when omitted */
  version?: string;
  maxDepth: number;
  searchPathVariable: string;
  /** Exact versions that win over any requirement a manifest declares */
  pins?: PinnedVersion[];
}

export function driverArgv(scriptPath: string, args: DriverArguments): string[] {
  return [
    scriptPath,
    args.packageName,
    args.outputFile,
    args.version ?? '',
    String(args.maxDepth),
    args.searchPathVariable,
    JSON.stringify(args.pins ?? [])
  ];
}

/**
 * Source of the throwaway script run by the import worker. It sees nothing
 * but the search-path variable, walks the dependency closure depth-first
 * with a (name, depth) visited set, and writes the loaded-package
 * descriptor as JSON to the output file. A missing root exits with code 2.
 *
 * Requirements are matched the way satisfiesVersion matches them, and a
 * pinned package is only ever loaded at its pinned version.
 */
export function buildDriverScript(): string {
  return String.raw`'use strict';
const fs = require('fs');
const path = require('path');

const MANIFEST = ${JSON.stringify(MANIFEST_FILE)};
const [name, outputFile, wantedVersion, maxDepthArg, variable, pinsArg] = process.argv.slice(2);
const maxDepth = Number(maxDepthArg) >= 0 ? Number(maxDepthArg) : 10;
const roots = (process.env[variable] || '').split(path.delimiter).filter(Boolean);
const pins = new Map(JSON.parse(pinsArg || '[]').map(pin => [pin.name.toLowerCase(), pin.version]));

function parseVersion(value) {
  const match = /^v?(\d+)\.(\d+)\.(\d+)(?:-([^+]+))?(?:\+(.+))?$/.exec(String(value).trim());
  return match ? [Number(match[1]), Number(match[2]), Number(match[3]), match[4] || ''] : null;
}

function compareParsed(left, right) {
  for (let i = 0; i < 3; i++) {
    if (left[i] !== right[i]) return left[i] - right[i];
  }
  if (left[3] && !right[3]) return -1;
  if (!left[3] && right[3]) return 1;
  return left[3].localeCompare(right[3]);
}

function compareVersions(a, b) {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (left && right) return compareParsed(left, right);
  if (left) return 1;
  if (right) return -1;
  return a.localeCompare(b);
}

function satisfies(version, requirement) {
  if (!requirement) return true;
  const wanted = requirement.trim();
  if (wanted === '*' || wanted === '' || wanted === 'latest') return true;
  const operator = /^(>=|<=|>|<|\^|~)?(.*)$/.exec(wanted);
  const actual = parseVersion(version);
  const bound = parseVersion(operator[2]);
  if (!actual || !bound) return version === requirement;
  const order = compareParsed(actual, bound);
  switch (operator[1]) {
    case '>=': return order >= 0;
    case '>': return order > 0;
    case '<=': return order <= 0;
    case '<': return order < 0;
    case '^':
      if (order < 0) return false;
      return bound[0] === 0 ? actual[0] === 0 && actual[1] === bound[1] : actual[0] === bound[0];
    case '~':
      return order >= 0 && actual[0] === bound[0] && actual[1] === bound[1];
    default:
      return order === 0;
  }
}

function readManifest(file) {
  return JSON.parse(fs.readFileSync(file, 'utf8'));
}

function findPackageDir(root, wanted) {
  let entries;
  try {
    entries = fs.readdirSync(root, { withFileTypes: true });
  } catch (error) {
    return null;
  }
  const dirs = entries.filter(entry => entry.isDirectory());
  const match = dirs.find(entry => entry.name === wanted) ||
    dirs.find(entry => entry.name.toLowerCase() === wanted.toLowerCase());
  return match ? path.join(root, match.name) : null;
}

function locate(wanted, version) {
  for (const root of roots) {
    const dir = findPackageDir(root, wanted);
    if (!dir) continue;
    const versions = fs.readdirSync(dir, { withFileTypes: true })
      .filter(entry => entry.isDirectory() && fs.existsSync(path.join(dir, entry.name, MANIFEST)))
      .map(entry => entry.name)
      .sort((a, b) => compareVersions(b, a));
    for (const candidate of versions) {
      if (satisfies(candidate, version)) return path.join(dir, candidate, MANIFEST);
    }
    const flat = path.join(dir, MANIFEST);
    if (fs.existsSync(flat) && satisfies(readManifest(flat).version, version)) return flat;
  }
  return null;
}

function references(list) {
  return (list || []).map(entry => typeof entry === 'string' ? { name: entry } : entry);
}

function describe(manifestPath, manifest) {
  const dir = path.dirname(manifestPath);
  return {
    name: manifest.name,
    version: manifest.version,
    path: dir,
    manifestPath: manifestPath,
    assemblies: (manifest.requiredAssemblies || []).map(assembly => ({
      name: assembly.name,
      version: assembly.version,
      publicKeyToken: assembly.publicKeyToken,
      location: assembly.location ? path.resolve(dir, assembly.location) : undefined
    }))
  };
}

const visited = new Set();
const loaded = [];
const unresolved = new Set();

function load(reference, depth) {
  if (depth > maxDepth) {
    unresolved.add(reference.name);
    return null;
  }
  const key = reference.name.toLowerCase() + '@' + depth;
  if (visited.has(key)) return null;
  visited.add(key);

  const pinned = pins.get(reference.name.toLowerCase());
  const manifestPath = locate(reference.name, pinned || reference.version);
  if (!manifestPath) {
    unresolved.add(reference.name);
    return null;
  }

  const manifest = readManifest(manifestPath);
  const children = references(manifest.requiredPackages).concat(references(manifest.nestedPackages));
  for (const child of children) {
    load(child, depth + 1);
  }

  const descriptor = describe(manifestPath, manifest);
  if (!loaded.some(entry => entry.name.toLowerCase() === descriptor.name.toLowerCase())) {
    loaded.push(descriptor);
  }
  return descriptor;
}

const root = load({ name: name, version: wantedVersion || undefined }, 0);
if (!root) {
  process.stderr.write('Package ' + name + ' not found on ' + variable + '\n');
  process.exit(2);
}

fs.writeFileSync(outputFile, JSON.stringify({
  root: root,
  dependencies: loaded.filter(entry => entry.name.toLowerCase() !== root.name.toLowerCase()),
  unresolved: Array.from(unresolved)
}));
`;
}
