import { ModEnvError, ErrorSeverity } from '@core/errors';

export interface SemVer {
  major: number;
  minor: number;
  patch: number;
  prerelease?: string;
  build?: string;
}

const SEMVER_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)(?:-([^+]+))?(?:\+(.+))?$/;

/**
 * Parse a semantic version string
 */
export function parseSemVer(versionString: string): SemVer {
  const parsed = tryParseSemVer(versionString);

  if (!parsed) {
    throw new ModEnvError(`Invalid version string: ${versionString}`, {
      code: 'INVALID_VERSION',
      severity: ErrorSeverity.Fatal
    });
  }

  return parsed;
}

export function tryParseSemVer(versionString: string): SemVer | undefined {
  const match = versionString.trim().match(SEMVER_PATTERN);
  if (!match) {
    return undefined;
  }

  return {
    major: parseInt(match[1], 10),
    minor: parseInt(match[2], 10),
    patch: parseInt(match[3], 10),
    prerelease: match[4] || undefined,
    build: match[5] || undefined
  };
}

/**
 * Compare two semantic versions
 * Returns: negative if a < b, 0 if a === b, positive if a > b
 */
export function compareSemVer(a: SemVer, b: SemVer): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  if (a.patch !== b.patch) return a.patch - b.patch;

  // If one has prerelease and other doesn't, non-prerelease is greater
  if (a.prerelease && !b.prerelease) return -1;
  if (!a.prerelease && b.prerelease) return 1;

  if (a.prerelease && b.prerelease) {
    return a.prerelease.localeCompare(b.prerelease);
  }

  return 0;
}

/**
 * Order two version strings; strings that are not semver sort below every
 * valid version and lexically among themselves.
 */
export function compareVersionStrings(a: string, b: string): number {
  const left = tryParseSemVer(a);
  const right = tryParseSemVer(b);

  if (left && right) return compareSemVer(left, right);
  if (left) return 1;
  if (right) return -1;
  return a.localeCompare(b);
}

export function isPrerelease(version: string): boolean {
  return tryParseSemVer(version)?.prerelease !== undefined;
}

/**
 * Check if a version satisfies a requirement
 */
export function satisfiesVersion(version: string, requirement: string): boolean {
  const trimmed = requirement.trim();
  if (trimmed === '*' || trimmed === '' || trimmed === 'latest') return true;

  const ver = parseSemVer(version);

  if (trimmed.startsWith('>=')) {
    return compareSemVer(ver, parseSemVer(trimmed.substring(2).trim())) >= 0;
  }

  if (trimmed.startsWith('>')) {
    return compareSemVer(ver, parseSemVer(trimmed.substring(1).trim())) > 0;
  }

  if (trimmed.startsWith('<=')) {
    return compareSemVer(ver, parseSemVer(trimmed.substring(2).trim())) <= 0;
  }

  if (trimmed.startsWith('<')) {
    return compareSemVer(ver, parseSemVer(trimmed.substring(1).trim())) < 0;
  }

  // ^ operator (compatible with)
  if (trimmed.startsWith('^')) {
    const reqVer = parseSemVer(trimmed.substring(1).trim());
    if (compareSemVer(ver, reqVer) < 0) return false;

    // For 0.x.x, treat minor as breaking
    if (reqVer.major === 0) {
      return ver.major === 0 && ver.minor === reqVer.minor;
    }

    return ver.major === reqVer.major;
  }

  // ~ operator (approximately)
  if (trimmed.startsWith('~')) {
    const reqVer = parseSemVer(trimmed.substring(1).trim());
    if (compareSemVer(ver, reqVer) < 0) return false;

    return ver.major === reqVer.major && ver.minor === reqVer.minor;
  }

  return compareSemVer(ver, parseSemVer(trimmed)) === 0;
}

/**
 * Like satisfiesVersion, but a malformed version or requirement is a miss
 * rather than an error.
 */
export function safeSatisfies(version: string, requirement: string | undefined): boolean {
  if (!requirement) {
    return true;
  }
  try {
    return satisfiesVersion(version, requirement);
  } catch {
    return version === requirement;
  }
}
