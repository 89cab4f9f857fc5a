const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000
};

/**
 * Milliseconds for "150ms", "15s", "2m" or "1h". Numbers are taken as
 * milliseconds already.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    return value;
  }

  const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/i.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid duration format: ${value}`);
  }

  const unit = (match[2] ?? 'ms').toLowerCase();
  return Math.floor(Number(match[1]) * UNIT_MS[unit]);
}
