import * as path from 'path';

export function splitSearchPath(value: string | null, delimiter: string = path.delimiter): string[] {
  if (!value) {
    return [];
  }
  return value.split(delimiter).map(entry => entry.trim()).filter(entry => entry.length > 0);
}

export function joinSearchPath(entries: string[], delimiter: string = path.delimiter): string {
  return entries.join(delimiter);
}
