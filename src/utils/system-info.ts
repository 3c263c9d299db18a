import { arch, platform, release } from 'node:os';
import { ConfigError } from '../core/errors.js';
import type { SystemInfo } from '../types/issue.js';

export function collectSystemInfo(): Array<[string, string]> {
  return [
    ['OS', platform()],
    ['OS Release', release()],
    ['Arch', arch()],
    ['Node', process.version],
  ];
}

/**
 * Parse repeated `key=value` CLI entries. Splits on the first `=` only.
 */
export function parseInfoEntries(entries: string[]): SystemInfo {
  return entries.map((entry): [string, string] => {
    const idx = entry.indexOf('=');
    if (idx <= 0) {
      throw new ConfigError(`Invalid --info entry "${entry}". Use key=value`);
    }
    return [entry.slice(0, idx).trim(), entry.slice(idx + 1).trim()];
  });
}
