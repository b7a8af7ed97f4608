/**
 * Duration parsing and compact age formatting
 */

import { ValidationError } from '../errors/index';

const UNIT_MS = new Map<string, number>([
  ['ns', 1e-6],
  ['us', 1e-3],
  ['µs', 1e-3],
  ['ms', 1],
  ['s', 1000],
  ['m', 60_000],
  ['h', 3_600_000],
]);

/**
 * Parse a duration such as `90s`, `5m` or `1h30m` into milliseconds.
 */
export function parseDuration(value: string): number {
  const input = value.trim();
  if (input === '0') {
    return 0;
  }
  if (input === '') {
    throw new ValidationError('invalid duration ""', ['since']);
  }

  const segment = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;
  let total = 0;
  let index = 0;
  while (index < input.length) {
    segment.lastIndex = index;
    const match = segment.exec(input);
    if (!match) {
      throw new ValidationError(`invalid duration "${value}"`, ['since']);
    }
    total += parseFloat(match[1] ?? '0') * (UNIT_MS.get(match[2] ?? '') ?? 0);
    index = segment.lastIndex;
  }
  return total;
}

function trimNumber(value: number): string {
  return String(Number(value.toFixed(9)));
}

/**
 * Canonical form of a duration: `1m30s`, `1h30m0s`, `2.5s`, `500ms`.
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  const sign = ms < 0 ? '-' : '';
  const abs = Math.abs(ms);

  if (abs < 1e-3) return `${sign}${trimNumber(abs * 1e6)}ns`;
  if (abs < 1) return `${sign}${trimNumber(abs * 1e3)}µs`;
  if (abs < 1000) return `${sign}${trimNumber(abs)}ms`;

  const hours = Math.floor(abs / 3_600_000);
  const minutes = Math.floor((abs % 3_600_000) / 60_000);
  const seconds = `${trimNumber((abs % 60_000) / 1000)}s`;
  if (hours > 0) return `${sign}${hours}h${minutes}m${seconds}`;
  if (minutes > 0) return `${sign}${minutes}m${seconds}`;
  return `${sign}${seconds}`;
}

/**
 * Compact age: `42s`, `5m`, `3h`, `12d`
 */
export function formatAge(ms: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m`;
  if (seconds < 86_400) return `${Math.floor(seconds / 3600)}h`;
  return `${Math.floor(seconds / 86_400)}d`;
}
