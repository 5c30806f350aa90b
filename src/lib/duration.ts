import { ConfigError } from './errors.js';

// durations are written the way most ops tooling writes them: 30s, 1m30s, 1.5h, 250ms
const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000
};

// longest delay a node timer honours; anything above fires after 1ms
export const MAX_TIMER_MS = 2 ** 31 - 1;

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

/**
 * Parses a duration string into milliseconds.
 * A bare `0` is accepted; any other number needs a unit.
 */
export function parseDuration(input: string): number {
  const text = input.trim();
  if (text === '') {
    throw new ConfigError('invalid duration: empty string');
  }

  let rest = text;
  let sign = 1;
  if (rest[0] === '-' || rest[0] === '+') {
    sign = rest[0] === '-' ? -1 : 1;
    rest = rest.slice(1);
  }
  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw new ConfigError(`invalid duration: ${JSON.stringify(input)}`);
  }

  let total = 0;
  SEGMENT.lastIndex = 0;
  while (SEGMENT.lastIndex < rest.length) {
    const match = SEGMENT.exec(rest);
    if (!match) {
      throw new ConfigError(`invalid duration: ${JSON.stringify(input)}`);
    }
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }

  return sign * total;
}

// inverse of parseDuration for log output
export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  if (ms < 0) return `-${formatDuration(-ms)}`;
  if (ms < 1000) return `${trim(ms)}ms`;

  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.floor((ms % 3_600_000) / 60_000);
  const seconds = trim((ms % 60_000) / 1000);

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

function trim(n: number): string {
  return String(Math.round(n * 1000) / 1000);
}
