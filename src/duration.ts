/**
 * Human-readable durations ("10d", "36h") for configuration values.
 *
 * Durations are represented as milliseconds.
 */

const MS_PER_SECOND = 1_000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

const UNITS: ReadonlyArray<readonly [string, number]> = [
  ['d', MS_PER_DAY],
  ['h', MS_PER_HOUR],
  ['m', MS_PER_MINUTE],
  ['s', MS_PER_SECOND],
];

/**
 * Parse "<integer><unit>" with unit `d`, `h`, `m` or `s` into milliseconds.
 * Case-insensitive; surrounding whitespace is ignored.
 *
 * @throws {Error} on an empty string, an unknown unit, or a count that is
 *   not a non-negative integer.
 */
export function parseDuration(s: string): number {
  const trimmed = s.trim().toLowerCase();
  if (trimmed.length === 0) {
    throw new Error('Duration string must not be empty');
  }

  const unit = trimmed[trimmed.length - 1];
  const multiplier = UNITS.find(([u]) => u === unit)?.[1];
  if (multiplier === undefined) {
    throw new Error(`Duration must end with d, h, m, or s, got '${unit}'`);
  }

  const count = trimmed.slice(0, -1);
  if (!/^\d+$/.test(count)) {
    throw new Error(`Invalid number in duration: '${count}'`);
  }

  const ms = Number(count) * multiplier;
  if (!Number.isSafeInteger(ms)) {
    throw new Error('Duration is too large');
  }
  return ms;
}

/** Format milliseconds with the largest unit that divides evenly ("14d", "90s"). */
export function formatDuration(ms: number): string {
  const whole = Math.floor(ms / MS_PER_SECOND) * MS_PER_SECOND;
  for (const [unit, size] of UNITS) {
    if (whole >= size && whole % size === 0) {
      return `${String(whole / size)}${unit}`;
    }
  }
  return `${String(whole / MS_PER_SECOND)}s`;
}

/** Whole days in a duration, rounded down. */
export function durationToDays(ms: number): number {
  return Math.floor(ms / MS_PER_DAY);
}
