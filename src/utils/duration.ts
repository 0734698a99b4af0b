/**
 * Human-readable durations such as `30s`, `1min` or `1h30m`
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  sec: 1000,
  secs: 1000,
  m: 60 * 1000,
  min: 60 * 1000,
  mins: 60 * 1000,
  h: 60 * 60 * 1000,
  hr: 60 * 60 * 1000,
  hour: 60 * 60 * 1000,
  hours: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
};

const PART = /(\d+(?:\.\d+)?)\s*([a-z]+)/gy;

/** Longest delay setTimeout accepts; larger ones fire after 1ms */
export const MAX_DURATION_MS = 2_147_483_647;

/**
 * Parse a duration into whole milliseconds.
 * Throws on unknown units, leftovers, and results outside 1ms..MAX_DURATION_MS.
 */
export function parseDuration(input: string): number {
  const text = input.trim().toLowerCase();
  if (text.length === 0) {
    throw new Error('duration is empty');
  }

  let total = 0;
  PART.lastIndex = 0;
  while (PART.lastIndex < text.length) {
    const match = PART.exec(text);
    if (!match) {
      throw new Error(`invalid duration '${input}'`);
    }
    const [, amount, unit] = match;
    const factor = UNIT_MS[unit];
    if (factor === undefined) {
      throw new Error(`unknown duration unit '${unit}' in '${input}'`);
    }
    total += Number(amount) * factor;
    // allow whitespace between parts
    while (text[PART.lastIndex] === ' ') {
      PART.lastIndex++;
    }
  }

  const ms = Math.round(total);
  if (!(ms >= 1)) {
    throw new Error(`duration '${input}' must be at least 1ms`);
  }
  if (ms > MAX_DURATION_MS) {
    throw new Error(`duration '${input}' exceeds ${MAX_DURATION_MS}ms`);
  }
  return ms;
}

export function formatDuration(ms: number): string {
  if (ms % 3_600_000 === 0) return `${ms / 3_600_000}h`;
  if (ms % 60_000 === 0) return `${ms / 60_000}min`;
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}
