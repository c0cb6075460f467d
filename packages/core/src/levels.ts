/**
 * Severity levels for Alertline events
 *
 * Levels are ordered; comparisons go through the numeric weight so that
 * `debug < info < warning < error < critical` holds everywhere.
 */

export const Levels = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warning",
  ERROR: "error",
  CRITICAL: "critical",
} as const;

export type Level = (typeof Levels)[keyof typeof Levels];

export const LEVEL_WEIGHTS: Readonly<Record<Level, number>> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

const ALIASES: Readonly<Record<string, Level>> = {
  warn: "warning",
  fatal: "critical",
};

export function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHTS, value);
}

/**
 * Parse a level name (case-insensitive, accepts `warn` and `fatal`).
 * Returns undefined for anything else.
 */
export function parseLevel(value: string): Level | undefined {
  const name = value.trim().toLowerCase();
  if (isLevel(name)) return name;
  return ALIASES[name];
}

export function levelWeight(level: Level): number {
  return LEVEL_WEIGHTS[level];
}

/**
 * True when `level` is at or above `threshold`
 */
export function isAtLeast(level: Level, threshold: Level): boolean {
  return LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[threshold];
}
