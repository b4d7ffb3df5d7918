const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

const DURATION_PATTERN = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)\s*$/;

/**
 * Parse a duration into milliseconds.
 *
 * Accepts a non-negative number of milliseconds or a string such as
 * "500ms", "30s", "15m", "24h" or "7d". Returns null when unparseable.
 */
export function parseDuration(value: number | string): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }

  const match = DURATION_PATTERN.exec(value);
  if (!match) return null;

  const amount = Number(match[1]);
  const unit = UNIT_MS[match[2] ?? ''];
  if (unit === undefined || !Number.isFinite(amount)) return null;

  return Math.round(amount * unit);
}
