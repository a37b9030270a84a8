/**
 * Suffix table for the compact counts shown next to hashtags.
 * `g` and `b` both mean 1e9: the remote site renders billions as "G".
 */
const SUFFIX_MULTIPLIERS: Record<string, number> = {
  k: 1e3,
  m: 1e6,
  g: 1e9,
  b: 1e9,
  t: 1e12,
};

// Commas only group thousands: "12,345" reads, "1,5 M" does not.
const MAGNITUDE_PATTERN =
  /^((?:[0-9]{1,3}(?:,[0-9]{3})+|[0-9]+)(?:\.[0-9]+)?|\.[0-9]+)\s*([a-z])?$/i;

const HUMAN_UNITS = ["", "K", "M", "G", "T"];

/**
 * Parse magnitude text such as "1.96 g", "850K" or "12,345" into an
 * integer count. Returns undefined for anything unreadable.
 */
export function parseMagnitude(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;

  const match = MAGNITUDE_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const [, digits, suffix] = match;
  const value = Number(digits.replace(/,/g, ""));
  if (!Number.isFinite(value)) return undefined;

  if (suffix === undefined) return Math.round(value);

  const multiplier = SUFFIX_MULTIPLIERS[suffix.toLowerCase()];
  if (multiplier === undefined) return undefined;

  return Math.round(value * multiplier);
}

/**
 * 1234 -> "1.23 K", 5600000 -> "5.6 M", 2150000000 -> "2.15 G"
 */
export function humanizeCount(value: number): string {
  let n = value;
  let unitIndex = 0;
  while (Math.abs(n) >= 1000 && unitIndex < HUMAN_UNITS.length - 1) {
    n /= 1000;
    unitIndex++;
  }

  let rounded = Number(n.toFixed(2));
  // 999_999 rounds up to "1000 K"; carry into the next unit
  if (Math.abs(rounded) >= 1000 && unitIndex < HUMAN_UNITS.length - 1) {
    rounded = Number((rounded / 1000).toFixed(2));
    unitIndex++;
  }

  const unit = HUMAN_UNITS[unitIndex];
  return unit ? `${rounded} ${unit}` : String(rounded);
}
