// utils.ts
// Small numeric helpers shared by the game and the terminal host.

/** Constrains a value to the inclusive range [a, b]. */
export function clamp(x: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, x));
}

/**
 * Coerce a loose numeric input into a clamped integer.
 * @param name - Field name used in warnings.
 * @param value - Raw value (number, numeric string or absent).
 * @param fallback - Value used when the input is absent or unusable.
 * @param min - Inclusive minimum.
 * @param max - Inclusive maximum.
 * @param warn - Optional sink for adjustment warnings.
 * @returns Integer within [min, max].
 */
export function coerceInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: (msg: string) => void
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = Number.parseInt(value, 10);
  } else {
    parsed = Number.NaN;
  }
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const whole = Math.floor(parsed);
  if (whole !== parsed) {
    warn?.(`${name} was rounded down to ${whole}.`);
  }
  const clamped = clamp(whole, min, max);
  if (clamped !== whole) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}
