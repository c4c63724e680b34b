// Attribute values arrive as strings; these helpers pass `null` through.

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/** Integer value of an attribute; NaN when it is not an integer. */
export function toInt(value: string | null): number | null {
  if (value === null) return null;
  return INTEGER_PATTERN.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

export function toFloat(value: string | null): number | null {
  if (value === null) return null;
  return value.trim() === '' ? Number.NaN : Number(value);
}

/** `1`/`true` and `0`/`false`; anything else is treated as absent. */
export function toBool(value: string | null): boolean | null {
  if (value === null) return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  return null;
}

/** Epoch seconds to Date. */
export function toDate(value: string | null): Date | null {
  const seconds = toInt(value);
  if (seconds === null || Number.isNaN(seconds)) return null;
  return new Date(seconds * 1000);
}
