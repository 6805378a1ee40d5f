/**
 * Number formatting for reports: a fixed count of significant digits with
 * trailing zeros dropped, e.g. 0.012345 -> "0.0123", 1234.5 -> "1230".
 */
export function formatSignificant(value: number, digits = 3): string {
  if (!Number.isFinite(value)) return String(value)
  return String(Number(value.toPrecision(digits)))
}
