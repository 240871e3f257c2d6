/**
 * Round to `precision` significant digits and drop trailing zeros, so
 * 2 prints as "2" and 5 / sqrt(8) as "1.76777" at precision 6.
 */
export function formatSignificant(value: number, precision: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(precision)));
}
