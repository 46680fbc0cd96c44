const INTEGER_FORMAT = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });
const DECIMAL_FORMAT = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Chart value label: whole numbers without decimals, everything else with
 * exactly two, both with thousands separators.
 */
export function formatValue(value: number): string {
  return Number.isInteger(value) ? INTEGER_FORMAT.format(value) : DECIMAL_FORMAT.format(value);
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}
