export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Renders a fraction as a percentage: formatPercent(0.05, 1) is "5.0". */
export function formatPercent(fraction: number, decimals: number): string {
  return (fraction * 100).toFixed(decimals);
}

/** Like formatPercent but always carries a sign, e.g. 0.05 -> "+5.00". */
export function formatSignedPercent(fraction: number, decimals: number): string {
  const pct = fraction * 100;
  const text = pct.toFixed(decimals);
  return pct >= 0 ? `+${text}` : text;
}
