const usdFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/**
 * Format a dollar amount rounded to the nearest whole dollar, e.g. `$9,876,000`
 */
export function formatUsd(value: number): string {
  return usdFormatter.format(Math.round(value));
}
