/**
 * Format values for display. Rounding happens here, never in the engine.
 */
const AMOUNT_FORMAT = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/** Rand amount, e.g. "R 1,234". */
export function formatCurrency(amount: number): string {
  return `R ${AMOUNT_FORMAT.format(amount)}`;
}

/** ROI value already expressed in percent, e.g. 1.3333 -> "1.33%". */
export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

/** Decimal rate, e.g. 0.105 -> "10.5%". */
export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}
