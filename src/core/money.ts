/**
 * Decimal helpers for prices, rates and percentages.
 *
 * Amounts travel as base-currency strings ("100.00"); arithmetic happens on
 * numbers and is rounded back to cents before leaving the builder.
 */

/**
 * Parses a decimal string or number. Empty, non-numeric and non-finite
 * input yields undefined.
 */
export function parseDecimal(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  const trimmed = value.trim();
  if (trimmed === '' || !/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function round2(value: number): number {
  return Math.round((value + Number.EPSILON * Math.sign(value)) * 100) / 100;
}

export function toCents(value: number): number {
  return Math.round(round2(value) * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function formatAmount(value: number): string {
  return round2(value).toFixed(2);
}

/**
 * 20 -> "20", 12.5 -> "12.5", 33.333 -> "33.33"
 */
export function formatPercent(value: number): string {
  return String(round2(value));
}

export function sumAmounts(values: Array<string | number | undefined>): number {
  return fromCents(values.reduce<number>((total, value) => total + toCents(parseDecimal(value) ?? 0), 0));
}

/**
 * Currency display, e.g. formatMoney(5, 'USD') -> "$5.00".
 */
export function formatMoney(value: number, currency: string): string {
  try {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(round2(value));
  } catch {
    return `${formatAmount(value)} ${currency}`;
  }
}
