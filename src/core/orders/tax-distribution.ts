/**
 * Tax Distribution
 *
 * Splits each order-level tax line across the line items in proportion to
 * their pre-tax extended price. Works in cents: each share is floored and the
 * leftover cents go one at a time to the largest remainders, earliest line
 * first on ties, so the portions of one tax line add up to its amount.
 */

import type { LineItem, OrderDraft, TaxLineSpec } from '../../types/order.types.js';
import { fromCents, toCents } from '../money.js';
import { resolveUnitPrice } from './line-item-builder.js';

export interface LineItemTaxPortion {
  /** Position of the line item in the draft */
  lineIndex: number;
  title: string;
  rate: number;
  amount: number;
}

export function usedTaxLines(taxLines: TaxLineSpec[]): TaxLineSpec[] {
  return taxLines.filter((line) => line.used);
}

/**
 * unit price × quantity, less the tax already contained in it.
 */
export function preTaxExtendedCents(item: LineItem): number {
  const gross = resolveUnitPrice(item) * item.quantity;
  const contained = item.taxesIncluded ? item.totalTax ?? 0 : 0;
  return Math.max(0, toCents(gross - contained));
}

export function distributeTax(draft: OrderDraft): LineItemTaxPortion[] {
  const bases = draft.items.map(preTaxExtendedCents);
  const totalBase = bases.reduce((sum, cents) => sum + cents, 0);
  if (totalBase === 0) {
    return [];
  }

  const portions: LineItemTaxPortion[] = [];

  for (const taxLine of usedTaxLines(draft.taxLines)) {
    const shares = splitCents(toCents(taxLine.amount), bases, totalBase);
    shares.forEach((cents, lineIndex) => {
      portions.push({ lineIndex, title: taxLine.title, rate: taxLine.rate, amount: fromCents(cents) });
    });
  }

  return portions;
}

function splitCents(amountCents: number, bases: number[], totalBase: number): number[] {
  const shares = bases.map((base) => Math.floor((amountCents * base) / totalBase));
  const remainders = bases.map((base, index) => ({ index, remainder: amountCents * base - shares[index] * totalBase }));
  remainders.sort((a, b) => b.remainder - a.remainder || a.index - b.index);

  let leftover = amountCents - shares.reduce((sum, cents) => sum + cents, 0);
  for (let i = 0; leftover > 0; i = (i + 1) % remainders.length, leftover--) {
    shares[remainders[i].index] += 1;
  }
  return shares;
}
