/**
 * Line Item Builder
 *
 * Resolves the unit price of one line item and applies its discounts in
 * order, each against the price left by the previous one.
 */

import type { DiscountSpec, LineItem, NoteAttribute } from '../../types/order.types.js';
import { formatMoney, round2 } from '../money.js';
import { ITEM_DISCOUNT_TITLE, describeDiscount, discountAmount, effectiveDiscounts } from './discounts.js';

export const ORIGINAL_PRICE_PROPERTY = 'Original Price';
export const LINE_DISCOUNT_PROPERTY = 'Line item discount';

const COMBINING_LONG_STROKE = '̶';

export interface AppliedDiscount {
  spec: DiscountSpec;
  /** Per-unit reduction actually taken */
  amount: number;
  description: string;
}

export interface BuiltLineItem {
  variantId: string;
  quantity: number;
  title?: string;
  taxable: boolean;
  originalPrice: number;
  discountedPrice: number;
  applied: AppliedDiscount[];
  /** Original price struck through and the discount breakdown, when any discount applied */
  properties: NoteAttribute[];
}

/**
 * "$100.00" -> "$̶1̶0̶0̶.̶0̶0̶"
 */
export function strikethrough(text: string): string {
  return Array.from(text)
    .map((char) => `${char}${COMBINING_LONG_STROKE}`)
    .join('');
}

/**
 * A zero or missing price is no override: the origin price applies.
 */
export function resolveUnitPrice(item: LineItem): number {
  const price = item.price !== undefined && item.price > 0 ? item.price : item.originPrice;
  return Math.max(0, price ?? 0);
}

/**
 * Discounts that apply to the item: its listed applications minus markers,
 * or `totalDiscount` as one fixed amount when nothing is listed.
 */
export function itemDiscounts(item: LineItem): DiscountSpec[] {
  if (item.discounts.length > 0) {
    return effectiveDiscounts(item.discounts);
  }
  if (item.totalDiscount !== undefined && item.totalDiscount > 0) {
    return [{ kind: 'FIXED_AMOUNT', title: ITEM_DISCOUNT_TITLE, amount: item.totalDiscount }];
  }
  return [];
}

export function buildLineItem(item: LineItem, currency: string): BuiltLineItem {
  const originalPrice = round2(resolveUnitPrice(item));
  const applied: AppliedDiscount[] = [];

  let current = originalPrice;
  for (const spec of itemDiscounts(item)) {
    const amount = discountAmount(spec, current);
    current = Math.max(0, current - amount);
    applied.push({ spec, amount: round2(amount), description: describeDiscount(spec, currency) });
  }

  const properties: NoteAttribute[] =
    applied.length > 0
      ? [
          { name: ORIGINAL_PRICE_PROPERTY, value: strikethrough(formatMoney(originalPrice, currency)) },
          { name: LINE_DISCOUNT_PROPERTY, value: applied.map((a) => a.description).join('\n') },
        ]
      : [];

  return {
    variantId: item.variantId,
    quantity: item.quantity,
    title: item.title,
    taxable: item.taxable,
    originalPrice,
    discountedPrice: round2(current),
    applied,
    properties,
  };
}
