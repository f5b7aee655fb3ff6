/**
 * Discount helpers shared by the line-item builder and the strategy selector.
 */

import type { DiscountSpec, OrderDraft } from '../../types/order.types.js';
import { formatMoney, formatPercent, round2 } from '../money.js';

const MARKER_FRAGMENTS = ['Original Price', '<s>', '</s>'];

export const ORDER_DISCOUNT_TITLE = 'Order Discount';
export const ITEM_DISCOUNT_TITLE = 'Item Discount';

/**
 * Upstream data sometimes carries the struck-through original price as a
 * discount application. Those entries are display metadata.
 */
export function isMarkerDiscount(discount: DiscountSpec): boolean {
  const title = discount.title.trim();
  return MARKER_FRAGMENTS.some((fragment) => title.includes(fragment));
}

export function effectiveDiscounts(discounts: DiscountSpec[]): DiscountSpec[] {
  return discounts.filter((discount) => !isMarkerDiscount(discount));
}

/**
 * "20% off (Summer)" / "$5.00 (Loyalty)"; the parenthesised title is omitted when empty.
 */
export function describeDiscount(discount: DiscountSpec, currency: string): string {
  const label =
    discount.kind === 'PERCENTAGE'
      ? `${formatPercent(discount.percentage)}% off`
      : formatMoney(discount.amount, currency);
  const title = discount.title.trim();
  return title === '' ? label : `${label} (${title})`;
}

/**
 * Reduction a discount takes from `price`, never more than `price` itself.
 */
export function discountAmount(discount: DiscountSpec, price: number): number {
  const raw = discount.kind === 'PERCENTAGE' ? (price * discount.percentage) / 100 : discount.amount;
  return Math.min(Math.max(raw, 0), Math.max(price, 0));
}

/**
 * The single order-level discount sent with the order.
 *
 * Uses the first real order-level application; without one, a
 * `totalDiscounts` figure becomes a percentage of `subtotalPrice`, or a fixed
 * amount when no positive subtotal is known.
 */
export function buildOrderLevelDiscount(draft: OrderDraft): DiscountSpec | undefined {
  const [first] = effectiveDiscounts(draft.discounts);
  if (first) {
    return first;
  }

  const total = draft.totalDiscounts;
  if (total === undefined || total <= 0) {
    return undefined;
  }

  const subtotal = draft.subtotalPrice;
  if (subtotal !== undefined && subtotal > 0) {
    return {
      kind: 'PERCENTAGE',
      title: ORDER_DISCOUNT_TITLE,
      percentage: Math.min(100, round2((total / subtotal) * 100)),
    };
  }
  return { kind: 'FIXED_AMOUNT', title: ORDER_DISCOUNT_TITLE, amount: round2(total) };
}

