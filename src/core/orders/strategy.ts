/**
 * Strategy selection: which remote call sequence can carry this draft.
 */

import type { OrderDraft, OrderStrategy } from '../../types/order.types.js';
import { buildOrderLevelDiscount } from './discounts.js';
import { itemDiscounts } from './line-item-builder.js';
import { usedTaxLines } from './tax-distribution.js';

export interface ClassifyOptions {
  /** Without custom tax, complete a draft order instead of creating directly */
  preferDraftFlow?: boolean;
  /** With tax and discounts, create then edit so discounts show struck through */
  preferStrikethrough?: boolean;
}

export interface DraftFeatures {
  tax: boolean;
  discount: boolean;
}

export function detectFeatures(draft: OrderDraft): DraftFeatures {
  const tax =
    usedTaxLines(draft.taxLines).length > 0 || draft.items.some((item) => usedTaxLines(item.taxLines).length > 0);
  const discount =
    buildOrderLevelDiscount(draft) !== undefined || draft.items.some((item) => itemDiscounts(item).length > 0);
  return { tax, discount };
}

export function classify(draft: OrderDraft, options: ClassifyOptions = {}): OrderStrategy {
  const { preferDraftFlow = true, preferStrikethrough = false } = options;
  const { tax, discount } = detectFeatures(draft);

  if (!tax) {
    return preferDraftFlow ? 'draft-order' : 'direct-no-frills';
  }
  if (!discount) {
    return 'direct-with-tax';
  }
  return preferStrikethrough ? 'edit-with-strikethrough' : 'direct-with-tax-and-discount';
}
