import { describe, expect, it } from 'vitest';
import type { TaxLineSpec } from '../../types/order.types.js';
import { testLineItem, testOrderDraft } from '../../testing/index.js';
import { sumAmounts } from '../money.js';
import { distributeTax, preTaxExtendedCents } from './tax-distribution.js';
import { classify } from './strategy.js';

function vat(amount: number): TaxLineSpec {
  return { title: 'VAT', rate: 0.085, amount, used: true };
}

describe('distributeTax', () => {
  it('gives the whole tax line to a single item', () => {
    const draft = testOrderDraft({ taxLines: [vat(8.5)], subtotalPrice: 100 });

    expect(classify(draft)).toBe('direct-with-tax');
    expect(distributeTax(draft)).toEqual([{ lineIndex: 0, title: 'VAT', rate: 0.085, amount: 8.5 }]);
  });

  it('splits in proportion to the extended price', () => {
    const draft = testOrderDraft({
      items: [testLineItem({ price: 30, quantity: 2 }), testLineItem({ price: 40 })],
      taxLines: [vat(5)],
    });

    expect(distributeTax(draft).map((portion) => portion.amount)).toEqual([3, 2]);
  });

  it('gives the leftover cent to the earliest line on equal remainders', () => {
    const draft = testOrderDraft({
      items: [testLineItem({ price: 10 }), testLineItem({ price: 10 }), testLineItem({ price: 10 })],
      taxLines: [vat(1)],
    });

    expect(distributeTax(draft).map((portion) => portion.amount)).toEqual([0.34, 0.33, 0.33]);
  });

  it('never gives a line a negative portion when many shares round up', () => {
    const items = Array.from({ length: 10 }, () => testLineItem({ price: 10 }));
    const portions = distributeTax(testOrderDraft({ items, taxLines: [vat(0.05)] }));

    expect(portions.map((portion) => portion.amount)).toEqual([0.01, 0.01, 0.01, 0.01, 0.01, 0, 0, 0, 0, 0]);
  });

  it('hands leftover cents to the largest remainders', () => {
    const draft = testOrderDraft({
      items: [testLineItem({ price: 50 }), testLineItem({ price: 30 }), testLineItem({ price: 20 })],
      taxLines: [vat(0.07)],
    });

    expect(distributeTax(draft).map((portion) => portion.amount)).toEqual([0.04, 0.02, 0.01]);
  });

  it('excludes tax already contained in the price', () => {
    const item = testLineItem({ price: 110, taxesIncluded: true, totalTax: 10 });
    expect(preTaxExtendedCents(item)).toBe(10000);

    const draft = testOrderDraft({ items: [item, testLineItem({ price: 100 })], taxLines: [vat(20)] });
    expect(distributeTax(draft).map((portion) => portion.amount)).toEqual([10, 10]);
  });

  it('distributes every used tax line and skips unused ones', () => {
    const draft = testOrderDraft({
      items: [testLineItem({ price: 75 }), testLineItem({ price: 25 })],
      taxLines: [
        { title: 'State', rate: 0.06, amount: 6, used: true },
        { title: 'Ignored', rate: 0.5, amount: 50, used: false },
        { title: 'City', rate: 0.02, amount: 2, used: true },
      ],
    });

    expect(distributeTax(draft)).toEqual([
      { lineIndex: 0, title: 'State', rate: 0.06, amount: 4.5 },
      { lineIndex: 1, title: 'State', rate: 0.06, amount: 1.5 },
      { lineIndex: 0, title: 'City', rate: 0.02, amount: 1.5 },
      { lineIndex: 1, title: 'City', rate: 0.02, amount: 0.5 },
    ]);
  });

  it('returns nothing when the pre-tax total is zero', () => {
    const draft = testOrderDraft({ items: [testLineItem({ price: 0 })], taxLines: [vat(8.5)] });

    expect(distributeTax(draft)).toEqual([]);
  });

  it('reconciles the portions to the tax line amount', () => {
    const items = [testLineItem({ price: 1 }), testLineItem({ price: 2.35, quantity: 3 }), testLineItem({ price: 3.1 })];
    for (const amount of [0.01, 0.05, 1, 7.77, 123.45]) {
      const portions = distributeTax(testOrderDraft({ items, taxLines: [vat(amount)] }));
      expect(sumAmounts(portions.map((portion) => portion.amount))).toBe(amount);
    }
  });
});
