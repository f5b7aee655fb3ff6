import { describe, expect, it } from 'vitest';
import type { DiscountSpec } from '../../types/order.types.js';
import { testLineItem } from '../../testing/index.js';
import { formatAmount } from '../money.js';
import { buildLineItem, itemDiscounts, resolveUnitPrice, strikethrough } from './line-item-builder.js';
import { toLineItem } from './order-input.js';

describe('strikethrough', () => {
  it('adds a combining long stroke after every character', () => {
    expect(strikethrough('$5')).toBe('$̶5̶');
  });
});

describe('resolveUnitPrice', () => {
  it('prefers the explicit price, then the origin price', () => {
    expect(resolveUnitPrice(testLineItem({ price: 30, originPrice: 40 }))).toBe(30);
    expect(resolveUnitPrice(testLineItem({ price: undefined, originPrice: 40 }))).toBe(40);
    expect(resolveUnitPrice(testLineItem({ price: undefined }))).toBe(0);
    expect(resolveUnitPrice(testLineItem({ price: -5 }))).toBe(0);
  });

  it('treats a zero price as no override', () => {
    expect(resolveUnitPrice(testLineItem({ price: 0, originPrice: 40 }))).toBe(40);

    const item = toLineItem({ variantId: '1', quantity: 1, price: '0.00', originPrice: '100.00' }, { taxesIncluded: false });
    expect(buildLineItem(item, 'USD').originalPrice).toBe(100);
  });
});

describe('buildLineItem', () => {
  it('applies a 20% discount to a 100.00 item', () => {
    const line = buildLineItem(
      testLineItem({ price: 100, discounts: [{ kind: 'PERCENTAGE', title: '', percentage: 20 }] }),
      'USD',
    );

    expect(formatAmount(line.discountedPrice)).toBe('80.00');
    expect(line.originalPrice).toBe(100);
    expect(line.applied.map((applied) => applied.description)).toEqual(['20% off']);
    expect(line.properties).toEqual([
      { name: 'Original Price', value: strikethrough('$100.00') },
      { name: 'Line item discount', value: '20% off' },
    ]);
  });

  it('applies discounts in order against the remaining price', () => {
    const line = buildLineItem(
      testLineItem({
        price: 100,
        discounts: [
          { kind: 'PERCENTAGE', title: 'Summer', percentage: 10 },
          { kind: 'FIXED_AMOUNT', title: 'Loyalty', amount: 5 },
        ],
      }),
      'USD',
    );

    expect(line.applied.map((applied) => applied.amount)).toEqual([10, 5]);
    expect(line.discountedPrice).toBe(85);
    expect(line.properties[1]).toEqual({ name: 'Line item discount', value: '10% off (Summer)\n$5.00 (Loyalty)' });
  });

  it('never goes below zero', () => {
    const line = buildLineItem(
      testLineItem({
        price: 10,
        discounts: [
          { kind: 'FIXED_AMOUNT', title: 'Big', amount: 15 },
          { kind: 'PERCENTAGE', title: 'Half', percentage: 50 },
        ],
      }),
      'USD',
    );

    expect(line.discountedPrice).toBe(0);
    expect(line.applied.map((applied) => applied.amount)).toEqual([10, 0]);
  });

  it('skips an Original Price marker entirely', () => {
    const line = buildLineItem(
      testLineItem({
        price: 100,
        discounts: [{ kind: 'FIXED_AMOUNT', title: 'Original Price <s>100</s>', amount: 100 }],
      }),
      'USD',
    );

    expect(line.applied).toEqual([]);
    expect(line.discountedPrice).toBe(100);
    expect(line.properties).toEqual([]);
  });

  it('falls back to the item discount total when no applications are listed', () => {
    const item = testLineItem({ price: 100, totalDiscount: 7.5 });

    expect(itemDiscounts(item)).toEqual([{ kind: 'FIXED_AMOUNT', title: 'Item Discount', amount: 7.5 }]);
    expect(buildLineItem(item, 'USD').discountedPrice).toBe(92.5);
  });

  it('reproduces the requested discount from original and discounted price', () => {
    const requests: DiscountSpec[] = [
      { kind: 'PERCENTAGE', title: '', percentage: 15 },
      { kind: 'PERCENTAGE', title: '', percentage: 33.33 },
      { kind: 'FIXED_AMOUNT', title: '', amount: 4.99 },
    ];
    for (const price of [9.99, 24.5, 100, 1234.56]) {
      for (const spec of requests) {
        const line = buildLineItem(testLineItem({ price, discounts: [spec] }), 'USD');
        const taken = line.originalPrice - line.discountedPrice;
        expect(line.discountedPrice).toBeGreaterThanOrEqual(0);
        if (spec.kind === 'PERCENTAGE') {
          expect((taken / line.originalPrice) * 100).toBeCloseTo(spec.percentage, 0);
        } else {
          expect(taken).toBeCloseTo(Math.min(spec.amount, price), 2);
        }
      }
    }
  });
});
