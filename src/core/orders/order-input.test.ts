import { describe, expect, it } from 'vitest';
import type { OrderInputData } from '../../types/input.types.js';
import { parseTags, toDiscountSpec, toMailingAddress, toOrderDraft, toTaxLineSpec } from './order-input.js';

describe('toDiscountSpec', () => {
  it('reads percentages in any casing', () => {
    expect(toDiscountSpec({ title: ' Summer ', valueType: 'Percentage', value: '12.5' })).toEqual({
      kind: 'PERCENTAGE',
      title: 'Summer',
      percentage: 12.5,
    });
  });

  it('clamps percentages to 0-100', () => {
    expect(toDiscountSpec({ valueType: 'percentage', value: 150 })).toEqual({
      kind: 'PERCENTAGE',
      title: '',
      percentage: 100,
    });
  });

  it('reads fixed amounts from amount, then value', () => {
    expect(toDiscountSpec({ title: 'Loyalty', valueType: 'FIXED_AMOUNT', amount: '5', value: '9' })).toEqual({
      kind: 'FIXED_AMOUNT',
      title: 'Loyalty',
      amount: 5,
    });
    expect(toDiscountSpec({ valueType: 'fixed_amount', value: 3 })).toEqual({
      kind: 'FIXED_AMOUNT',
      title: '',
      amount: 3,
    });
  });

  it('drops unknown types and unparseable values', () => {
    expect(toDiscountSpec({ valueType: 'shipping', value: 5 })).toBeUndefined();
    expect(toDiscountSpec({ valueType: 'percentage', value: 'ten' })).toBeUndefined();
  });
});

describe('toTaxLineSpec', () => {
  it('falls back to the code for the title', () => {
    expect(toTaxLineSpec({ code: 'GST', rate: '0.05', price: '2.50' })).toEqual({
      title: 'GST',
      rate: 0.05,
      amount: 2.5,
      used: true,
    });
  });

  it('honours isUsed and fills the blanks', () => {
    expect(toTaxLineSpec({ isUsed: false })).toEqual({ title: 'Tax', rate: 0, amount: 0, used: false });
  });
});

describe('toMailingAddress', () => {
  it('takes street as address1 and upper-cases the country code', () => {
    const address = toMailingAddress({ firstName: 'Ada', street: '1 Main St', countryCode: 'us' });

    expect(address).toEqual({ firstName: 'Ada', address1: '1 Main St', countryCode: 'US' });
  });

  it('treats an empty address as absent', () => {
    expect(toMailingAddress({ firstName: ' ' })).toBeUndefined();
    expect(toMailingAddress(null)).toBeUndefined();
  });
});

describe('parseTags', () => {
  it('splits comma lists and trims entries', () => {
    expect(parseTags('gift, vip,,wholesale ')).toEqual(['gift', 'vip', 'wholesale']);
    expect(parseTags([' x ', ''])).toEqual(['x']);
    expect(parseTags(undefined)).toEqual([]);
  });
});

describe('toOrderDraft', () => {
  const data: OrderInputData = {
    email: 'order@example.com',
    customer: { id: '55', email: 'buyer@example.com', firstName: 'Ada' },
    items: [
      {
        productId: 101,
        quantity: 2,
        price: '19.99',
        name: 'Mug',
        discountApplications: [{ title: 'Sale', valueType: 'percentage', value: 10 }],
      },
    ],
    shippingMethodTitle: 'Express',
    totalShipping: '7',
    additionalData: { shipping_note: 'Leave at the door' },
    tags: 'gift, vip',
    taxLines: [{ title: 'VAT', rate: '0.2', price: '8' }],
    currency: 'eur',
    payments: [{ paymentName: 'Cash', paymentCode: 'RCPT-1', amount: '10' }, { amount: '0' }],
    financialStatus: 'pending',
    source: 'pos',
  };

  it('maps the input file onto a draft', () => {
    const draft = toOrderDraft(data, { currency: 'USD' });

    expect(draft.email).toBe('buyer@example.com');
    expect(draft.customer).toEqual({ id: '55', email: 'buyer@example.com', firstName: 'Ada' });
    expect(draft.items).toEqual([
      {
        variantId: 'gid://shopify/ProductVariant/101',
        quantity: 2,
        price: 19.99,
        title: 'Mug',
        taxable: true,
        taxesIncluded: false,
        discounts: [{ kind: 'PERCENTAGE', title: 'Sale', percentage: 10 }],
        taxLines: [],
      },
    ]);
    expect(draft.shipping).toEqual({ title: 'Express', price: 7 });
    expect(draft.shippingNote).toBe('Leave at the door');
    expect(draft.tags).toEqual(['gift', 'vip']);
    expect(draft.taxLines).toEqual([{ title: 'VAT', rate: 0.2, amount: 8, used: true }]);
    expect(draft.currency).toBe('EUR');
    expect(draft.payments).toEqual([{ amount: 10, currency: 'EUR', gateway: 'Cash', code: 'RCPT-1' }]);
    expect(draft.financialStatus).toBe('PENDING');
    expect(draft.sourceName).toBe('pos');
  });

  it('uses the defaults for what the file leaves out', () => {
    const draft = toOrderDraft({ items: [{ variantId: 'gid://shopify/ProductVariant/7', quantity: 1 }] }, {
      currency: 'USD',
    });

    expect(draft.currency).toBe('USD');
    expect(draft.shipping).toBeUndefined();
    expect(draft.shippingNote).toBeUndefined();
    expect(draft.items[0].variantId).toBe('gid://shopify/ProductVariant/7');
    expect(draft.items[0].price).toBeUndefined();
    expect(draft.payments).toEqual([]);
  });

  it('defaults the payment gateway to manual', () => {
    const draft = toOrderDraft({ items: [{ variantId: 7, quantity: 1 }], payments: [{ amount: 12 }] }, {
      currency: 'USD',
    });

    expect(draft.payments).toEqual([{ amount: 12, currency: 'USD', gateway: 'manual' }]);
  });
});
