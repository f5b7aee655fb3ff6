/**
 * Order Input
 *
 * Maps a validated `{ "order": { ... } }` input file onto an OrderDraft.
 * Prices and rates that do not parse are treated as absent.
 */

import type {
  AddressInput,
  DiscountApplicationInput,
  ItemInput,
  OrderInputData,
  PaymentInput,
  TaxLineInput,
} from '../../types/input.types.js';
import type {
  DiscountSpec,
  LineItem,
  MailingAddress,
  OrderDraft,
  PaymentSpec,
  TaxLineSpec,
} from '../../types/order.types.js';
import { toGid } from '../admin/gid.js';
import { parseDecimal, round2 } from '../money.js';

export const DEFAULT_PAYMENT_GATEWAY = 'manual';

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseTags(tags: string | string[] | undefined): string[] {
  const list = Array.isArray(tags) ? tags : (tags ?? '').split(',');
  return list.map((tag) => tag.trim()).filter((tag) => tag !== '');
}

/**
 * Unknown value types are dropped.
 */
export function toDiscountSpec(input: DiscountApplicationInput): DiscountSpec | undefined {
  const title = input.title?.trim() ?? '';
  const valueType = input.valueType?.trim().toLowerCase();

  if (valueType === 'percentage') {
    const percentage = parseDecimal(input.value);
    if (percentage === undefined) {
      return undefined;
    }
    return { kind: 'PERCENTAGE', title, percentage: Math.min(100, Math.max(0, round2(percentage))) };
  }

  if (valueType === 'fixed_amount') {
    const amount = parseDecimal(input.amount) ?? parseDecimal(input.value);
    if (amount === undefined) {
      return undefined;
    }
    return { kind: 'FIXED_AMOUNT', title, amount: Math.max(0, round2(amount)) };
  }

  return undefined;
}

function toDiscountSpecs(inputs: DiscountApplicationInput[] | undefined): DiscountSpec[] {
  return (inputs ?? []).flatMap((input) => {
    const spec = toDiscountSpec(input);
    return spec ? [spec] : [];
  });
}

/**
 * A missing `isUsed` counts as used.
 */
export function toTaxLineSpec(input: TaxLineInput): TaxLineSpec {
  return {
    title: input.title?.trim() || input.code?.trim() || 'Tax',
    rate: parseDecimal(input.rate) ?? 0,
    amount: parseDecimal(input.price) ?? 0,
    used: input.isUsed !== false,
  };
}

export function toMailingAddress(input: AddressInput | null | undefined): MailingAddress | undefined {
  if (!input) {
    return undefined;
  }
  const address: MailingAddress = {
    firstName: text(input.firstName),
    lastName: text(input.lastName),
    company: text(input.company),
    address1: text(input.address1) ?? text(input.street),
    address2: text(input.address2),
    city: text(input.city),
    province: text(input.province),
    provinceCode: text(input.provinceCode),
    country: text(input.country),
    countryCode: text(input.countryCode)?.toUpperCase(),
    zip: text(input.zip),
    phone: text(input.phone),
  };
  return Object.values(address).some((value) => value !== undefined) ? address : undefined;
}

export function toLineItem(input: ItemInput, defaults: { taxesIncluded: boolean }): LineItem {
  const reference = input.variantId ?? input.productId ?? '';
  return {
    variantId: toGid('ProductVariant', reference),
    quantity: input.quantity,
    price: parseDecimal(input.price),
    originPrice: parseDecimal(input.originPrice),
    title: text(input.name),
    taxable: input.taxable ?? true,
    taxesIncluded: input.taxesIncluded ?? defaults.taxesIncluded,
    totalTax: parseDecimal(input.totalTax),
    totalDiscount: parseDecimal(input.totalDiscount),
    discounts: toDiscountSpecs(input.discountApplications),
    taxLines: (input.taxLines ?? []).map(toTaxLineSpec),
  };
}

function toPaymentSpec(input: PaymentInput, currency: string): PaymentSpec | undefined {
  const amount = parseDecimal(input.amount);
  if (amount === undefined || amount <= 0) {
    return undefined;
  }
  return {
    amount: round2(amount),
    currency: text(input.currency)?.toUpperCase() ?? currency,
    gateway: text(input.paymentName) ?? DEFAULT_PAYMENT_GATEWAY,
    code: text(input.paymentCode),
  };
}

export function toOrderDraft(data: OrderInputData, defaults: { currency: string }): OrderDraft {
  const currency = text(data.currency)?.toUpperCase() ?? defaults.currency;
  const taxesIncluded = data.taxesIncluded ?? false;
  const shippingTitle = text(data.shippingMethodTitle) ?? text(data.shippingMethod);
  const shippingPrice = parseDecimal(data.totalShipping);
  const customerEmail = text(data.customer?.email);

  return {
    email: customerEmail ?? text(data.email),
    customer: data.customer
      ? {
          id: text(data.customer.id),
          email: customerEmail,
          firstName: text(data.customer.firstName),
          lastName: text(data.customer.lastName),
          phone: text(data.customer.phone),
        }
      : undefined,
    items: data.items.map((item) => toLineItem(item, { taxesIncluded })),
    shippingAddress: toMailingAddress(data.shippingAddress),
    billingAddress: toMailingAddress(data.billingAddress),
    note: text(data.note),
    tags: parseTags(data.tags),
    shipping:
      shippingTitle !== undefined || shippingPrice !== undefined
        ? { title: shippingTitle ?? 'Shipping', price: round2(shippingPrice ?? 0) }
        : undefined,
    shippingNote: text(data.shippingNote) ?? text(data.additionalData?.shipping_note),
    noteAttributes: (data.noteAttributes ?? []).filter((attribute) => attribute.name.trim() !== ''),
    discounts: toDiscountSpecs(data.discountApplications),
    taxLines: (data.taxLines ?? []).map(toTaxLineSpec),
    currency,
    taxesIncluded,
    subtotalPrice: parseDecimal(data.subtotalPrice),
    totalDiscounts: parseDecimal(data.totalDiscounts),
    totalPrice: parseDecimal(data.totalPrice),
    payments: (data.payments ?? []).flatMap((payment) => {
      const spec = toPaymentSpec(payment, currency);
      return spec ? [spec] : [];
    }),
    financialStatus: text(data.financialStatus)?.toUpperCase(),
    sourceName: text(data.source),
  };
}
