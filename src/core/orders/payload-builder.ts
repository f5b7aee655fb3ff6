/**
 * Payload Builder
 *
 * Shapes an OrderDraft into the request bodies each strategy sends:
 * the GraphQL DraftOrderInput, the REST order body, the GraphQL
 * OrderCreateOrderInput, and the discounts applied in an order-edit session.
 */

import type { DiscountSpec, MailingAddress, OrderDraft, TaxLineSpec } from '../../types/order.types.js';
import { fromGid, toGid } from '../admin/gid.js';
import { formatAmount, round2 } from '../money.js';
import { ORDER_DISCOUNT_TITLE, buildOrderLevelDiscount } from './discounts.js';
import { type BuiltLineItem, buildLineItem } from './line-item-builder.js';
import { type LineItemTaxPortion, usedTaxLines } from './tax-distribution.js';

export interface MoneyInput {
  amount: string;
  currencyCode: string;
}

export interface MoneyBagInput {
  shopMoney: MoneyInput;
}

export interface MailingAddressInput {
  firstName?: string;
  lastName?: string;
  company?: string;
  address1?: string;
  address2?: string;
  city?: string;
  province?: string;
  provinceCode?: string;
  country?: string;
  countryCode?: string;
  zip?: string;
  phone?: string;
}

export interface AttributeInput {
  key: string;
  value: string;
}

export interface AppliedDiscountInput {
  title: string;
  description: string;
  value: number;
  valueType: 'PERCENTAGE' | 'FIXED_AMOUNT';
}

export interface DraftOrderLineItemInput {
  variantId: string;
  quantity: number;
  taxable: boolean;
  title?: string;
  originalUnitPriceWithCurrency?: MoneyInput;
  appliedDiscount?: AppliedDiscountInput;
}

export interface DraftOrderInput {
  email?: string;
  note?: string;
  tags: string[];
  lineItems: DraftOrderLineItemInput[];
  shippingAddress?: MailingAddressInput;
  billingAddress?: MailingAddressInput;
  appliedDiscount?: AppliedDiscountInput;
  customAttributes: AttributeInput[];
  shippingLine?: { title: string; priceWithCurrency: MoneyInput };
  purchasingEntity?: { customerId: string };
  presentmentCurrencyCode: string;
  taxExempt: boolean;
}

export interface OrderCreateTaxLineInput {
  title: string;
  rate: string;
  priceSet: MoneyBagInput;
}

export interface OrderCreateLineItemInput {
  variantId: string;
  quantity: number;
  title?: string;
  priceSet: MoneyBagInput;
  properties?: Array<{ name: string; value: string }>;
  taxLines?: OrderCreateTaxLineInput[];
}

export type OrderCreateDiscountCodeInput =
  | { itemPercentageDiscountCode: { code: string; percentage: number } }
  | { itemFixedDiscountCode: { code: string; amountSet: MoneyBagInput } };

export interface OrderCreateOrderInput {
  email?: string;
  note?: string;
  tags: string[];
  currency: string;
  financialStatus: string;
  lineItems: OrderCreateLineItemInput[];
  shippingAddress?: MailingAddressInput;
  billingAddress?: MailingAddressInput;
  taxLines?: OrderCreateTaxLineInput[];
  taxesIncluded: boolean;
  discountCode?: OrderCreateDiscountCodeInput;
  shippingLines?: Array<{ title: string; priceSet: MoneyBagInput }>;
  customAttributes?: AttributeInput[];
  customer?: { toAssociate: { id: string } };
  sourceName?: string;
}

export interface RestTaxLine {
  title: string;
  rate: number;
  price: string;
}

export interface RestAddress {
  first_name?: string;
  last_name?: string;
  company?: string;
  address1?: string;
  address2?: string;
  city?: string;
  province?: string;
  province_code?: string;
  country?: string;
  country_code?: string;
  zip?: string;
  phone?: string;
}

export interface RestLineItem {
  variant_id: number;
  quantity: number;
  price: string;
  title?: string;
  taxable: boolean;
  tax_lines?: RestTaxLine[];
  discount_allocations?: Array<{ amount: string; title: string }>;
}

export interface RestOrderBody {
  order: {
    email?: string;
    note?: string;
    tags?: string;
    currency: string;
    financial_status: string;
    taxes_included: boolean;
    line_items: RestLineItem[];
    shipping_address?: RestAddress;
    billing_address?: RestAddress;
    tax_lines?: RestTaxLine[];
    shipping_lines?: Array<{ title: string; price: string; code: string }>;
    note_attributes?: Array<{ name: string; value: string }>;
    customer?: { id: number };
    source_name?: string;
  };
}

export interface EditLineItemDiscount {
  /** Position of the line item in the draft */
  lineIndex: number;
  description: string;
  percentValue?: number;
  fixedValue?: MoneyInput;
}

export function money(amount: number, currencyCode: string): MoneyInput {
  return { amount: formatAmount(amount), currencyCode };
}

export function moneyBag(amount: number, currencyCode: string): MoneyBagInput {
  return { shopMoney: money(amount, currencyCode) };
}

export function toAddressInput(address: MailingAddress | undefined): MailingAddressInput | undefined {
  if (!address) {
    return undefined;
  }
  return {
    firstName: address.firstName,
    lastName: address.lastName,
    company: address.company,
    address1: address.address1,
    address2: address.address2,
    city: address.city,
    provinceCode: address.provinceCode,
    province: address.provinceCode ? undefined : address.province,
    countryCode: address.countryCode,
    country: address.countryCode ? undefined : address.country,
    zip: address.zip,
    phone: address.phone,
  };
}

export function toRestAddress(address: MailingAddress | undefined): RestAddress | undefined {
  if (!address) {
    return undefined;
  }
  return {
    first_name: address.firstName,
    last_name: address.lastName,
    company: address.company,
    address1: address.address1,
    address2: address.address2,
    city: address.city,
    province: address.province,
    province_code: address.provinceCode,
    country: address.country,
    country_code: address.countryCode,
    zip: address.zip,
    phone: address.phone,
  };
}

export function toAppliedDiscount(spec: DiscountSpec): AppliedDiscountInput {
  return spec.kind === 'PERCENTAGE'
    ? { title: spec.title, description: spec.title, value: spec.percentage, valueType: 'PERCENTAGE' }
    : { title: spec.title, description: spec.title, value: round2(spec.amount), valueType: 'FIXED_AMOUNT' };
}

/**
 * A lone percentage travels as-is; anything else collapses into the per-unit
 * difference between original and discounted price.
 */
export function lineAppliedDiscount(line: BuiltLineItem): AppliedDiscountInput | undefined {
  const [first] = line.applied;
  if (!first) {
    return undefined;
  }
  if (line.applied.length === 1 && first.spec.kind === 'PERCENTAGE') {
    return toAppliedDiscount(first.spec);
  }
  const title = line.applied
    .map((a) => a.spec.title)
    .filter((t) => t !== '')
    .join(', ');
  return {
    title,
    description: line.applied.map((a) => a.description).join('; '),
    value: round2(line.originalPrice - line.discountedPrice),
    valueType: 'FIXED_AMOUNT',
  };
}

function toTaxLineInput(taxLine: TaxLineSpec, currency: string): OrderCreateTaxLineInput {
  return { title: taxLine.title, rate: String(taxLine.rate), priceSet: moneyBag(taxLine.amount, currency) };
}

export function toRestTaxLine(taxLine: { title: string; rate: number; amount: number }): RestTaxLine {
  return { title: taxLine.title, rate: taxLine.rate, price: formatAmount(taxLine.amount) };
}

function toDiscountCode(spec: DiscountSpec, currency: string): OrderCreateDiscountCodeInput {
  const code = spec.title.trim() || ORDER_DISCOUNT_TITLE;
  return spec.kind === 'PERCENTAGE'
    ? { itemPercentageDiscountCode: { code, percentage: spec.percentage } }
    : { itemFixedDiscountCode: { code, amountSet: moneyBag(spec.amount, currency) } };
}

function nonEmpty<T>(list: T[]): T[] | undefined {
  return list.length > 0 ? list : undefined;
}

export function buildLineItems(draft: OrderDraft): BuiltLineItem[] {
  return draft.items.map((item) => buildLineItem(item, draft.currency));
}

export function buildDraftOrderInput(draft: OrderDraft): DraftOrderInput {
  const orderDiscount = buildOrderLevelDiscount(draft);

  return {
    email: draft.email,
    note: draft.note,
    tags: draft.tags,
    lineItems: buildLineItems(draft).map((line) => ({
      variantId: line.variantId,
      quantity: line.quantity,
      taxable: line.taxable,
      title: line.title,
      originalUnitPriceWithCurrency:
        line.originalPrice > 0 ? money(line.originalPrice, draft.currency) : undefined,
      appliedDiscount: lineAppliedDiscount(line),
    })),
    shippingAddress: toAddressInput(draft.shippingAddress),
    billingAddress: toAddressInput(draft.billingAddress),
    appliedDiscount: orderDiscount ? toAppliedDiscount(orderDiscount) : undefined,
    customAttributes: draft.noteAttributes.map((attribute) => ({ key: attribute.name, value: attribute.value })),
    shippingLine: draft.shipping
      ? { title: draft.shipping.title, priceWithCurrency: money(draft.shipping.price, draft.currency) }
      : undefined,
    purchasingEntity: draft.customer?.id ? { customerId: toGid('Customer', draft.customer.id) } : undefined,
    presentmentCurrencyCode: draft.currency,
    taxExempt: false,
  };
}

/**
 * Body for REST `POST orders`. Lines keep their undiscounted price; item
 * discounts travel as discount allocations. Item-level tax lines are sent
 * only when the order carries none, since the endpoint rejects both levels.
 */
export function buildRestOrderBody(draft: OrderDraft, defaultFinancialStatus: string): RestOrderBody {
  const orderTaxLines = usedTaxLines(draft.taxLines).map(toRestTaxLine);

  const lineItems = buildLineItems(draft).map((line, index): RestLineItem => {
    const itemTaxLines = usedTaxLines(draft.items[index].taxLines).map(toRestTaxLine);
    const discountTotal = round2((line.originalPrice - line.discountedPrice) * line.quantity);
    return {
      variant_id: Number(fromGid(line.variantId)),
      quantity: line.quantity,
      price: formatAmount(line.originalPrice),
      title: line.title,
      taxable: line.taxable,
      tax_lines: orderTaxLines.length === 0 ? nonEmpty(itemTaxLines) : undefined,
      discount_allocations:
        discountTotal > 0
          ? [
              {
                amount: formatAmount(discountTotal),
                title: line.applied.map((a) => a.description).join(', '),
              },
            ]
          : undefined,
    };
  });

  return {
    order: {
      email: draft.email,
      note: draft.note,
      tags: draft.tags.length > 0 ? draft.tags.join(',') : undefined,
      currency: draft.currency,
      financial_status: (draft.financialStatus ?? defaultFinancialStatus).toLowerCase(),
      taxes_included: draft.taxesIncluded,
      line_items: lineItems,
      shipping_address: toRestAddress(draft.shippingAddress),
      billing_address: toRestAddress(draft.billingAddress),
      tax_lines: nonEmpty(orderTaxLines),
      shipping_lines: draft.shipping
        ? [{ title: draft.shipping.title, price: formatAmount(draft.shipping.price), code: draft.shipping.title }]
        : undefined,
      note_attributes: nonEmpty(draft.noteAttributes),
      customer: draft.customer?.id ? { id: Number(fromGid(draft.customer.id)) } : undefined,
      source_name: draft.sourceName,
    },
  };
}

export interface OrderCreateOptions {
  defaultFinancialStatus: string;
  /** Attach order-level tax lines */
  withTax: boolean;
  /**
   * true: fold item discounts into the price and describe them in line
   * properties. false: send undiscounted prices (an edit session applies
   * the discounts afterwards).
   */
  foldDiscounts: boolean;
}

export function buildOrderCreateInput(draft: OrderDraft, options: OrderCreateOptions): OrderCreateOrderInput {
  const { currency } = draft;
  const orderTaxLines = options.withTax ? usedTaxLines(draft.taxLines) : [];
  const orderDiscount = buildOrderLevelDiscount(draft);

  const lineItems = buildLineItems(draft).map((line, index): OrderCreateLineItemInput => {
    const itemTaxLines =
      options.withTax && orderTaxLines.length === 0 ? usedTaxLines(draft.items[index].taxLines) : [];
    return {
      variantId: line.variantId,
      quantity: line.quantity,
      title: line.title,
      priceSet: moneyBag(options.foldDiscounts ? line.discountedPrice : line.originalPrice, currency),
      properties: options.foldDiscounts ? nonEmpty(line.properties) : undefined,
      taxLines: nonEmpty(itemTaxLines.map((taxLine) => toTaxLineInput(taxLine, currency))),
    };
  });

  return {
    email: draft.email,
    note: draft.note,
    tags: draft.tags,
    currency,
    financialStatus: draft.financialStatus ?? options.defaultFinancialStatus,
    lineItems,
    shippingAddress: toAddressInput(draft.shippingAddress),
    billingAddress: toAddressInput(draft.billingAddress),
    taxLines: nonEmpty(orderTaxLines.map((taxLine) => toTaxLineInput(taxLine, currency))),
    taxesIncluded: draft.taxesIncluded,
    discountCode: orderDiscount ? toDiscountCode(orderDiscount, currency) : undefined,
    shippingLines: draft.shipping
      ? [{ title: draft.shipping.title, priceSet: moneyBag(draft.shipping.price, currency) }]
      : undefined,
    customAttributes: nonEmpty(
      draft.noteAttributes.map((attribute) => ({ key: attribute.name, value: attribute.value })),
    ),
    customer: draft.customer?.id ? { toAssociate: { id: toGid('Customer', draft.customer.id) } } : undefined,
    sourceName: draft.sourceName,
  };
}

/**
 * One edit-session discount per discounted line. A lone percentage stays a
 * percentage; otherwise the whole line's reduction is sent as a fixed value.
 */
export function buildEditDiscounts(draft: OrderDraft): EditLineItemDiscount[] {
  return buildLineItems(draft).flatMap((line, lineIndex): EditLineItemDiscount[] => {
    const [first] = line.applied;
    if (!first) {
      return [];
    }
    const description = line.applied.map((a) => a.description).join(', ');
    if (line.applied.length === 1 && first.spec.kind === 'PERCENTAGE') {
      return [{ lineIndex, description, percentValue: first.spec.percentage }];
    }
    const total = round2((line.originalPrice - line.discountedPrice) * line.quantity);
    return total > 0 ? [{ lineIndex, description, fixedValue: money(total, draft.currency) }] : [];
  });
}

/**
 * Line-level REST tax lines from distributed portions, grouped by line.
 */
export function groupTaxPortions(portions: LineItemTaxPortion[]): Map<number, RestTaxLine[]> {
  const grouped = new Map<number, RestTaxLine[]>();
  for (const portion of portions) {
    const lines = grouped.get(portion.lineIndex) ?? [];
    lines.push(toRestTaxLine(portion));
    grouped.set(portion.lineIndex, lines);
  }
  return grouped;
}
