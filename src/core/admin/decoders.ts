/**
 * Response decoders
 *
 * Typed shapes of the remote records the tools read, and the mapping from
 * those shapes to orderkit's own records. A missing required field is a
 * ResponseShapeError.
 */

import type {
  FulfillmentOrderRecord,
  RecordedDiscount,
  RecordedTaxLine,
  TransactionRecord,
} from '../../types/order.types.js';
import { ResponseShapeError, type UserError } from '../errors.js';
import { parseDecimal } from '../money.js';

export interface Money {
  amount: string;
  currencyCode: string;
}

export interface MoneyBag {
  shopMoney: Money;
}

export interface Connection<T> {
  nodes: T[];
}

export interface MutationPayload {
  userErrors: UserError[];
}

export interface GqlTaxLine {
  title: string;
  rate?: number | null;
  ratePercentage?: number | null;
  priceSet: MoneyBag;
}

export type GqlDiscountValue =
  | { __typename: 'MoneyV2'; amount: string; currencyCode: string }
  | { __typename: 'PricingPercentageValue'; percentage: number };

export interface GqlDiscountApplication {
  __typename: string;
  code?: string;
  title?: string;
  value: GqlDiscountValue;
}

export interface GqlOrderLineItem {
  id: string;
  title: string;
  quantity: number;
  variant?: { id: string } | null;
  originalUnitPriceSet?: MoneyBag;
  discountedUnitPriceSet?: MoneyBag;
  taxLines?: GqlTaxLine[];
  customAttributes?: Array<{ key: string; value: string | null }>;
}

export interface GqlOrder {
  id: string;
  name: string;
  email?: string | null;
  createdAt?: string;
  displayFinancialStatus?: string | null;
  displayFulfillmentStatus?: string | null;
  totalPriceSet?: MoneyBag;
  subtotalPriceSet?: MoneyBag;
  totalTaxSet?: MoneyBag | null;
  totalDiscountsSet?: MoneyBag | null;
  taxLines?: GqlTaxLine[];
  discountApplications?: Connection<GqlDiscountApplication>;
  lineItems?: Connection<GqlOrderLineItem>;
}

export interface GqlFulfillmentOrderLine {
  id: string;
  remainingQuantity: number;
  totalQuantity: number;
  lineItem?: { id: string; title: string } | null;
}

export interface GqlFulfillmentOrder {
  id: string;
  status: string;
  requestStatus?: string | null;
  assignedLocation?: { name?: string | null; location?: { id: string } | null } | null;
  deliveryMethod?: { methodType?: string | null } | null;
  lineItems: Connection<GqlFulfillmentOrderLine>;
}

export interface RestTaxLineRecord {
  title: string;
  rate?: number | string | null;
  price: string;
}

export interface RestOrderRecord {
  id: number | string;
  name?: string;
  order_number?: number;
  total_price?: string;
  total_tax?: string;
  currency?: string;
  tax_lines?: RestTaxLineRecord[];
  discount_applications?: Array<{ title?: string; code?: string; value?: string; value_type?: string }>;
  line_items?: Array<{ id: number | string; title?: string; quantity?: number; tax_lines?: RestTaxLineRecord[] }>;
}

export interface RestTransactionRecord {
  id: number | string;
  kind: string;
  status: string;
  amount: string;
  currency?: string;
  gateway?: string;
  created_at?: string;
}

export function requireValue<T>(value: T | null | undefined, description: string): T {
  if (value === null || value === undefined) {
    throw new ResponseShapeError(`Response is missing ${description}`);
  }
  return value;
}

export function decodeTaxLines(lines: GqlTaxLine[] | undefined): RecordedTaxLine[] {
  return (lines ?? []).map((line) => ({
    title: line.title,
    rate: line.rate ?? undefined,
    amount: line.priceSet.shopMoney.amount,
  }));
}

export function decodeRestTaxLines(lines: RestTaxLineRecord[] | undefined): RecordedTaxLine[] {
  return (lines ?? []).map((line) => ({
    title: line.title,
    rate: typeof line.rate === 'string' ? parseDecimal(line.rate) : line.rate ?? undefined,
    amount: line.price,
  }));
}

export function decodeDiscountApplications(
  connection: Connection<GqlDiscountApplication> | undefined,
): RecordedDiscount[] {
  return (connection?.nodes ?? []).map((node) => {
    const title = node.code ?? node.title ?? node.__typename;
    return node.value.__typename === 'PricingPercentageValue'
      ? { title, valueType: 'PERCENTAGE', value: String(node.value.percentage) }
      : { title, valueType: 'FIXED_AMOUNT', value: node.value.amount, amount: node.value.amount };
  });
}

export function decodeRestDiscounts(order: RestOrderRecord): RecordedDiscount[] {
  return (order.discount_applications ?? []).map((application) => ({
    title: application.title ?? application.code ?? 'Discount',
    valueType: application.value_type?.toUpperCase(),
    value: application.value,
  }));
}

export function decodeFulfillmentOrders(connection: Connection<GqlFulfillmentOrder>): FulfillmentOrderRecord[] {
  return connection.nodes.map((node) => ({
    id: node.id,
    status: node.status,
    requestStatus: node.requestStatus ?? undefined,
    assignedLocationId: node.assignedLocation?.location?.id,
    assignedLocationName: node.assignedLocation?.name ?? undefined,
    deliveryMethodType: node.deliveryMethod?.methodType ?? undefined,
    lineItems: node.lineItems.nodes.map((line) => ({
      id: line.id,
      // remainingQuantity drops to 0 once fulfilled
      quantity: line.remainingQuantity || line.totalQuantity,
      lineItemId: line.lineItem?.id,
      title: line.lineItem?.title,
    })),
  }));
}

export function decodeRestTransaction(record: RestTransactionRecord): TransactionRecord {
  return {
    id: String(record.id),
    kind: record.kind,
    status: record.status,
    amount: record.amount,
    currency: record.currency,
    gateway: record.gateway,
    createdAt: record.created_at,
  };
}
