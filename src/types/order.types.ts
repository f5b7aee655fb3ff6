/**
 * Order Types
 *
 * The abstract order a caller asks for (OrderDraft) and the record the
 * remote platform confirms back (RemoteOrderConfirmation).
 */

export type DiscountKind = 'PERCENTAGE' | 'FIXED_AMOUNT';

export type DiscountSpec =
  | {
      kind: 'PERCENTAGE';
      title: string;
      /** 0-100, rounded to 2 decimals */
      percentage: number;
    }
  | {
      kind: 'FIXED_AMOUNT';
      title: string;
      /** Non-negative, order currency */
      amount: number;
    };

export interface TaxLineSpec {
  title: string;
  /** Proportion, e.g. 0.0825 */
  rate: number;
  amount: number;
  /** Unused entries are dropped before transmission */
  used: boolean;
}

export interface MailingAddress {
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

export interface CustomerContact {
  /** Remote customer reference (GID or numeric) */
  id?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  phone?: string;
}

export interface LineItem {
  /** Catalog variant, GID form */
  variantId: string;
  quantity: number;
  /** Explicit override price */
  price?: number;
  /** Pre-discount price, used when no override is given */
  originPrice?: number;
  title?: string;
  taxable: boolean;
  taxesIncluded: boolean;
  /** Tax already contained in the line when taxes are included */
  totalTax?: number;
  /** Used only when no discount applications are listed */
  totalDiscount?: number;
  discounts: DiscountSpec[];
  taxLines: TaxLineSpec[];
}

export interface ShippingSpec {
  title: string;
  price: number;
}

export interface NoteAttribute {
  name: string;
  value: string;
}

export interface PaymentSpec {
  amount: number;
  currency: string;
  gateway: string;
  code?: string;
}

export interface OrderDraft {
  email?: string;
  customer?: CustomerContact;
  items: LineItem[];
  shippingAddress?: MailingAddress;
  billingAddress?: MailingAddress;
  note?: string;
  tags: string[];
  shipping?: ShippingSpec;
  /** Free-text note stored as a metafield on the created order */
  shippingNote?: string;
  noteAttributes: NoteAttribute[];
  /** Order-level discount applications */
  discounts: DiscountSpec[];
  /** Order-level tax lines */
  taxLines: TaxLineSpec[];
  currency: string;
  taxesIncluded: boolean;
  subtotalPrice?: number;
  totalDiscounts?: number;
  totalPrice?: number;
  payments: PaymentSpec[];
  financialStatus?: string;
  sourceName?: string;
}

export type OrderStrategy =
  | 'draft-order'
  | 'direct-no-frills'
  | 'direct-with-tax'
  | 'direct-with-tax-and-discount'
  | 'edit-with-strikethrough';

export const ORDER_STRATEGIES: readonly OrderStrategy[] = [
  'draft-order',
  'direct-no-frills',
  'direct-with-tax',
  'direct-with-tax-and-discount',
  'edit-with-strikethrough',
];

export interface RecordedTaxLine {
  title: string;
  rate?: number;
  amount: string;
}

export interface RecordedDiscount {
  title: string;
  valueType?: string;
  value?: string;
  amount?: string;
}

export interface FulfillmentOrderLine {
  id: string;
  quantity: number;
  lineItemId?: string;
  title?: string;
}

export interface FulfillmentOrderRecord {
  id: string;
  status: string;
  requestStatus?: string;
  assignedLocationId?: string;
  assignedLocationName?: string;
  deliveryMethodType?: string;
  lineItems: FulfillmentOrderLine[];
}

export interface TransactionRecord {
  id: string;
  kind: string;
  status: string;
  amount: string;
  currency?: string;
  gateway?: string;
  createdAt?: string;
}

export interface RemoteOrderConfirmation {
  strategy: OrderStrategy;
  orderId: string;
  orderName?: string;
  orderNumber?: number;
  draftOrderId?: string;
  totalPrice?: string;
  totalTax?: string;
  currency: string;
  taxLines: RecordedTaxLine[];
  discounts: RecordedDiscount[];
  fulfillmentOrders: FulfillmentOrderRecord[];
  /** undefined when the flow does not look fulfillment orders up */
  fulfillmentRoutingComplete?: boolean;
  transactions: TransactionRecord[];
  /** Best-effort steps that failed */
  warnings: string[];
  /** Raw remote responses, in call order */
  raw: unknown[];
}
