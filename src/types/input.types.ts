/**
 * Input File Types
 *
 * Shapes of the local JSON files commands read. Keys are camelCase; numbers
 * may arrive as strings, and are parsed leniently when mapped to domain types.
 */

export type Decimalish = string | number;

export interface DiscountApplicationInput {
  title?: string;
  value?: Decimalish;
  /** "percentage" | "fixed_amount" (any casing) */
  valueType?: string;
  amount?: Decimalish;
}

export interface TaxLineInput {
  id?: string;
  title?: string;
  rate?: Decimalish;
  price?: Decimalish;
  code?: string;
  isUsed?: boolean;
}

export interface AddressInput {
  firstName?: string;
  lastName?: string;
  company?: string;
  address1?: string;
  street?: string;
  address2?: string;
  city?: string;
  province?: string;
  provinceCode?: string;
  country?: string;
  countryCode?: string;
  zip?: string;
  phone?: string;
}

export interface CustomerInput {
  id?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  phone?: string;
}

export interface ItemInput {
  productId?: string | number;
  variantId?: string | number;
  quantity: number;
  price?: Decimalish;
  originPrice?: Decimalish;
  name?: string;
  taxable?: boolean;
  taxesIncluded?: boolean;
  totalTax?: Decimalish;
  totalDiscount?: Decimalish;
  discountApplications?: DiscountApplicationInput[];
  taxLines?: TaxLineInput[];
}

export interface NoteAttributeInput {
  name: string;
  value: string;
}

export interface PaymentInput {
  paymentCode?: string;
  paymentName?: string;
  amount: Decimalish;
  currency?: string;
  type?: string;
}

export interface OrderInputData {
  email?: string;
  customer?: CustomerInput;
  items: ItemInput[];
  shippingAddress?: AddressInput | null;
  billingAddress?: AddressInput | null;
  note?: string;
  tags?: string | string[];
  shippingMethod?: string;
  shippingMethodTitle?: string;
  totalShipping?: Decimalish;
  shippingNote?: string;
  additionalData?: { shipping_note?: string };
  noteAttributes?: NoteAttributeInput[];
  taxLines?: TaxLineInput[];
  taxesIncluded?: boolean;
  totalTax?: Decimalish;
  totalDiscounts?: Decimalish;
  discountApplications?: DiscountApplicationInput[];
  subtotalPrice?: Decimalish;
  totalPrice?: Decimalish;
  currency?: string;
  payments?: PaymentInput[];
  financialStatus?: string;
  source?: string;
}

export interface OrderInputFile {
  order: OrderInputData;
}

export interface ShippingNoteInputFile {
  orderId: string;
  shippingNote?: string;
}

export interface MetafieldInput {
  namespace: string;
  key: string;
  type: string;
  value: string;
}

export interface ProductInputFile {
  product: {
    title: string;
    descriptionHtml?: string;
    vendor?: string;
    productType?: string;
    status?: 'ACTIVE' | 'DRAFT' | 'ARCHIVED';
    tags?: string[];
    metafields?: MetafieldInput[];
  };
}

export interface AddressListInputFile {
  addresses: AddressInput[];
}
