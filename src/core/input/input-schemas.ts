/**
 * Input Schemas
 *
 * JSON Schemas for the local files commands read. Numbers may be written as
 * strings; unknown keys are tolerated so exports from other tools load as-is.
 */

const decimal = { type: ['string', 'number'] };
const optionalString = { type: 'string' };
/** Numeric id or a GID ending in one; REST bodies need the number. */
const resourceReference = {
  type: ['string', 'integer'],
  pattern: '^\\s*(\\d+|gid://shopify/[A-Za-z]+/\\d+)\\s*$',
  minimum: 1,
};

const discountApplication = {
  type: 'object',
  properties: {
    title: optionalString,
    value: decimal,
    valueType: { type: 'string' },
    amount: decimal,
  },
};

const taxLine = {
  type: 'object',
  properties: {
    id: optionalString,
    title: optionalString,
    rate: decimal,
    price: decimal,
    code: optionalString,
    isUsed: { type: 'boolean' },
  },
};

export const addressSchema = {
  type: 'object',
  properties: {
    firstName: optionalString,
    lastName: optionalString,
    company: optionalString,
    address1: optionalString,
    street: optionalString,
    address2: optionalString,
    city: optionalString,
    province: optionalString,
    provinceCode: optionalString,
    country: optionalString,
    countryCode: optionalString,
    zip: optionalString,
    phone: optionalString,
  },
};

const item = {
  type: 'object',
  required: ['quantity'],
  anyOf: [{ required: ['productId'] }, { required: ['variantId'] }],
  properties: {
    productId: resourceReference,
    variantId: resourceReference,
    quantity: { type: 'integer', minimum: 1 },
    price: decimal,
    originPrice: decimal,
    name: optionalString,
    taxable: { type: 'boolean' },
    taxesIncluded: { type: 'boolean' },
    totalTax: decimal,
    totalDiscount: decimal,
    discountApplications: { type: 'array', items: discountApplication },
    taxLines: { type: 'array', items: taxLine },
  },
};

export const orderInputSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['order'],
  properties: {
    order: {
      type: 'object',
      required: ['items'],
      properties: {
        email: optionalString,
        customer: {
          type: 'object',
          properties: {
            id: optionalString,
            email: optionalString,
            firstName: optionalString,
            lastName: optionalString,
            phone: optionalString,
          },
        },
        items: { type: 'array', minItems: 1, items: item },
        shippingAddress: { anyOf: [addressSchema, { type: 'null' }] },
        billingAddress: { anyOf: [addressSchema, { type: 'null' }] },
        note: optionalString,
        tags: { anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }] },
        shippingMethod: optionalString,
        shippingMethodTitle: optionalString,
        totalShipping: decimal,
        shippingNote: optionalString,
        additionalData: {
          type: 'object',
          properties: { shipping_note: optionalString },
        },
        noteAttributes: {
          type: 'array',
          items: {
            type: 'object',
            required: ['name', 'value'],
            properties: { name: { type: 'string' }, value: { type: 'string' } },
          },
        },
        taxLines: { type: 'array', items: taxLine },
        taxesIncluded: { type: 'boolean' },
        totalTax: decimal,
        totalDiscounts: decimal,
        discountApplications: { type: 'array', items: discountApplication },
        subtotalPrice: decimal,
        totalPrice: decimal,
        currency: { type: 'string', pattern: '^[A-Za-z]{3}$' },
        payments: {
          type: 'array',
          items: {
            type: 'object',
            required: ['amount'],
            properties: {
              paymentCode: optionalString,
              paymentName: optionalString,
              amount: decimal,
              currency: optionalString,
              type: optionalString,
            },
          },
        },
        financialStatus: { type: 'string' },
        source: optionalString,
      },
    },
  },
};

export const shippingNoteInputSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['orderId'],
  properties: {
    orderId: { type: ['string', 'integer'] },
    shippingNote: optionalString,
  },
};

export const productInputSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['product'],
  properties: {
    product: {
      type: 'object',
      required: ['title'],
      properties: {
        title: { type: 'string', minLength: 1 },
        descriptionHtml: { type: 'string' },
        vendor: { type: 'string' },
        productType: { type: 'string' },
        status: { type: 'string', enum: ['ACTIVE', 'DRAFT', 'ARCHIVED'] },
        tags: { type: 'array', items: { type: 'string' } },
        metafields: {
          type: 'array',
          items: {
            type: 'object',
            required: ['namespace', 'key', 'type', 'value'],
            properties: {
              namespace: { type: 'string' },
              key: { type: 'string' },
              type: { type: 'string' },
              value: { type: 'string' },
            },
          },
        },
      },
    },
  },
};

export const addressListInputSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['addresses'],
  properties: {
    addresses: { type: 'array', minItems: 1, items: addressSchema },
  },
};
