/**
 * Configuration Schema
 *
 * JSON Schema for validating orderkit configuration files (after defaults
 * are merged in).
 */

export const configSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['apiVersion', 'currency', 'timeoutMs', 'fulfillmentRetry', 'shippingNote', 'orders'],
  properties: {
    apiVersion: {
      type: 'string',
      pattern: '^\\d{4}-\\d{2}$|^unstable$',
      description: 'Admin API version',
    },
    currency: {
      type: 'string',
      pattern: '^[A-Z]{3}$',
      description: 'ISO 4217 shop currency',
    },
    timeoutMs: {
      type: 'integer',
      minimum: 1000,
      maximum: 300000,
      description: 'Client-side timeout for each outbound call',
    },
    fulfillmentRetry: {
      type: 'object',
      required: ['maxAttempts', 'baseDelayMs', 'multiplier'],
      properties: {
        maxAttempts: { type: 'integer', minimum: 1, maximum: 20 },
        baseDelayMs: { type: 'integer', minimum: 0 },
        multiplier: { type: 'number', minimum: 1 },
      },
      additionalProperties: false,
    },
    shippingNote: {
      type: 'object',
      required: ['namespace', 'key', 'type'],
      properties: {
        namespace: { type: 'string', minLength: 3 },
        key: { type: 'string', minLength: 2 },
        type: { type: 'string' },
      },
      additionalProperties: false,
    },
    orders: {
      type: 'object',
      required: ['financialStatus', 'preferDraftFlow', 'preferStrikethrough'],
      properties: {
        financialStatus: {
          type: 'string',
          enum: ['PENDING', 'AUTHORIZED', 'PARTIALLY_PAID', 'PAID', 'PARTIALLY_REFUNDED', 'REFUNDED', 'VOIDED'],
        },
        preferDraftFlow: { type: 'boolean' },
        preferStrikethrough: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};
