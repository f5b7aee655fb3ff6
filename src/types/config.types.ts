/**
 * Configuration Types
 *
 * Defines all configuration interfaces for orderkit.
 */

import type { RetryPolicy } from '../core/retry.js';

/**
 * Settings read from an orderkit config file. Every field is optional and
 * falls back to `defaultConfig`.
 */
export interface OrderkitConfig {
  /** Admin API version, e.g. "2025-10" */
  apiVersion: string;

  /** Shop currency used for money inputs */
  currency: string;

  /** Client-side timeout for every outbound call */
  timeoutMs: number;

  /** Backoff for the fulfillment-order lookup */
  fulfillmentRetry: RetryPolicy;

  /** Where the shipping note metafield lives */
  shippingNote: ShippingNoteConfig;

  /** Order creation defaults */
  orders: OrderDefaultsConfig;
}

export interface ShippingNoteConfig {
  namespace: string;
  key: string;
  type: string;
}

export interface OrderDefaultsConfig {
  /** Financial status for direct creation (PAID, PENDING, ...) */
  financialStatus: string;

  /** Use the draft-order flow when no custom tax is requested */
  preferDraftFlow: boolean;

  /** Create-then-edit so line discounts render struck through */
  preferStrikethrough: boolean;
}

export interface Credentials {
  shopDomain: string;
  accessToken: string;
}

/**
 * Built once at start-up and passed explicitly to everything that talks to
 * the remote platform.
 */
export interface RuntimeConfig extends OrderkitConfig {
  credentials: Credentials;

  /** Path of the config file used, if any */
  configPath?: string;
}

export const defaultConfig: OrderkitConfig = {
  apiVersion: '2025-10',
  currency: 'USD',
  timeoutMs: 30_000,
  fulfillmentRetry: {
    maxAttempts: 5,
    baseDelayMs: 3_000,
    multiplier: 1.5,
  },
  shippingNote: {
    namespace: 'orderkit',
    key: 'shipping_note',
    type: 'multi_line_text_field',
  },
  orders: {
    financialStatus: 'PAID',
    preferDraftFlow: true,
    preferStrikethrough: false,
  },
};
