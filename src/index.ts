/**
 * orderkit - Public API
 *
 * Main entry point for programmatic usage.
 *
 * @example
 * ```typescript
 * import { OrderOrchestrator, ShopifyAdminGateway, loadRuntimeConfig, readInputFile, toOrderDraft, validateOrderInput } from 'orderkit';
 *
 * const config = await loadRuntimeConfig();
 * const file = await readInputFile('input.json', validateOrderInput);
 * const orchestrator = new OrderOrchestrator(new ShopifyAdminGateway(config), config);
 * const confirmation = await orchestrator.execute(toOrderDraft(file.order, config));
 * ```
 */

// Domain types
export type {
  DiscountKind,
  DiscountSpec,
  TaxLineSpec,
  MailingAddress,
  CustomerContact,
  LineItem,
  ShippingSpec,
  NoteAttribute,
  PaymentSpec,
  OrderDraft,
  OrderStrategy,
  RecordedTaxLine,
  RecordedDiscount,
  FulfillmentOrderLine,
  FulfillmentOrderRecord,
  TransactionRecord,
  RemoteOrderConfirmation,
} from './types/order.types.js';
export { ORDER_STRATEGIES } from './types/order.types.js';

// Input file types
export type {
  OrderInputFile,
  OrderInputData,
  ShippingNoteInputFile,
  ProductInputFile,
  AddressListInputFile,
} from './types/input.types.js';

// Config
export type {
  OrderkitConfig,
  ShippingNoteConfig,
  OrderDefaultsConfig,
  Credentials,
  RuntimeConfig,
} from './types/config.types.js';
export { defaultConfig } from './types/config.types.js';
export {
  ConfigurationManager,
  loadRuntimeConfig,
  SHOP_DOMAIN_ENV,
  ACCESS_TOKEN_ENV,
} from './core/config/configuration-manager.js';

// Errors
export {
  OrderkitError,
  ConfigurationError,
  TransportError,
  RemoteApplicationError,
  ResponseShapeError,
  InputError,
} from './core/errors.js';

// Retry
export type { RetryPolicy, RetryOutcome, Sleep } from './core/retry.js';
export { retryUntil, backoffDelay } from './core/retry.js';

// Gateway
export type { AdminGateway, RestMethod, RestResponse, GraphQLVariables } from './core/admin/admin-gateway.js';
export { ShopifyAdminGateway } from './core/admin/shopify-admin-gateway.js';
export { toGid, fromGid, isGid } from './core/admin/gid.js';

// Input
export {
  readInputFile,
  checkInput,
  validateOrderInput,
  validateShippingNoteInput,
  validateProductInput,
  validateAddressListInput,
} from './core/input/input-loader.js';
export { toOrderDraft } from './core/orders/order-input.js';

// Order payload builder
export type { ClassifyOptions } from './core/orders/strategy.js';
export { classify } from './core/orders/strategy.js';
export type { BuiltLineItem, AppliedDiscount } from './core/orders/line-item-builder.js';
export { buildLineItem } from './core/orders/line-item-builder.js';
export { buildOrderLevelDiscount } from './core/orders/discounts.js';
export type { LineItemTaxPortion } from './core/orders/tax-distribution.js';
export { distributeTax } from './core/orders/tax-distribution.js';
export {
  buildDraftOrderInput,
  buildRestOrderBody,
  buildOrderCreateInput,
  buildEditDiscounts,
} from './core/orders/payload-builder.js';

// Orchestration
export type { ExecuteOptions, OrderPlan, PlannedRequest } from './core/orders/order-orchestrator.js';
export { OrderOrchestrator, planOrder } from './core/orders/order-orchestrator.js';

// Services
export { FulfillmentService } from './core/services/fulfillment-service.js';
export { MetafieldService } from './core/services/metafield-service.js';
export { TransactionService } from './core/services/transaction-service.js';
export { OrderService } from './core/services/order-service.js';
export { CustomerService } from './core/services/customer-service.js';
export { CatalogService } from './core/services/catalog-service.js';
export { ShopService } from './core/services/shop-service.js';

// Logger
export { Logger, LogLevel } from './core/logger.js';
