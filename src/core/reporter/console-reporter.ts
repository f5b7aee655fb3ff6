/**
 * Console Reporter
 *
 * Prints command results through the Logger. With `raw` set, each result is
 * printed as JSON instead of the human-readable summary.
 */

import chalk from 'chalk';
import type {
  FulfillmentOrderRecord,
  RemoteOrderConfirmation,
  TransactionRecord,
} from '../../types/order.types.js';
import type { GqlOrder } from '../admin/decoders.js';
import { decodeDiscountApplications, decodeTaxLines } from '../admin/decoders.js';
import { Logger } from '../logger.js';
import type { OrderPlan } from '../orders/order-orchestrator.js';
import type { AccessScopeReport, LocationRecord, ShopRecord } from '../services/shop-service.js';
import type { ProductRecord, VariantInventoryRecord } from '../services/catalog-service.js';
import type { AddressRecord, CustomerAddressBook } from '../services/customer-service.js';
import type { DeliveryMethodRecord } from '../services/order-service.js';

export type Field = [label: string, value: string | number | boolean | undefined];

export interface ReporterOptions {
  raw?: boolean;
}

export function confirmationFields(confirmation: RemoteOrderConfirmation): Field[] {
  return [
    ['Strategy', confirmation.strategy],
    ['Order ID', confirmation.orderId],
    ['Order name', confirmation.orderName],
    ['Order number', confirmation.orderNumber],
    ['Draft order ID', confirmation.draftOrderId],
    ['Total', confirmation.totalPrice === undefined ? undefined : `${confirmation.totalPrice} ${confirmation.currency}`],
    ['Total tax', confirmation.totalTax === undefined ? undefined : `${confirmation.totalTax} ${confirmation.currency}`],
    [
      'Fulfillment routing',
      confirmation.fulfillmentRoutingComplete === undefined
        ? undefined
        : confirmation.fulfillmentRoutingComplete
          ? 'complete'
          : 'pending',
    ],
  ];
}

export function addressLine(address: AddressRecord): string {
  const name = [address.firstName, address.lastName].filter(Boolean).join(' ');
  const place = [address.address1, address.address2, address.city, address.province, address.zip, address.country]
    .filter(Boolean)
    .join(', ');
  return name ? `${name}, ${place}` : place;
}

export class ConsoleReporter {
  private raw: boolean;

  constructor(options: ReporterOptions = {}) {
    this.raw = options.raw ?? false;
  }

  confirmation(confirmation: RemoteOrderConfirmation): void {
    if (this.raw) {
      Logger.json('Remote responses:', confirmation.raw);
      return;
    }

    Logger.newLine();
    Logger.success(`Order ${confirmation.orderName ?? confirmation.orderId} created`);
    this.fields(confirmationFields(confirmation));

    if (confirmation.taxLines.length > 0) {
      Logger.info('Tax lines:');
      for (const line of confirmation.taxLines) {
        const rate = line.rate === undefined ? '' : ` (${line.rate})`;
        Logger.info(`  - ${line.title}${rate}: ${line.amount}`);
      }
    }
    if (confirmation.discounts.length > 0) {
      Logger.info('Discounts:');
      for (const discount of confirmation.discounts) {
        Logger.info(`  - ${discount.title}: ${discount.value ?? ''} ${discount.valueType ?? ''}`.trimEnd());
      }
    }
    if (confirmation.fulfillmentOrders.length > 0) {
      this.fulfillmentOrders(confirmation.fulfillmentOrders);
    }
    if (confirmation.transactions.length > 0) {
      this.transactions(confirmation.transactions);
    }
    this.warnings(confirmation.warnings);
  }

  plan(plan: OrderPlan): void {
    if (!this.raw) {
      Logger.heading(`Dry run: ${plan.strategy}`);
    }
    for (const request of plan.requests) {
      Logger.json(this.raw ? request.operation : chalk.bold(request.operation), request.body);
    }
  }

  order(order: GqlOrder): void {
    if (this.raw) {
      Logger.json('Order:', order);
      return;
    }

    Logger.heading(`Order ${order.name}`);
    this.fields([
      ['ID', order.id],
      ['Email', order.email ?? undefined],
      ['Created', order.createdAt],
      ['Financial status', order.displayFinancialStatus ?? undefined],
      ['Fulfillment status', order.displayFulfillmentStatus ?? undefined],
      ['Subtotal', order.subtotalPriceSet?.shopMoney.amount],
      ['Discounts', order.totalDiscountsSet?.shopMoney.amount],
      ['Tax', order.totalTaxSet?.shopMoney.amount],
      ['Total', order.totalPriceSet?.shopMoney.amount],
    ]);

    const lines = order.lineItems?.nodes ?? [];
    if (lines.length > 0) {
      Logger.info('Line items:');
      for (const line of lines) {
        const original = line.originalUnitPriceSet?.shopMoney.amount;
        const discounted = line.discountedUnitPriceSet?.shopMoney.amount;
        const price = original !== undefined && discounted !== undefined && original !== discounted
          ? `${discounted} (was ${original})`
          : original ?? '';
        Logger.info(`  - ${line.quantity} x ${line.title} @ ${price}`);
        for (const taxLine of decodeTaxLines(line.taxLines)) {
          Logger.info(`      tax ${taxLine.title}: ${taxLine.amount}`);
        }
      }
    }

    const taxLines = decodeTaxLines(order.taxLines);
    if (taxLines.length > 0) {
      Logger.info('Tax lines:');
      for (const line of taxLines) {
        Logger.info(`  - ${line.title}: ${line.amount}`);
      }
    }
    const discounts = decodeDiscountApplications(order.discountApplications);
    if (discounts.length > 0) {
      Logger.info('Discounts:');
      for (const discount of discounts) {
        Logger.info(`  - ${discount.title}: ${discount.value ?? ''}`);
      }
    }
  }

  fulfillmentOrders(records: FulfillmentOrderRecord[]): void {
    if (this.raw) {
      Logger.json('Fulfillment orders:', records);
      return;
    }
    if (records.length === 0) {
      Logger.info('No fulfillment orders');
      return;
    }
    Logger.info('Fulfillment orders:');
    for (const record of records) {
      Logger.info(`  - ${record.id} [${record.status}] ${record.assignedLocationName ?? ''}`.trimEnd());
      for (const line of record.lineItems) {
        Logger.info(`      ${line.quantity} x ${line.title ?? line.lineItemId ?? line.id}`);
      }
    }
  }

  transactions(records: TransactionRecord[]): void {
    if (this.raw) {
      Logger.json('Transactions:', records);
      return;
    }
    if (records.length === 0) {
      Logger.info('No transactions');
      return;
    }
    Logger.table(
      records.map((record) => ({
        id: record.id,
        kind: record.kind,
        status: record.status,
        amount: `${record.amount} ${record.currency ?? ''}`.trim(),
        gateway: record.gateway ?? '',
      })),
    );
  }

  deliveryMethod(record: DeliveryMethodRecord): void {
    if (this.raw) {
      Logger.json('Delivery method:', record);
      return;
    }
    Logger.heading(`Order ${record.orderName}`);
    this.fields([
      ['ID', record.orderId],
      ['Fulfillment status', record.fulfillmentStatus],
      ['Shipping line', record.shippingLine?.title],
      ['Code', record.shippingLine?.code],
      ['Source', record.shippingLine?.source],
      ['Carrier', record.shippingLine?.carrierIdentifier],
      ['Delivery category', record.shippingLine?.deliveryCategory],
    ]);
    for (const fulfillmentOrder of record.fulfillmentOrders) {
      Logger.info(
        `  - ${fulfillmentOrder.id} [${fulfillmentOrder.status}] ${fulfillmentOrder.methodType ?? 'UNKNOWN'} ${fulfillmentOrder.locationName ?? ''}`.trimEnd(),
      );
    }
  }

  shop(shop: ShopRecord): void {
    if (this.raw) {
      Logger.json('Shop:', shop);
      return;
    }
    this.fields([
      ['Shop', shop.name],
      ['Domain', shop.domain],
      ['Email', shop.email],
      ['Currency', shop.currency],
    ]);
  }

  locations(records: LocationRecord[]): void {
    if (this.raw) {
      Logger.json('Locations:', records);
      return;
    }
    Logger.table(
      records.map((record) => ({
        id: record.id,
        name: record.name,
        active: record.isActive,
        primary: record.isPrimary,
        service: record.fulfillmentService ?? '',
      })),
    );
  }

  products(records: ProductRecord[]): void {
    if (this.raw) {
      Logger.json('Products:', records);
      return;
    }
    for (const product of records) {
      Logger.info(`${chalk.bold(product.title)} ${product.id} ${product.status ?? ''}`.trimEnd());
      for (const variant of product.variants) {
        Logger.info(`  - ${variant.title} ${variant.id} ${variant.price ?? ''} (${variant.inventoryQuantity ?? 0} in stock)`);
      }
    }
  }

  inventory(record: VariantInventoryRecord): void {
    if (this.raw) {
      Logger.json('Inventory:', record);
      return;
    }
    Logger.heading(`${record.productTitle ?? ''} ${record.title}`.trim());
    this.fields([
      ['Variant', record.variantId],
      ['SKU', record.sku],
      ['Inventory item', record.inventoryItemId],
      ['Tracked', record.tracked],
    ]);
    for (const level of record.levels) {
      Logger.info(`  - ${level.locationName}: ${level.available} available`);
    }
  }

  addressBook(book: CustomerAddressBook): void {
    if (this.raw) {
      Logger.json('Addresses:', book);
      return;
    }
    Logger.heading(book.name || book.customerId);
    for (const address of book.addresses) {
      const marker = address.id === book.defaultAddressId ? ' (default)' : '';
      Logger.info(`  - ${address.id}${marker}: ${addressLine(address)}`);
    }
  }

  accessScopes(report: AccessScopeReport): void {
    if (this.raw) {
      Logger.json('Access scopes:', report);
      return;
    }
    Logger.info(`Granted scopes: ${report.scopes.join(', ')}`);
    for (const scope of report.fulfillmentScopes) {
      if (scope.granted) {
        Logger.success(scope.handle);
      } else {
        Logger.warn(`${scope.handle} is missing`);
      }
    }
  }

  warnings(warnings: string[]): void {
    if (warnings.length === 0) {
      return;
    }
    Logger.newLine();
    Logger.info(`${warnings.length} step(s) need attention:`);
    for (const warning of warnings) {
      Logger.info(`  - ${warning}`);
    }
  }

  private fields(fields: Field[]): void {
    for (const [label, value] of fields) {
      Logger.field(label, value, 2);
    }
  }
}
