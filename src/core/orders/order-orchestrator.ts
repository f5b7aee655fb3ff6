/**
 * Order Orchestrator
 *
 * Runs the remote call sequence of one strategy and folds the responses into
 * a single RemoteOrderConfirmation. Calls are strictly sequential and write
 * calls are never retried. Side steps (shipping note, tax restore, summary
 * read, fulfillment lookup, payment recording) only add warnings when they fail.
 */

import type { OrderDefaultsConfig, RuntimeConfig } from '../../types/config.types.js';
import type { OrderDraft, OrderStrategy, RemoteOrderConfirmation } from '../../types/order.types.js';
import type { AdminGateway } from '../admin/admin-gateway.js';
import {
  type Connection,
  type GqlOrder,
  type MutationPayload,
  type RestOrderRecord,
  decodeDiscountApplications,
  decodeRestDiscounts,
  decodeRestTaxLines,
  decodeTaxLines,
  requireValue,
} from '../admin/decoders.js';
import { fromGid, toGid } from '../admin/gid.js';
import { ResponseShapeError, assertNoUserErrors, errorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import { type Sleep, defaultSleep } from '../retry.js';
import { FulfillmentService } from '../services/fulfillment-service.js';
import { MetafieldService } from '../services/metafield-service.js';
import { TransactionService } from '../services/transaction-service.js';
import {
  DRAFT_ORDER_COMPLETE,
  DRAFT_ORDER_CREATE,
  DRAFT_ORDER_ORDER,
  ORDER_CREATE,
  ORDER_EDIT_ADD_LINE_ITEM_DISCOUNT,
  ORDER_EDIT_BEGIN,
  ORDER_EDIT_COMMIT,
  ORDER_SUMMARY,
} from './order-documents.js';
import {
  type RestTaxLine,
  buildDraftOrderInput,
  buildEditDiscounts,
  buildOrderCreateInput,
  buildRestOrderBody,
  groupTaxPortions,
  toRestTaxLine,
} from './payload-builder.js';
import { classify } from './strategy.js';
import { distributeTax, usedTaxLines } from './tax-distribution.js';

interface DraftOrderRef {
  id: string;
  name: string;
}

interface DraftOrderCreateData {
  draftOrderCreate: MutationPayload & { draftOrder: DraftOrderRef | null };
}

interface DraftOrderCompleteData {
  draftOrderComplete: MutationPayload & { draftOrder: DraftOrderRef | null };
}

interface DraftOrderOrderData {
  node: (DraftOrderRef & { order?: { id: string; name: string } | null }) | null;
}

interface OrderCreateData {
  orderCreate: MutationPayload & { order: GqlOrder | null };
}

interface OrderSummaryData {
  order: GqlOrder | null;
}

interface OrderEditBeginData {
  orderEditBegin: MutationPayload & {
    calculatedOrder: { id: string; lineItems: Connection<{ id: string; quantity: number }> } | null;
  };
}

interface OrderEditAddDiscountData {
  orderEditAddLineItemDiscount: MutationPayload;
}

interface OrderEditCommitData {
  orderEditCommit: MutationPayload & { order: GqlOrder | null };
}

interface RestOrderEnvelope {
  order?: RestOrderRecord;
}

export interface ExecuteOptions {
  /** Overrides the classified strategy */
  strategy?: OrderStrategy;
  /** Draft flow: complete without marking the order paid */
  paymentPending?: boolean;
}

export interface PlannedRequest {
  operation: string;
  body: unknown;
}

export interface OrderPlan {
  strategy: OrderStrategy;
  requests: PlannedRequest[];
}

export interface OrchestratorOptions {
  sleep?: Sleep;
}

/**
 * The primary request bodies a strategy would send. Needs no credentials, so
 * a dry run works before the environment is set up.
 */
export function planOrder(draft: OrderDraft, orders: OrderDefaultsConfig, override?: OrderStrategy): OrderPlan {
  const strategy = override ?? classify(draft, orders);
  const financialStatus = orders.financialStatus;

  switch (strategy) {
    case 'draft-order':
      return { strategy, requests: [{ operation: 'draftOrderCreate', body: buildDraftOrderInput(draft) }] };
    case 'direct-with-tax':
      return {
        strategy,
        requests: [{ operation: 'POST orders', body: buildRestOrderBody(draft, financialStatus) }],
      };
    case 'direct-no-frills':
    case 'direct-with-tax-and-discount':
      return {
        strategy,
        requests: [
          {
            operation: 'orderCreate',
            body: buildOrderCreateInput(draft, {
              defaultFinancialStatus: financialStatus,
              withTax: strategy === 'direct-with-tax-and-discount',
              foldDiscounts: true,
            }),
          },
        ],
      };
    case 'edit-with-strikethrough':
      return {
        strategy,
        requests: [
          {
            operation: 'orderCreate',
            body: buildOrderCreateInput(draft, {
              defaultFinancialStatus: financialStatus,
              withTax: true,
              foldDiscounts: false,
            }),
          },
          { operation: 'orderEditAddLineItemDiscount', body: buildEditDiscounts(draft) },
        ],
      };
  }
}

export class OrderOrchestrator {
  private gateway: AdminGateway;
  private config: RuntimeConfig;
  private fulfillments: FulfillmentService;
  private metafields: MetafieldService;
  private transactions: TransactionService;

  constructor(gateway: AdminGateway, config: RuntimeConfig, options: OrchestratorOptions = {}) {
    this.gateway = gateway;
    this.config = config;
    this.fulfillments = new FulfillmentService(gateway, options.sleep ?? defaultSleep);
    this.metafields = new MetafieldService(gateway, config.shippingNote);
    this.transactions = new TransactionService(gateway);
  }

  resolveStrategy(draft: OrderDraft, override?: OrderStrategy): OrderStrategy {
    return override ?? classify(draft, this.config.orders);
  }

  async execute(draft: OrderDraft, options: ExecuteOptions = {}): Promise<RemoteOrderConfirmation> {
    const strategy = this.resolveStrategy(draft, options.strategy);
    Logger.debug(`Creating order with strategy ${strategy}`);

    const confirmation = await this.run(draft, strategy, options);
    if (strategy !== 'draft-order') {
      await this.attachShippingNote(confirmation, draft);
    }
    return Object.freeze(confirmation);
  }

  private run(draft: OrderDraft, strategy: OrderStrategy, options: ExecuteOptions): Promise<RemoteOrderConfirmation> {
    switch (strategy) {
      case 'draft-order':
        return this.runDraftOrder(draft, options.paymentPending ?? false);
      case 'direct-with-tax':
        return this.runDirectWithTax(draft);
      case 'direct-no-frills':
        return this.runOrderCreate(draft, strategy, false);
      case 'direct-with-tax-and-discount':
        return this.runOrderCreate(draft, strategy, true);
      case 'edit-with-strikethrough':
        return this.runEditWithStrikethrough(draft);
    }
  }

  private async runDraftOrder(draft: OrderDraft, paymentPending: boolean): Promise<RemoteOrderConfirmation> {
    const raw: unknown[] = [];
    const warnings: string[] = [];
    if (this.hasCustomTax(draft)) {
      this.warn(warnings, 'Custom tax lines are not accepted by the draft-order flow and were not sent');
    }

    const created = await this.gateway.graphql<DraftOrderCreateData>('draftOrderCreate', DRAFT_ORDER_CREATE, {
      input: buildDraftOrderInput(draft),
    });
    raw.push(created);
    assertNoUserErrors('draftOrderCreate', created.draftOrderCreate.userErrors);
    const draftOrder = requireValue(created.draftOrderCreate.draftOrder, 'draftOrderCreate.draftOrder');
    Logger.debug(`Draft order ${draftOrder.name} created`);

    const completed = await this.gateway.graphql<DraftOrderCompleteData>(
      'draftOrderComplete',
      DRAFT_ORDER_COMPLETE,
      { id: draftOrder.id, paymentPending },
    );
    raw.push(completed);
    assertNoUserErrors('draftOrderComplete', completed.draftOrderComplete.userErrors);

    const linked = await this.gateway.graphql<DraftOrderOrderData>('DraftOrderOrder', DRAFT_ORDER_ORDER, {
      id: draftOrder.id,
    });
    raw.push(linked);
    const order = linked.node?.order;
    if (!order) {
      throw new ResponseShapeError(`Draft order ${draftOrder.name} has no linked order after completion`);
    }

    const confirmation = this.emptyConfirmation('draft-order', order.id, draft.currency, raw, warnings);
    confirmation.orderName = order.name;
    confirmation.draftOrderId = draftOrder.id;

    await this.attachShippingNote(confirmation, draft);
    await this.refreshSummary(confirmation);
    await this.lookupFulfillmentOrders(confirmation);

    if (paymentPending) {
      await this.recordPayments(confirmation, draft);
    }
    return confirmation;
  }

  private async runDirectWithTax(draft: OrderDraft): Promise<RemoteOrderConfirmation> {
    const body = buildRestOrderBody(draft, this.config.orders.financialStatus);
    const response = await this.gateway.rest<RestOrderEnvelope>('POST', 'orders', body);
    const order = requireValue(response.body.order, 'order');
    return this.fromRestOrder('direct-with-tax', order, draft.currency, [response.body]);
  }

  private async runOrderCreate(
    draft: OrderDraft,
    strategy: OrderStrategy,
    withTax: boolean,
  ): Promise<RemoteOrderConfirmation> {
    const warnings: string[] = [];
    if (!withTax && this.hasCustomTax(draft)) {
      this.warn(warnings, `Custom tax lines are not sent by the ${strategy} strategy`);
    }

    const created = await this.gateway.graphql<OrderCreateData>('orderCreate', ORDER_CREATE, {
      order: buildOrderCreateInput(draft, {
        defaultFinancialStatus: this.config.orders.financialStatus,
        withTax,
        foldDiscounts: true,
      }),
    });
    assertNoUserErrors('orderCreate', created.orderCreate.userErrors);
    const order = requireValue(created.orderCreate.order, 'orderCreate.order');

    const confirmation = this.fromGqlOrder(strategy, order, draft.currency, [created]);
    confirmation.warnings.push(...warnings);
    return confirmation;
  }

  /**
   * Create at undiscounted prices, discount each line in an edit session so
   * the original price shows struck through, then put back the custom tax
   * lines the commit discards.
   */
  private async runEditWithStrikethrough(draft: OrderDraft): Promise<RemoteOrderConfirmation> {
    const created = await this.gateway.graphql<OrderCreateData>('orderCreate', ORDER_CREATE, {
      order: buildOrderCreateInput(draft, {
        defaultFinancialStatus: this.config.orders.financialStatus,
        withTax: true,
        foldDiscounts: false,
      }),
    });
    assertNoUserErrors('orderCreate', created.orderCreate.userErrors);
    const order = requireValue(created.orderCreate.order, 'orderCreate.order');
    const confirmation = this.fromGqlOrder('edit-with-strikethrough', order, draft.currency, [created]);

    const discounts = buildEditDiscounts(draft);
    if (discounts.length === 0) {
      return confirmation;
    }

    const begun = await this.gateway.graphql<OrderEditBeginData>('orderEditBegin', ORDER_EDIT_BEGIN, {
      id: order.id,
    });
    confirmation.raw.push(begun);
    assertNoUserErrors('orderEditBegin', begun.orderEditBegin.userErrors);
    const calculated = requireValue(begun.orderEditBegin.calculatedOrder, 'orderEditBegin.calculatedOrder');

    for (const discount of discounts) {
      const line = calculated.lineItems.nodes[discount.lineIndex];
      if (!line) {
        throw new ResponseShapeError(`Edit session has no line item at position ${discount.lineIndex + 1}`);
      }
      const added = await this.gateway.graphql<OrderEditAddDiscountData>(
        'orderEditAddLineItemDiscount',
        ORDER_EDIT_ADD_LINE_ITEM_DISCOUNT,
        {
          id: calculated.id,
          lineItemId: line.id,
          discount: {
            description: discount.description,
            percentValue: discount.percentValue,
            fixedValue: discount.fixedValue,
          },
        },
      );
      confirmation.raw.push(added);
      assertNoUserErrors('orderEditAddLineItemDiscount', added.orderEditAddLineItemDiscount.userErrors);
    }

    const committed = await this.gateway.graphql<OrderEditCommitData>('orderEditCommit', ORDER_EDIT_COMMIT, {
      id: calculated.id,
      notifyCustomer: false,
      staffNote: 'Line item discounts applied',
    });
    confirmation.raw.push(committed);
    assertNoUserErrors('orderEditCommit', committed.orderEditCommit.userErrors);
    const edited = requireValue(committed.orderEditCommit.order, 'orderEditCommit.order');
    this.applyGqlOrder(confirmation, edited);

    await this.restoreTaxLines(confirmation, draft, order);
    return confirmation;
  }

  /**
   * Order-level tax lines first; when the response records none, per-line
   * tax lines (distributed portions, or the items' own lines).
   */
  private async restoreTaxLines(
    confirmation: RemoteOrderConfirmation,
    draft: OrderDraft,
    createdOrder: GqlOrder,
  ): Promise<void> {
    const orderTaxLines = usedTaxLines(draft.taxLines).map(toRestTaxLine);
    const lineTaxLines =
      orderTaxLines.length > 0
        ? groupTaxPortions(distributeTax(draft))
        : new Map(
            draft.items.map((item, index): [number, RestTaxLine[]] => [
              index,
              usedTaxLines(item.taxLines).map(toRestTaxLine),
            ]),
          );
    if (orderTaxLines.length === 0 && [...lineTaxLines.values()].every((lines) => lines.length === 0)) {
      return;
    }

    const orderNumber = Number(fromGid(confirmation.orderId));
    const path = `orders/${orderNumber}`;

    try {
      if (orderTaxLines.length > 0) {
        const { body } = await this.gateway.rest<RestOrderEnvelope>('PUT', path, {
          order: { id: orderNumber, tax_lines: orderTaxLines },
        });
        confirmation.raw.push(body);
        const recorded = decodeRestTaxLines(body.order?.tax_lines);
        if (recorded.length > 0) {
          confirmation.taxLines = recorded;
          confirmation.totalTax = body.order?.total_tax ?? confirmation.totalTax;
          confirmation.totalPrice = body.order?.total_price ?? confirmation.totalPrice;
          return;
        }
        Logger.debug('Order-level tax lines were not recorded, retrying per line item');
      }

      const remoteLines = createdOrder.lineItems?.nodes ?? [];
      const lineItems = [...lineTaxLines.entries()].flatMap(([index, taxLines]) => {
        const remote = remoteLines[index];
        return remote && taxLines.length > 0 ? [{ id: Number(fromGid(remote.id)), tax_lines: taxLines }] : [];
      });
      if (lineItems.length === 0) {
        this.warn(confirmation.warnings, 'Custom tax lines could not be restored: no matching line items');
        return;
      }

      const { body } = await this.gateway.rest<RestOrderEnvelope>('PUT', path, {
        order: { id: orderNumber, line_items: lineItems },
      });
      confirmation.raw.push(body);
      const restored = (body.order?.line_items ?? []).some((line) => (line.tax_lines ?? []).length > 0);
      if (!restored) {
        this.warn(confirmation.warnings, 'Custom tax lines were not restored after the edit commit');
        return;
      }
      confirmation.taxLines = decodeRestTaxLines(body.order?.tax_lines);
      confirmation.totalTax = body.order?.total_tax ?? confirmation.totalTax;
      confirmation.totalPrice = body.order?.total_price ?? confirmation.totalPrice;
    } catch (error) {
      this.warn(confirmation.warnings, `Restoring tax lines failed: ${errorMessage(error)}`);
    }
  }

  private async attachShippingNote(confirmation: RemoteOrderConfirmation, draft: OrderDraft): Promise<void> {
    if (!draft.shippingNote) {
      return;
    }
    try {
      const metafield = await this.metafields.setShippingNote(confirmation.orderId, draft.shippingNote);
      confirmation.raw.push(metafield);
      Logger.debug(`Shipping note stored as ${metafield.namespace}.${metafield.key}`);
    } catch (error) {
      this.warn(confirmation.warnings, `Shipping note was not saved: ${errorMessage(error)}`);
    }
  }

  private async refreshSummary(confirmation: RemoteOrderConfirmation): Promise<void> {
    try {
      const data = await this.gateway.graphql<OrderSummaryData>('OrderSummary', ORDER_SUMMARY, {
        id: confirmation.orderId,
      });
      confirmation.raw.push(data);
      this.applyGqlOrder(confirmation, requireValue(data.order, 'order'));
    } catch (error) {
      this.warn(confirmation.warnings, `Order summary could not be read: ${errorMessage(error)}`);
    }
  }

  private async lookupFulfillmentOrders(confirmation: RemoteOrderConfirmation): Promise<void> {
    try {
      const outcome = await this.fulfillments.lookup(confirmation.orderId, this.config.fulfillmentRetry);
      confirmation.fulfillmentOrders = outcome.value;
      confirmation.fulfillmentRoutingComplete = outcome.satisfied;
      if (!outcome.satisfied) {
        this.warn(
          confirmation.warnings,
          `No fulfillment orders after ${outcome.attempts} attempts; routing may still be in progress`,
        );
      }
    } catch (error) {
      confirmation.fulfillmentRoutingComplete = false;
      this.warn(confirmation.warnings, `Fulfillment orders could not be read: ${errorMessage(error)}`);
    }
  }

  private async recordPayments(confirmation: RemoteOrderConfirmation, draft: OrderDraft): Promise<void> {
    for (const payment of draft.payments) {
      try {
        confirmation.transactions.push(await this.transactions.recordPayment(confirmation.orderId, payment));
      } catch (error) {
        this.warn(confirmation.warnings, `Payment via ${payment.gateway} was not recorded: ${errorMessage(error)}`);
      }
    }
  }

  private hasCustomTax(draft: OrderDraft): boolean {
    return (
      usedTaxLines(draft.taxLines).length > 0 || draft.items.some((item) => usedTaxLines(item.taxLines).length > 0)
    );
  }

  private warn(warnings: string[], message: string): void {
    warnings.push(message);
    Logger.warn(message);
  }

  private emptyConfirmation(
    strategy: OrderStrategy,
    orderId: string,
    currency: string,
    raw: unknown[],
    warnings: string[] = [],
  ): RemoteOrderConfirmation {
    return {
      strategy,
      orderId,
      currency,
      taxLines: [],
      discounts: [],
      fulfillmentOrders: [],
      transactions: [],
      warnings,
      raw,
    };
  }

  private fromGqlOrder(
    strategy: OrderStrategy,
    order: GqlOrder,
    currency: string,
    raw: unknown[],
  ): RemoteOrderConfirmation {
    const confirmation = this.emptyConfirmation(strategy, order.id, currency, raw);
    this.applyGqlOrder(confirmation, order);
    return confirmation;
  }

  private applyGqlOrder(confirmation: RemoteOrderConfirmation, order: GqlOrder): void {
    confirmation.orderName = order.name;
    confirmation.totalPrice = order.totalPriceSet?.shopMoney.amount ?? confirmation.totalPrice;
    confirmation.totalTax = order.totalTaxSet?.shopMoney.amount ?? confirmation.totalTax;
    confirmation.currency = order.totalPriceSet?.shopMoney.currencyCode ?? confirmation.currency;
    confirmation.taxLines = decodeTaxLines(order.taxLines);
    confirmation.discounts = decodeDiscountApplications(order.discountApplications);
  }

  private fromRestOrder(
    strategy: OrderStrategy,
    order: RestOrderRecord,
    currency: string,
    raw: unknown[],
  ): RemoteOrderConfirmation {
    const confirmation = this.emptyConfirmation(strategy, toGid('Order', order.id), order.currency ?? currency, raw);
    confirmation.orderName = order.name;
    confirmation.orderNumber = order.order_number;
    confirmation.totalPrice = order.total_price;
    confirmation.totalTax = order.total_tax;
    confirmation.taxLines = decodeRestTaxLines(order.tax_lines);
    confirmation.discounts = decodeRestDiscounts(order);
    return confirmation;
  }
}
