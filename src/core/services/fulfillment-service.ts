/**
 * Fulfillment Service
 *
 * Fulfillment orders are created asynchronously after an order is finalized,
 * so the lookup polls with backoff until at least one record shows up.
 */

import type { FulfillmentOrderRecord } from '../../types/order.types.js';
import type { AdminGateway } from '../admin/admin-gateway.js';
import { type Connection, type GqlFulfillmentOrder, decodeFulfillmentOrders } from '../admin/decoders.js';
import { toGid } from '../admin/gid.js';
import { ResponseShapeError } from '../errors.js';
import { type RetryOutcome, type RetryPolicy, type Sleep, defaultSleep, retryUntil } from '../retry.js';
import { FULFILLMENT_ORDERS } from '../orders/order-documents.js';

interface FulfillmentOrdersData {
  order: {
    id: string;
    name: string;
    fulfillmentOrders?: Connection<GqlFulfillmentOrder> | null;
  } | null;
}

export class FulfillmentService {
  private gateway: AdminGateway;
  private sleep: Sleep;

  constructor(gateway: AdminGateway, sleep: Sleep = defaultSleep) {
    this.gateway = gateway;
    this.sleep = sleep;
  }

  async fetchOnce(orderId: string): Promise<FulfillmentOrderRecord[]> {
    const id = toGid('Order', orderId);
    const data = await this.gateway.graphql<FulfillmentOrdersData>('FulfillmentOrders', FULFILLMENT_ORDERS, { id });
    if (!data.order) {
      throw new ResponseShapeError(`Order ${id} not found`);
    }
    // A missing connection usually means the token lacks fulfillment-order scopes
    return data.order.fulfillmentOrders ? decodeFulfillmentOrders(data.order.fulfillmentOrders) : [];
  }

  /**
   * Retries while the list is empty or the query fails. An exhausted policy
   * resolves with the last (empty) list and `satisfied: false`.
   */
  lookup(orderId: string, policy: RetryPolicy): Promise<RetryOutcome<FulfillmentOrderRecord[]>> {
    return retryUntil(
      () => this.fetchOnce(orderId),
      (records) => records.length > 0,
      policy,
      this.sleep,
    );
  }
}
