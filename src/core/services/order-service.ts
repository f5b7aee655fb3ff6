/**
 * Order Service
 *
 * Read-only order lookups used by the inspection commands.
 */

import type { AdminGateway } from '../admin/admin-gateway.js';
import type { Connection, GqlOrder } from '../admin/decoders.js';
import { toGid } from '../admin/gid.js';
import { ResponseShapeError } from '../errors.js';
import { ORDER_SUMMARY } from '../orders/order-documents.js';

const ORDER_DELIVERY_METHOD = `
  query OrderDeliveryMethod($query: String!) {
    orders(first: 1, query: $query) {
      nodes {
        id
        name
        legacyResourceId
        displayFulfillmentStatus
        shippingLine { title code source carrierIdentifier deliveryCategory }
        fulfillmentOrders(first: 10) {
          nodes {
            id
            status
            deliveryMethod { id methodType }
            assignedLocation { name location { id name } }
          }
        }
      }
    }
  }
`;

export interface DeliveryMethodRecord {
  orderId: string;
  orderName: string;
  legacyResourceId: string;
  fulfillmentStatus?: string;
  shippingLine?: {
    title: string;
    code?: string;
    source?: string;
    carrierIdentifier?: string;
    deliveryCategory?: string;
  };
  fulfillmentOrders: Array<{
    id: string;
    status: string;
    methodType?: string;
    locationName?: string;
  }>;
}

interface OrderData {
  order: GqlOrder | null;
}

interface GqlShippingLine {
  title: string;
  code?: string | null;
  source?: string | null;
  carrierIdentifier?: string | null;
  deliveryCategory?: string | null;
}

interface DeliveryMethodData {
  orders: Connection<{
    id: string;
    name: string;
    legacyResourceId: string;
    displayFulfillmentStatus?: string | null;
    shippingLine?: GqlShippingLine | null;
    fulfillmentOrders: Connection<{
      id: string;
      status: string;
      deliveryMethod?: { id: string; methodType?: string | null } | null;
      assignedLocation?: { name?: string | null; location?: { id: string; name: string } | null } | null;
    }>;
  }>;
}

/**
 * "1001", "#1001" and "name:#1001" all search for the order named #1001.
 */
export function orderNameQuery(orderNumber: string): string {
  const trimmed = orderNumber.trim().replace(/^name:/, '');
  return `name:${trimmed.startsWith('#') ? trimmed : `#${trimmed}`}`;
}

export class OrderService {
  private gateway: AdminGateway;

  constructor(gateway: AdminGateway) {
    this.gateway = gateway;
  }

  async fetchOrder(orderId: string): Promise<GqlOrder> {
    const id = toGid('Order', orderId);
    const data = await this.gateway.graphql<OrderData>('OrderSummary', ORDER_SUMMARY, { id });
    if (!data.order) {
      throw new ResponseShapeError(`Order ${id} not found`);
    }
    return data.order;
  }

  async findDeliveryMethod(orderNumber: string): Promise<DeliveryMethodRecord> {
    const query = orderNameQuery(orderNumber);
    const data = await this.gateway.graphql<DeliveryMethodData>('OrderDeliveryMethod', ORDER_DELIVERY_METHOD, {
      query,
    });
    const [order] = data.orders.nodes;
    if (!order) {
      throw new ResponseShapeError(`No order matches ${query}`);
    }

    const shippingLine = order.shippingLine;
    return {
      orderId: order.id,
      orderName: order.name,
      legacyResourceId: order.legacyResourceId,
      fulfillmentStatus: order.displayFulfillmentStatus ?? undefined,
      shippingLine: shippingLine
        ? {
            title: shippingLine.title,
            code: shippingLine.code ?? undefined,
            source: shippingLine.source ?? undefined,
            carrierIdentifier: shippingLine.carrierIdentifier ?? undefined,
            deliveryCategory: shippingLine.deliveryCategory ?? undefined,
          }
        : undefined,
      fulfillmentOrders: order.fulfillmentOrders.nodes.map((node) => ({
        id: node.id,
        status: node.status,
        methodType: node.deliveryMethod?.methodType ?? undefined,
        locationName: node.assignedLocation?.location?.name ?? node.assignedLocation?.name ?? undefined,
      })),
    };
  }
}
