/**
 * Metafield Service
 *
 * Reads, sets and deletes the shipping-note metafield on an order.
 */

import type { ShippingNoteConfig } from '../../types/config.types.js';
import type { AdminGateway } from '../admin/admin-gateway.js';
import type { MutationPayload } from '../admin/decoders.js';
import { fromGid, toGid } from '../admin/gid.js';
import { ResponseShapeError, assertNoUserErrors } from '../errors.js';

const METAFIELDS_SET = `
  mutation SetMetafields($metafields: [MetafieldsSetInput!]!) {
    metafieldsSet(metafields: $metafields) {
      metafields { id namespace key value type }
      userErrors { field message }
    }
  }
`;

const ORDER_METAFIELD = `
  query OrderMetafield($id: ID!, $namespace: String!, $key: String!) {
    order(id: $id) {
      id
      name
      metafield(namespace: $namespace, key: $key) { id namespace key value type }
    }
  }
`;

export interface MetafieldRecord {
  id: string;
  namespace: string;
  key: string;
  value: string;
  type: string;
}

interface MetafieldsSetData {
  metafieldsSet: MutationPayload & { metafields: MetafieldRecord[] | null };
}

interface OrderMetafieldData {
  order: { id: string; name: string; metafield: MetafieldRecord | null } | null;
}

export class MetafieldService {
  private gateway: AdminGateway;
  private settings: ShippingNoteConfig;

  constructor(gateway: AdminGateway, settings: ShippingNoteConfig) {
    this.gateway = gateway;
    this.settings = settings;
  }

  async getShippingNote(orderId: string): Promise<MetafieldRecord | undefined> {
    const data = await this.gateway.graphql<OrderMetafieldData>('OrderMetafield', ORDER_METAFIELD, {
      id: toGid('Order', orderId),
      namespace: this.settings.namespace,
      key: this.settings.key,
    });
    if (!data.order) {
      throw new ResponseShapeError(`Order ${orderId} not found`);
    }
    return data.order.metafield ?? undefined;
  }

  async setShippingNote(orderId: string, note: string): Promise<MetafieldRecord> {
    const data = await this.gateway.graphql<MetafieldsSetData>('metafieldsSet', METAFIELDS_SET, {
      metafields: [
        {
          ownerId: toGid('Order', orderId),
          namespace: this.settings.namespace,
          key: this.settings.key,
          type: this.settings.type,
          value: note,
        },
      ],
    });
    assertNoUserErrors('metafieldsSet', data.metafieldsSet.userErrors);
    const [metafield] = data.metafieldsSet.metafields ?? [];
    if (!metafield) {
      throw new ResponseShapeError('metafieldsSet returned no metafield');
    }
    return metafield;
  }

  /**
   * Removes the note; resolves false when there was none.
   */
  async deleteShippingNote(orderId: string): Promise<boolean> {
    const existing = await this.getShippingNote(orderId);
    if (!existing) {
      return false;
    }
    await this.gateway.rest('DELETE', `metafields/${fromGid(existing.id)}`);
    return true;
  }
}
