/**
 * Shop Service
 *
 * Shop identity, locations and the scopes granted to the access token.
 */

import type { AdminGateway } from '../admin/admin-gateway.js';
import type { Connection } from '../admin/decoders.js';
import { requireValue } from '../admin/decoders.js';

const SHOP_INFO = `
  query ShopInfo {
    shop { id name email myshopifyDomain currencyCode }
  }
`;

const LOCATIONS = `
  query Locations($first: Int!) {
    locations(first: $first) {
      nodes {
        id
        name
        isActive
        isPrimary
        fulfillsOnlineOrders
        fulfillmentService { handle serviceName }
        address { city country }
      }
    }
  }
`;

const ACCESS_SCOPES = `
  query AccessScopes {
    currentAppInstallation {
      accessScopes { handle }
    }
  }
`;

/**
 * Scopes the fulfillment-order lookup depends on.
 */
export const FULFILLMENT_SCOPES: readonly string[] = [
  'read_merchant_managed_fulfillment_orders',
  'write_merchant_managed_fulfillment_orders',
  'read_assigned_fulfillment_orders',
  'write_assigned_fulfillment_orders',
];

export interface ShopRecord {
  id: string;
  name: string;
  email?: string;
  domain: string;
  currency?: string;
}

export interface LocationRecord {
  id: string;
  name: string;
  isActive: boolean;
  isPrimary: boolean;
  fulfillsOnlineOrders?: boolean;
  fulfillmentService?: string;
  city?: string;
  country?: string;
}

export interface AccessScopeReport {
  scopes: string[];
  fulfillmentScopes: Array<{ handle: string; granted: boolean }>;
}

interface ShopInfoData {
  shop: {
    id: string;
    name: string;
    email?: string | null;
    myshopifyDomain: string;
    currencyCode?: string | null;
  } | null;
}

interface LocationsData {
  locations: Connection<{
    id: string;
    name: string;
    isActive: boolean;
    isPrimary: boolean;
    fulfillsOnlineOrders?: boolean | null;
    fulfillmentService?: { handle: string; serviceName: string } | null;
    address?: { city?: string | null; country?: string | null } | null;
  }>;
}

interface AccessScopesData {
  currentAppInstallation: { accessScopes: Array<{ handle: string }> } | null;
}

export class ShopService {
  private gateway: AdminGateway;

  constructor(gateway: AdminGateway) {
    this.gateway = gateway;
  }

  async shopInfo(): Promise<ShopRecord> {
    const data = await this.gateway.graphql<ShopInfoData>('ShopInfo', SHOP_INFO);
    const shop = requireValue(data.shop, 'shop');
    return {
      id: shop.id,
      name: shop.name,
      email: shop.email ?? undefined,
      domain: shop.myshopifyDomain,
      currency: shop.currencyCode ?? undefined,
    };
  }

  async locations(first = 20): Promise<LocationRecord[]> {
    const data = await this.gateway.graphql<LocationsData>('Locations', LOCATIONS, { first });
    return data.locations.nodes.map((location) => ({
      id: location.id,
      name: location.name,
      isActive: location.isActive,
      isPrimary: location.isPrimary,
      fulfillsOnlineOrders: location.fulfillsOnlineOrders ?? undefined,
      fulfillmentService: location.fulfillmentService?.serviceName,
      city: location.address?.city ?? undefined,
      country: location.address?.country ?? undefined,
    }));
  }

  async accessScopes(): Promise<AccessScopeReport> {
    const data = await this.gateway.graphql<AccessScopesData>('AccessScopes', ACCESS_SCOPES);
    const installation = requireValue(data.currentAppInstallation, 'currentAppInstallation');
    const scopes = installation.accessScopes.map((scope) => scope.handle).sort();
    return {
      scopes,
      fulfillmentScopes: FULFILLMENT_SCOPES.map((handle) => ({ handle, granted: scopes.includes(handle) })),
    };
  }
}
