/**
 * Catalog Service
 *
 * Product listing, product creation and variant inventory levels.
 */

import type { ProductInputFile } from '../../types/input.types.js';
import type { AdminGateway } from '../admin/admin-gateway.js';
import type { Connection, MutationPayload } from '../admin/decoders.js';
import { requireValue } from '../admin/decoders.js';
import { toGid } from '../admin/gid.js';
import { assertNoUserErrors } from '../errors.js';

const LIST_PRODUCTS = `
  query ListProducts($first: Int!) {
    products(first: $first) {
      nodes {
        id
        title
        status
        vendor
        variants(first: 20) {
          nodes { id title sku price inventoryQuantity }
        }
      }
    }
  }
`;

const PRODUCT_CREATE = `
  mutation CreateProduct($product: ProductCreateInput!) {
    productCreate(product: $product) {
      product {
        id
        title
        handle
        status
        metafields(first: 20) { nodes { namespace key type value } }
      }
      userErrors { field message }
    }
  }
`;

const VARIANT_INVENTORY = `
  query VariantInventory($id: ID!) {
    productVariant(id: $id) {
      id
      title
      sku
      product { title }
      inventoryItem {
        id
        tracked
        inventoryLevels(first: 20) {
          nodes {
            location { id name }
            quantities(names: ["available"]) { name quantity }
          }
        }
      }
    }
  }
`;

export interface VariantRecord {
  id: string;
  title: string;
  sku?: string;
  price?: string;
  inventoryQuantity?: number;
}

export interface ProductRecord {
  id: string;
  title: string;
  status?: string;
  vendor?: string;
  handle?: string;
  variants: VariantRecord[];
  metafields: Array<{ namespace: string; key: string; type: string; value: string }>;
}

export interface InventoryLevelRecord {
  locationId: string;
  locationName: string;
  available: number;
}

export interface VariantInventoryRecord {
  variantId: string;
  title: string;
  productTitle?: string;
  sku?: string;
  inventoryItemId: string;
  tracked: boolean;
  levels: InventoryLevelRecord[];
}

interface GqlVariant {
  id: string;
  title: string;
  sku?: string | null;
  price?: string | null;
  inventoryQuantity?: number | null;
}

interface ListProductsData {
  products: Connection<{
    id: string;
    title: string;
    status?: string | null;
    vendor?: string | null;
    variants: Connection<GqlVariant>;
  }>;
}

interface ProductCreateData {
  productCreate: MutationPayload & {
    product: {
      id: string;
      title: string;
      handle?: string | null;
      status?: string | null;
      metafields?: Connection<{ namespace: string; key: string; type: string; value: string }>;
    } | null;
  };
}

interface VariantInventoryData {
  productVariant: {
    id: string;
    title: string;
    sku?: string | null;
    product?: { title: string } | null;
    inventoryItem: {
      id: string;
      tracked: boolean;
      inventoryLevels: Connection<{
        location: { id: string; name: string };
        quantities: Array<{ name: string; quantity: number }>;
      }>;
    } | null;
  } | null;
}

function decodeVariant(variant: GqlVariant): VariantRecord {
  return {
    id: variant.id,
    title: variant.title,
    sku: variant.sku ?? undefined,
    price: variant.price ?? undefined,
    inventoryQuantity: variant.inventoryQuantity ?? undefined,
  };
}

export class CatalogService {
  private gateway: AdminGateway;

  constructor(gateway: AdminGateway) {
    this.gateway = gateway;
  }

  async listProducts(first = 10): Promise<ProductRecord[]> {
    const data = await this.gateway.graphql<ListProductsData>('ListProducts', LIST_PRODUCTS, { first });
    return data.products.nodes.map((product) => ({
      id: product.id,
      title: product.title,
      status: product.status ?? undefined,
      vendor: product.vendor ?? undefined,
      variants: product.variants.nodes.map(decodeVariant),
      metafields: [],
    }));
  }

  async createProduct(input: ProductInputFile['product']): Promise<ProductRecord> {
    const data = await this.gateway.graphql<ProductCreateData>('productCreate', PRODUCT_CREATE, {
      product: {
        title: input.title,
        descriptionHtml: input.descriptionHtml,
        vendor: input.vendor,
        productType: input.productType,
        status: input.status,
        tags: input.tags,
        metafields: input.metafields,
      },
    });
    assertNoUserErrors('productCreate', data.productCreate.userErrors);
    const product = requireValue(data.productCreate.product, 'productCreate.product');
    return {
      id: product.id,
      title: product.title,
      handle: product.handle ?? undefined,
      status: product.status ?? undefined,
      variants: [],
      metafields: product.metafields?.nodes ?? [],
    };
  }

  async variantInventory(variantId: string): Promise<VariantInventoryRecord> {
    const id = toGid('ProductVariant', variantId);
    const data = await this.gateway.graphql<VariantInventoryData>('VariantInventory', VARIANT_INVENTORY, { id });
    const variant = requireValue(data.productVariant, `product variant ${id}`);
    const item = requireValue(variant.inventoryItem, 'productVariant.inventoryItem');
    return {
      variantId: variant.id,
      title: variant.title,
      productTitle: variant.product?.title,
      sku: variant.sku ?? undefined,
      inventoryItemId: item.id,
      tracked: item.tracked,
      levels: item.inventoryLevels.nodes.map((level) => ({
        locationId: level.location.id,
        locationName: level.location.name,
        available: level.quantities.find((quantity) => quantity.name === 'available')?.quantity ?? 0,
      })),
    };
  }
}
