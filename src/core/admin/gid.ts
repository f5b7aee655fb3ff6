/**
 * Global ID helpers: "gid://shopify/Order/123" <-> "123"
 */

const GID_PATTERN = /^gid:\/\/shopify\/([A-Za-z]+)\/([^/?]+)/;

export type GidResource =
  | 'Order'
  | 'DraftOrder'
  | 'ProductVariant'
  | 'Product'
  | 'Customer'
  | 'MailingAddress'
  | 'Location'
  | 'Metafield'
  | 'FulfillmentOrder'
  | 'InventoryItem';

export function isGid(value: string): boolean {
  return GID_PATTERN.test(value);
}

/**
 * Accepts either form; numeric ids get the resource prefix.
 */
export function toGid(resource: GidResource, id: string | number): string {
  const value = String(id).trim();
  if (isGid(value)) {
    return value;
  }
  return `gid://shopify/${resource}/${value}`;
}

/**
 * Legacy numeric id used by the REST endpoints.
 */
export function fromGid(id: string | number): string {
  const value = String(id).trim();
  const match = GID_PATTERN.exec(value);
  return match ? match[2] : value;
}

export function gidResource(id: string): string | undefined {
  return GID_PATTERN.exec(id)?.[1];
}

/**
 * Customer addresses are MailingAddress GIDs qualified with the model name.
 */
export function toAddressGid(id: string | number): string {
  return `gid://shopify/MailingAddress/${fromGid(id).split('?')[0]}?model_name=CustomerAddress`;
}
