import { describe, expect, it } from 'vitest';
import { defaultConfig } from '../../types/config.types.js';
import { FakeAdminGateway } from '../../testing/index.js';
import { MetafieldService } from './metafield-service.js';

const note = {
  id: 'gid://shopify/Metafield/31',
  namespace: 'orderkit',
  key: 'shipping_note',
  value: 'Leave at the back door',
  type: 'multi_line_text_field',
};

describe('MetafieldService', () => {
  it('reads the note with the configured namespace and key', async () => {
    const gateway = new FakeAdminGateway().onGraphQL('OrderMetafield', {
      order: { id: 'gid://shopify/Order/500', name: '#1001', metafield: note },
    });
    const service = new MetafieldService(gateway, { namespace: 'shipping', key: 'note', type: 'single_line_text_field' });

    await expect(service.getShippingNote('500')).resolves.toEqual(note);
    expect(gateway.graphqlCalls('OrderMetafield')).toEqual([
      { id: 'gid://shopify/Order/500', namespace: 'shipping', key: 'note' },
    ]);
  });

  it('rejects a set with user errors', async () => {
    const gateway = new FakeAdminGateway().onGraphQL('metafieldsSet', {
      metafieldsSet: { metafields: null, userErrors: [{ field: ['metafields', '0', 'value'], message: 'is too long' }] },
    });

    await expect(new MetafieldService(gateway, defaultConfig.shippingNote).setShippingNote('500', 'x')).rejects.toThrow(
      'metafieldsSet failed: metafields.0.value: is too long',
    );
  });

  it('deletes an existing note through REST', async () => {
    const gateway = new FakeAdminGateway()
      .onGraphQL('OrderMetafield', { order: { id: 'gid://shopify/Order/500', name: '#1001', metafield: note } })
      .onRest('DELETE', 'metafields/31', {});

    await expect(new MetafieldService(gateway, defaultConfig.shippingNote).deleteShippingNote('500')).resolves.toBe(true);
    expect(gateway.operations()).toEqual(['OrderMetafield', 'DELETE metafields/31']);
  });

  it('reports false when there is no note to delete', async () => {
    const gateway = new FakeAdminGateway().onGraphQL('OrderMetafield', {
      order: { id: 'gid://shopify/Order/500', name: '#1001', metafield: null },
    });

    await expect(new MetafieldService(gateway, defaultConfig.shippingNote).deleteShippingNote('500')).resolves.toBe(false);
    expect(gateway.operations()).toEqual(['OrderMetafield']);
  });
});
