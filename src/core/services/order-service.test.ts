import { describe, expect, it } from 'vitest';
import { FakeAdminGateway } from '../../testing/index.js';
import { OrderService, orderNameQuery } from './order-service.js';

describe('orderNameQuery', () => {
  it.each([
    ['1001', 'name:#1001'],
    ['#1001', 'name:#1001'],
    ['name:#1001', 'name:#1001'],
    [' 1001 ', 'name:#1001'],
  ])('%s -> %s', (input, expected) => {
    expect(orderNameQuery(input)).toBe(expected);
  });
});

describe('OrderService', () => {
  it('fetches an order by numeric id', async () => {
    const order = { id: 'gid://shopify/Order/500', name: '#1001' };
    const gateway = new FakeAdminGateway().onGraphQL('OrderSummary', { order });

    await expect(new OrderService(gateway).fetchOrder('500')).resolves.toEqual(order);
    expect(gateway.graphqlCalls('OrderSummary')).toEqual([{ id: 'gid://shopify/Order/500' }]);
  });

  it('fails for an unknown order', async () => {
    const gateway = new FakeAdminGateway().onGraphQL('OrderSummary', { order: null });

    await expect(new OrderService(gateway).fetchOrder('404')).rejects.toThrow('Order gid://shopify/Order/404 not found');
  });

  it('finds the delivery method by order name', async () => {
    const gateway = new FakeAdminGateway().onGraphQL('OrderDeliveryMethod', {
      orders: {
        nodes: [
          {
            id: 'gid://shopify/Order/500',
            name: '#1001',
            legacyResourceId: '500',
            displayFulfillmentStatus: 'UNFULFILLED',
            shippingLine: { title: 'Express', code: 'EXP', source: null, carrierIdentifier: null, deliveryCategory: null },
            fulfillmentOrders: {
              nodes: [
                {
                  id: 'gid://shopify/FulfillmentOrder/1',
                  status: 'OPEN',
                  deliveryMethod: { id: 'gid://shopify/DeliveryMethod/1', methodType: 'SHIPPING' },
                  assignedLocation: { name: 'Main (old)', location: { id: 'gid://shopify/Location/1', name: 'Main' } },
                },
              ],
            },
          },
        ],
      },
    });

    const record = await new OrderService(gateway).findDeliveryMethod('1001');

    expect(gateway.graphqlCalls('OrderDeliveryMethod')).toEqual([{ query: 'name:#1001' }]);
    expect(record).toEqual({
      orderId: 'gid://shopify/Order/500',
      orderName: '#1001',
      legacyResourceId: '500',
      fulfillmentStatus: 'UNFULFILLED',
      shippingLine: { title: 'Express', code: 'EXP' },
      fulfillmentOrders: [
        { id: 'gid://shopify/FulfillmentOrder/1', status: 'OPEN', methodType: 'SHIPPING', locationName: 'Main' },
      ],
    });
  });

  it('fails when no order has the name', async () => {
    const gateway = new FakeAdminGateway().onGraphQL('OrderDeliveryMethod', { orders: { nodes: [] } });

    await expect(new OrderService(gateway).findDeliveryMethod('#9999')).rejects.toThrow('No order matches name:#9999');
  });
});
