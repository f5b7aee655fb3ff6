import { describe, expect, it } from 'vitest';
import { FakeAdminGateway } from '../../testing/index.js';
import { TransactionService } from './transaction-service.js';

describe('TransactionService', () => {
  it('lists transactions by legacy order id', async () => {
    const gateway = new FakeAdminGateway().onRest('GET', 'orders/500/transactions', {
      transactions: [
        { id: 9, kind: 'sale', status: 'success', amount: '20.00', currency: 'USD', gateway: 'manual', created_at: '2024-05-01T10:00:00Z' },
      ],
    });

    const transactions = await new TransactionService(gateway).list('gid://shopify/Order/500');

    expect(transactions).toEqual([
      {
        id: '9',
        kind: 'sale',
        status: 'success',
        amount: '20.00',
        currency: 'USD',
        gateway: 'manual',
        createdAt: '2024-05-01T10:00:00Z',
      },
    ]);
  });

  it('treats a missing list as empty', async () => {
    const gateway = new FakeAdminGateway().onRest('GET', 'orders/500/transactions', {});

    await expect(new TransactionService(gateway).list('500')).resolves.toEqual([]);
  });

  it('fails when the created transaction is missing from the response', async () => {
    const gateway = new FakeAdminGateway().onRest('POST', 'orders/500/transactions', {});

    await expect(
      new TransactionService(gateway).recordPayment('500', { amount: 5, currency: 'USD', gateway: 'Cash' }),
    ).rejects.toThrow('Response is missing transaction');
  });
});
