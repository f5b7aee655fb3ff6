/**
 * Transaction Service
 *
 * Transactions go through REST: the GraphQL surface has no equivalent for
 * recording an external payment against an order.
 */

import type { PaymentSpec, TransactionRecord } from '../../types/order.types.js';
import type { AdminGateway } from '../admin/admin-gateway.js';
import { type RestTransactionRecord, decodeRestTransaction, requireValue } from '../admin/decoders.js';
import { fromGid } from '../admin/gid.js';
import { formatAmount } from '../money.js';

interface TransactionListBody {
  transactions?: RestTransactionRecord[];
}

interface TransactionBody {
  transaction?: RestTransactionRecord;
}

export class TransactionService {
  private gateway: AdminGateway;

  constructor(gateway: AdminGateway) {
    this.gateway = gateway;
  }

  async list(orderId: string): Promise<TransactionRecord[]> {
    const { body } = await this.gateway.rest<TransactionListBody>('GET', `orders/${fromGid(orderId)}/transactions`);
    return (body.transactions ?? []).map(decodeRestTransaction);
  }

  /**
   * Records a payment taken outside the platform as a successful sale.
   */
  async recordPayment(orderId: string, payment: PaymentSpec): Promise<TransactionRecord> {
    const { body } = await this.gateway.rest<TransactionBody>('POST', `orders/${fromGid(orderId)}/transactions`, {
      transaction: {
        kind: 'sale',
        status: 'success',
        amount: formatAmount(payment.amount),
        currency: payment.currency,
        gateway: payment.gateway,
        source: 'external',
        authorization: payment.code,
      },
    });
    return decodeRestTransaction(requireValue(body.transaction, 'transaction'));
  }
}
