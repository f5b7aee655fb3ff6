/**
 * Order inspection commands
 */

import { Command } from 'commander';
import { Logger } from '../../core/logger.js';
import { FulfillmentService } from '../../core/services/fulfillment-service.js';
import { OrderService } from '../../core/services/order-service.js';
import { TransactionService } from '../../core/services/transaction-service.js';
import { runCommand } from '../context.js';

export const orderCommand = new Command('order')
  .description('Show an order: totals, tax lines, discounts and line items')
  .argument('<orderId>', 'Order GID or numeric id')
  .action(async (orderId: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const order = await context.step('Fetching order...', () => new OrderService(gateway).fetchOrder(orderId));
      context.reporter.order(order);
    }),
  );

export const fulfillmentsCommand = new Command('fulfillments')
  .description('List the fulfillment orders of an order, waiting for routing to finish')
  .argument('<orderId>', 'Order GID or numeric id')
  .option('--no-wait', 'Query once instead of retrying while the list is empty')
  .action(async (orderId: string, options: { wait: boolean }, command: Command) =>
    runCommand(command, async (context) => {
      const { config, gateway } = await context.connect();
      const service = new FulfillmentService(gateway);
      if (!options.wait) {
        context.reporter.fulfillmentOrders(await context.step('Fetching fulfillment orders...', () => service.fetchOnce(orderId)));
        return;
      }
      const outcome = await context.step('Fetching fulfillment orders...', () =>
        service.lookup(orderId, config.fulfillmentRetry),
      );
      context.reporter.fulfillmentOrders(outcome.value);
      if (!outcome.satisfied) {
        Logger.warn(`No fulfillment orders after ${outcome.attempts} attempts`);
      }
    }),
  );

export const deliveryMethodCommand = new Command('delivery-method')
  .description('Show the shipping line and delivery methods of an order')
  .argument('<orderNumber>', 'Order name or number, e.g. 1001 or #1001')
  .action(async (orderNumber: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const record = await context.step('Looking up delivery method...', () =>
        new OrderService(gateway).findDeliveryMethod(orderNumber),
      );
      context.reporter.deliveryMethod(record);
    }),
  );

export const transactionsCommand = new Command('transactions')
  .description('List the transactions of an order')
  .argument('<orderId>', 'Order GID or numeric id')
  .action(async (orderId: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const records = await context.step('Fetching transactions...', () => new TransactionService(gateway).list(orderId));
      context.reporter.transactions(records);
    }),
  );
