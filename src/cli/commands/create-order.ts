/**
 * Create Order Command
 *
 * Loads an order input file, picks a creation strategy and runs it.
 * `draft-order` is the same command pinned to the draft-order flow.
 */

import { Command, Option } from 'commander';
import { ORDER_STRATEGIES, type OrderStrategy } from '../../types/order.types.js';
import { readInputFile, validateOrderInput } from '../../core/input/input-loader.js';
import { Logger } from '../../core/logger.js';
import { OrderOrchestrator, planOrder } from '../../core/orders/order-orchestrator.js';
import { toOrderDraft } from '../../core/orders/order-input.js';
import { type CommandContext, runCommand } from '../context.js';

interface CreateOrderOptions {
  strategy?: OrderStrategy;
  paymentPending?: boolean;
  dryRun?: boolean;
}

async function createOrder(
  context: CommandContext,
  input: string,
  options: CreateOrderOptions,
): Promise<void> {
  const settings = await context.settings();
  const file = await readInputFile(input, validateOrderInput);
  const draft = toOrderDraft(file.order, { currency: settings.currency });
  const plan = planOrder(draft, settings.orders, options.strategy);

  if (options.dryRun) {
    context.reporter.plan(plan);
    return;
  }

  const { config, gateway } = await context.connect();
  const summary = `Create a ${draft.items.length}-item order on ${config.credentials.shopDomain} using ${plan.strategy}?`;
  if (!(await context.confirm(summary))) {
    Logger.info('Nothing was sent.');
    return;
  }

  const orchestrator = new OrderOrchestrator(gateway, config);
  const confirmation = await context.step(`Creating order (${plan.strategy})...`, () =>
    orchestrator.execute(draft, { strategy: plan.strategy, paymentPending: options.paymentPending }),
  );
  context.reporter.confirmation(confirmation);
}

export const createOrderCommand = new Command('create-order')
  .description('Create an order from an input file')
  .argument('[input]', 'Order input file', 'input.json')
  .addOption(new Option('--strategy <strategy>', 'Force a creation strategy').choices(ORDER_STRATEGIES))
  .option('--payment-pending', 'Draft flow: complete the order as payment pending')
  .option('--dry-run', 'Print the request payloads without sending them')
  .action(async (input: string, options: CreateOrderOptions, command: Command) =>
    runCommand(command, (context) => createOrder(context, input, options)),
  );

export const draftOrderCommand = new Command('draft-order')
  .description('Create an order through a draft order')
  .argument('[input]', 'Order input file', 'input.json')
  .option('--payment-pending', 'Complete the order as payment pending')
  .option('--dry-run', 'Print the request payloads without sending them')
  .action(async (input: string, options: CreateOrderOptions, command: Command) =>
    runCommand(command, (context) => createOrder(context, input, { ...options, strategy: 'draft-order' })),
  );
