/**
 * Shop commands
 */

import { Command } from 'commander';
import { Logger } from '../../core/logger.js';
import { ShopService } from '../../core/services/shop-service.js';
import { runCommand } from '../context.js';

export const locationsCommand = new Command('locations')
  .description('List locations with their active, primary and fulfillment service flags')
  .action(async (_options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const locations = await context.step('Fetching locations...', () => new ShopService(gateway).locations());
      context.reporter.locations(locations);
    }),
  );

export const accessScopesCommand = new Command('access-scopes')
  .description('List the scopes granted to the access token')
  .action(async (_options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const report = await context.step('Fetching access scopes...', () => new ShopService(gateway).accessScopes());
      context.reporter.accessScopes(report);
      if (report.fulfillmentScopes.some((scope) => !scope.granted)) {
        Logger.info('Fulfillment-order lookups need the missing scopes above.');
      }
    }),
  );

export const checkConfigCommand = new Command('check-config')
  .description('Check credentials and configuration against the shop')
  .action(async (_options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { config, gateway } = await context.connect();
      if (!context.options.raw) {
        Logger.heading('Configuration');
        Logger.field('Config file', config.configPath ?? '(defaults)', 2);
        Logger.field('Shop domain', config.credentials.shopDomain, 2);
        Logger.field('API version', config.apiVersion, 2);
        Logger.field('Currency', config.currency, 2);
        Logger.field('Timeout', `${config.timeoutMs}ms`, 2);
        Logger.field(
          'Shipping note',
          `${config.shippingNote.namespace}.${config.shippingNote.key} (${config.shippingNote.type})`,
          2,
        );
        Logger.newLine();
      }
      const shop = await context.step('Querying shop...', () => new ShopService(gateway).shopInfo());
      context.reporter.shop(shop);
      if (shop.currency && shop.currency !== config.currency) {
        Logger.warn(`Shop currency is ${shop.currency} but orders default to ${config.currency}`);
      }
    }),
  );
