#!/usr/bin/env node
/**
 * orderkit CLI
 *
 * Entry point for the command-line interface.
 */

import { Command } from 'commander';
import { createOrderCommand, draftOrderCommand } from './commands/create-order.js';
import { deliveryMethodCommand, fulfillmentsCommand, orderCommand, transactionsCommand } from './commands/order.js';
import { initCommand } from './commands/init.js';
import { shippingNoteCommand } from './commands/shipping-note.js';
import { addProductCommand, inventoryCommand, productsCommand } from './commands/catalog.js';
import { customerAddressesCommand } from './commands/customer-addresses.js';
import { accessScopesCommand, checkConfigCommand, locationsCommand } from './commands/shop.js';
import { type GlobalOptions, applyOutputOptions, reportFailure } from './context.js';
import { Logger } from '../core/logger.js';
import { description, name, version } from './version.js';

const program = new Command();

// ============================================================================
// Custom Help Formatting
// ============================================================================

function showCustomHelp(): void {
  console.log(`\n  ${name} v${version}`);
  console.log(`  ${description}\n`);

  console.log('  QUICK START\n');
  console.log(`    $ ${name} init                         # Create the configuration`);
  console.log(`    $ ${name} check-config                 # Verify credentials`);
  console.log(`    $ ${name} create-order --dry-run       # Preview the payloads of input.json`);
  console.log(`    $ ${name} create-order                 # Create the order`);
  console.log('');

  console.log('  COMMANDS\n');

  console.log('  Orders:');
  console.log('    create-order [input]      Create an order from an input file (default input.json)');
  console.log('                              --strategy <s>     Force a creation strategy');
  console.log('                              --payment-pending  Complete a draft as payment pending');
  console.log('                              --dry-run          Print payloads without sending');
  console.log('    draft-order [input]       Create an order through a draft order');
  console.log('    order <id>                Order totals, tax lines, discounts and line items');
  console.log('    fulfillments <orderId>    Fulfillment orders, retried while routing runs');
  console.log('    delivery-method <number>  Shipping line and delivery methods by order name');
  console.log('    transactions <orderId>    Transactions recorded on an order');
  console.log('    shipping-note [input]     Set or clear the shipping note (default shipping-note.json)');
  console.log('');

  console.log('  Catalog:');
  console.log('    products [--first n]      Products with their variants');
  console.log('    add-product [input]       Create a product (default product.json)');
  console.log('    inventory <variantId>     Inventory levels of a variant');
  console.log('');

  console.log('  Customers:');
  console.log('    customer-addresses list <customer>');
  console.log('    customer-addresses add <customer> [input]');
  console.log('    customer-addresses set-default <customer> <addressId>');
  console.log('    customer-addresses remove <customer> <addressId>');
  console.log('');

  console.log('  Shop:');
  console.log('    locations                 Locations and fulfillment services');
  console.log('    access-scopes             Scopes granted to the access token');
  console.log('    init [-f]                 Write orderkit.config.json and a .env skeleton');
  console.log('    check-config              Check credentials and configuration');
  console.log('');

  console.log('  GLOBAL OPTIONS\n');
  console.log('    -c, --config <path>       Path to configuration file');
  console.log('    --env-file <path>         Path to the .env file (default ./.env)');
  console.log('    -v, --version             Display current version');
  console.log('    --verbose                 Enable verbose output');
  console.log('    --silent                  Suppress all output except errors');
  console.log('    --no-color                Disable colored output');
  console.log('    --ci                      No spinners or prompts');
  console.log('    --raw                     Print raw remote responses as JSON');
  console.log('    -y, --yes                 Answer yes to confirmations');
  console.log('');

  console.log('  ENVIRONMENT\n');
  console.log('    SHOPIFY_SHOP_DOMAIN       Shop domain, e.g. example.myshopify.com');
  console.log('    SHOPIFY_API_SECRET        Admin API access token');
  console.log('');
}

program
  .name(name)
  .description(description)
  .version(version, '-v, --version', 'Display the current version');

// Global options
program
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--env-file <path>', 'Path to the .env file')
  .option('--verbose', 'Enable verbose output')
  .option('--silent', 'Suppress all output except errors')
  .option('--no-color', 'Disable colored output')
  .option('--ci', 'CI mode: no spinners, no prompts')
  .option('--raw', 'Print raw remote responses as JSON')
  .option('-y, --yes', 'Answer yes to confirmations');

program.hook('preAction', (_thisCommand, actionCommand) => {
  applyOutputOptions(actionCommand.optsWithGlobals<GlobalOptions>());
});

// Register commands
program.addCommand(initCommand);
program.addCommand(createOrderCommand);
program.addCommand(draftOrderCommand);
program.addCommand(orderCommand);
program.addCommand(fulfillmentsCommand);
program.addCommand(deliveryMethodCommand);
program.addCommand(transactionsCommand);
program.addCommand(shippingNoteCommand);
program.addCommand(productsCommand);
program.addCommand(addProductCommand);
program.addCommand(inventoryCommand);
program.addCommand(customerAddressesCommand);
program.addCommand(locationsCommand);
program.addCommand(accessScopesCommand);
program.addCommand(checkConfigCommand);

program
  .command('help [command]', { hidden: true })
  .description('Display help for a command')
  .action((commandName?: string) => {
    if (!commandName) {
      showCustomHelp();
      return;
    }
    const cmd = program.commands.find((c) => c.name() === commandName);
    if (cmd) {
      cmd.outputHelp();
    } else {
      Logger.error(`Unknown command: ${commandName}`);
      Logger.info(`Run "${name} help" for a list of commands.`);
      process.exitCode = 1;
    }
  });

// Show custom help when no args provided
if (process.argv.length <= 2) {
  showCustomHelp();
} else {
  program.parseAsync(process.argv).catch(reportFailure);
}
