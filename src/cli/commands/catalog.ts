/**
 * Catalog commands
 */

import { Command, InvalidArgumentError } from 'commander';
import { readInputFile, validateProductInput } from '../../core/input/input-loader.js';
import { Logger } from '../../core/logger.js';
import { CatalogService } from '../../core/services/catalog-service.js';
import { runCommand } from '../context.js';

function positiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 250) {
    throw new InvalidArgumentError('Expected a whole number between 1 and 250.');
  }
  return parsed;
}

export const productsCommand = new Command('products')
  .description('List products with their variants')
  .option('--first <n>', 'Number of products to list', positiveInteger, 10)
  .action(async (options: { first: number }, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const products = await context.step('Fetching products...', () =>
        new CatalogService(gateway).listProducts(options.first),
      );
      context.reporter.products(products);
    }),
  );

export const addProductCommand = new Command('add-product')
  .description('Create a product from an input file')
  .argument('[input]', 'Product input file', 'product.json')
  .action(async (input: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const file = await readInputFile(input, validateProductInput);
      const { gateway } = await context.connect();
      const product = await context.step(`Creating "${file.product.title}"...`, () =>
        new CatalogService(gateway).createProduct(file.product),
      );
      if (context.options.raw) {
        Logger.json('Product:', product);
        return;
      }
      Logger.success(`Created ${product.title} (${product.id})`);
      for (const metafield of product.metafields) {
        Logger.field(`${metafield.namespace}.${metafield.key}`, metafield.value, 2);
      }
    }),
  );

export const inventoryCommand = new Command('inventory')
  .description('Show inventory levels of a variant')
  .argument('<variantId>', 'Variant GID or numeric id')
  .action(async (variantId: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const record = await context.step('Fetching inventory...', () =>
        new CatalogService(gateway).variantInventory(variantId),
      );
      context.reporter.inventory(record);
    }),
  );
