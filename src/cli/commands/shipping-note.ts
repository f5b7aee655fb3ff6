/**
 * Shipping Note Command
 *
 * Sets the shipping-note metafield of an order from an input file, or
 * deletes it when the file carries no note.
 */

import { Command } from 'commander';
import { readInputFile, validateShippingNoteInput } from '../../core/input/input-loader.js';
import { Logger } from '../../core/logger.js';
import { MetafieldService } from '../../core/services/metafield-service.js';
import { runCommand } from '../context.js';

export const shippingNoteCommand = new Command('shipping-note')
  .description('Set or clear the shipping note of an order')
  .argument('[input]', 'Shipping note input file', 'shipping-note.json')
  .action(async (input: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const file = await readInputFile(input, validateShippingNoteInput);
      const { config, gateway } = await context.connect();
      const service = new MetafieldService(gateway, config.shippingNote);
      const orderId = String(file.orderId);
      const note = file.shippingNote?.trim() ?? '';

      if (note === '') {
        const deleted = await context.step('Deleting shipping note...', () => service.deleteShippingNote(orderId));
        Logger.info(deleted ? `Shipping note removed from ${orderId}` : `${orderId} has no shipping note`);
        return;
      }

      const metafield = await context.step('Saving shipping note...', () => service.setShippingNote(orderId, note));
      if (context.options.raw) {
        Logger.json('Metafield:', metafield);
        return;
      }
      Logger.success(`Shipping note saved as ${metafield.namespace}.${metafield.key} (${metafield.id})`);
    }),
  );
