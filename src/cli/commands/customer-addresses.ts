/**
 * Customer Addresses Command
 *
 * List, add, set-default and remove on a customer's address book.
 */

import { Command } from 'commander';
import { readInputFile, validateAddressListInput } from '../../core/input/input-loader.js';
import { Logger } from '../../core/logger.js';
import { toMailingAddress } from '../../core/orders/order-input.js';
import { CustomerService } from '../../core/services/customer-service.js';
import type { MailingAddress } from '../../types/order.types.js';
import { runCommand } from '../context.js';

const listCommand = new Command('list')
  .description('List the addresses of a customer')
  .argument('<customer>', 'Customer GID, numeric id or search query')
  .action(async (customer: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const service = new CustomerService(gateway);
      const book = await context.step('Fetching addresses...', async () =>
        service.getAddressBook(await service.findCustomer(customer)),
      );
      context.reporter.addressBook(book);
    }),
  );

const addCommand = new Command('add')
  .description('Add addresses from an input file; the first becomes the default')
  .argument('<customer>', 'Customer GID, numeric id or search query')
  .argument('[input]', 'Address list input file', 'addresses.json')
  .action(async (customer: string, input: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const file = await readInputFile(input, validateAddressListInput);
      const addresses = file.addresses
        .map(toMailingAddress)
        .filter((address): address is MailingAddress => address !== undefined);
      if (addresses.length < file.addresses.length) {
        Logger.warn(`${file.addresses.length - addresses.length} empty address(es) skipped`);
      }

      const { gateway } = await context.connect();
      const service = new CustomerService(gateway);
      const customerId = await service.findCustomer(customer);
      const created = await context.step(`Adding ${addresses.length} address(es)...`, () =>
        service.addAddresses(customerId, addresses),
      );
      for (const address of created) {
        Logger.success(`Added ${address.id}`);
      }
    }),
  );

const setDefaultCommand = new Command('set-default')
  .description('Make an address the default')
  .argument('<customer>', 'Customer GID, numeric id or search query')
  .argument('<addressId>', 'Address GID or numeric id')
  .action(async (customer: string, addressId: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const service = new CustomerService(gateway);
      const customerId = await service.findCustomer(customer);
      const defaultId = await context.step('Updating default address...', () =>
        service.setDefaultAddress(customerId, addressId),
      );
      Logger.success(`Default address is now ${defaultId}`);
    }),
  );

const removeCommand = new Command('remove')
  .description('Delete an address, moving the default elsewhere first')
  .argument('<customer>', 'Customer GID, numeric id or search query')
  .argument('<addressId>', 'Address GID or numeric id')
  .action(async (customer: string, addressId: string, _options: unknown, command: Command) =>
    runCommand(command, async (context) => {
      const { gateway } = await context.connect();
      const service = new CustomerService(gateway);
      const customerId = await service.findCustomer(customer);
      if (!(await context.confirm(`Delete address ${addressId}?`))) {
        Logger.info('Nothing was deleted.');
        return;
      }
      const deletedId = await context.step('Deleting address...', () => service.removeAddress(customerId, addressId));
      Logger.success(`Deleted ${deletedId}`);
    }),
  );

export const customerAddressesCommand = new Command('customer-addresses')
  .description("Manage a customer's addresses")
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(setDefaultCommand)
  .addCommand(removeCommand);
