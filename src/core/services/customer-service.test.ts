import { describe, expect, it } from 'vitest';
import { FakeAdminGateway } from '../../testing/index.js';
import { CustomerService, sameAddress } from './customer-service.js';

const CUSTOMER = 'gid://shopify/Customer/55';
const HOME = 'gid://shopify/MailingAddress/1?model_name=CustomerAddress';
const WORK = 'gid://shopify/MailingAddress/2?model_name=CustomerAddress';

function addressBookReply(defaultId: string | null = HOME) {
  return {
    customer: {
      id: CUSTOMER,
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@example.com',
      defaultAddress: defaultId ? { id: defaultId } : null,
      addresses: [
        { id: HOME, address1: '1 Rue Haute', city: 'Paris', country: 'France', zip: null },
        { id: WORK, address1: '2 Quai Bas', city: 'Lyon', country: 'France', zip: '69001' },
      ],
    },
  };
}

const defaultMoved = {
  customerUpdateDefaultAddress: { customer: { id: CUSTOMER, defaultAddress: { id: WORK } }, userErrors: [] },
};

describe('sameAddress', () => {
  it('ignores the model-name suffix and the GID prefix', () => {
    expect(sameAddress(HOME, '1')).toBe(true);
    expect(sameAddress(HOME, 'gid://shopify/MailingAddress/1')).toBe(true);
    expect(sameAddress(HOME, WORK)).toBe(false);
  });
});

describe('CustomerService', () => {
  describe('findCustomer', () => {
    it('turns ids into GIDs without a lookup', async () => {
      const gateway = new FakeAdminGateway();
      const service = new CustomerService(gateway);

      await expect(service.findCustomer('55')).resolves.toBe(CUSTOMER);
      await expect(service.findCustomer(CUSTOMER)).resolves.toBe(CUSTOMER);
      expect(gateway.calls).toEqual([]);
    });

    it('searches for anything else', async () => {
      const gateway = new FakeAdminGateway().onGraphQL('SearchCustomer', {
        customers: { nodes: [{ id: CUSTOMER, firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.com' }] },
      });

      await expect(new CustomerService(gateway).findCustomer(' ada@example.com ')).resolves.toBe(CUSTOMER);
      expect(gateway.graphqlCalls('SearchCustomer')).toEqual([{ query: 'ada@example.com' }]);
    });

    it('fails when the search finds nobody', async () => {
      const gateway = new FakeAdminGateway().onGraphQL('SearchCustomer', { customers: { nodes: [] } });

      await expect(new CustomerService(gateway).findCustomer('nobody@example.com')).rejects.toThrow(
        'No customer matches "nobody@example.com"',
      );
    });
  });

  it('reads the address book', async () => {
    const gateway = new FakeAdminGateway().onGraphQL('CustomerAddresses', addressBookReply());

    const book = await new CustomerService(gateway).getAddressBook('55');

    expect(gateway.graphqlCalls('CustomerAddresses')).toEqual([{ id: CUSTOMER }]);
    expect(book).toEqual({
      customerId: CUSTOMER,
      name: 'Ada Lovelace',
      email: 'ada@example.com',
      defaultAddressId: HOME,
      addresses: [
        { id: HOME, address1: '1 Rue Haute', city: 'Paris', country: 'France' },
        { id: WORK, address1: '2 Quai Bas', city: 'Lyon', country: 'France', zip: '69001' },
      ],
    });
  });

  it('adds addresses and makes the first one the default', async () => {
    const gateway = new FakeAdminGateway()
      .onGraphQL(
        'customerAddressCreate',
        { customerAddressCreate: { address: { id: HOME, city: 'Paris' }, userErrors: [] } },
        { customerAddressCreate: { address: { id: WORK, city: 'Lyon' }, userErrors: [] } },
      )
      .onGraphQL('customerUpdateDefaultAddress', {
        customerUpdateDefaultAddress: { customer: { id: CUSTOMER, defaultAddress: { id: HOME } }, userErrors: [] },
      });

    const created = await new CustomerService(gateway).addAddresses('55', [
      { city: 'Paris', country: 'France', countryCode: 'FR' },
      { city: 'Lyon', countryCode: 'FR' },
    ]);

    expect(created.map((address) => address.id)).toEqual([HOME, WORK]);
    expect(gateway.graphqlCalls('customerAddressCreate')).toEqual([
      { customerId: CUSTOMER, address: { city: 'Paris', countryCode: 'FR' } },
      { customerId: CUSTOMER, address: { city: 'Lyon', countryCode: 'FR' } },
    ]);
    expect(gateway.graphqlCalls('customerUpdateDefaultAddress')).toEqual([{ customerId: CUSTOMER, addressId: HOME }]);
  });

  describe('removeAddress', () => {
    it('moves the default to another address before deleting it', async () => {
      const gateway = new FakeAdminGateway()
        .onGraphQL('CustomerAddresses', addressBookReply())
        .onGraphQL('customerUpdateDefaultAddress', defaultMoved)
        .onGraphQL('customerAddressDelete', {
          customerAddressDelete: { deletedAddressId: 'gid://shopify/MailingAddress/1', userErrors: [] },
        });

      const deleted = await new CustomerService(gateway).removeAddress('55', '1');

      expect(deleted).toBe('gid://shopify/MailingAddress/1');
      expect(gateway.operations()).toEqual(['CustomerAddresses', 'customerUpdateDefaultAddress', 'customerAddressDelete']);
      expect(gateway.graphqlCalls('customerUpdateDefaultAddress')).toEqual([{ customerId: CUSTOMER, addressId: WORK }]);
      expect(gateway.graphqlCalls('customerAddressDelete')).toEqual([{ customerId: CUSTOMER, addressId: HOME }]);
    });

    it('deletes a non-default address directly', async () => {
      const gateway = new FakeAdminGateway()
        .onGraphQL('CustomerAddresses', addressBookReply())
        .onGraphQL('customerAddressDelete', {
          customerAddressDelete: { deletedAddressId: 'gid://shopify/MailingAddress/2', userErrors: [] },
        });

      await new CustomerService(gateway).removeAddress('55', WORK);

      expect(gateway.operations()).toEqual(['CustomerAddresses', 'customerAddressDelete']);
    });

    it("refuses an address outside the customer's book", async () => {
      const gateway = new FakeAdminGateway().onGraphQL('CustomerAddresses', addressBookReply());

      await expect(new CustomerService(gateway).removeAddress('55', '9')).rejects.toThrow(
        `Address 9 does not belong to customer ${CUSTOMER}`,
      );
      expect(gateway.operations()).toEqual(['CustomerAddresses']);
    });

    it('surfaces user errors from the delete', async () => {
      const gateway = new FakeAdminGateway()
        .onGraphQL('CustomerAddresses', addressBookReply(null))
        .onGraphQL('customerAddressDelete', {
          customerAddressDelete: { deletedAddressId: null, userErrors: [{ field: ['addressId'], message: 'not found' }] },
        });

      await expect(new CustomerService(gateway).removeAddress('55', '2')).rejects.toThrow(
        'customerAddressDelete failed: addressId: not found',
      );
    });
  });
});
