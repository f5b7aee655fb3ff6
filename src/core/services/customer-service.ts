/**
 * Customer Service
 *
 * Customer lookup and address book maintenance.
 */

import type { MailingAddress } from '../../types/order.types.js';
import type { AdminGateway } from '../admin/admin-gateway.js';
import type { Connection, MutationPayload } from '../admin/decoders.js';
import { requireValue } from '../admin/decoders.js';
import { fromGid, isGid, toAddressGid, toGid } from '../admin/gid.js';
import { ResponseShapeError, assertNoUserErrors } from '../errors.js';
import { Logger } from '../logger.js';
import { toAddressInput } from '../orders/payload-builder.js';

const ADDRESS_FIELDS = 'id firstName lastName company address1 address2 city province country zip phone';

const SEARCH_CUSTOMER = `
  query SearchCustomer($query: String!) {
    customers(first: 1, query: $query) {
      nodes { id firstName lastName email }
    }
  }
`;

const CUSTOMER_ADDRESSES = `
  query CustomerAddresses($id: ID!) {
    customer(id: $id) {
      id
      firstName
      lastName
      email
      defaultAddress { id }
      addresses { ${ADDRESS_FIELDS} }
    }
  }
`;

const CUSTOMER_ADDRESS_CREATE = `
  mutation CustomerAddressCreate($customerId: ID!, $address: MailingAddressInput!) {
    customerAddressCreate(customerId: $customerId, address: $address) {
      address { ${ADDRESS_FIELDS} }
      userErrors { field message }
    }
  }
`;

const CUSTOMER_UPDATE_DEFAULT_ADDRESS = `
  mutation CustomerUpdateDefaultAddress($customerId: ID!, $addressId: ID!) {
    customerUpdateDefaultAddress(customerId: $customerId, addressId: $addressId) {
      customer { id defaultAddress { id } }
      userErrors { field message }
    }
  }
`;

const CUSTOMER_ADDRESS_DELETE = `
  mutation CustomerAddressDelete($customerId: ID!, $addressId: ID!) {
    customerAddressDelete(customerId: $customerId, addressId: $addressId) {
      deletedAddressId
      userErrors { field message }
    }
  }
`;

export interface AddressRecord extends MailingAddress {
  id: string;
}

export interface CustomerAddressBook {
  customerId: string;
  name: string;
  email?: string;
  defaultAddressId?: string;
  addresses: AddressRecord[];
}

interface GqlAddress {
  id: string;
  firstName?: string | null;
  lastName?: string | null;
  company?: string | null;
  address1?: string | null;
  address2?: string | null;
  city?: string | null;
  province?: string | null;
  country?: string | null;
  zip?: string | null;
  phone?: string | null;
}

interface GqlCustomer {
  id: string;
  firstName?: string | null;
  lastName?: string | null;
  email?: string | null;
}

interface SearchCustomerData {
  customers: Connection<GqlCustomer>;
}

interface CustomerAddressesData {
  customer: (GqlCustomer & { defaultAddress: { id: string } | null; addresses: GqlAddress[] }) | null;
}

interface AddressCreateData {
  customerAddressCreate: MutationPayload & { address: GqlAddress | null };
}

interface UpdateDefaultData {
  customerUpdateDefaultAddress: MutationPayload & {
    customer: { id: string; defaultAddress: { id: string } | null } | null;
  };
}

interface AddressDeleteData {
  customerAddressDelete: MutationPayload & { deletedAddressId: string | null };
}

function decodeAddress(address: GqlAddress): AddressRecord {
  return {
    id: address.id,
    firstName: address.firstName ?? undefined,
    lastName: address.lastName ?? undefined,
    company: address.company ?? undefined,
    address1: address.address1 ?? undefined,
    address2: address.address2 ?? undefined,
    city: address.city ?? undefined,
    province: address.province ?? undefined,
    country: address.country ?? undefined,
    zip: address.zip ?? undefined,
    phone: address.phone ?? undefined,
  };
}

/**
 * Address GIDs differ in their query suffix; compare the numeric part.
 */
export function sameAddress(a: string, b: string): boolean {
  return fromGid(a).split('?')[0] === fromGid(b).split('?')[0];
}

export class CustomerService {
  private gateway: AdminGateway;

  constructor(gateway: AdminGateway) {
    this.gateway = gateway;
  }

  /**
   * Accepts a GID, a numeric id, or a search query such as an email address.
   */
  async findCustomer(reference: string): Promise<string> {
    const trimmed = reference.trim();
    if (isGid(trimmed) || /^\d+$/.test(trimmed)) {
      return toGid('Customer', trimmed);
    }
    const data = await this.gateway.graphql<SearchCustomerData>('SearchCustomer', SEARCH_CUSTOMER, {
      query: trimmed,
    });
    const [customer] = data.customers.nodes;
    if (!customer) {
      throw new ResponseShapeError(`No customer matches "${trimmed}"`);
    }
    Logger.debug(`Customer "${trimmed}" resolved to ${customer.id}`);
    return customer.id;
  }

  async getAddressBook(customerId: string): Promise<CustomerAddressBook> {
    const data = await this.gateway.graphql<CustomerAddressesData>('CustomerAddresses', CUSTOMER_ADDRESSES, {
      id: toGid('Customer', customerId),
    });
    const customer = requireValue(data.customer, `customer ${customerId}`);
    return {
      customerId: customer.id,
      name: [customer.firstName, customer.lastName].filter(Boolean).join(' '),
      email: customer.email ?? undefined,
      defaultAddressId: customer.defaultAddress?.id,
      addresses: customer.addresses.map(decodeAddress),
    };
  }

  async createAddress(customerId: string, address: MailingAddress): Promise<AddressRecord> {
    const data = await this.gateway.graphql<AddressCreateData>('customerAddressCreate', CUSTOMER_ADDRESS_CREATE, {
      customerId: toGid('Customer', customerId),
      address: toAddressInput(address),
    });
    assertNoUserErrors('customerAddressCreate', data.customerAddressCreate.userErrors);
    return decodeAddress(requireValue(data.customerAddressCreate.address, 'customerAddressCreate.address'));
  }

  async setDefaultAddress(customerId: string, addressId: string): Promise<string> {
    const data = await this.gateway.graphql<UpdateDefaultData>(
      'customerUpdateDefaultAddress',
      CUSTOMER_UPDATE_DEFAULT_ADDRESS,
      { customerId: toGid('Customer', customerId), addressId: toAddressGid(addressId) },
    );
    assertNoUserErrors('customerUpdateDefaultAddress', data.customerUpdateDefaultAddress.userErrors);
    const customer = requireValue(data.customerUpdateDefaultAddress.customer, 'customerUpdateDefaultAddress.customer');
    return requireValue(customer.defaultAddress, 'customer.defaultAddress').id;
  }

  /**
   * Creates each address in turn and makes the first one the default.
   */
  async addAddresses(customerId: string, addresses: MailingAddress[]): Promise<AddressRecord[]> {
    const created: AddressRecord[] = [];
    for (const address of addresses) {
      created.push(await this.createAddress(customerId, address));
    }
    const [first] = created;
    if (first) {
      await this.setDefaultAddress(customerId, first.id);
    }
    return created;
  }

  /**
   * Deletes an address. The default address is handed to another address
   * first, since the platform refuses to delete a customer's default.
   */
  async removeAddress(customerId: string, addressId: string): Promise<string> {
    const book = await this.getAddressBook(customerId);
    const target = book.addresses.find((address) => sameAddress(address.id, addressId));
    if (!target) {
      throw new ResponseShapeError(`Address ${addressId} does not belong to customer ${book.customerId}`);
    }

    if (book.defaultAddressId && sameAddress(book.defaultAddressId, target.id)) {
      const replacement = book.addresses.find((address) => !sameAddress(address.id, target.id));
      if (replacement) {
        Logger.debug(`Moving default address to ${replacement.id}`);
        await this.setDefaultAddress(book.customerId, replacement.id);
      }
    }

    const data = await this.gateway.graphql<AddressDeleteData>('customerAddressDelete', CUSTOMER_ADDRESS_DELETE, {
      customerId: book.customerId,
      addressId: toAddressGid(target.id),
    });
    assertNoUserErrors('customerAddressDelete', data.customerAddressDelete.userErrors);
    return requireValue(data.customerAddressDelete.deletedAddressId, 'customerAddressDelete.deletedAddressId');
  }
}
