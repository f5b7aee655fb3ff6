import { describe, expect, it } from 'vitest';
import { fromGid, gidResource, isGid, toAddressGid, toGid } from './gid.js';

describe('global ids', () => {
  it('prefixes numeric ids', () => {
    expect(toGid('Order', 123)).toBe('gid://shopify/Order/123');
    expect(toGid('ProductVariant', ' 456 ')).toBe('gid://shopify/ProductVariant/456');
  });

  it('leaves global ids unchanged', () => {
    expect(toGid('Order', 'gid://shopify/Order/5')).toBe('gid://shopify/Order/5');
  });

  it('extracts the legacy id', () => {
    expect(fromGid('gid://shopify/Order/42')).toBe('42');
    expect(fromGid(42)).toBe('42');
    expect(fromGid('gid://shopify/MailingAddress/9?model_name=CustomerAddress')).toBe('9');
  });

  it('recognises global ids and their resource', () => {
    expect(isGid('gid://shopify/Customer/1')).toBe(true);
    expect(isGid('123')).toBe(false);
    expect(gidResource('gid://shopify/ProductVariant/9')).toBe('ProductVariant');
    expect(gidResource('9')).toBeUndefined();
  });

  it('qualifies customer address ids', () => {
    expect(toAddressGid(77)).toBe('gid://shopify/MailingAddress/77?model_name=CustomerAddress');
    expect(toAddressGid('gid://shopify/MailingAddress/77?model_name=CustomerAddress')).toBe(
      'gid://shopify/MailingAddress/77?model_name=CustomerAddress',
    );
  });
});
