import { ReadableStream } from 'stream/web';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { RemoteApplicationError, TransportError } from '../errors.js';
import { testRuntimeConfig } from '../../testing/index.js';
import { ShopifyAdminGateway, flattenRestErrors } from './shopify-admin-gateway.js';

function stubFetch(respond: () => Promise<Response>): void {
  vi.stubGlobal('fetch', vi.fn(respond));
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('flattenRestErrors', () => {
  it('accepts a single message, a list and a field map', () => {
    expect(flattenRestErrors('Not Found')).toEqual(['Not Found']);
    expect(flattenRestErrors(['a', 'b'])).toEqual(['a', 'b']);
    expect(flattenRestErrors({ line_items: ['is invalid', 'is empty'], email: 'is taken' })).toEqual([
      'line_items: is invalid, is empty',
      'email: is taken',
    ]);
  });
});

describe('ShopifyAdminGateway', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('resolves with the GraphQL data', async () => {
    stubFetch(async () => jsonResponse({ data: { shop: { id: 'gid://shopify/Shop/1' } } }));

    await expect(new ShopifyAdminGateway(testRuntimeConfig()).graphql('ShopInfo', '{ shop { id } }')).resolves.toEqual({
      shop: { id: 'gid://shopify/Shop/1' },
    });
  });

  it('rejects GraphQL errors with their codes', async () => {
    stubFetch(async () => jsonResponse({ errors: [{ message: 'Throttled', extensions: { code: 'THROTTLED' } }] }));

    const request = new ShopifyAdminGateway(testRuntimeConfig()).graphql('ShopInfo', '{ shop { id } }');

    await expect(request).rejects.toBeInstanceOf(RemoteApplicationError);
    await expect(request).rejects.toThrow('ShopInfo failed: Throttled (THROTTLED)');
  });

  it('rejects a non-success status as a transport failure', async () => {
    stubFetch(async () => jsonResponse({ errors: 'Invalid API key or access token' }, 401));

    const error = await new ShopifyAdminGateway(testRuntimeConfig())
      .graphql('ShopInfo', '{ shop { id } }')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('status', 401);
  });

  it('wraps network failures', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(new ShopifyAdminGateway(testRuntimeConfig()).graphql('ShopInfo', '{ shop { id } }')).rejects.toThrow(
      /^ShopInfo: request failed: /,
    );
  });

  it('maps a failure while reading the body to a transport failure', async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));
      },
    });
    stubFetch(async () => new Response(stalled, { status: 200 }));

    const error = await new ShopifyAdminGateway(testRuntimeConfig())
      .graphql('ShopInfo', '{ shop { id } }')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('message', expect.stringMatching(/^ShopInfo: request failed: /));
  });

  it('reads an empty REST body as an empty object', async () => {
    stubFetch(async () => new Response('', { status: 200 }));

    await expect(new ShopifyAdminGateway(testRuntimeConfig()).rest('DELETE', 'metafields/31')).resolves.toEqual({
      status: 200,
      body: {},
    });
  });

  it('rejects REST bodies that carry errors', async () => {
    stubFetch(async () => jsonResponse({ errors: { base: ['Order is locked'] } }));

    await expect(
      new ShopifyAdminGateway(testRuntimeConfig()).rest('PUT', 'orders/800', { order: { id: 800 } }),
    ).rejects.toThrow('PUT orders/800 failed: base: Order is locked');
  });
});
