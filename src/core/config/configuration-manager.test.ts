import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig } from '../../types/config.types.js';
import { ConfigurationError } from '../errors.js';
import { ConfigurationManager, ciRequested } from './configuration-manager.js';

describe('ConfigurationManager.resolve', () => {
  it('fills every setting from the defaults', () => {
    expect(new ConfigurationManager().resolve({})).toEqual(defaultConfig);
  });

  it('merges nested sections key by key', () => {
    const config = new ConfigurationManager().resolve({
      currency: 'CAD',
      orders: { preferStrikethrough: true },
      fulfillmentRetry: { maxAttempts: 2 },
    });

    expect(config.currency).toBe('CAD');
    expect(config.orders).toEqual({ financialStatus: 'PAID', preferDraftFlow: true, preferStrikethrough: true });
    expect(config.fulfillmentRetry).toEqual({ maxAttempts: 2, baseDelayMs: 3000, multiplier: 1.5 });
  });

  it('rejects values of the wrong type', () => {
    expect(() => new ConfigurationManager().resolve({ timeoutMs: 'soon' })).toThrow(
      new ConfigurationError('Invalid configuration: /timeoutMs must be integer'),
    );
  });

  it('rejects unknown keys', () => {
    expect(() => new ConfigurationManager().resolve({ colour: 'blue' })).toThrow(
      'Invalid configuration: / must NOT have additional properties',
    );
  });
});

describe('ConfigurationManager.readCredentials', () => {
  it('normalises the shop domain', () => {
    const credentials = new ConfigurationManager().readCredentials({
      SHOPIFY_SHOP_DOMAIN: 'https://test-shop.myshopify.com/',
      SHOPIFY_API_SECRET: ' test-secret ',
    });

    expect(credentials).toEqual({ shopDomain: 'test-shop.myshopify.com', accessToken: 'test-secret' });
  });

  it('names every missing variable', () => {
    expect(() => new ConfigurationManager().readCredentials({ SHOPIFY_SHOP_DOMAIN: '  ' })).toThrow(
      'SHOPIFY_SHOP_DOMAIN and SHOPIFY_API_SECRET must be set in the environment or .env file',
    );
  });
});

describe('ConfigurationManager.createRuntimeConfig', () => {
  it('builds a frozen runtime config', () => {
    const runtime = new ConfigurationManager().createRuntimeConfig(defaultConfig, {
      SHOPIFY_SHOP_DOMAIN: 'test-shop.myshopify.com',
      SHOPIFY_API_SECRET: 'test-secret',
    });

    expect(Object.isFrozen(runtime)).toBe(true);
    expect(runtime.credentials.accessToken).toBe('test-secret');
    expect(runtime.configPath).toBeUndefined();
  });
});

describe('ConfigurationManager.loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'orderkit-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads an explicit config file', async () => {
    const file = path.join(dir, 'orderkit.config.json');
    await fs.writeFile(file, JSON.stringify({ currency: 'EUR', shippingNote: { key: 'delivery_note' } }));

    const manager = new ConfigurationManager();
    const config = await manager.loadConfig(file);

    expect(config.currency).toBe('EUR');
    expect(config.shippingNote).toEqual({
      namespace: 'orderkit',
      key: 'delivery_note',
      type: 'multi_line_text_field',
    });
    const runtime = manager.createRuntimeConfig(config, {
      SHOPIFY_SHOP_DOMAIN: 'test-shop.myshopify.com',
      SHOPIFY_API_SECRET: 'test-secret',
    });
    expect(runtime.configPath).toBe(file);
  });

  it('detects a config file in a directory', async () => {
    const manager = new ConfigurationManager();
    expect(manager.configExists(dir)).toBe(false);

    await fs.writeFile(path.join(dir, '.orderkitrc.json'), '{}');
    expect(manager.configExists(dir)).toBe(true);
  });
});

describe('ciRequested', () => {
  it('reads the CI variable', () => {
    expect(ciRequested({ CI: 'true' })).toBe(true);
    expect(ciRequested({ CI: '1' })).toBe(true);
    expect(ciRequested({ CI: 'false' })).toBe(false);
    expect(ciRequested({})).toBe(false);
  });
});
