/**
 * Configuration Manager
 *
 * Handles loading, validating, and assembling orderkit configuration.
 * Non-secret settings come from a config file found by cosmiconfig;
 * credentials come from the environment (optionally seeded from `.env`).
 */

import { cosmiconfig } from 'cosmiconfig';
import _Ajv, { type ValidateFunction } from 'ajv';
import { config as loadDotenv } from 'dotenv';
import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as path from 'path';
import {
  OrderkitConfig,
  RuntimeConfig,
  Credentials,
  defaultConfig,
} from '../../types/config.types.js';
import { ConfigurationError } from '../errors.js';
import { Logger } from '../logger.js';
import { configSchema } from './config-schema.js';

// ESM compatibility for Ajv
const Ajv = _Ajv as unknown as typeof _Ajv.default;

export const SHOP_DOMAIN_ENV = 'SHOPIFY_SHOP_DOMAIN';
export const ACCESS_TOKEN_ENV = 'SHOPIFY_API_SECRET';

const CONFIG_FILES = [
  'orderkit.config.json',
  '.orderkitrc',
  '.orderkitrc.json',
  '.orderkitrc.yaml',
  '.orderkitrc.yml',
];

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigurationManager {
  private config: OrderkitConfig | null = null;
  private configPath: string | null = null;
  private explorer = cosmiconfig('orderkit', {
    searchPlaces: [...CONFIG_FILES, 'package.json'],
    packageProp: 'orderkit',
  });

  private ajv: InstanceType<typeof Ajv>;
  private validateSchema: ValidateFunction<OrderkitConfig>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, verbose: true });
    this.validateSchema = this.ajv.compile<OrderkitConfig>(configSchema);
  }

  /**
   * Load configuration from file or search for it. Falls back to defaults
   * when no file exists.
   */
  async loadConfig(configPath?: string): Promise<OrderkitConfig> {
    const result = configPath
      ? await this.explorer.load(configPath)
      : await this.explorer.search();

    if (!result || result.isEmpty) {
      Logger.debug('No configuration file found, using defaults');
      this.config = this.resolve({});
      return this.config;
    }

    this.configPath = result.filepath;
    this.config = this.resolve(result.config);
    Logger.debug(`Loaded configuration from ${result.filepath}`);
    return this.config;
  }

  /**
   * Merge raw file content with defaults and validate the result.
   */
  resolve(rawConfig: unknown): OrderkitConfig {
    const merged = this.mergeWithDefaults(rawConfig);
    if (!this.validateSchema(merged)) {
      const details = (this.validateSchema.errors ?? []).map(
        (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`,
      );
      throw new ConfigurationError(`Invalid configuration: ${details.join('; ')}`);
    }
    return merged;
  }

  /**
   * Seed process.env from a `.env` file. Variables already set win.
   */
  loadEnvironment(envPath: string = path.resolve(process.cwd(), '.env')): void {
    if (!fsSync.existsSync(envPath)) {
      Logger.debug(`No env file at ${envPath}`);
      return;
    }
    const result = loadDotenv({ path: envPath });
    if (result.error) {
      throw new ConfigurationError(`Failed to read ${envPath}: ${result.error.message}`);
    }
    Logger.debug(`Loaded environment from ${envPath}`);
  }

  /**
   * Read the two required credentials.
   */
  readCredentials(env: Env = process.env): Credentials {
    const shopDomain = env[SHOP_DOMAIN_ENV]?.trim() ?? '';
    const accessToken = env[ACCESS_TOKEN_ENV]?.trim() ?? '';

    const missing = [
      shopDomain === '' ? SHOP_DOMAIN_ENV : null,
      accessToken === '' ? ACCESS_TOKEN_ENV : null,
    ].filter((name): name is string => name !== null);

    if (missing.length > 0) {
      throw new ConfigurationError(`${missing.join(' and ')} must be set in the environment or .env file`);
    }

    return {
      shopDomain: shopDomain.replace(/^https?:\/\//, '').replace(/\/+$/, ''),
      accessToken,
    };
  }

  /**
   * Build the single runtime configuration object for this process.
   */
  createRuntimeConfig(config: OrderkitConfig, env: Env = process.env): RuntimeConfig {
    return Object.freeze({
      ...config,
      credentials: Object.freeze(this.readCredentials(env)),
      configPath: this.configPath ?? undefined,
    });
  }

  /**
   * Check if a configuration file exists in the current directory
   */
  configExists(cwd: string = process.cwd()): boolean {
    return CONFIG_FILES.some((file) => fsSync.existsSync(path.join(cwd, file)));
  }

  /**
   * Write a configuration file, `orderkit.config.json` in the working
   * directory unless a path is given.
   */
  async writeConfig(config: OrderkitConfig, filePath: string = path.resolve(process.cwd(), CONFIG_FILES[0])): Promise<string> {
    await fs.writeFile(filePath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
    this.config = config;
    this.configPath = filePath;
    return filePath;
  }

  /**
   * Merge configuration with defaults, section by section
   */
  private mergeWithDefaults(config: unknown): unknown {
    if (!isRecord(config)) {
      return config;
    }
    const section = (key: string): Record<string, unknown> => {
      const value = config[key];
      return isRecord(value) ? value : {};
    };

    return {
      ...defaultConfig,
      ...config,
      fulfillmentRetry: {
        ...defaultConfig.fulfillmentRetry,
        ...section('fulfillmentRetry'),
      },
      shippingNote: {
        ...defaultConfig.shippingNote,
        ...section('shippingNote'),
      },
      orders: {
        ...defaultConfig.orders,
        ...section('orders'),
      },
    };
  }
}

/**
 * Load `.env`, the config file and the credentials in one go.
 */
export async function loadRuntimeConfig(options: { config?: string; envFile?: string } = {}): Promise<RuntimeConfig> {
  const manager = new ConfigurationManager();
  manager.loadEnvironment(options.envFile);
  const config = await manager.loadConfig(options.config);
  return manager.createRuntimeConfig(config);
}

/**
 * True when the process runs under a CI system.
 */
export function ciRequested(env: Env = process.env): boolean {
  const value = env.CI?.trim().toLowerCase();
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}
