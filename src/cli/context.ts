/**
 * Command Context
 *
 * What every command needs: the global flags, settings, the gateway, the
 * reporter, spinners and confirmation prompts.
 */

import type { Command } from 'commander';
import inquirer from 'inquirer';
import ora from 'ora';
import type { OrderkitConfig, RuntimeConfig } from '../types/config.types.js';
import type { AdminGateway } from '../core/admin/admin-gateway.js';
import { ShopifyAdminGateway } from '../core/admin/shopify-admin-gateway.js';
import { ConfigurationManager, ciRequested } from '../core/config/configuration-manager.js';
import { OrderkitError, errorMessage } from '../core/errors.js';
import { LogLevel, Logger } from '../core/logger.js';
import { ConsoleReporter } from '../core/reporter/console-reporter.js';

export interface GlobalOptions {
  config?: string;
  envFile?: string;
  verbose?: boolean;
  silent?: boolean;
  color?: boolean;
  ci?: boolean;
  raw?: boolean;
  yes?: boolean;
}

export interface Connection {
  config: RuntimeConfig;
  gateway: AdminGateway;
}

/**
 * Applies --verbose, --silent and --no-color to the Logger.
 */
export function applyOutputOptions(options: GlobalOptions): void {
  if (options.silent) {
    Logger.setLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    Logger.setLevel(LogLevel.DEBUG);
  }
  if (options.color === false) {
    Logger.setColors(false);
  }
}

export class CommandContext {
  readonly options: GlobalOptions;
  readonly reporter: ConsoleReporter;
  readonly ci: boolean;
  private manager = new ConfigurationManager();
  private settingsCache: OrderkitConfig | null = null;
  private connection: Connection | null = null;

  constructor(command: Command) {
    this.options = command.optsWithGlobals<GlobalOptions>();
    this.ci = this.options.ci === true || ciRequested();
    this.reporter = new ConsoleReporter({ raw: this.options.raw });
  }

  /**
   * Settings from `.env` and the config file, without requiring credentials.
   */
  async settings(): Promise<OrderkitConfig> {
    if (!this.settingsCache) {
      this.manager.loadEnvironment(this.options.envFile);
      this.settingsCache = await this.manager.loadConfig(this.options.config);
    }
    return this.settingsCache;
  }

  async connect(): Promise<Connection> {
    if (!this.connection) {
      const config = this.manager.createRuntimeConfig(await this.settings());
      Logger.debug(`Using ${config.credentials.shopDomain} (API ${config.apiVersion})`);
      this.connection = { config, gateway: new ShopifyAdminGateway(config) };
    }
    return this.connection;
  }

  /**
   * Runs one remote step behind a spinner, or a debug line in CI mode.
   */
  async step<T>(text: string, work: () => Promise<T>): Promise<T> {
    if (this.ci) {
      Logger.debug(text);
      return work();
    }
    const spinner = ora({ text, isSilent: this.options.silent === true }).start();
    try {
      const result = await work();
      spinner.succeed();
      return result;
    } catch (error) {
      spinner.fail();
      throw error;
    }
  }

  /**
   * `--yes` answers for the user. Without a terminal to ask on, the answer is no.
   */
  async confirm(message: string): Promise<boolean> {
    if (this.options.yes) {
      return true;
    }
    if (this.ci || !process.stdin.isTTY) {
      Logger.warn(`${message} Pass --yes to confirm without a prompt.`);
      return false;
    }
    const answers = await inquirer.prompt<{ proceed: boolean }>([
      { type: 'confirm', name: 'proceed', message, default: false },
    ]);
    return answers.proceed;
  }
}

export function reportFailure(error: unknown): void {
  if (error instanceof OrderkitError) {
    Logger.error(`${error.name}: ${error.message}`);
  } else {
    Logger.error(`Unexpected error: ${errorMessage(error)}`);
  }
  if (error instanceof Error && error.stack) {
    Logger.debug(error.stack);
  }
  process.exitCode = 1;
}

/**
 * Wraps a command body: builds its context and turns any error into a
 * message and exit status 1.
 */
export async function runCommand(command: Command, body: (context: CommandContext) => Promise<void>): Promise<void> {
  try {
    await body(new CommandContext(command));
  } catch (error) {
    reportFailure(error);
  }
}
