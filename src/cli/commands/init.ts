/**
 * Init Command
 *
 * Writes orderkit.config.json in the current directory, and a `.env`
 * skeleton for the credentials when none exists yet.
 */

import { Command } from 'commander';
import inquirer from 'inquirer';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationManager, ACCESS_TOKEN_ENV, SHOP_DOMAIN_ENV } from '../../core/config/configuration-manager.js';
import { Logger } from '../../core/logger.js';
import { type OrderkitConfig, defaultConfig } from '../../types/config.types.js';
import { runCommand } from '../context.js';

const FINANCIAL_STATUSES = ['PAID', 'PENDING', 'AUTHORIZED'];

export type InitAnswers = {
  apiVersion: string;
  currency: string;
  financialStatus: string;
  preferStrikethrough: boolean;
};

export interface InitResult {
  configPath: string;
  /** Set when a new `.env` skeleton was written */
  envPath?: string;
}

export function defaultAnswers(): InitAnswers {
  return {
    apiVersion: defaultConfig.apiVersion,
    currency: defaultConfig.currency,
    financialStatus: defaultConfig.orders.financialStatus,
    preferStrikethrough: defaultConfig.orders.preferStrikethrough,
  };
}

/**
 * Writes the config file (validated like any loaded one) and the `.env`
 * skeleton. An existing `.env` is never touched.
 */
export async function initProject(
  cwd: string,
  answers: InitAnswers,
  manager: ConfigurationManager = new ConfigurationManager(),
): Promise<InitResult> {
  const config: OrderkitConfig = manager.resolve({
    apiVersion: answers.apiVersion,
    currency: answers.currency.toUpperCase(),
    orders: {
      financialStatus: answers.financialStatus,
      preferStrikethrough: answers.preferStrikethrough,
    },
  });
  const configPath = await manager.writeConfig(config, path.join(cwd, 'orderkit.config.json'));

  const envPath = path.join(cwd, '.env');
  if (fs.existsSync(envPath)) {
    return { configPath };
  }
  await fs.promises.writeFile(envPath, `${SHOP_DOMAIN_ENV}=\n${ACCESS_TOKEN_ENV}=\n`, 'utf-8');
  return { configPath, envPath };
}

async function askAnswers(): Promise<InitAnswers> {
  const defaults = defaultAnswers();
  return inquirer.prompt<InitAnswers>([
    { type: 'input', name: 'apiVersion', message: 'Admin API version:', default: defaults.apiVersion },
    {
      type: 'input',
      name: 'currency',
      message: 'Shop currency:',
      default: defaults.currency,
      validate: (value: string) => /^[A-Za-z]{3}$/.test(value.trim()) || 'Expected a three-letter currency code',
    },
    {
      type: 'list',
      name: 'financialStatus',
      message: 'Financial status of directly created orders:',
      choices: FINANCIAL_STATUSES,
      default: defaults.financialStatus,
    },
    {
      type: 'confirm',
      name: 'preferStrikethrough',
      message: 'Show line discounts struck through on taxed orders (create, then edit)?',
      default: defaults.preferStrikethrough,
    },
  ]);
}

export const initCommand = new Command('init')
  .description('Create orderkit.config.json and a .env skeleton in the current directory')
  .option('-f, --force', 'Overwrite an existing configuration')
  .action(async (options: { force?: boolean }, command: Command) =>
    runCommand(command, async (context) => {
      const manager = new ConfigurationManager();
      if (manager.configExists() && !options.force) {
        Logger.warn('Configuration already exists. Use --force to overwrite.');
        return;
      }

      const interactive = !context.options.yes && !context.ci && process.stdin.isTTY === true;
      const answers = interactive ? await askAnswers() : defaultAnswers();
      const result = await initProject(process.cwd(), answers, manager);

      Logger.success(`Configuration written to ${path.basename(result.configPath)}`);
      if (result.envPath) {
        Logger.success(`Credentials skeleton written to ${path.basename(result.envPath)}`);
      }
      Logger.info('\nNext steps:');
      Logger.info(`  1. Fill in ${SHOP_DOMAIN_ENV} and ${ACCESS_TOKEN_ENV} in .env (keep it out of version control)`);
      Logger.info('  2. Run "orderkit check-config" to verify the credentials');
      Logger.info('  3. Run "orderkit create-order --dry-run" to preview an order');
    }),
  );
