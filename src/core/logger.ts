/**
 * Logger - Centralized logging utility for orderkit
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

class LoggerInstance {
  private level: LogLevel = LogLevel.INFO;
  private useColors: boolean = true;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setColors(enabled: boolean): void {
    this.useColors = enabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      const prefix = this.useColors ? chalk.gray('[DEBUG]') : '[DEBUG]';
      console.log(prefix, message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.log(message, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      const formatted = this.useColors ? chalk.green(`✓ ${message}`) : `[OK] ${message}`;
      console.log(formatted, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      const prefix = this.useColors ? chalk.yellow('⚠') : '[WARN]';
      const formatted = this.useColors ? chalk.yellow(message) : message;
      console.warn(prefix, formatted, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      const prefix = this.useColors ? chalk.red('✖') : '[ERROR]';
      const formatted = this.useColors ? chalk.red(message) : message;
      console.error(prefix, formatted, ...args);
    }
  }

  /**
   * Section heading, e.g. "=== Order Details ==="
   */
  heading(title: string): void {
    if (this.level <= LogLevel.INFO) {
      const text = `=== ${title} ===`;
      console.log(this.useColors ? chalk.bold.cyan(text) : text);
    }
  }

  /**
   * Aligned "label: value" line; empty values are skipped.
   */
  field(label: string, value: string | number | boolean | undefined | null, indent = 0): void {
    if (this.level > LogLevel.INFO || value === undefined || value === null || value === '') {
      return;
    }
    const pad = ' '.repeat(indent);
    const key = this.useColors ? chalk.gray(`${label}:`) : `${label}:`;
    console.log(`${pad}${key} ${String(value)}`);
  }

  json(label: string, data: unknown): void {
    if (this.level <= LogLevel.INFO) {
      console.log(label);
      console.log(JSON.stringify(data, null, 2));
    }
  }

  table(data: Record<string, unknown>[]): void {
    if (this.level <= LogLevel.INFO) {
      console.table(data);
    }
  }

  newLine(): void {
    if (this.level <= LogLevel.INFO) {
      console.log();
    }
  }
}

export const Logger = new LoggerInstance();
