import chalk from 'chalk';
import { config, LogLevel } from '../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console logger used by every stage of the scraper.
 * `success` is printed at info level.
 */
export class Logger {
  private threshold: number;

  constructor(level: LogLevel = config.logLevel) {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(chalk.gray(message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(message);
  }

  success(message: string): void {
    if (this.enabled('info')) console.info(chalk.green(message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(chalk.yellow(message));
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled('error')) return;
    const detail = error === undefined ? '' : `: ${errorMessage(error)}`;
    console.error(chalk.red(`${message}${detail}`));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = new Logger();
