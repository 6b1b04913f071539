/**
 * Leveled logging for the library and CLI.
 *
 * Everything goes to stderr so that `refgraph resolve` output on stdout can be piped.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class Logger {
  private level?: LogLevel;
  private prefix: string = '';
  private parent?: Logger;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.error(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      console.error(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      console.error(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.error(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      console.error(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Log a success line (shown unless the level is above info).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.green(`✓ ${message}`));
  }

  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger whose prefix nests under this one.
   * Until setLevel is called on it, the child follows the parent's level.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
