/**
 * Levelled logger for the envkeep CLI.
 *
 * Everything goes to stderr so that `--format json|yaml` output on stdout
 * stays machine-readable.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class Logger {
  private level: LogLevel = 'info';
  private prefix = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
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

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.blue(this.formatMessage(message)));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.error(chalk.yellow(`⚠ ${this.formatMessage(message)}`));
  }

  error(message: string, error?: Error): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`✗ ${this.formatMessage(message)}`));
    if (error && this.level === 'debug') {
      console.error(chalk.red(error.stack || error.message));
    }
  }

  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.green(`✓ ${message}`));
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
