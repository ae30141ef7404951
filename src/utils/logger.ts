/**
 * Leveled console logging for the CLI and the validator.
 *
 * Everything goes to stderr so that `--json` output on stdout stays parseable.
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
  private prefix: string = '';
  private timestamps = false;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Prefix every line with an ISO timestamp. */
  setTimestamps(enabled: boolean): void {
    this.timestamps = enabled;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(tag: string, message: string): string {
    const scoped = this.prefix ? `[${this.prefix}] ${message}` : message;
    const line = `[${tag}] ${scoped}`;
    return this.timestamps ? `${new Date().toISOString()} ${line}` : line;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.error(chalk.gray(this.formatMessage('DEBUG', message)));
    if (data) {
      console.error(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.blue(this.formatMessage('INFO', message)));
    if (data) {
      console.error(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.error(chalk.yellow(this.formatMessage('WARN', message)));
    if (data) {
      console.error(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(this.formatMessage('ERROR', message)));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Create a child logger with a prefix. The child copies the parent's
   * level at creation time.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.timestamps = this.timestamps;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
