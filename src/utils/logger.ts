/**
 * Leveled logger.
 *
 * Everything goes to stderr: stdout belongs to the parsers being built,
 * which print help and version text there.
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
  // Shared with child loggers so setLevel on the root reaches them
  private state: { level: LogLevel } = { level: 'warn' };
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.state.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(line: string): void {
    process.stderr.write(`${line}\n`);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.write(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      this.write(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.write(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      this.write(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.write(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      this.write(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.write(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error) {
      if (error instanceof Error) {
        this.write(chalk.red(error.stack || error.message));
      } else {
        this.write(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Log a success message (shown from info level).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    this.write(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure message (shown from info level).
   */
  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    this.write(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix. The child follows the parent's level.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.state = this.state;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
