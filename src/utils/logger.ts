/**
 * @arch hexagraph.infra.logging
 *
 * Leveled console logger shared by the library and the CLI.
 */
import chalk from 'chalk';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Sink = 'log' | 'warn' | 'error';

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

/**
 * Logger with a minimum level and an optional `[prefix]`.
 * Debug and info go to stdout, warn and error to stderr.
 * A child follows its parent's level until it is given its own.
 */
class Logger {
  private level: LogLevel | undefined;
  private prefix: string = '';

  constructor(private readonly parent?: Logger) {}

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

  private write(sink: Sink, paint: (text: string) => string, tag: string, message: string, data?: Record<string, unknown>): void {
    console[sink](paint(`[${tag}] ${this.formatMessage(message)}`));
    if (data) {
      console[sink](paint(JSON.stringify(data, jsonReplacer, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.write('log', chalk.gray, 'DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.write('log', chalk.blue, 'INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.write('warn', chalk.yellow, 'WARN', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    if (error instanceof Error) {
      this.write('error', chalk.red, 'ERROR', message);
      console.error(chalk.red(error.stack || error.message));
      return;
    }
    this.write('error', chalk.red, 'ERROR', message, error);
  }

  /**
   * Log a success message (shown at info level and below).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure message (shown at info level and below).
   */
  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a nested prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger(this);
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

/** Node ids are bigints, which JSON.stringify rejects. */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export const logger = new Logger();

export { Logger };
