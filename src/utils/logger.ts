/**
 * Structured logging infrastructure.
 *
 * Everything goes to stderr: stdout is reserved for generated SQL and JSON
 * reports so that `pgmutate compile --stdout > out.sql` stays clean.
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

type Paint = (text: string) => string;

/**
 * Leveled logger for the pgmutate CLI and compiler.
 * Child loggers add a prefix and follow their root's level.
 */
class Logger {
  private level: LogLevel = 'info';

  constructor(
    private readonly prefix: string = '',
    private readonly root?: Logger
  ) {}

  setLevel(level: LogLevel): void {
    if (this.root) {
      this.root.setLevel(level);
      return;
    }
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.root ? this.root.getLevel() : this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', chalk.gray, `[DEBUG] ${this.tag(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', chalk.blue, `[INFO] ${this.tag(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', chalk.yellow, `[WARN] ${this.tag(message)}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.write('error', chalk.red, `[ERROR] ${this.tag(message)}`);
      if (this.isEnabled('error')) console.error(chalk.red(error.stack ?? error.message));
      return;
    }
    this.write('error', chalk.red, `[ERROR] ${this.tag(message)}`, error);
  }

  /** Completed work, shown at info level. */
  success(message: string): void {
    this.write('info', chalk.green, `✓ ${message}`);
  }

  /** Failed work, shown at info level. */
  fail(message: string): void {
    this.write('info', chalk.red, `✗ ${message}`);
  }

  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.root ?? this);
  }

  private tag(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(level: LogLevel, paint: Paint, line: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    console.error(paint(line));
    if (data) {
      console.error(paint(JSON.stringify(data, null, 2)));
    }
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
