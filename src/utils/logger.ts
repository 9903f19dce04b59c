/**
 * Leveled console logging for the binpick CLI.
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
type Sink = (text: string) => void;

class Logger {
  private level: LogLevel;

  constructor(
    private readonly prefix: string = '',
    level: LogLevel = 'info'
  ) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  // Sinks are looked up per call so console spies in tests take effect.
  private emit(level: Exclude<LogLevel, 'silent'>, paint: Paint, sink: Sink, message: string, extra?: string): void {
    if (!this.enabled(level)) return;
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    sink(paint(`[${level.toUpperCase()}] ${text}`));
    if (extra !== undefined) sink(paint(extra));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', chalk.gray, (t) => console.log(t), message, data && JSON.stringify(data, null, 2));
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', chalk.blue, (t) => console.log(t), message, data && JSON.stringify(data, null, 2));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', chalk.yellow, (t) => console.warn(t), message, data && JSON.stringify(data, null, 2));
  }

  error(message: string, cause?: Error | Record<string, unknown>): void {
    const extra = cause instanceof Error ? (cause.stack ?? cause.message) : cause && JSON.stringify(cause, null, 2);
    this.emit('error', chalk.red, (t) => console.error(t), message, extra);
  }

  /** A found asset; printed at info level, without the level tag. */
  success(message: string): void {
    if (!this.enabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /** Logger for one tool, its prefix joined onto this one's. */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.level);
  }
}

export const logger = new Logger();

export { Logger };
