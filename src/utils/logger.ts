/**
 * Levelled console logging for the CLI.
 *
 * Tagged lines (`[INFO] ...`) go through `debug`/`info`/`warn`/`error`.
 * `passthrough` writes external tool output byte-for-byte, with no tag or colour.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Channel = 'log' | 'warn' | 'error';

interface LevelStyle {
  tag: string;
  colour: ChalkInstance;
  channel: Channel;
}

const STYLES: Record<Exclude<LogLevel, 'silent'>, LevelStyle> = {
  debug: { tag: 'DEBUG', colour: chalk.gray, channel: 'log' },
  info: { tag: 'INFO', colour: chalk.blue, channel: 'log' },
  warn: { tag: 'WARN', colour: chalk.yellow, channel: 'warn' },
  error: { tag: 'ERROR', colour: chalk.red, channel: 'error' },
};

export interface VerbosityFlags {
  verbose?: boolean;
  quiet?: boolean;
}

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Map `--verbose` / `--quiet` onto a level. Quiet wins when both are set.
   */
  applyFlags(flags: VerbosityFlags): void {
    if (flags.quiet) {
      this.level = 'error';
    } else if (flags.verbose) {
      this.level = 'debug';
    }
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, extra?: string): void {
    if (!this.isEnabled(level)) return;
    const { tag, colour, channel } = STYLES[level];
    console[channel](colour(`[${tag}] ${message}`));
    if (extra !== undefined) {
      console[channel](colour(extra));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data && JSON.stringify(data, null, 2));
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data && JSON.stringify(data, null, 2));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data && JSON.stringify(data, null, 2));
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    let extra: string | undefined;
    if (error instanceof Error) {
      extra = error.stack || error.message;
    } else if (error) {
      extra = JSON.stringify(error, null, 2);
    }
    this.emit('error', message, extra);
  }

  success(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Write text verbatim to stdout. Suppressed only at `silent`.
   */
  passthrough(text: string): void {
    if (!text || this.level === 'silent') return;
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  }
}

export const logger = new Logger();

export { Logger };
