/**
 * Logger for CLI output
 *
 * Respects --verbose, --quiet and --no-color. Messages go through the given
 * CliIO so the interactive prompt and tests see them in order.
 */
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { CliIO } from '../types.js';

/**
 * Log levels in order of verbosity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Show debug messages and attached data */
  verbose?: boolean;
  /** Only show errors */
  quiet?: boolean;
  /** Disable color output */
  noColor?: boolean;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Info level with a green checkmark */
  success(message: string, data?: Record<string, unknown>): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const plain = new Chalk({ level: 0 });

function shouldOutput(options: LoggerOptions, level: LogLevel): boolean {
  if (options.quiet) {
    return level === 'error';
  }

  if (!options.verbose && level === 'debug') {
    return false;
  }

  return true;
}

function formatTextMessage(c: ChalkInstance, level: LogLevel, message: string, prefix?: string): string {
  switch (level) {
    case 'debug':
      return c.gray(`[debug] ${message}`);
    case 'info':
      if (prefix) {
        return `${prefix} ${message}`;
      }
      return message;
    case 'warn':
      return c.yellow(`${c.bold('warning:')} ${message}`);
    case 'error':
      return c.red(`${c.bold('error:')} ${message}`);
  }
}

export function createLogger(io: CliIO, initial: LoggerOptions = {}): Logger {
  let options: LoggerOptions = { verbose: false, quiet: false, noColor: false, ...initial };

  const colors = (): ChalkInstance => (options.noColor ? plain : chalk);

  const output = (level: LogLevel, message: string, data?: Record<string, unknown>, prefix?: string): void => {
    if (!shouldOutput(options, level)) {
      return;
    }

    const c = colors();
    const formatted = formatTextMessage(c, level, message, prefix);
    if (level === 'error' || level === 'warn') {
      io.err(formatted);
    } else {
      io.out(formatted);
    }

    if (data && options.verbose) {
      io.out(c.gray(JSON.stringify(data, null, 2)));
    }
  };

  return {
    debug(message, data): void {
      output('debug', message, data);
    },

    info(message, data): void {
      output('info', message, data);
    },

    warn(message, data): void {
      output('warn', message, data);
    },

    error(message, data): void {
      output('error', message, data);
    },

    success(message, data): void {
      output('info', message, data, colors().green('✓'));
    },

    configure(next: LoggerOptions): void {
      options = {
        verbose: next.verbose ?? options.verbose,
        quiet: next.quiet ?? options.quiet,
        noColor: next.noColor ?? options.noColor,
      };
    },

    getOptions(): Readonly<LoggerOptions> {
      return { ...options };
    },
  };
}
