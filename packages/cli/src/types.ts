import type { ClientFactory, DebugLog, ReconPolicy } from '@kafkarecon/core';
import type { Logger } from './utils/logger.js';

export type ExitCode = 0 | 1 | 2 | 130;

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  USER_INTERRUPT: 130,
} as const;

export interface CliIO {
  out(message: string): void;
  err(message: string): void;
}

/**
 * Line source for the interactive prompt.
 *
 * `question` resolves with `undefined` once input is closed and rejects with
 * `ReplInterruptError` when the user interrupts.
 */
export interface LineReader {
  question(prompt: string): Promise<string | undefined>;
  close(): void;
}

export interface ClientFactoryOptions {
  timeoutMs: number;
  debug: DebugLog;
}

export interface CliDependencies {
  io: CliIO;
  logger: Logger;
  stdoutIsTTY: boolean;
  version: string;
  createClientFactory(options: ClientFactoryOptions): ClientFactory;
  createLineReader(): LineReader;
}

export interface ReconOptions {
  config?: string;
  timeout?: number;
  nameWidth?: number;
  valueWidth?: number;
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
}

export type DisplayPolicy = Pick<ReconPolicy, 'nameWidth' | 'valueWidth'>;
