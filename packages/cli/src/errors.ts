import { ReconError } from '@kafkarecon/core';
import type { ExitCode } from './types.js';
import { isObjectRecord } from './utils.js';

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError) {
    super(error.message);
    this.name = 'CliError';
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

/** Raised by a line reader when the user presses Ctrl+C at the prompt. */
export class ReplInterruptError extends Error {
  constructor() {
    super('Interrupted');
    this.name = 'ReplInterruptError';
  }
}

export function isCliError(value: unknown): value is CliError {
  if (!isObjectRecord(value)) {
    return false;
  }

  const code = value['code'];
  const exitCode = value['exitCode'];
  const name = value['name'];

  return typeof code === 'string' && typeof exitCode === 'number' && name === 'CliError';
}

export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (error instanceof ReconError) {
    return new CliError({
      code: error.code,
      message: error.message,
      suggestion: error.suggestion,
      exitCode: 1,
    });
  }

  if (error instanceof Error) {
    return new CliError({
      code: 'INTERNAL_ERROR',
      message: error.message,
      exitCode: 1,
      suggestion: 'Run with --verbose for more detail.',
    });
  }

  return new CliError({
    code: 'UNKNOWN_ERROR',
    message: 'An unknown error occurred.',
    exitCode: 1,
  });
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'INVALID_ARGUMENT',
    message,
    exitCode: 2,
    suggestion,
  });
}
