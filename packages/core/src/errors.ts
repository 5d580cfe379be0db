import type { ClientKind } from './types.js';

export interface StructuredReconError {
  code: string;
  message: string;
  suggestion?: string;
}

export class ReconError extends Error implements StructuredReconError {
  code: string;

  suggestion?: string;

  constructor(error: StructuredReconError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = 'ReconError';
    this.code = error.code;
    this.suggestion = error.suggestion;
  }
}

export class ConfigLoadError extends ReconError {
  readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super(
      {
        code: 'CONFIG_LOAD_ERROR',
        message,
        suggestion: 'The file must contain a flat JSON object of client properties.',
      },
      { cause },
    );
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
  }
}

export type PreconditionCode = 'NOT_CONNECTED' | 'CONFIG_REQUIRED' | 'BOOTSTRAP_REQUIRED' | 'SESSION_BUSY';

export class PreconditionError extends ReconError {
  constructor(code: PreconditionCode, message: string, suggestion?: string) {
    super({ code, message, suggestion });
    this.name = 'PreconditionError';
  }
}

export class HandleConstructionError extends ReconError {
  readonly client: ClientKind;

  constructor(client: ClientKind, message: string, cause?: unknown) {
    super({ code: 'HANDLE_CONSTRUCTION_ERROR', message }, { cause });
    this.name = 'HandleConstructionError';
    this.client = client;
  }
}

export class MetadataFetchError extends ReconError {
  constructor(message: string, cause?: unknown) {
    super({ code: 'METADATA_FETCH_ERROR', message }, { cause });
    this.name = 'MetadataFetchError';
  }
}

export class ResourceFetchError extends ReconError {
  readonly brokerId: number;

  constructor(brokerId: number, message: string, cause?: unknown) {
    super({ code: 'RESOURCE_FETCH_ERROR', message }, { cause });
    this.name = 'ResourceFetchError';
    this.brokerId = brokerId;
  }
}

export class TimeoutError extends ReconError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super({ code: 'TIMEOUT', message: `${operation} timed out after ${String(timeoutMs)}ms` });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'unknown error';
}
