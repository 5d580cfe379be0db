import { vi } from 'vitest';
import type {
  AdminHandle,
  BrokerResourceRef,
  ClientFactory,
  ConfigMapping,
  ConsumerHandle,
  MetadataSnapshot,
  ResourceConfigEntry,
} from '@kafkarecon/core';
import { ReplInterruptError } from '../src/errors.js';
import type { CliDependencies, ClientFactoryOptions, LineReader } from '../src/types.js';
import { createLogger } from '../src/utils/logger.js';

export interface MockState {
  outs: string[];
  errs: string[];
  /** Everything written, stdout and stderr interleaved. */
  lines: string[];
  prompts: string[];
  factoryOptions: ClientFactoryOptions[];
  readerClosed: boolean;
}

export function metadata(overrides: Partial<MetadataSnapshot> = {}): MetadataSnapshot {
  return {
    clusterId: 'cluster-a',
    originBrokerName: 'kafka-1:9092/1',
    originBrokerId: 1,
    controllerId: 1,
    brokers: new Map([
      [1, { id: 1, host: 'kafka-1', port: 9092 }],
      [2, { id: 2, host: 'kafka-2', port: 9093 }],
    ]),
    ...overrides,
  };
}

export function configEntry(name: string, value?: string, overrides: Partial<ResourceConfigEntry> = {}): ResourceConfigEntry {
  return { name, value, source: 'DEFAULT_CONFIG', readOnly: true, sensitive: false, ...overrides };
}

export class MockAdminHandle implements AdminHandle {
  metadata: MetadataSnapshot | Error = metadata();

  configs = new Map<number, ResourceConfigEntry[] | Error>();

  readonly close = vi.fn(async (): Promise<void> => undefined);

  async listTopologyMetadata(): Promise<MetadataSnapshot> {
    if (this.metadata instanceof Error) {
      throw this.metadata;
    }
    return this.metadata;
  }

  async describeResourceConfig(ref: BrokerResourceRef): Promise<ReadonlyMap<string, ResourceConfigEntry>> {
    const result = this.configs.get(ref.id) ?? [];
    if (result instanceof Error) {
      throw result;
    }
    return new Map(result.map((item) => [item.name, item]));
  }
}

export class MockConsumerHandle implements ConsumerHandle {
  readonly close = vi.fn(async (): Promise<void> => undefined);

  async listTopologyMetadata(): Promise<MetadataSnapshot> {
    return metadata();
  }
}

export class MockClientFactory implements ClientFactory {
  readonly admin = new MockAdminHandle();

  readonly consumer = new MockConsumerHandle();

  readonly adminProperties: ConfigMapping[] = [];

  adminError: Error | undefined;

  consumerError: Error | undefined;

  async createAdmin(properties: ConfigMapping): Promise<AdminHandle> {
    this.adminProperties.push(properties);
    if (this.adminError) {
      throw this.adminError;
    }
    return this.admin;
  }

  async createConsumer(): Promise<ConsumerHandle> {
    if (this.consumerError) {
      throw this.consumerError;
    }
    return this.consumer;
  }
}

export const INTERRUPT = Symbol('interrupt');

export type ScriptLine = string | typeof INTERRUPT;

/**
 * Replays scripted input; runs out like a closed stdin.
 */
export function createScriptedReader(script: readonly ScriptLine[], state: MockState): LineReader {
  const remaining = [...script];
  return {
    async question(prompt: string): Promise<string | undefined> {
      state.prompts.push(prompt);
      const next = remaining.shift();
      if (next === INTERRUPT) {
        throw new ReplInterruptError();
      }
      return next;
    },
    close(): void {
      state.readerClosed = true;
    },
  };
}

export interface MockDepsOptions {
  factory?: ClientFactory;
  script?: readonly ScriptLine[];
  verbose?: boolean;
}

export function createMockDeps(options: MockDepsOptions = {}): {
  deps: CliDependencies;
  state: MockState;
  factory: ClientFactory;
} {
  const state: MockState = {
    outs: [],
    errs: [],
    lines: [],
    prompts: [],
    factoryOptions: [],
    readerClosed: false,
  };
  const factory = options.factory ?? new MockClientFactory();

  const io = {
    out(message: string): void {
      state.outs.push(message);
      state.lines.push(message);
    },
    err(message: string): void {
      state.errs.push(message);
      state.lines.push(message);
    },
  };

  const deps: CliDependencies = {
    io,
    logger: createLogger(io, { noColor: true, verbose: options.verbose ?? false }),
    stdoutIsTTY: false,
    version: '0.1.0',
    createClientFactory(factoryOptions: ClientFactoryOptions): ClientFactory {
      state.factoryOptions.push(factoryOptions);
      return factory;
    },
    createLineReader(): LineReader {
      return createScriptedReader(options.script ?? [], state);
    },
  };

  return { deps, state, factory };
}
