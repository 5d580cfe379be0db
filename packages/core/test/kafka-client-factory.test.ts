import net from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';
import kafkajs from 'kafkajs';
import type { ConfigEntries, ConsumerConfig, DescribeConfigResponse, KafkaConfig } from 'kafkajs';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ResourceFetchError, TimeoutError } from '../src/errors.js';
import {
  KafkaJsAdminHandle,
  KafkaJsClientFactory,
  KafkaJsConsumerHandle,
  configSourceName,
  toMetadataSnapshot,
  toResourceConfigEntry,
  type ClusterAdminApi,
  type ClusterDescription,
  type KafkaClientSource,
} from '../src/kafka/client-factory.js';

const { ConfigResourceTypes, logLevel } = kafkajs;

const cluster: ClusterDescription = {
  clusterId: 'cluster-a',
  controller: 2,
  brokers: [
    { nodeId: 2, host: 'kafka-2', port: 9092 },
    { nodeId: 1, host: 'kafka-1', port: 9092 },
  ],
};

function configEntry(configName: string, configValue: string, overrides: Partial<ConfigEntries> = {}): ConfigEntries {
  return {
    configName,
    configValue,
    isDefault: false,
    configSource: 4,
    isSensitive: false,
    readOnly: true,
    configSynonyms: [],
    ...overrides,
  };
}

function configResponse(
  configEntries: ConfigEntries[],
  errorCode = 0,
  errorMessage = '',
): DescribeConfigResponse {
  return {
    throttleTime: 0,
    resources: [
      { configEntries, errorCode, errorMessage, resourceName: '1', resourceType: ConfigResourceTypes.BROKER },
    ],
  };
}

function fakeAdminApi(response: DescribeConfigResponse = configResponse([])) {
  const api = {
    connect: vi.fn(async (): Promise<void> => undefined),
    disconnect: vi.fn(async (): Promise<void> => undefined),
    describeCluster: vi.fn(async (): Promise<ClusterDescription> => cluster),
    describeConfigs: vi.fn(async (): Promise<DescribeConfigResponse> => response),
  } satisfies ClusterAdminApi;
  return api;
}

describe('configSourceName', () => {
  it('names known sources and keeps unknown numbers visible', () => {
    expect(configSourceName(4)).toBe('STATIC_BROKER_CONFIG');
    expect(configSourceName(5)).toBe('DEFAULT_CONFIG');
    expect(configSourceName(42)).toBe('UNKNOWN(42)');
  });
});

describe('toMetadataSnapshot', () => {
  it('names the origin after the seed address it matches', () => {
    const snapshot = toMetadataSnapshot(cluster, ['kafka-1:9092']);

    expect(snapshot.clusterId).toBe('cluster-a');
    expect(snapshot.controllerId).toBe(2);
    expect(snapshot.originBrokerId).toBe(1);
    expect(snapshot.originBrokerName).toBe('kafka-1:9092/1');
    expect(snapshot.brokers.get(2)).toEqual({ id: 2, host: 'kafka-2', port: 9092 });
  });

  it('falls back to a bootstrap placeholder when no seed matches', () => {
    const snapshot = toMetadataSnapshot({ ...cluster, controller: null }, ['lb.example:9092']);

    expect(snapshot.originBrokerId).toBe(-1);
    expect(snapshot.originBrokerName).toBe('lb.example:9092/bootstrap');
    expect(snapshot.originUnidentified).toBe(true);
    expect(snapshot.controllerId).toBe(-1);
  });
});

describe('toResourceConfigEntry', () => {
  it('maps flags and names the source', () => {
    expect(toResourceConfigEntry(configEntry('ssl.client.auth', 'none', { configSource: 5, readOnly: false }))).toEqual({
      name: 'ssl.client.auth',
      value: 'none',
      source: 'DEFAULT_CONFIG',
      readOnly: false,
      sensitive: false,
    });
  });
});

describe('KafkaJsAdminHandle', () => {
  it('reads topology through the admin client', async () => {
    const api = fakeAdminApi();
    const handle = new KafkaJsAdminHandle(api, ['kafka-2:9092']);

    const snapshot = await handle.listTopologyMetadata(1_000);

    expect(snapshot.originBrokerName).toBe('kafka-2:9092/2');
    expect(api.describeCluster).toHaveBeenCalledTimes(1);
  });

  it('describes the broker resource without synonyms', async () => {
    const api = fakeAdminApi(
      configResponse([
        configEntry('ssl.client.auth', 'required'),
        configEntry('sasl.jaas.config', 'hidden', { isSensitive: true }),
      ]),
    );
    const handle = new KafkaJsAdminHandle(api, ['kafka-1:9092']);

    const entries = await handle.describeResourceConfig({ kind: 'broker', id: 1 }, 1_000);

    expect(api.describeConfigs).toHaveBeenCalledWith({
      resources: [{ type: ConfigResourceTypes.BROKER, name: '1' }],
      includeSynonyms: false,
    });
    expect([...entries.keys()]).toEqual(['ssl.client.auth', 'sasl.jaas.config']);
    expect(entries.get('sasl.jaas.config')?.sensitive).toBe(true);
  });

  it('turns a resource error into a resource fetch error', async () => {
    const api = fakeAdminApi(configResponse([], 29, 'Cluster authorization failed.'));
    const handle = new KafkaJsAdminHandle(api, ['kafka-1:9092']);

    const error = await handle.describeResourceConfig({ kind: 'broker', id: 1 }, 1_000).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ResourceFetchError);
    if (error instanceof ResourceFetchError) {
      expect(error.brokerId).toBe(1);
      expect(error.message).toBe('Cluster authorization failed.');
    }
  });

  it('disconnects on close', async () => {
    const api = fakeAdminApi();
    const handle = new KafkaJsAdminHandle(api, ['kafka-1:9092']);

    await handle.close();

    expect(api.disconnect).toHaveBeenCalledTimes(1);
  });
});

describe('KafkaJsConsumerHandle', () => {
  it('opens and releases a metadata client for each query', async () => {
    const api = fakeAdminApi();
    const consumer = { disconnect: vi.fn(async (): Promise<void> => undefined) };
    const handle = new KafkaJsConsumerHandle(consumer, () => api, ['kafka-1:9092']);

    const snapshot = await handle.listTopologyMetadata(1_000);
    await handle.close();

    expect(snapshot.originBrokerId).toBe(1);
    expect(api.connect).toHaveBeenCalledTimes(1);
    expect(api.disconnect).toHaveBeenCalledTimes(1);
    expect(consumer.disconnect).toHaveBeenCalledTimes(1);
  });

  it('releases the metadata client when the query fails', async () => {
    const api = fakeAdminApi();
    api.describeCluster.mockRejectedValueOnce(new Error('broker went away'));
    const consumer = { disconnect: vi.fn(async (): Promise<void> => undefined) };
    const handle = new KafkaJsConsumerHandle(consumer, () => api, ['kafka-1:9092']);

    await expect(handle.listTopologyMetadata(1_000)).rejects.toThrow('broker went away');
    expect(api.disconnect).toHaveBeenCalledTimes(1);
  });
});

function fakeKafka() {
  const admin = fakeAdminApi();
  const consumer = {
    connect: vi.fn(async (): Promise<void> => undefined),
    disconnect: vi.fn(async (): Promise<void> => undefined),
  };
  const configs: KafkaConfig[] = [];
  const consumerConfigs: ConsumerConfig[] = [];
  const createKafka = vi.fn((config: KafkaConfig): KafkaClientSource => {
    configs.push(config);
    return {
      admin: () => admin,
      consumer: (consumerConfig) => {
        consumerConfigs.push(consumerConfig);
        return consumer;
      },
    };
  });
  return { admin, consumer, configs, consumerConfigs, createKafka };
}

describe('KafkaJsClientFactory', () => {
  it('connects an admin client with retries off and timeouts capped', async () => {
    const kafka = fakeKafka();
    const factory = new KafkaJsClientFactory({ connectTimeoutMs: 500, createKafka: kafka.createKafka });

    const handle = await factory.createAdmin({
      'bootstrap.servers': 'kafka-1:9092',
      'socket.connection.setup.timeout.ms': 200,
      'request.timeout.ms': 30_000,
    });

    expect(kafka.configs[0]).toMatchObject({
      brokers: ['kafka-1:9092'],
      clientId: 'kafkarecon',
      connectionTimeout: 200,
      requestTimeout: 500,
      retry: { retries: 0 },
    });
    expect(kafka.admin.connect).toHaveBeenCalledTimes(1);
    expect((await handle.listTopologyMetadata(1_000)).originBrokerName).toBe('kafka-1:9092/1');
  });

  it('connects a consumer with its group and reports keys kafkajs does not take', async () => {
    const kafka = fakeKafka();
    const debug = vi.fn();
    const factory = new KafkaJsClientFactory({ createKafka: kafka.createKafka, debug });

    await factory.createConsumer({
      'bootstrap.servers': 'kafka-1:9092',
      'group.id': 'recon',
      'enable.partition.eof': true,
    });

    expect(kafka.consumerConfigs).toEqual([{ groupId: 'recon' }]);
    expect(kafka.consumer.connect).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('Properties without a kafkajs equivalent (consumer): enable.partition.eof');
  });

  it('rejects a consumer without a group id before building a client', async () => {
    const kafka = fakeKafka();
    const factory = new KafkaJsClientFactory({ createKafka: kafka.createKafka });

    await expect(factory.createConsumer({ 'bootstrap.servers': 'kafka-1:9092' })).rejects.toThrow(
      '"group.id" is required for a consumer',
    );
    expect(kafka.createKafka).not.toHaveBeenCalled();
  });

  it('releases a client whose connect fails', async () => {
    const kafka = fakeKafka();
    kafka.admin.connect.mockRejectedValueOnce(new Error('Connection refused'));
    kafka.admin.disconnect.mockRejectedValueOnce(new Error('already closed'));
    const debug = vi.fn();
    const factory = new KafkaJsClientFactory({ createKafka: kafka.createKafka, debug });

    await expect(factory.createAdmin({ 'bootstrap.servers': 'kafka-1:9092' })).rejects.toThrow('Connection refused');
    expect(kafka.admin.disconnect).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('Admin connection: release after failure did not complete', {
      error: 'Error: already closed',
    });
  });

  it('releases a timed-out client only after its connect settles', async () => {
    const kafka = fakeKafka();
    let finish: () => void = () => undefined;
    kafka.admin.connect.mockReturnValueOnce(
      new Promise<void>((resolve) => {
        finish = resolve;
      }),
    );
    const factory = new KafkaJsClientFactory({ connectTimeoutMs: 20, createKafka: kafka.createKafka });

    const error = await factory.createAdmin({ 'bootstrap.servers': 'kafka-1:9092' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(kafka.admin.disconnect).not.toHaveBeenCalled();

    finish();

    await vi.waitFor(() => {
      expect(kafka.admin.disconnect).toHaveBeenCalledTimes(1);
    });
  });

  it('forwards kafkajs log lines to debug', async () => {
    const kafka = fakeKafka();
    const debug = vi.fn();
    const factory = new KafkaJsClientFactory({ createKafka: kafka.createKafka, debug });
    await factory.createAdmin({ 'bootstrap.servers': 'kafka-1:9092' });

    const log = kafka.configs[0]?.logCreator?.(logLevel.INFO);
    log?.({
      namespace: 'Connection',
      level: logLevel.ERROR,
      label: 'ERROR',
      log: { timestamp: '2024-01-01T00:00:00.000Z', message: 'Connection timeout' },
    });

    expect(log).toBeDefined();
    expect(debug).toHaveBeenCalledWith('[kafkajs] Connection: Connection timeout', { level: 'ERROR' });
  });
});

describe('KafkaJsClientFactory against a local socket', () => {
  const servers: net.Server[] = [];
  const sockets = new Set<net.Socket>();
  let accepted = 0;

  async function listen(server: net.Server): Promise<number> {
    servers.push(server);
    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', resolve);
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }
    return address.port;
  }

  function silentServer(): net.Server {
    return net.createServer((socket) => {
      accepted += 1;
      sockets.add(socket);
      socket.on('error', () => undefined);
      socket.on('close', () => {
        sockets.delete(socket);
      });
    });
  }

  afterEach(async () => {
    for (const socket of sockets) {
      socket.destroy();
    }
    sockets.clear();
    accepted = 0;
    await Promise.all(
      servers.splice(0).map(
        (server) =>
          new Promise<void>((resolve) => {
            server.close(() => resolve());
          }),
      ),
    );
  });

  it('turns a refused connection into a construction failure', async () => {
    const server = net.createServer();
    const port = await listen(server);
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    const factory = new KafkaJsClientFactory({ connectTimeoutMs: 2_000 });

    const error = await factory.createAdmin({ 'bootstrap.servers': `127.0.0.1:${String(port)}` }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(TimeoutError);
  });

  it('stops dialling a broker that never answers once the connect times out', async () => {
    const port = await listen(silentServer());
    const factory = new KafkaJsClientFactory({ connectTimeoutMs: 300 });

    await expect(factory.createAdmin({ 'bootstrap.servers': `127.0.0.1:${String(port)}` })).rejects.toThrow(
      'Admin connection timed out after 300ms',
    );

    await vi.waitFor(
      () => {
        expect(sockets.size).toBe(0);
      },
      { timeout: 5_000, interval: 50 },
    );
    const dialled = accepted;
    await delay(1_000);

    expect(accepted).toBe(dialled);
    expect(sockets.size).toBe(0);
  }, 15_000);
});
