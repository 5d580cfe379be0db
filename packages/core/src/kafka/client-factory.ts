import kafkajs from 'kafkajs';
import type { Admin, Consumer, ConsumerConfig, KafkaConfig, logCreator } from 'kafkajs';
import { ResourceFetchError, TimeoutError } from '../errors.js';
import { DEFAULT_TIMEOUT_MS } from '../policy.js';
import type {
  AdminHandle,
  BrokerRecord,
  BrokerResourceRef,
  ClientFactory,
  ConfigMapping,
  ConsumerHandle,
  MetadataSnapshot,
  ResourceConfigEntry,
} from '../types.js';
import { withTimeout } from '../utils/timeout.js';
import { PropertyError, translateProperties, type ReadTextFile } from './properties.js';

const { Kafka, ConfigResourceTypes, logLevel } = kafkajs;

export type ClusterDescription = Awaited<ReturnType<Admin['describeCluster']>>;

type DescribeConfigsResponse = Awaited<ReturnType<Admin['describeConfigs']>>;

type KafkaJsConfigEntry = DescribeConfigsResponse['resources'][number]['configEntries'][number];

/** The part of a kafkajs admin client the handles talk to. */
export type ClusterAdminApi = Pick<Admin, 'connect' | 'disconnect' | 'describeCluster' | 'describeConfigs'>;

export type DebugLog = (message: string, data?: Record<string, unknown>) => void;

const CONFIG_SOURCE_NAMES: Record<number, string> = {
  0: 'UNKNOWN',
  1: 'TOPIC_CONFIG',
  2: 'DYNAMIC_BROKER_CONFIG',
  3: 'DYNAMIC_DEFAULT_BROKER_CONFIG',
  4: 'STATIC_BROKER_CONFIG',
  5: 'DEFAULT_CONFIG',
  6: 'DYNAMIC_BROKER_LOGGER_CONFIG',
};

export function configSourceName(source: number): string {
  return CONFIG_SOURCE_NAMES[source] ?? `UNKNOWN(${String(source)})`;
}

/**
 * Maps a kafkajs cluster description onto a metadata snapshot.
 *
 * kafkajs does not say which broker answered, so the origin is the broker
 * listening on one of the addresses the client bootstrapped from. When none
 * matches, the origin is reported as `<seed>/bootstrap` with id -1 and marked
 * unidentified.
 */
export function toMetadataSnapshot(cluster: ClusterDescription, seeds: readonly string[]): MetadataSnapshot {
  const brokers = new Map<number, BrokerRecord>();
  for (const broker of cluster.brokers) {
    brokers.set(broker.nodeId, { id: broker.nodeId, host: broker.host, port: broker.port });
  }

  const controllerId = cluster.controller ?? -1;
  for (const seed of seeds) {
    const match = [...brokers.values()].find((broker) => `${broker.host}:${String(broker.port)}` === seed);
    if (match) {
      return {
        clusterId: cluster.clusterId,
        originBrokerName: `${seed}/${String(match.id)}`,
        originBrokerId: match.id,
        controllerId,
        brokers,
      };
    }
  }

  return {
    clusterId: cluster.clusterId,
    originBrokerName: `${seeds[0] ?? 'unknown'}/bootstrap`,
    originBrokerId: -1,
    originUnidentified: true,
    controllerId,
    brokers,
  };
}

export function toResourceConfigEntry(entry: KafkaJsConfigEntry): ResourceConfigEntry {
  const value: unknown = entry.configValue;
  return {
    name: entry.configName,
    value: typeof value === 'string' ? value : undefined,
    source: configSourceName(entry.configSource),
    readOnly: entry.readOnly,
    sensitive: entry.isSensitive,
  };
}

export class KafkaJsAdminHandle implements AdminHandle {
  private readonly admin: ClusterAdminApi;

  private readonly seeds: readonly string[];

  constructor(admin: ClusterAdminApi, seeds: readonly string[]) {
    this.admin = admin;
    this.seeds = seeds;
  }

  async listTopologyMetadata(timeoutMs: number): Promise<MetadataSnapshot> {
    const cluster = await withTimeout('Metadata request', timeoutMs, this.admin.describeCluster());
    return toMetadataSnapshot(cluster, this.seeds);
  }

  async describeResourceConfig(
    ref: BrokerResourceRef,
    timeoutMs: number,
  ): Promise<ReadonlyMap<string, ResourceConfigEntry>> {
    const response = await withTimeout(
      `Config request for broker ${String(ref.id)}`,
      timeoutMs,
      this.admin.describeConfigs({
        resources: [{ type: ConfigResourceTypes.BROKER, name: String(ref.id) }],
        includeSynonyms: false,
      }),
    );

    const resource = response.resources[0];
    if (!resource) {
      throw new ResourceFetchError(ref.id, `Broker ${String(ref.id)} returned no config resource`);
    }
    if (resource.errorCode !== 0) {
      throw new ResourceFetchError(ref.id, resource.errorMessage || `error code ${String(resource.errorCode)}`);
    }

    const entries = new Map<string, ResourceConfigEntry>();
    for (const entry of resource.configEntries) {
      entries.set(entry.configName, toResourceConfigEntry(entry));
    }
    return entries;
  }

  async close(): Promise<void> {
    await this.admin.disconnect();
  }
}

export class KafkaJsConsumerHandle implements ConsumerHandle {
  private readonly consumer: Pick<Consumer, 'disconnect'>;

  private readonly openMetadataClient: () => ClusterAdminApi;

  private readonly seeds: readonly string[];

  /**
   * kafkajs consumers expose no cluster description, so topology is read
   * through a short-lived admin client built from the consumer's own
   * configuration.
   */
  constructor(consumer: Pick<Consumer, 'disconnect'>, openMetadataClient: () => ClusterAdminApi, seeds: readonly string[]) {
    this.consumer = consumer;
    this.openMetadataClient = openMetadataClient;
    this.seeds = seeds;
  }

  async listTopologyMetadata(timeoutMs: number): Promise<MetadataSnapshot> {
    const client = this.openMetadataClient();
    const request = async (): Promise<ClusterDescription> => {
      try {
        await client.connect();
        return await client.describeCluster();
      } finally {
        await client.disconnect();
      }
    };
    const cluster = await withTimeout('Metadata request', timeoutMs, request());
    return toMetadataSnapshot(cluster, this.seeds);
  }

  async close(): Promise<void> {
    await this.consumer.disconnect();
  }
}

/** The part of a kafkajs `Kafka` instance the factory builds clients from. */
export interface KafkaClientSource {
  admin(): ClusterAdminApi;
  consumer(config: ConsumerConfig): Pick<Consumer, 'connect' | 'disconnect'>;
}

export type CreateKafka = (config: KafkaConfig) => KafkaClientSource;

export interface KafkaJsClientFactoryOptions {
  /** Ceiling for establishing each client connection. */
  connectTimeoutMs?: number;
  debug?: DebugLog;
  readText?: ReadTextFile;
  createKafka?: CreateKafka;
}

const settled = (): void => undefined;

/**
 * Builds connected kafkajs clients from librdkafka-style properties.
 *
 * Clients never retry and their socket and request timeouts are capped at
 * the connect timeout, so a failed connect stops dialling soon after the
 * factory gives up on it.
 */
export class KafkaJsClientFactory implements ClientFactory {
  private readonly connectTimeoutMs: number;

  private readonly debug: DebugLog;

  private readonly readText: ReadTextFile | undefined;

  private readonly kafkaFor: CreateKafka;

  constructor(options: KafkaJsClientFactoryOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.debug = options.debug ?? (() => undefined);
    this.readText = options.readText;
    this.kafkaFor = options.createKafka ?? ((config) => new Kafka(config));
  }

  async createAdmin(properties: ConfigMapping): Promise<AdminHandle> {
    const translated = await translateProperties(properties, this.readText);
    this.reportIgnored('admin', translated.ignored);

    const admin = this.createKafka(translated.kafka).admin();
    await this.connectOrRelease('Admin connection', admin);
    return new KafkaJsAdminHandle(admin, translated.seeds);
  }

  async createConsumer(properties: ConfigMapping): Promise<ConsumerHandle> {
    const translated = await translateProperties(properties, this.readText);
    this.reportIgnored('consumer', translated.ignored);

    const groupId = translated.consumer.groupId;
    if (groupId === undefined) {
      throw new PropertyError('"group.id" is required for a consumer');
    }

    const kafka = this.createKafka(translated.kafka);
    const consumer = kafka.consumer({ ...translated.consumer, groupId });
    await this.connectOrRelease('Consumer connection', consumer);
    return new KafkaJsConsumerHandle(consumer, () => kafka.admin(), translated.seeds);
  }

  private createKafka(config: KafkaConfig): KafkaClientSource {
    const forward: logCreator = () => (entry) => {
      this.debug(`[kafkajs] ${entry.namespace}: ${entry.log.message}`, { level: entry.label });
    };
    return this.kafkaFor({
      ...config,
      connectionTimeout: Math.min(config.connectionTimeout ?? this.connectTimeoutMs, this.connectTimeoutMs),
      requestTimeout: Math.min(config.requestTimeout ?? this.connectTimeoutMs, this.connectTimeoutMs),
      retry: { retries: 0 },
      logLevel: logLevel.INFO,
      logCreator: forward,
    });
  }

  private async connectOrRelease(operation: string, client: Pick<Admin, 'connect' | 'disconnect'>): Promise<void> {
    const connecting = client.connect();
    try {
      await withTimeout(operation, this.connectTimeoutMs, connecting);
    } catch (error) {
      if (error instanceof TimeoutError) {
        // the connect attempt outlives the deadline; release once it settles
        void connecting.then(settled, settled).then(() => this.release(operation, client));
      } else {
        await this.release(operation, client);
      }
      throw error;
    }
  }

  private async release(operation: string, client: Pick<Admin, 'disconnect'>): Promise<void> {
    try {
      await client.disconnect();
    } catch (error) {
      this.debug(`${operation}: release after failure did not complete`, { error: String(error) });
    }
  }

  private reportIgnored(client: 'admin' | 'consumer', ignored: string[]): void {
    if (ignored.length > 0) {
      this.debug(`Properties without a kafkajs equivalent (${client}): ${ignored.join(', ')}`);
    }
  }
}
