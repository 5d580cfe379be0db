/**
 * kafkarecon core - connection lifecycle and cluster introspection
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './errors.js';
export * from './policy.js';

export { ConfigStore, toConfigMapping } from './config/store.js';
export type { ConfigLoadResult } from './config/store.js';

export {
  ADMIN_PROPERTY_KEYS,
  BOOTSTRAP_SERVERS_KEY,
  GROUP_ID_KEY,
  PARTITION_EOF_KEY,
  absent,
  adminProperties,
  connectClients,
  consumerProperties,
  generateGroupId,
  present,
  resolveBootstrapServer,
} from './connection/manager.js';
export type { ConnectOptions, ConnectOutcome } from './connection/manager.js';

export { describeCluster, filterConfigEntries, sortBrokers, summarizeMetadata } from './discovery/cluster.js';
export type { BrokerConfigResult, BrokerIdCheck, ClusterOverview, ClusterReport } from './discovery/cluster.js';

export { NOT_CONNECTED_LABEL, ReconSession } from './session.js';
export type { DisconnectOutcome, ReconSessionOptions } from './session.js';

export {
  KafkaJsAdminHandle,
  KafkaJsClientFactory,
  KafkaJsConsumerHandle,
  configSourceName,
  toMetadataSnapshot,
  toResourceConfigEntry,
} from './kafka/client-factory.js';
export type {
  ClusterAdminApi,
  ClusterDescription,
  CreateKafka,
  DebugLog,
  KafkaClientSource,
  KafkaJsClientFactoryOptions,
} from './kafka/client-factory.js';

export { DEFAULT_CLIENT_ID, PropertyError, parseBrokerList, parseSecurityProtocol, translateProperties } from './kafka/properties.js';
export type { ReadTextFile, SecurityProtocol, TranslatedProperties } from './kafka/properties.js';

export { withTimeout } from './utils/timeout.js';
