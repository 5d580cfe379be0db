export type ConfigValue = string | number | boolean | string[];

export type ConfigMapping = Record<string, ConfigValue>;

export interface BrokerRecord {
  id: number;
  host: string;
  port: number;
}

/**
 * One point-in-time answer to a topology query.
 *
 * `originBrokerId` and `controllerId` are what the responding broker claims;
 * they are not guaranteed to be members of `brokers`.
 */
export interface MetadataSnapshot {
  readonly clusterId: string;
  readonly originBrokerName: string;
  readonly originBrokerId: number;
  /**
   * Set when the client could not tell which broker answered (for example a
   * seed behind a load balancer). `originBrokerId` is then a placeholder.
   */
  readonly originUnidentified?: boolean;
  readonly controllerId: number;
  readonly brokers: ReadonlyMap<number, BrokerRecord>;
}

export interface ResourceConfigEntry {
  name: string;
  value?: string;
  source: string;
  readOnly: boolean;
  sensitive: boolean;
}

export interface BrokerResourceRef {
  kind: 'broker';
  id: number;
}

export interface AdminHandle {
  listTopologyMetadata(timeoutMs: number): Promise<MetadataSnapshot>;
  describeResourceConfig(ref: BrokerResourceRef, timeoutMs: number): Promise<ReadonlyMap<string, ResourceConfigEntry>>;
  close(): Promise<void>;
}

export interface ConsumerHandle {
  listTopologyMetadata(timeoutMs: number): Promise<MetadataSnapshot>;
  close(): Promise<void>;
}

export interface ClientFactory {
  createAdmin(properties: ConfigMapping): Promise<AdminHandle>;
  createConsumer(properties: ConfigMapping): Promise<ConsumerHandle>;
}

export type HandleSlot<T> = { kind: 'absent' } | { kind: 'present'; handle: T };

export type ClientKind = 'admin' | 'consumer';

export type DiagnosticLevel = 'ok' | 'warn' | 'fail';

export interface Diagnostic {
  level: DiagnosticLevel;
  code: string;
  message: string;
}

export interface ReconPolicy {
  timeoutMs: number;
  allowList: readonly string[];
  nameWidth: number;
  valueWidth: number;
}
