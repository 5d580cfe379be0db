import fs from 'node:fs/promises';
import type { ConnectionOptions } from 'node:tls';
import type { ConsumerConfig, KafkaConfig, SASLOptions } from 'kafkajs';
import type { ConfigMapping, ConfigValue } from '../types.js';

export const DEFAULT_CLIENT_ID = 'kafkarecon';

export type SecurityProtocol = 'plaintext' | 'ssl' | 'sasl_plaintext' | 'sasl_ssl';

export type ReadTextFile = (filePath: string) => Promise<string>;

export interface TranslatedProperties {
  kafka: KafkaConfig;
  /** Addresses the client bootstraps from. */
  seeds: string[];
  consumer: Omit<ConsumerConfig, 'groupId'> & { groupId?: string };
  /** Property names kafkajs has no equivalent for. */
  ignored: string[];
}

/**
 * Property keys understood by the translation below. Anything else is
 * reported back in `ignored`.
 */
const KNOWN_KEYS = new Set([
  'bootstrap.servers',
  'client.id',
  'security.protocol',
  'ssl.ca.location',
  'ssl.certificate.location',
  'ssl.key.location',
  'ssl.key.password',
  'enable.ssl.certificate.verification',
  'sasl.mechanism',
  'sasl.mechanisms',
  'sasl.username',
  'sasl.password',
  'socket.connection.setup.timeout.ms',
  'request.timeout.ms',
  'group.id',
  'session.timeout.ms',
  'heartbeat.interval.ms',
  'allow.auto.create.topics',
]);

export class PropertyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PropertyError';
  }
}

function stringProperty(properties: ConfigMapping, key: string): string | undefined {
  const value = properties[key];
  if (value === undefined) {
    return undefined;
  }
  if (Array.isArray(value)) {
    throw new PropertyError(`"${key}" must be a single value`);
  }
  return String(value);
}

function numberProperty(properties: ConfigMapping, key: string): number | undefined {
  const raw = stringProperty(properties, key);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || raw.trim().length === 0) {
    throw new PropertyError(`"${key}" must be a number, got "${raw}"`);
  }
  return parsed;
}

function booleanProperty(properties: ConfigMapping, key: string): boolean | undefined {
  const raw = stringProperty(properties, key);
  if (raw === undefined) {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true') {
    return true;
  }
  if (normalized === 'false') {
    return false;
  }
  throw new PropertyError(`"${key}" must be true or false, got "${raw}"`);
}

export function parseBrokerList(value: ConfigValue | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const items = Array.isArray(value) ? value : String(value).split(',');
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

const SECURITY_PROTOCOLS: readonly SecurityProtocol[] = ['plaintext', 'ssl', 'sasl_plaintext', 'sasl_ssl'];

export function parseSecurityProtocol(value: string | undefined): SecurityProtocol {
  const normalized = (value ?? 'plaintext').trim().toLowerCase();
  const protocol = SECURITY_PROTOCOLS.find((candidate) => candidate === normalized);
  if (protocol === undefined) {
    throw new PropertyError(`Unsupported security.protocol "${value ?? ''}"`);
  }
  return protocol;
}

function saslOptions(properties: ConfigMapping): SASLOptions {
  const mechanism = stringProperty(properties, 'sasl.mechanism') ?? stringProperty(properties, 'sasl.mechanisms') ?? 'PLAIN';
  const username = stringProperty(properties, 'sasl.username') ?? '';
  const password = stringProperty(properties, 'sasl.password') ?? '';

  switch (mechanism.trim().toUpperCase()) {
    case 'PLAIN':
      return { mechanism: 'plain', username, password };
    case 'SCRAM-SHA-256':
      return { mechanism: 'scram-sha-256', username, password };
    case 'SCRAM-SHA-512':
      return { mechanism: 'scram-sha-512', username, password };
    default:
      throw new PropertyError(`Unsupported sasl.mechanism "${mechanism}"`);
  }
}

async function tlsOptions(properties: ConfigMapping, readText: ReadTextFile): Promise<ConnectionOptions | true> {
  const options: ConnectionOptions = {};
  const caPath = stringProperty(properties, 'ssl.ca.location');
  const certPath = stringProperty(properties, 'ssl.certificate.location');
  const keyPath = stringProperty(properties, 'ssl.key.location');
  const passphrase = stringProperty(properties, 'ssl.key.password');
  const verify = booleanProperty(properties, 'enable.ssl.certificate.verification');

  if (caPath !== undefined) {
    options.ca = [await readText(caPath)];
  }
  if (certPath !== undefined) {
    options.cert = await readText(certPath);
  }
  if (keyPath !== undefined) {
    options.key = await readText(keyPath);
  }
  if (passphrase !== undefined) {
    options.passphrase = passphrase;
  }
  if (verify === false) {
    options.rejectUnauthorized = false;
  }

  return Object.keys(options).length === 0 ? true : options;
}

/**
 * Translates librdkafka-style client properties into kafkajs configuration.
 * TLS material is read from the paths the properties name.
 */
export async function translateProperties(
  properties: ConfigMapping,
  readText: ReadTextFile = (filePath) => fs.readFile(filePath, 'utf8'),
): Promise<TranslatedProperties> {
  const brokers = parseBrokerList(properties['bootstrap.servers']);
  if (brokers.length === 0) {
    throw new PropertyError('"bootstrap.servers" is empty');
  }

  const protocol = parseSecurityProtocol(stringProperty(properties, 'security.protocol'));
  const kafka: KafkaConfig = {
    brokers,
    clientId: stringProperty(properties, 'client.id') ?? DEFAULT_CLIENT_ID,
  };

  if (protocol === 'ssl' || protocol === 'sasl_ssl') {
    kafka.ssl = await tlsOptions(properties, readText);
  }
  if (protocol === 'sasl_plaintext' || protocol === 'sasl_ssl') {
    kafka.sasl = saslOptions(properties);
  }

  const connectionTimeout = numberProperty(properties, 'socket.connection.setup.timeout.ms');
  if (connectionTimeout !== undefined) {
    kafka.connectionTimeout = connectionTimeout;
  }
  const requestTimeout = numberProperty(properties, 'request.timeout.ms');
  if (requestTimeout !== undefined) {
    kafka.requestTimeout = requestTimeout;
  }

  const consumer: TranslatedProperties['consumer'] = {};
  const groupId = stringProperty(properties, 'group.id');
  if (groupId !== undefined) {
    consumer.groupId = groupId;
  }
  const sessionTimeout = numberProperty(properties, 'session.timeout.ms');
  if (sessionTimeout !== undefined) {
    consumer.sessionTimeout = sessionTimeout;
  }
  const heartbeatInterval = numberProperty(properties, 'heartbeat.interval.ms');
  if (heartbeatInterval !== undefined) {
    consumer.heartbeatInterval = heartbeatInterval;
  }
  const allowAutoTopicCreation = booleanProperty(properties, 'allow.auto.create.topics');
  if (allowAutoTopicCreation !== undefined) {
    consumer.allowAutoTopicCreation = allowAutoTopicCreation;
  }

  const ignored = Object.keys(properties).filter((key) => !KNOWN_KEYS.has(key));

  return { kafka, seeds: brokers, consumer, ignored };
}
