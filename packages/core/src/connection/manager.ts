import { randomUUID } from 'node:crypto';
import type { ConfigStore } from '../config/store.js';
import { HandleConstructionError, PreconditionError, describeError } from '../errors.js';
import type {
  AdminHandle,
  ClientFactory,
  ClientKind,
  ConfigMapping,
  ConfigValue,
  ConsumerHandle,
  Diagnostic,
  HandleSlot,
} from '../types.js';

export const BOOTSTRAP_SERVERS_KEY = 'bootstrap.servers';

export const GROUP_ID_KEY = 'group.id';

export const PARTITION_EOF_KEY = 'enable.partition.eof';

/** The only properties an admin client is built from, besides the bootstrap address. */
export const ADMIN_PROPERTY_KEYS: readonly string[] = [
  'security.protocol',
  'ssl.ca.location',
  'ssl.certificate.location',
  'ssl.key.location',
];

export interface ConnectOptions {
  /** Uniform random number in [0, 1). */
  random?: () => number;
  generateGroupId?: () => string;
}

export interface ConnectOutcome {
  admin: HandleSlot<AdminHandle>;
  consumer: HandleSlot<ConsumerHandle>;
  resolvedBroker?: string;
  generatedGroupId?: string;
  diagnostics: Diagnostic[];
}

export function generateGroupId(): string {
  return randomUUID().replace(/-/g, '');
}

export function absent<T>(): HandleSlot<T> {
  return { kind: 'absent' };
}

export function present<T>(handle: T): HandleSlot<T> {
  return { kind: 'present', handle };
}

/**
 * Picks the address to bootstrap from. A list yields one candidate chosen
 * uniformly at random; an empty list or a non-string value yields nothing.
 */
export function resolveBootstrapServer(value: ConfigValue | undefined, random: () => number = Math.random): string | undefined {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return undefined;
    }
    const index = Math.min(Math.floor(random() * value.length), value.length - 1);
    return value[index];
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    return value;
  }
  return undefined;
}

export function adminProperties(config: Readonly<ConfigMapping>, bootstrapServer: string): ConfigMapping {
  const properties: ConfigMapping = {};
  for (const key of ADMIN_PROPERTY_KEYS) {
    const value = config[key];
    if (value !== undefined) {
      properties[key] = value;
    }
  }
  properties[BOOTSTRAP_SERVERS_KEY] = bootstrapServer;
  return properties;
}

export function consumerProperties(config: Readonly<ConfigMapping>, bootstrapServer: string): ConfigMapping {
  return {
    ...config,
    [BOOTSTRAP_SERVERS_KEY]: bootstrapServer,
    [PARTITION_EOF_KEY]: true,
  };
}

function failure(error: { code: string; message: string }): Diagnostic {
  return { level: 'fail', code: error.code, message: error.message };
}

async function constructHandle<T>(
  client: ClientKind,
  create: () => Promise<T>,
): Promise<{ slot: HandleSlot<T>; error?: HandleConstructionError }> {
  try {
    return { slot: present(await create()) };
  } catch (error) {
    const label = client === 'admin' ? 'Admin client' : 'Consumer';
    return {
      slot: absent(),
      error: new HandleConstructionError(client, `${label} connection failed: ${describeError(error)}`, error),
    };
  }
}

/**
 * Builds the admin and consumer clients from the stored configuration.
 *
 * Never rejects: every failure ends up in `diagnostics` and whichever clients
 * were built are returned.
 */
export async function connectClients(
  store: ConfigStore,
  factory: ClientFactory,
  options: ConnectOptions = {},
): Promise<ConnectOutcome> {
  const outcome: ConnectOutcome = {
    admin: absent(),
    consumer: absent(),
    diagnostics: [],
  };

  if (store.isEmpty()) {
    outcome.diagnostics.push(failure(new PreconditionError('CONFIG_REQUIRED', 'Configuration required')));
    return outcome;
  }

  if (!store.has(GROUP_ID_KEY)) {
    const groupId = (options.generateGroupId ?? generateGroupId)();
    store.set(GROUP_ID_KEY, groupId);
    outcome.generatedGroupId = groupId;
    outcome.diagnostics.push({
      level: 'ok',
      code: 'GROUP_ID_GENERATED',
      message: `Group ID not configured, using: ${groupId}`,
    });
  }

  const bootstrapServer = resolveBootstrapServer(store.get(BOOTSTRAP_SERVERS_KEY), options.random);
  if (bootstrapServer === undefined) {
    outcome.diagnostics.push(failure(new PreconditionError('BOOTSTRAP_REQUIRED', 'Bootstrap server not configured')));
    return outcome;
  }

  const config = store.snapshot();

  const admin = await constructHandle('admin', () => factory.createAdmin(adminProperties(config, bootstrapServer)));
  outcome.admin = admin.slot;
  if (admin.error) {
    outcome.diagnostics.push(failure(admin.error));
  } else {
    outcome.resolvedBroker = bootstrapServer;
    outcome.diagnostics.push({ level: 'ok', code: 'ADMIN_CONNECTED', message: 'Admin client connected' });
  }

  const consumer = await constructHandle('consumer', () =>
    factory.createConsumer(consumerProperties(config, bootstrapServer)),
  );
  outcome.consumer = consumer.slot;
  if (consumer.error) {
    outcome.diagnostics.push(failure(consumer.error));
  } else {
    outcome.resolvedBroker = bootstrapServer;
    outcome.diagnostics.push({ level: 'ok', code: 'CONSUMER_CONNECTED', message: 'Consumer connected' });
  }

  return outcome;
}
