import { MetadataFetchError, PreconditionError, ResourceFetchError, describeError } from '../errors.js';
import { DEFAULT_RECON_POLICY } from '../policy.js';
import type {
  AdminHandle,
  BrokerRecord,
  ConsumerHandle,
  Diagnostic,
  HandleSlot,
  MetadataSnapshot,
  ReconPolicy,
  ResourceConfigEntry,
} from '../types.js';

export interface BrokerIdCheck {
  id: number;
  valid: boolean;
}

export type BrokerConfigResult =
  | { brokerId: number; status: 'ok'; entries: ResourceConfigEntry[] }
  | { brokerId: number; status: 'failed'; error: ResourceFetchError };

export interface ClusterOverview {
  clusterId: string;
  originBrokerName: string;
  brokers: BrokerRecord[];
  origin: BrokerIdCheck;
  controller: BrokerIdCheck;
}

export interface ClusterReport {
  /** Where metadata came from; absent when nothing was fetched. */
  source?: 'admin' | 'consumer';
  overview?: ClusterOverview;
  brokerConfigs: BrokerConfigResult[];
  diagnostics: Diagnostic[];
}

export function sortBrokers(brokers: ReadonlyMap<number, BrokerRecord>): BrokerRecord[] {
  return [...brokers.values()].sort((a, b) => a.id - b.id);
}

export function filterConfigEntries(
  entries: ReadonlyMap<string, ResourceConfigEntry>,
  allowList: readonly string[],
): ResourceConfigEntry[] {
  const allowed = new Set(allowList);
  return [...entries.values()]
    .filter((entry) => allowed.has(entry.name))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

function checkBrokerId(brokers: ReadonlyMap<number, BrokerRecord>, id: number): BrokerIdCheck {
  return { id, valid: brokers.has(id) };
}

function originDiagnostic(metadata: MetadataSnapshot, origin: BrokerIdCheck): Diagnostic {
  if (metadata.originUnidentified) {
    return {
      level: 'warn',
      code: 'ORIGIN_BROKER_UNKNOWN',
      message: `Metadata origin broker could not be identified: ${metadata.originBrokerName}`,
    };
  }
  if (origin.valid) {
    return { level: 'ok', code: 'ORIGIN_BROKER', message: `Metadata origin broker ID: ${String(origin.id)}` };
  }
  return {
    level: 'fail',
    code: 'INVALID_ORIGIN_BROKER',
    message: `Invalid metadata origin broker ID: ${String(origin.id)}`,
  };
}

export function summarizeMetadata(metadata: MetadataSnapshot): { overview: ClusterOverview; diagnostics: Diagnostic[] } {
  const origin = checkBrokerId(metadata.brokers, metadata.originBrokerId);
  const controller = checkBrokerId(metadata.brokers, metadata.controllerId);
  const diagnostics: Diagnostic[] = [
    originDiagnostic(metadata, origin),
    controller.valid
      ? { level: 'ok', code: 'CONTROLLER', message: `Controller broker ID: ${String(controller.id)}` }
      : {
          level: 'fail',
          code: 'INVALID_CONTROLLER',
          message: `Invalid controller broker ID: ${String(controller.id)}`,
        },
  ];

  return {
    overview: {
      clusterId: metadata.clusterId,
      originBrokerName: metadata.originBrokerName,
      brokers: sortBrokers(metadata.brokers),
      origin,
      controller,
    },
    diagnostics,
  };
}

async function fetchBrokerConfig(admin: AdminHandle, broker: BrokerRecord, policy: ReconPolicy): Promise<BrokerConfigResult> {
  try {
    const entries = await admin.describeResourceConfig({ kind: 'broker', id: broker.id }, policy.timeoutMs);
    return { brokerId: broker.id, status: 'ok', entries: filterConfigEntries(entries, policy.allowList) };
  } catch (error) {
    return {
      brokerId: broker.id,
      status: 'failed',
      error: new ResourceFetchError(
        broker.id,
        `Could not describe broker ${String(broker.id)}: ${describeError(error)}`,
        error,
      ),
    };
  }
}

/**
 * Fetches topology from whichever client is available (admin first), validates
 * the origin and controller claims and, with an admin client, enumerates each
 * broker's configuration. A failing broker never stops the others.
 */
export async function describeCluster(
  admin: HandleSlot<AdminHandle>,
  consumer: HandleSlot<ConsumerHandle>,
  policy: ReconPolicy = DEFAULT_RECON_POLICY,
): Promise<ClusterReport> {
  const report: ClusterReport = { brokerConfigs: [], diagnostics: [] };

  let fetchMetadata: (() => Promise<MetadataSnapshot>) | undefined;
  if (admin.kind === 'present') {
    const handle = admin.handle;
    report.source = 'admin';
    fetchMetadata = () => handle.listTopologyMetadata(policy.timeoutMs);
  } else if (consumer.kind === 'present') {
    const handle = consumer.handle;
    report.source = 'consumer';
    fetchMetadata = () => handle.listTopologyMetadata(policy.timeoutMs);
  }

  if (!fetchMetadata) {
    const error = new PreconditionError('NOT_CONNECTED', 'Not connected', 'Run "connect" first.');
    report.diagnostics.push({ level: 'fail', code: error.code, message: error.message });
    return report;
  }

  let metadata: MetadataSnapshot;
  try {
    metadata = await fetchMetadata();
  } catch (error) {
    const fetchError = new MetadataFetchError(`Could not query metadata: ${describeError(error)}`, error);
    report.diagnostics.push({ level: 'fail', code: fetchError.code, message: fetchError.message });
    return report;
  }

  const summary = summarizeMetadata(metadata);
  report.overview = summary.overview;
  report.diagnostics.push(...summary.diagnostics);

  if (admin.kind === 'absent') {
    return report;
  }

  for (const broker of summary.overview.brokers) {
    report.brokerConfigs.push(await fetchBrokerConfig(admin.handle, broker, policy));
  }

  return report;
}
