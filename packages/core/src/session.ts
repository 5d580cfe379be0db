import { ConfigStore } from './config/store.js';
import { absent, connectClients, type ConnectOptions, type ConnectOutcome } from './connection/manager.js';
import { describeCluster, type ClusterReport } from './discovery/cluster.js';
import { PreconditionError, describeError } from './errors.js';
import { resolveReconPolicy } from './policy.js';
import type {
  AdminHandle,
  ClientFactory,
  ConsumerHandle,
  Diagnostic,
  HandleSlot,
  ReconPolicy,
} from './types.js';

export const NOT_CONNECTED_LABEL = 'not connected';

export interface ReconSessionOptions {
  factory: ClientFactory;
  policy?: Partial<ReconPolicy>;
  connect?: ConnectOptions;
}

export interface DisconnectOutcome {
  diagnostics: Diagnostic[];
}

async function releaseHandle(
  slot: HandleSlot<AdminHandle | ConsumerHandle>,
  label: string,
  diagnostics: Diagnostic[],
): Promise<void> {
  if (slot.kind === 'absent') {
    return;
  }
  try {
    await slot.handle.close();
    diagnostics.push({ level: 'ok', code: 'DISCONNECTED', message: `${label} disconnected` });
  } catch (error) {
    diagnostics.push({
      level: 'fail',
      code: 'DISCONNECT_FAILED',
      message: `${label} disconnect failed: ${describeError(error)}`,
    });
  }
}

/**
 * State for one interactive session: the configuration, the two client slots
 * and the label of the broker they were bootstrapped from.
 *
 * `connect`, `disconnect` and `describeCluster` are exclusive; a call made
 * while another one is still running is rejected with `SESSION_BUSY`.
 */
export class ReconSession {
  readonly config = new ConfigStore();

  readonly policy: ReconPolicy;

  private adminSlot: HandleSlot<AdminHandle> = absent();

  private consumerSlot: HandleSlot<ConsumerHandle> = absent();

  private brokerLabel = NOT_CONNECTED_LABEL;

  private busy = false;

  private readonly factory: ClientFactory;

  private readonly connectOptions: ConnectOptions;

  constructor(options: ReconSessionOptions) {
    this.factory = options.factory;
    this.policy = resolveReconPolicy(options.policy);
    this.connectOptions = options.connect ?? {};
  }

  get broker(): string {
    return this.brokerLabel;
  }

  get admin(): HandleSlot<AdminHandle> {
    return this.adminSlot;
  }

  get consumer(): HandleSlot<ConsumerHandle> {
    return this.consumerSlot;
  }

  isConnected(): boolean {
    return this.adminSlot.kind === 'present' || this.consumerSlot.kind === 'present';
  }

  async connect(): Promise<ConnectOutcome> {
    return this.exclusive(async () => {
      const released: Diagnostic[] = [];
      if (this.isConnected()) {
        await this.releaseAll(released);
      }

      const outcome = await connectClients(this.config, this.factory, this.connectOptions);
      this.adminSlot = outcome.admin;
      this.consumerSlot = outcome.consumer;
      if (outcome.resolvedBroker !== undefined) {
        this.brokerLabel = outcome.resolvedBroker;
      }
      return { ...outcome, diagnostics: [...released, ...outcome.diagnostics] };
    });
  }

  async disconnect(): Promise<DisconnectOutcome> {
    return this.exclusive(async () => {
      const diagnostics: Diagnostic[] = [];
      if (!this.isConnected()) {
        const error = new PreconditionError('NOT_CONNECTED', 'Not connected');
        diagnostics.push({ level: 'fail', code: error.code, message: error.message });
        return { diagnostics };
      }
      await this.releaseAll(diagnostics);
      return { diagnostics };
    });
  }

  async describeCluster(): Promise<ClusterReport> {
    return this.exclusive(() => describeCluster(this.adminSlot, this.consumerSlot, this.policy));
  }

  /**
   * Releases whatever is still held. Used at process exit.
   */
  async dispose(): Promise<Diagnostic[]> {
    const diagnostics: Diagnostic[] = [];
    await this.releaseAll(diagnostics);
    return diagnostics;
  }

  private async releaseAll(diagnostics: Diagnostic[]): Promise<void> {
    const admin = this.adminSlot;
    const consumer = this.consumerSlot;
    this.adminSlot = absent();
    this.consumerSlot = absent();
    this.brokerLabel = NOT_CONNECTED_LABEL;
    await releaseHandle(admin, 'Admin', diagnostics);
    await releaseHandle(consumer, 'Consumer', diagnostics);
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new PreconditionError(
        'SESSION_BUSY',
        'Another session operation is still running',
        'Wait for it to finish before connecting, disconnecting or describing the cluster.',
      );
    }
    this.busy = true;
    try {
      return await task();
    } finally {
      this.busy = false;
    }
  }
}
