/**
 * `cluster`
 *
 * Prints cluster identity, the broker table, the origin and controller checks
 * and, with an admin client, the allow-listed configuration of every broker.
 */
import type { ClusterReport } from '@kafkarecon/core';
import { formatBrokers, formatConfigEntries } from '../formatter.js';
import type { CliDependencies, DisplayPolicy } from '../types.js';
import { withSpinner } from '../utils/spinner.js';
import { reportDiagnostic, type CommandContext } from './context.js';

export function renderClusterReport(report: ClusterReport, deps: CliDependencies, display: DisplayPolicy): void {
  const overview = report.overview;
  if (!overview) {
    for (const diagnostic of report.diagnostics) {
      reportDiagnostic(deps, diagnostic);
    }
    return;
  }

  deps.logger.success(`Cluster ID: ${overview.clusterId}`);
  deps.io.out('');
  deps.logger.success(`Metadata origin broker name: ${overview.originBrokerName}`);
  deps.io.out('');
  deps.io.out(formatBrokers(overview.brokers));

  for (const diagnostic of report.diagnostics) {
    deps.io.out('');
    reportDiagnostic(deps, diagnostic);
  }

  for (const result of report.brokerConfigs) {
    deps.io.out('');
    if (result.status === 'failed') {
      deps.logger.error(result.error.message);
      continue;
    }
    deps.logger.info(`Broker ${String(result.brokerId)}:`);
    deps.io.out(formatConfigEntries(result.entries, display));
  }
}

export async function handleCluster({ session, deps }: CommandContext): Promise<void> {
  const report = await withSpinner(deps, 'Querying cluster metadata...', () => session.describeCluster());
  if (report.source !== undefined) {
    deps.logger.debug(`Metadata fetched through the ${report.source} client`);
  }
  renderClusterReport(report, deps, session.policy);
}
