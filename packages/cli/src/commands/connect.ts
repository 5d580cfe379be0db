/**
 * `connect` and `disconnect`
 *
 * Both report each client separately; a failing admin client never hides the
 * consumer result and the other way round.
 */
import { withSpinner } from '../utils/spinner.js';
import { reportDiagnostic, type CommandContext } from './context.js';

export async function handleConnect({ session, deps }: CommandContext): Promise<void> {
  const outcome = await withSpinner(deps, 'Connecting to cluster...', () => session.connect());

  outcome.diagnostics.forEach((diagnostic, index) => {
    if (index > 0) {
      deps.io.out('');
    }
    reportDiagnostic(deps, diagnostic);
  });

  if (outcome.resolvedBroker !== undefined) {
    deps.logger.debug(`Bootstrapped from ${outcome.resolvedBroker}`);
  }
}

export async function handleDisconnect({ session, deps }: CommandContext): Promise<void> {
  const outcome = await session.disconnect();
  for (const diagnostic of outcome.diagnostics) {
    reportDiagnostic(deps, diagnostic);
  }
}
