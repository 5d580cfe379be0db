import type { ReconSession } from '@kafkarecon/core';
import { toCliError } from './errors.js';
import { formatCliError } from './formatter.js';
import { getCommandHelp } from './help.js';
import { handleCluster } from './commands/cluster.js';
import { handleConfig, handleLoad } from './commands/config.js';
import { handleConnect, handleDisconnect } from './commands/connect.js';
import type { CommandHandler } from './commands/context.js';
import type { CliDependencies } from './types.js';

export type CommandResult = 'continue' | 'exit';

const handleHelp: CommandHandler = async ({ deps }) => {
  deps.io.out(getCommandHelp());
};

const HANDLERS: ReadonlyMap<string, CommandHandler> = new Map<string, CommandHandler>([
  ['config', handleConfig],
  ['load', handleLoad],
  ['connect', handleConnect],
  ['disconnect', handleDisconnect],
  ['cluster', handleCluster],
  ['help', handleHelp],
  ['?', handleHelp],
]);

/**
 * Dispatches one tokenized prompt line. Failures are reported and never end
 * the loop; only `exit` does.
 */
export async function executeCommand(
  words: readonly string[],
  session: ReconSession,
  deps: CliDependencies,
): Promise<CommandResult> {
  const [name, ...args] = words;
  if (name === undefined) {
    return 'continue';
  }

  if (name === 'exit') {
    return 'exit';
  }

  const handler = HANDLERS.get(name);
  if (!handler) {
    deps.logger.error(`Command not found: ${name}`);
    return 'continue';
  }

  try {
    await handler({ args, session, deps });
  } catch (error) {
    const cliError = toCliError(error);
    deps.logger.error(formatCliError(cliError));
    if (error instanceof Error && error.stack) {
      deps.logger.debug(error.stack);
    }
  }
  return 'continue';
}
