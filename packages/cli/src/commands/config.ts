/**
 * `config` and `load <file>`
 */
import { ConfigLoadError, type ConfigValue } from '@kafkarecon/core';
import { formatConfig } from '../formatter.js';
import type { CliDependencies } from '../types.js';
import type { CommandContext } from './context.js';

function printConfig(deps: CliDependencies, entries: ReadonlyArray<readonly [string, ConfigValue]>): void {
  if (entries.length === 0) {
    deps.logger.error('No configuration');
    return;
  }
  deps.io.out(formatConfig(entries));
}

export async function handleConfig({ session, deps }: CommandContext): Promise<void> {
  printConfig(deps, session.config.describe());
}

/**
 * Loads a file into the session configuration. Load failures are reported and
 * leave the configuration as it was.
 */
export async function loadConfigFile({ session, deps }: Omit<CommandContext, 'args'>, filePath: string): Promise<boolean> {
  try {
    const result = await session.config.load(filePath);
    deps.logger.success('Loaded configuration from file:');
    deps.io.out('');
    printConfig(deps, Object.entries(result.loaded));
    return true;
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      deps.logger.error(error.message);
      deps.logger.debug(`${error.code}: ${error.filePath}`, error.suggestion ? { suggestion: error.suggestion } : undefined);
      return false;
    }
    throw error;
  }
}

export async function handleLoad(context: CommandContext): Promise<void> {
  const [filePath, ...extra] = context.args;
  if (filePath === undefined || extra.length > 0) {
    context.deps.logger.error('usage: load <file>');
    return;
  }
  await loadConfigFile(context, filePath);
}
