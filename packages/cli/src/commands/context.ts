import type { Diagnostic, ReconSession } from '@kafkarecon/core';
import type { CliDependencies } from '../types.js';

export interface CommandContext {
  /** Words after the command name. */
  args: string[];
  session: ReconSession;
  deps: CliDependencies;
}

export type CommandHandler = (context: CommandContext) => Promise<void>;

export function reportDiagnostic(deps: CliDependencies, diagnostic: Diagnostic): void {
  switch (diagnostic.level) {
    case 'ok':
      deps.logger.success(diagnostic.message);
      return;
    case 'warn':
      deps.logger.warn(diagnostic.message);
      return;
    case 'fail':
      deps.logger.error(diagnostic.message);
      return;
  }
}
