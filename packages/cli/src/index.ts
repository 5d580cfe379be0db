export { CLI_NAME, createProgram, run, startRecon } from './cli.js';
export { CliError, ReplInterruptError, isCliError, toCliError, usageError } from './errors.js';
export {
  formatBrokers,
  formatCliError,
  formatConfig,
  formatConfigEntries,
  formatPrompt,
  formatTable,
} from './formatter.js';
export type { TableCell } from './formatter.js';
export { splitCommandLine } from './parser.js';
export { executeCommand } from './router.js';
export type { CommandResult } from './router.js';
export { runRepl } from './repl.js';
export { createDefaultDependencies } from './services/defaults.js';
export { createLogger } from './utils/logger.js';
export type { Logger, LoggerOptions } from './utils/logger.js';
export { EXIT_CODES } from './types.js';
export type * from './types.js';
