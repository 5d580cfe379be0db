/**
 * Interactive prompt loop
 */
import type { ReconSession } from '@kafkarecon/core';
import { CliError, ReplInterruptError } from './errors.js';
import { formatCliError, formatPrompt } from './formatter.js';
import { splitCommandLine } from './parser.js';
import { executeCommand } from './router.js';
import { EXIT_CODES, type CliDependencies, type ExitCode, type LineReader } from './types.js';

/**
 * Reads and runs commands until `exit`, end of input or an interrupt.
 * The reader is closed on every way out.
 */
export async function runRepl(session: ReconSession, deps: CliDependencies, reader: LineReader): Promise<ExitCode> {
  try {
    for (;;) {
      const line = await reader.question(formatPrompt(session.broker));
      if (line === undefined) {
        deps.io.out('');
        return EXIT_CODES.SUCCESS;
      }

      let words: string[];
      try {
        words = splitCommandLine(line);
      } catch (error) {
        if (error instanceof CliError) {
          deps.logger.error(formatCliError(error));
          continue;
        }
        throw error;
      }

      if (words.length === 0) {
        continue;
      }

      const result = await executeCommand(words, session, deps);
      if (result === 'exit') {
        return EXIT_CODES.SUCCESS;
      }
    }
  } catch (error) {
    if (error instanceof ReplInterruptError) {
      deps.io.out('');
      return EXIT_CODES.USER_INTERRUPT;
    }
    throw error;
  } finally {
    reader.close();
  }
}
