import ora from 'ora';
import type { CliDependencies } from '../types.js';

/**
 * Runs a network-bound task behind a spinner. The spinner is only shown on an
 * interactive terminal and never in quiet mode.
 */
export async function withSpinner<T>(deps: CliDependencies, text: string, task: () => Promise<T>): Promise<T> {
  if (!deps.stdoutIsTTY || deps.logger.getOptions().quiet) {
    return task();
  }

  const spinner = ora({ text, color: 'cyan' }).start();
  try {
    return await task();
  } finally {
    spinner.stop();
  }
}
