import * as readline from 'node:readline';
import { ReplInterruptError } from '../errors.js';
import type { LineReader } from '../types.js';

interface Waiter {
  resolve(line: string | undefined): void;
  reject(error: Error): void;
}

/**
 * Line reader over a readline interface. Lines that arrive while a command is
 * still running are queued, so piped input is never dropped.
 */
export function createReadlineLineReader(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): LineReader {
  const rl = readline.createInterface({ input, output });
  const queued: string[] = [];
  let waiter: Waiter | undefined;
  let closed = false;
  let interrupted = false;

  rl.on('line', (line) => {
    if (waiter) {
      const current = waiter;
      waiter = undefined;
      current.resolve(line);
      return;
    }
    queued.push(line);
  });

  rl.on('close', () => {
    closed = true;
    if (waiter) {
      const current = waiter;
      waiter = undefined;
      current.resolve(undefined);
    }
  });

  rl.on('SIGINT', () => {
    if (waiter) {
      const current = waiter;
      waiter = undefined;
      current.reject(new ReplInterruptError());
      return;
    }
    interrupted = true;
  });

  return {
    question(prompt: string): Promise<string | undefined> {
      if (interrupted) {
        return Promise.reject(new ReplInterruptError());
      }
      const next = queued.shift();
      if (next !== undefined) {
        return Promise.resolve(next);
      }
      if (closed) {
        return Promise.resolve(undefined);
      }

      rl.setPrompt(prompt);
      rl.prompt();
      return new Promise((resolve, reject) => {
        waiter = { resolve, reject };
      });
    },

    close(): void {
      if (!closed) {
        rl.close();
      }
    },
  };
}
