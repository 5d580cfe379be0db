import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { KafkaJsClientFactory } from '@kafkarecon/core';
import type { CliDependencies, CliIO } from '../types.js';
import { isObjectRecord } from '../utils.js';
import { createLogger } from '../utils/logger.js';
import { createReadlineLineReader } from './line-reader.js';

function readCliVersion(): string {
  const cliPackageJson = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');

  try {
    const parsed: unknown = JSON.parse(readFileSync(cliPackageJson, 'utf8'));
    if (isObjectRecord(parsed)) {
      const version = parsed['version'];
      if (typeof version === 'string' && version.trim().length > 0) {
        return version;
      }
    }
  } catch {
    return '0.0.0';
  }

  return '0.0.0';
}

export function createDefaultDependencies(): CliDependencies {
  const io: CliIO = {
    out(message: string): void {
      process.stdout.write(`${message}\n`);
    },
    err(message: string): void {
      process.stderr.write(`${message}\n`);
    },
  };

  return {
    io,
    logger: createLogger(io),
    stdoutIsTTY: !!process.stdout.isTTY,
    version: readCliVersion(),
    createClientFactory: (options) =>
      new KafkaJsClientFactory({ connectTimeoutMs: options.timeoutMs, debug: options.debug }),
    createLineReader: () => createReadlineLineReader(process.stdin, process.stdout),
  };
}
