#!/usr/bin/env node

import { run } from './cli.js';

void run(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch(() => {
    process.exitCode = 1;
  });
