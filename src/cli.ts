#!/usr/bin/env node

import { runCli } from './cliCommands.js';

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error('[jniweave] unexpected failure', err);
    process.exit(1);
  },
);
