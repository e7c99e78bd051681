#!/usr/bin/env tsx
// MUST be first import to load environment variables before other modules
import { env } from './env';

import { runCli } from './commands';

runCli(process.argv.slice(2), { env }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[dialogue-tts] Unexpected failure:', error);
    process.exitCode = 1;
  }
);
