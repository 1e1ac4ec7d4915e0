#!/usr/bin/env node
import { config } from 'dotenv';
config({ path: '.env.local' });
config({ path: '.env' });

import { runCli } from './commands/search.js';

runCli(process.argv)
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
