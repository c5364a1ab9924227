#!/usr/bin/env node

import 'dotenv/config';
import { runDetectDomain } from '../cli/detect-domain.js';
import { nodeIO } from '../cli/io.js';

runDetectDomain(process.argv.slice(2), nodeIO())
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[sdd-detect-domain] Fatal error:', error);
    process.exitCode = 1;
  });
