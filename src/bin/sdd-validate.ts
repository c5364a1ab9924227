#!/usr/bin/env node

import 'dotenv/config';
import { runValidateArtifact } from '../cli/validate-artifact.js';
import { nodeIO } from '../cli/io.js';

runValidateArtifact(process.argv.slice(2), nodeIO())
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[sdd-validate] Fatal error:', error);
    process.exitCode = 1;
  });
