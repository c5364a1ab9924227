#!/usr/bin/env node

import 'dotenv/config';
import { runSuggestDepartment } from '../cli/suggest-department.js';
import { nodeIO } from '../cli/io.js';

runSuggestDepartment(process.argv.slice(2), nodeIO())
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[sdd-suggest-department] Fatal error:', error);
    process.exitCode = 1;
  });
