import { isSddRouterError } from '../core/errors.js';
import type { CliIO } from './io.js';

/** Runs a command body, reporting typed errors on stderr as exit code 1. */
export async function runCommand(io: CliIO, body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (error) {
    if (isSddRouterError(error)) {
      io.stderr(io.color.red(`ERROR: ${error.message}`));
      return 1;
    }
    throw error;
  }
}
