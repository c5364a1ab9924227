import chalk, { type ChalkInstance } from 'chalk';
import type { StdinLike } from '../core/input/read-input-node.js';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  stdin?: StdinLike;
  color: ChalkInstance;
  env: Record<string, string | undefined>;
  cwd: string;
}

export function nodeIO(): CliIO {
  return {
    stdout: text => {
      process.stdout.write(`${text}\n`);
    },
    stderr: text => {
      process.stderr.write(`${text}\n`);
    },
    stdin: process.stdin,
    color: chalk,
    env: process.env,
    cwd: process.cwd(),
  };
}
