import { readFile } from 'node:fs/promises';
import { FileNotFoundError, InputError, isSddRouterError, type Outcome } from '../errors.js';

export interface StdinLike extends AsyncIterable<string | Uint8Array> {
  isTTY?: boolean;
}

export interface InputSource {
  file?: string;
  text?: string;
  stdin?: StdinLike;
}

const decoder = new TextDecoder('utf-8', { fatal: false });

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error
    && ((error as { code?: unknown }).code === 'ENOENT' || (error as { code?: unknown }).code === 'EISDIR');
}

async function readFileText(path: string): Promise<string> {
  try {
    return decoder.decode(await readFile(path));
  } catch (error) {
    if (isMissing(error)) {
      throw new FileNotFoundError(path);
    }
    throw error;
  }
}

async function readStream(stream: StdinLike): Promise<string> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return decoder.decode(Buffer.concat(chunks));
}

/**
 * Resolves the text to analyze. A file wins over inline text; stdin is read
 * only when neither is given and it is not a terminal.
 */
export async function readInput(source: InputSource): Promise<Outcome<string>> {
  try {
    if (source.file) {
      return { ok: true, value: await readFileText(source.file) };
    }
    if (source.text) {
      return { ok: true, value: source.text };
    }
    const stdin = source.stdin;
    if (!stdin || stdin.isTTY) {
      throw new InputError('No input provided. Use --file, --text, or pipe text to stdin');
    }
    return { ok: true, value: await readStream(stdin) };
  } catch (error) {
    if (isSddRouterError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
