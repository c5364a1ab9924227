import { readFile, readdir, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { FileNotFoundError } from '../errors.js';
import type { Artifact, ArtifactKind, SupportingFile } from './types.js';

const decoder = new TextDecoder('utf-8', { fatal: false });

const ARTIFACT_FILES: Record<ArtifactKind, string> = {
  spec: 'spec.md',
  plan: 'plan.md',
  tasks: 'tasks.md',
};

const LABELS: Record<ArtifactKind, string> = {
  spec: 'Specification file',
  plan: 'Plan file',
  tasks: 'Tasks file',
};

export function isMissing(error: unknown): boolean {
  const code = typeof error === 'object' && error !== null && 'code' in error
    ? (error as { code?: unknown }).code
    : undefined;
  return code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR';
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

async function hasEntries(path: string): Promise<boolean> {
  try {
    return (await readdir(path)).length > 0;
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

export async function detectSiblings(artifactPath: string): Promise<Set<SupportingFile>> {
  const dir = dirname(artifactPath);
  const siblings = new Set<SupportingFile>();
  for (const file of ['research.md', 'data-model.md', 'quickstart.md'] as const) {
    if (await isFile(join(dir, file))) {
      siblings.add(file);
    }
  }
  const contracts = join(dir, 'contracts');
  if (await isDirectory(contracts)) {
    siblings.add('contracts/');
    if (await hasEntries(contracts)) {
      siblings.add('contracts/*');
    }
  }
  return siblings;
}

export async function readArtifact(path: string, kind: ArtifactKind): Promise<Artifact> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    if (isMissing(error)) {
      throw new FileNotFoundError(path, LABELS[kind]);
    }
    throw error;
  }
  return {
    path,
    content: decoder.decode(bytes),
    byteLength: bytes.byteLength,
    siblings: kind === 'plan' ? await detectSiblings(path) : new Set(),
  };
}

/** `specs/<feature>/<kind>.md` under the project root. */
export function defaultArtifactPath(projectRoot: string, featureDir: string, kind: ArtifactKind): string {
  return join(projectRoot, 'specs', featureDir, ARTIFACT_FILES[kind]);
}
