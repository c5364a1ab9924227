import { evaluateChecklist, runChecklist } from './checklist.js';
import { CONSTITUTION_CHECKLIST, type RepositoryFacts } from './constitution-checklist.js';
import { PLAN_CHECKLIST } from './plan-checklist.js';
import { SPEC_CHECKLIST } from './spec-checklist.js';
import { TASKS_CHECKLIST } from './tasks-checklist.js';
import type { Artifact, ArtifactKind, ValidateOptions, ValidationReport } from './types.js';

export function validateArtifact(
  kind: ArtifactKind,
  artifact: Artifact,
  options: ValidateOptions = {}
): ValidationReport {
  switch (kind) {
    case 'spec':
      return runChecklist(SPEC_CHECKLIST, artifact, options);
    case 'plan':
      return runChecklist(PLAN_CHECKLIST, artifact, options);
    case 'tasks':
      return runChecklist(TASKS_CHECKLIST, artifact, options);
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unhandled artifact kind: ${String(exhaustive)}`);
    }
  }
}

/** Runs the constitution checklist against a scanned repository. */
export function validateConstitution(
  root: string,
  facts: RepositoryFacts,
  options: ValidateOptions = {}
): ValidationReport {
  return evaluateChecklist(CONSTITUTION_CHECKLIST, facts, root, options);
}

/** Process exit code for a report: 0 PASS, 1 FAIL, 2 WARN. */
export function exitCodeFor(report: ValidationReport): number {
  switch (report.status) {
    case 'PASS':
      return 0;
    case 'FAIL':
      return 1;
    case 'WARN':
      return 2;
  }
}

export function artifactFromText(path: string, content: string): Artifact {
  return {
    path,
    content,
    byteLength: Buffer.byteLength(content, 'utf8'),
    siblings: new Set(),
  };
}
