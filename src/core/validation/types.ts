export type ArtifactKind = 'spec' | 'plan' | 'tasks';

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ['spec', 'plan', 'tasks'];

/** Artifact checklists plus the repository-wide constitution checklist. */
export type ReportKind = ArtifactKind | 'constitution';

export const REPORT_KINDS: readonly ReportKind[] = [...ARTIFACT_KINDS, 'constitution'];

/** An unmet `info` item is reported as INFO and still counts as passed. */
export type CheckSeverity = 'required' | 'recommended' | 'optional' | 'info';

export type CheckResult = 'PASS' | 'FAIL' | 'WARN' | 'INFO';

export type ValidationStatus = 'PASS' | 'FAIL' | 'WARN';

/** Supporting files an implementation plan may have next to it. */
export type SupportingFile = 'research.md' | 'data-model.md' | 'quickstart.md' | 'contracts/' | 'contracts/*';

export const SUPPORTING_FILES: readonly SupportingFile[] = [
  'research.md',
  'data-model.md',
  'quickstart.md',
  'contracts/',
  'contracts/*',
];

export interface Artifact {
  path: string;
  content: string;
  byteLength: number;
  /** Supporting files present beside the artifact; `contracts/*` marks a non-empty contracts directory. */
  siblings: ReadonlySet<SupportingFile>;
}

export interface ChecklistItem<F> {
  name: string;
  severity: CheckSeverity;
  description: string;
  group?: string;
  recommendation?: string | ((facts: F) => string);
  predicate(facts: F): boolean;
}

export interface ChecklistRules<F> {
  kind: ReportKind;
  title: string;
  /** Warnings tolerated in strict mode before the status becomes WARN. */
  warningThreshold: number;
  items: ReadonlyArray<ChecklistItem<F>>;
  stats?(facts: F): TaskStats;
}

export interface Checklist<F> extends ChecklistRules<F> {
  kind: ArtifactKind;
  analyze(artifact: Artifact): F;
}

export interface CheckOutcome {
  name: string;
  result: CheckResult;
  severity: CheckSeverity;
  description: string;
  group?: string;
}

export interface TaskStats {
  total: number;
  completed: number;
  parallel: number;
  progressPct: number;
}

export interface ValidateOptions {
  strict?: boolean;
  warningThreshold?: number;
}

export interface ValidationReport {
  /** Artifact path, or the repository root for the constitution checklist. */
  file: string;
  kind: ReportKind;
  title: string;
  status: ValidationStatus;
  score: number;
  totalChecks: number;
  passed: number;
  failed: number;
  warnings: number;
  strict: boolean;
  checks: CheckOutcome[];
  stats?: TaskStats;
  recommendations: string[];
}
