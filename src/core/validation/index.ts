export type {
  Artifact,
  ArtifactKind,
  CheckOutcome,
  CheckResult,
  CheckSeverity,
  Checklist,
  ChecklistItem,
  ChecklistRules,
  ReportKind,
  SupportingFile,
  TaskStats,
  ValidateOptions,
  ValidationReport,
  ValidationStatus,
} from './types.js';
export { ARTIFACT_KINDS, REPORT_KINDS, SUPPORTING_FILES } from './types.js';
export { runChecklist, evaluateChecklist, computeScore, resolveStatus } from './checklist.js';
export { SPEC_CHECKLIST, type SpecFacts } from './spec-checklist.js';
export { PLAN_CHECKLIST, type PlanFacts } from './plan-checklist.js';
export { TASKS_CHECKLIST, analyzeTasks, taskStats, type TasksFacts } from './tasks-checklist.js';
export { CONSTITUTION_CHECKLIST, CORE_DOCS_REQUIRED, type RepositoryFacts } from './constitution-checklist.js';
export { validateArtifact, validateConstitution, exitCodeFor, artifactFromText } from './validate.js';
export { toValidationJson, renderValidationReport, type ValidationReportJson } from './format.js';
