import type {
  Artifact,
  CheckOutcome,
  CheckResult,
  Checklist,
  ChecklistItem,
  ChecklistRules,
  ValidateOptions,
  ValidationReport,
  ValidationStatus,
} from './types.js';

function evaluate<F>(item: ChecklistItem<F>, facts: F): CheckResult {
  if (item.predicate(facts)) {
    return 'PASS';
  }
  switch (item.severity) {
    case 'required':
      return 'FAIL';
    case 'info':
      return 'INFO';
    default:
      return 'WARN';
  }
}

function resolveRecommendation<F>(item: ChecklistItem<F>, facts: F): string | undefined {
  if (typeof item.recommendation === 'function') {
    return item.recommendation(facts);
  }
  return item.recommendation;
}

export function computeScore(passed: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((100 * passed) / total);
}

export function resolveStatus(
  failed: number,
  warnings: number,
  strict: boolean,
  warningThreshold: number
): ValidationStatus {
  if (failed > 0) {
    return 'FAIL';
  }
  if (strict && warnings > warningThreshold) {
    return 'WARN';
  }
  return 'PASS';
}

/**
 * Evaluates every item of a checklist against facts already gathered. A
 * failing required item fails the report; any other failing item is a
 * warning, except `info` items, which only report.
 */
export function evaluateChecklist<F>(
  checklist: ChecklistRules<F>,
  facts: F,
  file: string,
  options: ValidateOptions = {}
): ValidationReport {
  const checks: CheckOutcome[] = [];
  const recommendations: string[] = [];

  for (const item of checklist.items) {
    const result = evaluate(item, facts);
    checks.push({
      name: item.name,
      result,
      severity: item.severity,
      description: item.description,
      ...(item.group ? { group: item.group } : {}),
    });
    if (result === 'FAIL' || result === 'WARN') {
      const recommendation = resolveRecommendation(item, facts);
      if (recommendation) {
        recommendations.push(recommendation);
      }
    }
  }

  const passed = checks.filter(check => check.result === 'PASS' || check.result === 'INFO').length;
  const failed = checks.filter(check => check.result === 'FAIL').length;
  const warnings = checks.filter(check => check.result === 'WARN').length;
  const strict = options.strict ?? false;
  const warningThreshold = options.warningThreshold ?? checklist.warningThreshold;

  const report: ValidationReport = {
    file,
    kind: checklist.kind,
    title: checklist.title,
    status: resolveStatus(failed, warnings, strict, warningThreshold),
    score: computeScore(passed, checks.length),
    totalChecks: checks.length,
    passed,
    failed,
    warnings,
    strict,
    checks,
    recommendations,
  };
  if (checklist.stats) {
    report.stats = checklist.stats(facts);
  }
  return report;
}

export function runChecklist<F>(
  checklist: Checklist<F>,
  artifact: Artifact,
  options: ValidateOptions = {}
): ValidationReport {
  return evaluateChecklist(checklist, checklist.analyze(artifact), artifact.path, options);
}
