import { dirname } from 'node:path';
import type { ChalkInstance } from 'chalk';
import type { CheckOutcome, CheckResult, ReportKind, ValidationReport, ValidationStatus } from './types.js';

const RULE = '======================================';

export interface ValidationReportJson {
  file: string;
  feature_dir?: string;
  status: ValidationStatus;
  score: number;
  total_checks: number;
  passed: number;
  failed: number;
  warnings: number;
  tasks?: {
    total: number;
    completed: number;
    parallel: number;
    progress_pct: number;
  };
  checks: Record<string, { result: CheckResult; description: string }>;
  recommendations: string[];
}

const SUBJECT: Record<ReportKind, string> = {
  spec: 'Specification',
  plan: 'Implementation plan',
  tasks: 'Task list',
  constitution: 'Constitutional compliance',
};

export function toValidationJson(report: ValidationReport): ValidationReportJson {
  const json: ValidationReportJson = {
    file: report.file,
    status: report.status,
    score: report.score,
    total_checks: report.totalChecks,
    passed: report.passed,
    failed: report.failed,
    warnings: report.warnings,
    checks: {},
    recommendations: [...report.recommendations],
  };
  if (report.kind === 'plan') {
    json.feature_dir = dirname(report.file);
  }
  if (report.stats) {
    json.tasks = {
      total: report.stats.total,
      completed: report.stats.completed,
      parallel: report.stats.parallel,
      progress_pct: report.stats.progressPct,
    };
  }
  for (const check of report.checks) {
    json.checks[check.name] = { result: check.result, description: check.description };
  }
  return json;
}

function checkLine(check: CheckOutcome, color: ChalkInstance, indent: string): string {
  switch (check.result) {
    case 'PASS':
      return `${indent}${color.green('✅ PASS')}: ${check.description}`;
    case 'FAIL':
      return `${indent}${color.red('❌ FAIL')}: ${check.description}`;
    case 'WARN':
      return `${indent}${color.yellow('⚠  WARN')}: ${check.description}`;
    case 'INFO':
      return `${indent}${color.blue('ℹ  INFO')}: ${check.description}`;
  }
}

function groupChecks(checks: readonly CheckOutcome[]): Map<string, CheckOutcome[]> {
  const groups = new Map<string, CheckOutcome[]>();
  for (const check of checks) {
    const key = check.group ?? '';
    const bucket = groups.get(key) ?? [];
    bucket.push(check);
    groups.set(key, bucket);
  }
  return groups;
}

export function renderValidationReport(
  report: ValidationReport,
  color: ChalkInstance,
  options: { verbose?: boolean } = {}
): string {
  const lines = [
    color.blue(RULE),
    color.blue(`  ${report.title}`),
    color.blue(RULE),
    '',
    `${color.green(report.kind === 'constitution' ? 'Repository:' : 'File:')} ${report.file}`,
  ];
  if (report.kind === 'plan') {
    lines.push(`${color.green('Feature Directory:')} ${dirname(report.file)}`);
  }
  lines.push(
    `${color.green('Status:')} ${report.status}`,
    `${color.green('Score:')} ${report.score}%`,
    ''
  );

  if (report.stats) {
    lines.push(
      color.yellow('Task Statistics:'),
      `  Total Tasks: ${report.stats.total}`,
      `  Completed: ${report.stats.completed} (${report.stats.progressPct}%)`,
      `  Parallel Tasks: ${report.stats.parallel}`,
      ''
    );
  }

  lines.push(color.yellow('Results:'), `  ✅ Passed: ${report.passed}/${report.totalChecks}`);
  if (report.failed > 0) {
    lines.push(color.red(`  ❌ Failed: ${report.failed}/${report.totalChecks}`));
  }
  if (report.warnings > 0) {
    lines.push(color.yellow(`  ⚠  Warnings: ${report.warnings}/${report.totalChecks}`));
  }
  lines.push('');

  if (options.verbose || report.failed > 0 || report.warnings > 0) {
    lines.push(color.blue('Detailed Results:'));
    for (const [group, checks] of groupChecks(report.checks)) {
      if (group) {
        lines.push(`  ${group}:`);
      }
      const indent = group ? '    ' : '  ';
      for (const check of checks) {
        lines.push(checkLine(check, color, indent));
      }
    }
    lines.push('');
  }

  if (report.recommendations.length > 0) {
    lines.push(color.yellow('Recommendations:'));
    for (const recommendation of report.recommendations) {
      lines.push(`  • ${recommendation}`);
    }
    lines.push('');
  }

  const subject = SUBJECT[report.kind];
  switch (report.status) {
    case 'PASS':
      lines.push(color.green(`✅ ${subject} validation passed!`));
      break;
    case 'FAIL':
      lines.push(color.red(`❌ ${subject} validation failed. Address required checks above.`));
      break;
    case 'WARN':
      lines.push(color.yellow(`⚠  ${subject} has warnings. Consider addressing recommendations.`));
      break;
  }

  return lines.join('\n');
}
