import type { Artifact, Checklist, TaskStats } from './types.js';

export interface TasksFacts {
  byteLength: number;
  hasTitle: boolean;
  hasSections: boolean;
  hasDependencies: boolean;
  hasTestTasks: boolean;
  hasContractTasks: boolean;
  total: number;
  completed: number;
  parallel: number;
}

const TASK_LINE = /^- \[[ x]\]/;
const COMPLETED_LINE = /^- \[x\]/;

function countLines(lines: readonly string[], pattern: RegExp): number {
  return lines.filter(line => pattern.test(line)).length;
}

export function analyzeTasks(content: string, byteLength: number): TasksFacts {
  const lines = content.split(/\r?\n/);
  return {
    byteLength,
    hasTitle: /^# /m.test(content),
    hasSections: /^##/m.test(content),
    hasDependencies: /(depends on|dependency|prerequisite|after|before)/i.test(content),
    hasTestTasks: /(test|testing|TDD|unit test|integration test)/i.test(content),
    hasContractTasks: /(contract|API spec|interface|schema)/i.test(content),
    total: countLines(lines, TASK_LINE),
    completed: countLines(lines, COMPLETED_LINE),
    parallel: lines.filter(line => line.includes('[P]')).length,
  };
}

export function taskStats(facts: TasksFacts): TaskStats {
  return {
    total: facts.total,
    completed: facts.completed,
    parallel: facts.parallel,
    progressPct: facts.total > 0 ? Math.floor((facts.completed * 100) / facts.total) : 0,
  };
}

export const TASKS_CHECKLIST: Checklist<TasksFacts> = {
  kind: 'tasks',
  title: 'Task List Validation',
  warningThreshold: 4,
  analyze: (artifact: Artifact) => analyzeTasks(artifact.content, artifact.byteLength),
  stats: taskStats,
  items: [
    {
      name: 'file_not_empty',
      severity: 'required',
      description: 'File has substantial content (>100 bytes)',
      predicate: facts => facts.byteLength > 100,
    },
    {
      name: 'has_title',
      severity: 'required',
      description: 'File has a title (# heading)',
      predicate: facts => facts.hasTitle,
    },
    {
      name: 'has_tasks',
      severity: 'required',
      description: 'Contains at least one task',
      predicate: facts => facts.total > 0,
    },
    {
      name: 'has_checkboxes',
      severity: 'required',
      description: 'Tasks use checkbox format [ ] or [x]',
      predicate: facts => facts.total > 0,
    },
    {
      name: 'sufficient_tasks',
      severity: 'recommended',
      description: 'Has sufficient tasks (≥3)',
      recommendation: facts => `Break down work into more granular tasks (currently: ${facts.total} tasks)`,
      predicate: facts => facts.total >= 3,
    },
    {
      name: 'has_test_tasks',
      severity: 'recommended',
      description: 'Includes test-related tasks (Principle II)',
      recommendation: 'Add test-related tasks (Principle II: Test-First Development)',
      predicate: facts => facts.hasTestTasks,
    },
    {
      name: 'has_contract_tasks',
      severity: 'recommended',
      description: 'Includes contract tasks (Principle III)',
      recommendation: 'Add contract definition tasks (Principle III: Contract-First)',
      predicate: facts => facts.hasContractTasks,
    },
    {
      name: 'has_dependencies',
      severity: 'recommended',
      description: 'Documents task dependencies',
      recommendation: 'Document task dependencies to clarify execution order',
      predicate: facts => facts.hasDependencies,
    },
    {
      name: 'has_parallel_markers',
      severity: 'recommended',
      description: 'Marks parallel-executable tasks [P]',
      recommendation: 'Mark tasks that can be executed in parallel with [P]',
      predicate: facts => facts.parallel > 0,
    },
    {
      name: 'not_all_completed',
      severity: 'optional',
      description: 'Has incomplete tasks (work remaining)',
      predicate: facts => facts.completed < facts.total,
    },
    {
      name: 'reasonable_count',
      severity: 'optional',
      description: 'Task count is reasonable (≤50)',
      recommendation: facts => `Task list may be too detailed (${facts.total} tasks). Consider grouping.`,
      predicate: facts => facts.total <= 50,
    },
    {
      name: 'has_sections',
      severity: 'optional',
      description: 'Organizes tasks into sections',
      predicate: facts => facts.hasSections,
    },
  ],
};
