import { describe, expect, it } from 'vitest';
import type { Artifact, SupportingFile } from './types.js';
import { artifactFromText, exitCodeFor, validateArtifact } from './validate.js';

function withSiblings(artifact: Artifact, siblings: SupportingFile[]): Artifact {
  return { ...artifact, siblings: new Set<SupportingFile>(siblings) };
}

function results(report: ReturnType<typeof validateArtifact>): Record<string, string> {
  return Object.fromEntries(report.checks.map(check => [check.name, check.result]));
}

const COMPLETE_SPEC = [
  '# Feature: Saved searches',
  '',
  '## Overview',
  'People can store a search and run it again later.',
  '',
  '## User Stories',
  'As a returning visitor, I want to store a search so that I can rerun it.',
  '',
  '## Requirements',
  '- Store a search with a name',
  '- List stored searches',
  '',
  '## Acceptance Criteria',
  '- A stored search shows up in the list',
  '',
  '## Non-Functional Requirements',
  '- Listing returns within 200 ms',
  '',
  '## Scope',
  'Sharing stored searches is out of scope.',
  '',
  ...Array.from({ length: 40 }, (_, index) => `- Detail ${index + 1}`),
].join('\n') + '\n';

const TASKS_WITHOUT_TESTS = [
  '# Tasks: Profile page',
  '',
  '## Setup',
  '- [ ] Create the profile module',
  '- [ ] Add the avatar upload form',
  '- [ ] Wire the save button',
  '- [x] Define the API contract for profile updates',
  '- [ ] Style the layout',
  '',
].join('\n');

const PLAN = [
  '# Plan: Saved searches',
  '',
  '## Architecture',
  'A reusable library module exposes the search store.',
  '',
  '## Tech Stack',
  'TypeScript, with vitest for the unit suite.',
  '',
  '## Implementation',
  '1. Define the API contract and schema for stored searches.',
  '2. Add the endpoint.',
  '',
  '## Dependencies',
  'Needs the search index.',
  '',
  '## Security',
  'Authentication is required for every call.',
  '',
].join('\n');

describe('spec checklist', () => {
  it('passes a complete specification', () => {
    const report = validateArtifact('spec', artifactFromText('spec.md', COMPLETE_SPEC));

    expect(report.status).toBe('PASS');
    expect(report.score).toBe(100);
    expect(report.totalChecks).toBe(10);
    expect(report.title).toBe('Specification Validation');
  });

  it('fails a stub and lists what is missing', () => {
    const report = validateArtifact('spec', artifactFromText('spec.md', '# Notes\n\nSome text.\n'));

    expect(results(report)).toEqual({
      file_not_empty: 'FAIL',
      has_title: 'PASS',
      has_overview: 'FAIL',
      has_requirements: 'FAIL',
      has_acceptance_criteria: 'WARN',
      has_user_stories: 'WARN',
      has_non_functional: 'WARN',
      has_scope: 'WARN',
      reasonable_length: 'WARN',
      no_todos: 'PASS',
    });
    expect(report.status).toBe('FAIL');
    expect(report.score).toBe(20);
    expect(report.recommendations[0]).toBe('Add acceptance criteria to define success metrics');
    expect(exitCodeFor(report)).toBe(1);
  });

  it('flags placeholders', () => {
    const report = validateArtifact('spec', artifactFromText('spec.md', `${COMPLETE_SPEC}FIXME: decide limits\n`));

    expect(results(report).no_todos).toBe('WARN');
    expect(report.recommendations).toEqual(['Remove TODO/FIXME placeholders or complete them']);
  });
});

describe('plan checklist', () => {
  it('passes a plan with all supporting files', () => {
    const artifact = withSiblings(artifactFromText('plan.md', PLAN), [
      'research.md',
      'data-model.md',
      'quickstart.md',
      'contracts/',
      'contracts/*',
    ]);
    const report = validateArtifact('plan', artifact);

    expect(report.totalChecks).toBe(16);
    expect(report.score).toBe(100);
    expect(report.status).toBe('PASS');
  });

  it('warns about missing supporting files', () => {
    const report = validateArtifact('plan', artifactFromText('plan.md', PLAN), { strict: true });

    expect(report.warnings).toBe(4);
    expect(report.score).toBe(75);
    expect(report.status).toBe('PASS');
    expect(report.recommendations).toEqual([
      'Create research.md to document technical decisions',
      'Create data-model.md to define entities and relationships',
      'Create contracts/ directory with API contract specifications',
      'Create quickstart.md with test scenarios and examples',
    ]);
  });

  it('accepts an empty contracts directory as a contracts reference', () => {
    const report = validateArtifact('plan', withSiblings(artifactFromText('plan.md', '# Plan\n'), ['contracts/']));

    expect(results(report).has_contracts_reference).toBe('PASS');
    expect(results(report).contracts_exist).toBe('WARN');
  });

  it('accepts a data model file in place of a textual reference', () => {
    const report = validateArtifact('plan', withSiblings(artifactFromText('plan.md', '# Plan\n'), ['data-model.md']));

    expect(results(report).has_data_model_reference).toBe('PASS');
    expect(results(report).has_contracts_reference).toBe('WARN');
    expect(report.checks.find(check => check.name === 'research_exists')?.group).toBe('Artifact Checks');
  });
});

describe('tasks checklist', () => {
  it('warns about missing test tasks without failing', () => {
    const report = validateArtifact('tasks', artifactFromText('tasks.md', TASKS_WITHOUT_TESTS));

    expect(results(report).has_test_tasks).toBe('WARN');
    expect(report.status).toBe('PASS');
    expect(report.score).toBe(75);
    expect(report.stats).toEqual({ total: 5, completed: 1, parallel: 0, progressPct: 20 });
    expect(report.recommendations).toEqual([
      'Add test-related tasks (Principle II: Test-First Development)',
      'Document task dependencies to clarify execution order',
      'Mark tasks that can be executed in parallel with [P]',
    ]);
    expect(exitCodeFor(report)).toBe(0);
  });

  it('fails a list without checkboxes', () => {
    const content = '# Tasks\n\n1. Write the parser\n2. Write the tests for the parser\n3. Ship it after review\n';
    const report = validateArtifact('tasks', artifactFromText('tasks.md', content));

    expect(results(report).has_tasks).toBe('FAIL');
    expect(results(report).has_checkboxes).toBe('FAIL');
    expect(report.status).toBe('FAIL');
    expect(report.stats?.progressPct).toBe(0);
  });

  it('counts parallel markers and completed tasks', () => {
    const content = [
      '# Tasks',
      '- [x] T001 Write unit test for the parser',
      '- [x] T002 [P] Define the schema',
      '- [ ] T003 [P] Build the parser (depends on T002)',
      '- [X] T004 Uppercase marks are not counted as completed',
      '',
    ].join('\r\n');
    const report = validateArtifact('tasks', artifactFromText('tasks.md', content));

    expect(report.stats).toEqual({ total: 3, completed: 2, parallel: 2, progressPct: 66 });
  });

  it('warns in strict mode when too many checks warn', () => {
    const content = [
      '# Tasks',
      '',
      '- [x] Write the code for the importer module',
      '- [x] Ship the release to the staging cluster',
      '- [x] Announce it to the whole team on the channel',
      '',
    ].join('\n');
    const report = validateArtifact('tasks', artifactFromText('tasks.md', content), { strict: true });

    // test, contract, dependency and parallel checks warn, as do not_all_completed and has_sections
    expect(report.warnings).toBe(6);
    expect(report.status).toBe('WARN');
    expect(exitCodeFor(report)).toBe(2);
  });

  it('suggests grouping an oversized list', () => {
    const lines = ['# Tasks', '## All'];
    for (let index = 1; index <= 51; index++) {
      lines.push(`- [ ] Item ${index}`);
    }
    const report = validateArtifact('tasks', artifactFromText('tasks.md', lines.join('\n')));

    expect(results(report).reasonable_count).toBe('WARN');
    expect(report.recommendations).toContain('Task list may be too detailed (51 tasks). Consider grouping.');
  });
});
