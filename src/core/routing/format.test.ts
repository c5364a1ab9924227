import { describe, expect, it } from 'vitest';
import { Chalk } from 'chalk';
import { loadDepartmentCatalog, loadDomainCatalog } from './catalog-loader-node.js';
import { DepartmentClassifier } from './department-classifier.js';
import { DomainRouter } from './domain-router.js';
import {
  renderDepartmentSuggestion,
  renderDomainDetection,
  renderExecutionPlan,
  toDepartmentSuggestionJson,
  toDomainDetectionJson,
  toExecutionPlanJson,
} from './format.js';

const plain = new Chalk({ level: 0 });
const router = new DomainRouter(loadDomainCatalog());

describe('domain detection output', () => {
  const decision = router.detect('Create a login form component with Redux state');

  it('serializes the decision in snake_case', () => {
    expect(toDomainDetectionJson(decision)).toEqual({
      strategy: 'single-agent',
      total_matches: 3,
      domain_count: 2,
      domains: [
        { domain: 'frontend', score: 2, agent: 'frontend-specialist' },
        { domain: 'backend', score: 1, agent: 'backend-architect' },
      ],
      suggested_agents: ['frontend-specialist'],
    });
  });

  it('adds every domain score when verbose', () => {
    const json = toDomainDetectionJson(decision, { verbose: true });

    expect(Object.keys(json.all_scores ?? {})).toHaveLength(11);
    expect(json.all_scores?.database).toBe(0);
  });

  it('renders a readable summary', () => {
    expect(renderDomainDetection(decision, plain).split('\n')).toEqual([
      '======================================',
      '  Domain Detection Results',
      '======================================',
      '',
      'Delegation Strategy: single-agent',
      'Total Keyword Matches: 3',
      'Domains Detected: 2',
      '',
      'Domain Breakdown:',
      '  • frontend: 2 matches → frontend-specialist',
      '  • backend: 1 matches → backend-architect',
      '',
      'Suggested Agents:',
      '  • frontend-specialist',
    ]);
  });

  it('says when no delegation is needed', () => {
    const lines = renderDomainDetection(router.detect('hello there'), plain).split('\n');

    expect(lines[lines.length - 1]).toBe('No specific agent delegation needed');
    expect(lines).not.toContain('Domain Breakdown:');
  });
});

describe('execution plan output', () => {
  const single = router.plan('Create a login form component with Redux state');

  it('rounds the scores and flattens the dependencies', () => {
    expect(toExecutionPlanJson(single)).toEqual({
      strategy: 'sequential',
      complexity: 0.22,
      confidence: 0.92,
      agents: ['frontend-specialist'],
      batches: [['frontend-specialist']],
      dependencies: {},
      parallel_opportunities: ['frontend-specialist'],
      refinement: 'retry-with-feedback',
      reasoning:
        'Task requires 2 domains (frontend, backend). Selected 1 agents: frontend-specialist. ' +
        'Complexity: 0.22. Execution strategy: sequential.',
      next_actions: ['Invoke frontend-specialist agent'],
    });
  });

  it('renders the strategy and next actions', () => {
    expect(renderExecutionPlan(single, plain).split('\n')).toEqual([
      'Execution Plan:',
      '  Strategy: sequential',
      '  Complexity: 0.22',
      '  Confidence: 0.92',
      'Next Actions:',
      '  • Invoke frontend-specialist agent',
    ]);
  });

  it('lists what each agent waits for', () => {
    const plan = router.plan(
      'Write unit tests with vitest after building the login form component and the API endpoint'
    );
    const lines = renderExecutionPlan(plan, plain).split('\n');

    expect(lines).toContain('  testing-specialist waits for frontend-specialist, backend-architect');
    expect(lines).toContain('  frontend-specialist waits for backend-architect');
    expect(lines.at(-1)).toBe('  • Batch 3: testing-specialist');
    expect(toExecutionPlanJson(plan).dependencies).toEqual({
      'task-orchestrator': [],
      'backend-architect': [],
      'testing-specialist': ['frontend-specialist', 'backend-architect'],
      'frontend-specialist': ['backend-architect'],
    });
  });
});

describe('department suggestion output', () => {
  const classifier = new DepartmentClassifier(loadDepartmentCatalog());

  it('serializes the profile next to the suggestion', () => {
    const json = toDepartmentSuggestionJson(
      classifier.suggest({ purpose: 'Manages Docker deployment to Kubernetes' })
    );

    expect(json.department).toBe('operations');
    expect(json.role_type).toBe('DevOps and Monitoring');
    expect(json.interaction_level).toBe('Operational');
    expect(json.tools).toEqual(['Read', 'Bash', 'Grep', 'Glob', 'TodoWrite']);
    expect(json.warnings).toEqual([]);
  });

  it('renders the default marker and validation result', () => {
    const text = renderDepartmentSuggestion(classifier.suggest({ purpose: 'Helps with chores' }), plain);

    expect(text.split('\n')[0]).toBe('✓ Suggested department: engineering (default, no clear match)');
    expect(text.split('\n').at(-1)).toBe('✓ Department assignment validated');
  });

  it('renders warnings', () => {
    const text = renderDepartmentSuggestion(
      classifier.suggest({ purpose: 'Writes integration tests for REST endpoints', name: 'api-tester' }),
      plain
    );

    expect(text.split('\n').slice(-2)).toEqual([
      'Department validation warnings:',
      '  ⚠ Backend agent typically belongs in engineering department',
    ]);
  });
});
