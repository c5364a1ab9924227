import { describe, expect, it } from 'vitest';
import type { RepositoryFacts } from './constitution-checklist.js';
import { validateConstitution } from './validate.js';

const BARE: RepositoryFacts = {
  libraryDirs: [],
  hasTests: false,
  hasContracts: false,
  hasIdempotentScripts: false,
  hasFeatureFlags: false,
  unapprovedGitScripts: [],
  hasLogging: false,
  docs: [],
  dependencyManifests: [],
  agentCount: 0,
  hasCollaborationTriggers: false,
  hasValidation: false,
  gitignoreProtectsSecrets: false,
  hasDesignSystem: false,
  hasAccessControl: false,
  hasModelConfig: false,
};

const COMPLIANT: RepositoryFacts = {
  libraryDirs: ['packages/'],
  hasTests: true,
  hasContracts: true,
  hasIdempotentScripts: true,
  hasFeatureFlags: true,
  unapprovedGitScripts: [],
  hasLogging: true,
  docs: ['README.md', 'CLAUDE.md', '.specify/memory/constitution.md'],
  dependencyManifests: ['package.json'],
  agentCount: 4,
  hasCollaborationTriggers: true,
  hasValidation: true,
  gitignoreProtectsSecrets: true,
  hasDesignSystem: true,
  hasAccessControl: true,
  hasModelConfig: true,
};

describe('constitution checklist', () => {
  it('passes a compliant repository', () => {
    const report = validateConstitution('/work/app', COMPLIANT);

    expect(report.kind).toBe('constitution');
    expect(report.status).toBe('PASS');
    expect(report.totalChecks).toBe(14);
    expect(report.score).toBe(100);
    expect(report.recommendations).toEqual([]);
  });

  it('warns on a bare repository and only informs on optional principles', () => {
    const report = validateConstitution('/work/app', BARE);

    expect(report.checks.map(check => [check.name, check.result])).toEqual([
      ['library_first', 'WARN'],
      ['test_first', 'WARN'],
      ['contract_first', 'WARN'],
      ['idempotent_operations', 'WARN'],
      ['progressive_enhancement', 'INFO'],
      ['git_approval', 'PASS'],
      ['observability', 'WARN'],
      ['documentation_sync', 'WARN'],
      ['dependency_management', 'INFO'],
      ['agent_delegation', 'WARN'],
      ['input_validation', 'WARN'],
      ['design_system', 'INFO'],
      ['access_control', 'INFO'],
      ['model_selection', 'INFO'],
    ]);
    expect(report.status).toBe('PASS');
    expect(report.passed).toBe(6);
    expect(report.warnings).toBe(8);
    expect(report.score).toBe(43);
    expect(report.recommendations.slice(-2)).toEqual([
      'Agent Delegation Protocol requires specialized agents and trigger definitions',
      'Add input validation and ensure secrets are gitignored',
    ]);
    expect(validateConstitution('/work/app', BARE, { strict: true }).status).toBe('WARN');
  });

  it('fails on git operations without approval', () => {
    const report = validateConstitution('/work/app', { ...COMPLIANT, unapprovedGitScripts: ['release.sh'] });

    expect(report.status).toBe('FAIL');
    expect(report.recommendations).toEqual(['Git operations require user approval (Principle VI): release.sh']);
  });

  it('names the missing half of agent delegation and input validation', () => {
    const agentsOnly = validateConstitution('/work/app', { ...COMPLIANT, hasCollaborationTriggers: false });
    const triggersOnly = validateConstitution('/work/app', { ...COMPLIANT, agentCount: 0 });
    const noValidation = validateConstitution('/work/app', { ...COMPLIANT, hasValidation: false });
    const secretsExposed = validateConstitution('/work/app', { ...COMPLIANT, gitignoreProtectsSecrets: false });

    expect(agentsOnly.recommendations).toEqual(['Create .specify/memory/agent-collaboration-triggers.md']);
    expect(triggersOnly.recommendations).toEqual(['Create specialized agents in .claude/agents/']);
    expect(noValidation.recommendations).toEqual(['Add input validation (zod, yup, joi) to prevent security issues']);
    expect(secretsExposed.recommendations).toEqual(['Ensure .env, secrets, and credentials are in .gitignore']);
  });

  it('needs three core documents', () => {
    const report = validateConstitution('/work/app', { ...COMPLIANT, docs: ['README.md', 'CLAUDE.md'] });

    expect(report.checks.find(check => check.name === 'documentation_sync')?.result).toBe('WARN');
  });
});
