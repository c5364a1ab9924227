import type { ChecklistRules } from './types.js';

/** What a scan of the repository found; see `scanRepository`. */
export interface RepositoryFacts {
  /** Present among libs/, packages/ and src/libs/. */
  libraryDirs: string[];
  hasTests: boolean;
  hasContracts: boolean;
  hasIdempotentScripts: boolean;
  hasFeatureFlags: boolean;
  /** Shell scripts that run git commands without asking first. */
  unapprovedGitScripts: string[];
  hasLogging: boolean;
  /** Found among README.md, CLAUDE.md, constitution.md and its update checklist. */
  docs: string[];
  dependencyManifests: string[];
  agentCount: number;
  hasCollaborationTriggers: boolean;
  hasValidation: boolean;
  gitignoreProtectsSecrets: boolean;
  hasDesignSystem: boolean;
  hasAccessControl: boolean;
  hasModelConfig: boolean;
}

export const CORE_DOCS_REQUIRED = 3;

function agentRecommendation(facts: RepositoryFacts): string {
  if (facts.agentCount > 0) {
    return 'Create .specify/memory/agent-collaboration-triggers.md';
  }
  if (facts.hasCollaborationTriggers) {
    return 'Create specialized agents in .claude/agents/';
  }
  return 'Agent Delegation Protocol requires specialized agents and trigger definitions';
}

function validationRecommendation(facts: RepositoryFacts): string {
  if (facts.gitignoreProtectsSecrets) {
    return 'Add input validation (zod, yup, joi) to prevent security issues';
  }
  if (facts.hasValidation) {
    return 'Ensure .env, secrets, and credentials are in .gitignore';
  }
  return 'Add input validation and ensure secrets are gitignored';
}

export const CONSTITUTION_CHECKLIST: ChecklistRules<RepositoryFacts> = {
  kind: 'constitution',
  title: 'Constitutional Compliance Check',
  warningThreshold: 3,
  items: [
    {
      name: 'library_first',
      severity: 'recommended',
      description: 'Principle I: Library structure exists (libs/, packages/ or src/libs/)',
      recommendation: 'Consider creating library structure for reusable components',
      predicate: facts => facts.libraryDirs.length > 0,
    },
    {
      name: 'test_first',
      severity: 'recommended',
      description: 'Principle II: Test files or test directories exist',
      recommendation: 'TDD requires test files (*.test.ts, *.spec.js) or test directories (__tests__, tests/)',
      predicate: facts => facts.hasTests,
    },
    {
      name: 'contract_first',
      severity: 'recommended',
      description: 'Principle III: Contracts or schemas are defined',
      recommendation: 'Consider defining contracts in specs/*/contracts/ or *contract*.ts files',
      predicate: facts => facts.hasContracts,
    },
    {
      name: 'idempotent_operations',
      severity: 'recommended',
      description: 'Principle IV: Scripts handle re-execution',
      recommendation: 'Scripts should handle re-execution safely (mkdir -p, check if exists, etc.)',
      predicate: facts => facts.hasIdempotentScripts,
    },
    {
      name: 'progressive_enhancement',
      severity: 'info',
      description: 'Principle V: Feature flag patterns found',
      predicate: facts => facts.hasFeatureFlags,
    },
    {
      name: 'git_approval',
      severity: 'required',
      description: 'Principle VI: Git operations in scripts ask for approval',
      recommendation: facts =>
        `Git operations require user approval (Principle VI): ${facts.unapprovedGitScripts.join(', ')}`,
      predicate: facts => facts.unapprovedGitScripts.length === 0,
    },
    {
      name: 'observability',
      severity: 'recommended',
      description: 'Principle VII: Source code emits logs',
      recommendation: 'Operations should emit structured logs for observability',
      predicate: facts => facts.hasLogging,
    },
    {
      name: 'documentation_sync',
      severity: 'recommended',
      description: `Principle VIII: At least ${CORE_DOCS_REQUIRED} core documentation files exist`,
      recommendation: 'Should have README.md, CLAUDE.md, constitution.md, and constitution_update_checklist.md',
      predicate: facts => facts.docs.length >= CORE_DOCS_REQUIRED,
    },
    {
      name: 'dependency_management',
      severity: 'info',
      description: 'Principle IX: Dependency manifest found',
      predicate: facts => facts.dependencyManifests.length > 0,
    },
    {
      name: 'agent_delegation',
      severity: 'recommended',
      description: 'Principle X: Specialized agents and collaboration triggers are defined',
      recommendation: agentRecommendation,
      predicate: facts => facts.agentCount > 0 && facts.hasCollaborationTriggers,
    },
    {
      name: 'input_validation',
      severity: 'recommended',
      description: 'Principle XI: Input validation present and secrets gitignored',
      recommendation: validationRecommendation,
      predicate: facts => facts.hasValidation && facts.gitignoreProtectsSecrets,
    },
    {
      name: 'design_system',
      severity: 'info',
      description: 'Principle XII: Design system patterns found',
      predicate: facts => facts.hasDesignSystem,
    },
    {
      name: 'access_control',
      severity: 'info',
      description: 'Principle XIII: Access control patterns found',
      predicate: facts => facts.hasAccessControl,
    },
    {
      name: 'model_selection',
      severity: 'info',
      description: 'Principle XIV: AI model selection is documented',
      predicate: facts => facts.hasModelConfig,
    },
  ],
};
