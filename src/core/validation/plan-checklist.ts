import type { Artifact, Checklist, SupportingFile } from './types.js';

export interface PlanFacts {
  byteLength: number;
  content: string;
  siblings: ReadonlySet<SupportingFile>;
}

const CONTENT = 'Content Checks';
const PRINCIPLES = 'Constitutional Principle Checks';
const QUALITY = 'Quality Checks';
const ARTIFACTS = 'Artifact Checks';

export const PLAN_CHECKLIST: Checklist<PlanFacts> = {
  kind: 'plan',
  title: 'Implementation Plan Validation',
  warningThreshold: 5,
  analyze(artifact: Artifact): PlanFacts {
    return {
      byteLength: artifact.byteLength,
      content: artifact.content,
      siblings: artifact.siblings,
    };
  },
  items: [
    {
      name: 'file_not_empty',
      severity: 'required',
      group: CONTENT,
      description: 'File has substantial content (>200 bytes)',
      predicate: facts => facts.byteLength > 200,
    },
    {
      name: 'has_title',
      severity: 'required',
      group: CONTENT,
      description: 'File has a title (# heading)',
      predicate: facts => /^# /m.test(facts.content),
    },
    {
      name: 'has_architecture',
      severity: 'required',
      group: CONTENT,
      description: 'Contains architecture/design section',
      predicate: facts => /(## architecture|## system design|## technical approach)/i.test(facts.content),
    },
    {
      name: 'has_tech_stack',
      severity: 'required',
      group: CONTENT,
      description: 'Specifies technology stack',
      predicate: facts => /(## tech stack|## technology|## technologies|## tools)/i.test(facts.content),
    },
    {
      name: 'has_implementation_steps',
      severity: 'required',
      group: CONTENT,
      description: 'Defines implementation approach',
      predicate: facts => /(## implementation|## steps|## plan|## approach)/i.test(facts.content),
    },
    {
      name: 'mentions_library_first',
      severity: 'recommended',
      group: PRINCIPLES,
      description: 'Addresses Library-First (Principle I)',
      recommendation: 'Address Principle I: Library-First Architecture',
      predicate: facts => /(library|package|module|reusable)/i.test(facts.content),
    },
    {
      name: 'mentions_testing',
      severity: 'recommended',
      group: PRINCIPLES,
      description: 'Addresses Test-First (Principle II)',
      recommendation: 'Address Principle II: Test-First Development',
      predicate: facts => /(test|testing|TDD|jest|vitest|playwright|cypress)/i.test(facts.content),
    },
    {
      name: 'mentions_contracts',
      severity: 'recommended',
      group: PRINCIPLES,
      description: 'Addresses Contract-First (Principle III)',
      recommendation: 'Address Principle III: Contract-First Design',
      predicate: facts => /(contract|API|interface|schema)/i.test(facts.content),
    },
    {
      name: 'has_data_model_reference',
      severity: 'recommended',
      group: QUALITY,
      description: 'References data model or entities',
      predicate: facts =>
        /(data model|entity|database|schema)/i.test(facts.content) || facts.siblings.has('data-model.md'),
    },
    {
      name: 'has_contracts_reference',
      severity: 'recommended',
      group: QUALITY,
      description: 'References contracts or APIs',
      predicate: facts => /(contract|API spec|endpoint)/i.test(facts.content) || facts.siblings.has('contracts/'),
    },
    {
      name: 'has_dependencies',
      severity: 'recommended',
      group: QUALITY,
      description: 'Lists dependencies/prerequisites',
      predicate: facts => /(## dependencies|## requirements|## prerequisites)/i.test(facts.content),
    },
    {
      name: 'has_security_considerations',
      severity: 'recommended',
      group: QUALITY,
      description: 'Addresses security considerations',
      predicate: facts => /(security|authentication|authorization|validation)/i.test(facts.content),
    },
    {
      name: 'research_exists',
      severity: 'recommended',
      group: ARTIFACTS,
      description: 'Research file exists (research.md)',
      recommendation: 'Create research.md to document technical decisions',
      predicate: facts => facts.siblings.has('research.md'),
    },
    {
      name: 'data_model_exists',
      severity: 'recommended',
      group: ARTIFACTS,
      description: 'Data model file exists (data-model.md)',
      recommendation: 'Create data-model.md to define entities and relationships',
      predicate: facts => facts.siblings.has('data-model.md'),
    },
    {
      name: 'contracts_exist',
      severity: 'recommended',
      group: ARTIFACTS,
      description: 'Contracts directory exists with files',
      recommendation: 'Create contracts/ directory with API contract specifications',
      predicate: facts => facts.siblings.has('contracts/*'),
    },
    {
      name: 'quickstart_exists',
      severity: 'recommended',
      group: ARTIFACTS,
      description: 'Quickstart file exists (quickstart.md)',
      recommendation: 'Create quickstart.md with test scenarios and examples',
      predicate: facts => facts.siblings.has('quickstart.md'),
    },
  ],
};
