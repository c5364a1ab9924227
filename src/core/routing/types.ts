export const DOMAINS = [
  'frontend',
  'backend',
  'database',
  'testing',
  'security',
  'performance',
  'devops',
  'specification',
  'tasks',
  'orchestration',
  'agent_creation',
] as const;

export type Domain = typeof DOMAINS[number];

export const DEPARTMENTS = [
  'architecture',
  'engineering',
  'quality',
  'data',
  'product',
  'operations',
] as const;

export type Department = typeof DEPARTMENTS[number];

export type DelegationStrategy = 'none' | 'single-agent' | 'multi-agent';

/**
 * `word` wraps every keyword in word boundaries (allowing a plural `s`/`es`),
 * `substring` matches the raw fragment anywhere in the text.
 */
export type MatchMode = 'word' | 'substring';

export interface KeywordDefinition {
  pattern: string;
  weight?: number;
}

export interface CatalogEntryDefinition<K extends string> {
  name: K;
  agent: string;
  keywords: ReadonlyArray<string | KeywordDefinition>;
}

export interface CatalogDefinition<K extends string> {
  match: MatchMode;
  entries: ReadonlyArray<CatalogEntryDefinition<K>>;
}

export interface CompiledKeyword {
  source: string;
  weight: number;
  regex: RegExp;
}

export interface ScoreEntry<K extends string = Domain> {
  domain: K;
  score: number;
  agent: string;
}

export interface RoutingPolicy<K extends string = Domain> {
  /** Minimum score for a domain to count towards a multi-agent decision. */
  significantScore: number;
  /** Specialists taken from the top of the ranking in a multi-agent decision. */
  maxSpecialists: number;
  /** Domain whose agent leads multi-agent work; never listed as a specialist. */
  orchestrationDomain: K;
}

export interface RoutingDecision<K extends string = Domain> {
  strategy: DelegationStrategy;
  domainCount: number;
  totalMatches: number;
  orderedDomains: ScoreEntry<K>[];
  suggestedAgents: string[];
  /** Every catalog domain, zero scores included, in catalog order. */
  allScores: ScoreEntry<K>[];
}

export interface DepartmentProfile {
  name: Department;
  description: string;
  roleType: string;
  interactionLevel: string;
  tools: readonly string[];
  mcpAccess: readonly string[];
}

export type AssignmentField = 'name' | 'description';

export interface AssignmentRule {
  field: AssignmentField;
  pattern: RegExp;
  expected: Department;
  message: string;
}

export interface DepartmentSuggestionInput {
  purpose: string;
  name?: string;
  /** Explicit department; skips scoring but still receives assignment warnings. */
  department?: string;
}

export interface DepartmentSuggestion {
  department: Department;
  defaulted: boolean;
  overridden: boolean;
  scores: Record<Department, number>;
  profile: DepartmentProfile;
  warnings: string[];
}
