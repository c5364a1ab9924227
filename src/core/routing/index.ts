export type {
  AssignmentRule,
  CatalogDefinition,
  CatalogEntryDefinition,
  CompiledKeyword,
  DelegationStrategy,
  Department,
  DepartmentProfile,
  DepartmentSuggestion,
  DepartmentSuggestionInput,
  Domain,
  KeywordDefinition,
  MatchMode,
  RoutingDecision,
  RoutingPolicy,
  ScoreEntry,
} from './types.js';
export { DOMAINS, DEPARTMENTS } from './types.js';
export { KeywordCatalog } from './keyword-catalog.js';
export { KeywordScorer } from './scorer.js';
export { RoutingDecider, DEFAULT_MAX_SPECIALISTS, DEFAULT_SIGNIFICANT_SCORE } from './routing-decider.js';
export { DomainRouter, type DomainRouterOptions } from './domain-router.js';
export {
  planExecution,
  estimateComplexity,
  mentionsOrdering,
  topologicalBatches,
  type ExecutionPlan,
  type ExecutionState,
  type ExecutionStrategy,
  type RefinementStrategy,
} from './execution-plan.js';
export { DepartmentClassifier } from './department-classifier.js';
export {
  parseDomainCatalog,
  parseDepartmentCatalog,
  isDomain,
  isDepartment,
  type DomainCatalogBundle,
  type DepartmentCatalogBundle,
} from './catalog-parser.js';
export {
  toDomainDetectionJson,
  renderDomainDetection,
  toDepartmentSuggestionJson,
  renderDepartmentSuggestion,
  toExecutionPlanJson,
  renderExecutionPlan,
  type DomainDetectionJson,
  type ExecutionPlanJson,
  type DepartmentSuggestionJson,
  type RenderOptions,
} from './format.js';
