import type { ChalkInstance } from 'chalk';
import type { ExecutionPlan, ExecutionStrategy, RefinementStrategy } from './execution-plan.js';
import type { Department, DepartmentSuggestion, RoutingDecision, DelegationStrategy } from './types.js';

const RULE = '======================================';

export interface DomainDetectionJson {
  strategy: DelegationStrategy;
  total_matches: number;
  domain_count: number;
  domains: Array<{ domain: string; score: number; agent: string }>;
  suggested_agents: string[];
  all_scores?: Record<string, number>;
}

export interface DepartmentSuggestionJson {
  department: Department;
  defaulted: boolean;
  overridden: boolean;
  scores: Record<Department, number>;
  description: string;
  tools: string[];
  mcp_access: string[];
  role_type: string;
  interaction_level: string;
  warnings: string[];
}

export interface ExecutionPlanJson {
  strategy: ExecutionStrategy;
  complexity: number;
  confidence: number;
  agents: string[];
  batches: string[][];
  dependencies: Record<string, string[]>;
  parallel_opportunities: string[];
  refinement: RefinementStrategy;
  reasoning: string;
  next_actions: string[];
}

export interface RenderOptions {
  verbose?: boolean;
}

export function toDomainDetectionJson<K extends string>(
  decision: RoutingDecision<K>,
  options: RenderOptions = {}
): DomainDetectionJson {
  const json: DomainDetectionJson = {
    strategy: decision.strategy,
    total_matches: decision.totalMatches,
    domain_count: decision.domainCount,
    domains: decision.orderedDomains.map(entry => ({
      domain: entry.domain,
      score: entry.score,
      agent: entry.agent,
    })),
    suggested_agents: [...decision.suggestedAgents],
  };
  if (options.verbose) {
    json.all_scores = Object.fromEntries(decision.allScores.map(entry => [entry.domain, entry.score]));
  }
  return json;
}

export function renderDomainDetection<K extends string>(
  decision: RoutingDecision<K>,
  color: ChalkInstance,
  options: RenderOptions = {}
): string {
  const lines = [
    color.blue(RULE),
    color.blue('  Domain Detection Results'),
    color.blue(RULE),
    '',
    `${color.green('Delegation Strategy:')} ${decision.strategy}`,
    `${color.green('Total Keyword Matches:')} ${decision.totalMatches}`,
    `${color.green('Domains Detected:')} ${decision.domainCount}`,
    '',
  ];

  if (decision.domainCount > 0) {
    lines.push(color.yellow('Domain Breakdown:'));
    for (const entry of decision.orderedDomains) {
      lines.push(`  • ${entry.domain}: ${entry.score} matches → ${entry.agent}`);
    }
    lines.push('');
  }

  if (decision.suggestedAgents.length > 0) {
    lines.push(color.green('Suggested Agents:'));
    for (const agent of decision.suggestedAgents) {
      lines.push(`  • ${agent}`);
    }
  } else {
    lines.push(color.yellow('No specific agent delegation needed'));
  }

  if (options.verbose) {
    lines.push('', color.blue('All Domain Scores:'));
    for (const entry of decision.allScores) {
      lines.push(`  ${entry.domain}: ${entry.score}`);
    }
  }

  return lines.join('\n');
}

function twoPlaces(value: number): number {
  return Math.round(value * 100) / 100;
}

export function toExecutionPlanJson(plan: ExecutionPlan): ExecutionPlanJson {
  return {
    strategy: plan.strategy,
    complexity: twoPlaces(plan.complexity),
    confidence: twoPlaces(plan.confidence),
    agents: [...plan.agents],
    batches: plan.batches.map(batch => [...batch]),
    dependencies: Object.fromEntries(plan.dependencies),
    parallel_opportunities: [...plan.parallelOpportunities],
    refinement: plan.refinement,
    reasoning: plan.reasoning,
    next_actions: [...plan.nextActions],
  };
}

export function renderExecutionPlan(plan: ExecutionPlan, color: ChalkInstance): string {
  const lines = [
    color.yellow('Execution Plan:'),
    `  Strategy: ${plan.strategy}`,
    `  Complexity: ${plan.complexity.toFixed(2)}`,
    `  Confidence: ${plan.confidence.toFixed(2)}`,
  ];
  for (const [agent, dependencies] of plan.dependencies) {
    if (dependencies.length > 0) {
      lines.push(`  ${agent} waits for ${dependencies.join(', ')}`);
    }
  }
  if (plan.nextActions.length > 0) {
    lines.push(color.green('Next Actions:'));
    for (const action of plan.nextActions) {
      lines.push(`  • ${action}`);
    }
  }
  return lines.join('\n');
}

export function toDepartmentSuggestionJson(suggestion: DepartmentSuggestion): DepartmentSuggestionJson {
  return {
    department: suggestion.department,
    defaulted: suggestion.defaulted,
    overridden: suggestion.overridden,
    scores: { ...suggestion.scores },
    description: suggestion.profile.description,
    tools: [...suggestion.profile.tools],
    mcp_access: [...suggestion.profile.mcpAccess],
    role_type: suggestion.profile.roleType,
    interaction_level: suggestion.profile.interactionLevel,
    warnings: [...suggestion.warnings],
  };
}

export function renderDepartmentSuggestion(
  suggestion: DepartmentSuggestion,
  color: ChalkInstance,
  options: RenderOptions = {}
): string {
  const { profile } = suggestion;
  const lines: string[] = [];

  if (options.verbose) {
    lines.push('Department scores:');
    for (const [department, score] of Object.entries(suggestion.scores)) {
      lines.push(`  ${department}: ${score}`);
    }
    lines.push('');
  }

  const source = suggestion.overridden
    ? ' (explicit)'
    : suggestion.defaulted ? ' (default, no clear match)' : '';
  lines.push(
    color.green(`✓ Suggested department: ${suggestion.department}${source}`),
    `  ${profile.description}`,
    `  Role: ${profile.roleType} (${profile.interactionLevel})`,
    `  Tools: ${profile.tools.join(', ')}`,
    `  MCP access: ${profile.mcpAccess.join(', ')}`,
  );

  if (suggestion.warnings.length > 0) {
    lines.push('', color.yellow('Department validation warnings:'));
    for (const warning of suggestion.warnings) {
      lines.push(`  ⚠ ${warning}`);
    }
  } else {
    lines.push(color.green('✓ Department assignment validated'));
  }

  return lines.join('\n');
}
