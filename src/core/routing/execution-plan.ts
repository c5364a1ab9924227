import { ConfigurationError } from '../errors.js';
import type { Domain, RoutingDecision } from './types.js';

export type ExecutionStrategy = 'sequential' | 'parallel' | 'dag';

export type RefinementStrategy = 'retry-with-feedback' | 'route-to-debug' | 'add-step';

/** Agents already handled in earlier rounds of the same request. */
export interface ExecutionState {
  completedAgents?: readonly string[];
  failedAgents?: readonly string[];
}

export interface ExecutionPlan {
  agents: string[];
  complexity: number;
  strategy: ExecutionStrategy;
  /** Agent to the agents it waits for; empty unless the strategy is `dag`. */
  dependencies: Map<string, string[]>;
  /** Agents grouped into rounds; every agent of a batch may run at once. */
  batches: string[][];
  parallelOpportunities: string[];
  confidence: number;
  refinement: RefinementStrategy;
  reasoning: string;
  nextActions: string[];
}

const COMPLEXITY_MARKERS = ['integration', 'multi', 'complex', 'system', 'architecture', 'workflow'];

const DEPENDENCY_MARKERS =
  /\b(?:after|before|depends on|requires|first|then|prerequisite|following|once|when)\b/i;

const DOMAIN_DEPENDENCIES: Partial<Record<Domain, readonly Domain[]>> = {
  frontend: ['backend', 'database'],
  testing: ['frontend', 'backend'],
  security: ['backend'],
  devops: ['testing'],
};

/** 0..1 from the domain count, the text length and architectural vocabulary. */
export function estimateComplexity(text: string, domainCount: number): number {
  const lowered = text.toLowerCase();
  const words = lowered.split(/\s+/).filter(word => word.length > 0).length;
  let complexity = Math.min(0.4, domainCount * 0.1) + Math.min(0.3, (words / 100) * 0.3);
  for (const marker of COMPLEXITY_MARKERS) {
    if (lowered.includes(marker)) {
      complexity += 0.05;
    }
  }
  return Math.min(1, complexity);
}

export function mentionsOrdering(text: string): boolean {
  return DEPENDENCY_MARKERS.test(text);
}

function chooseStrategy(agentCount: number, complexity: number, ordered: boolean): ExecutionStrategy {
  if (agentCount <= 1) {
    return 'sequential';
  }
  if (complexity > 0.6 || ordered) {
    return 'dag';
  }
  return complexity < 0.4 ? 'parallel' : 'dag';
}

function buildDependencies(agents: readonly string[], agentDomains: ReadonlyMap<string, Domain>): Map<string, string[]> {
  const domainAgents = new Map<Domain, string>();
  for (const agent of agents) {
    const domain = agentDomains.get(agent);
    if (domain) {
      domainAgents.set(domain, agent);
    }
  }

  const graph = new Map<string, string[]>();
  for (const agent of agents) {
    const domain = agentDomains.get(agent);
    const prerequisites = domain ? DOMAIN_DEPENDENCIES[domain] ?? [] : [];
    graph.set(
      agent,
      prerequisites.flatMap(prerequisite => {
        const dependency = domainAgents.get(prerequisite);
        return dependency ? [dependency] : [];
      })
    );
  }
  return graph;
}

/** Kahn's algorithm, batch by batch; agents keep their selection order inside a batch. */
export function topologicalBatches(
  agents: readonly string[],
  dependencies: ReadonlyMap<string, readonly string[]>
): string[][] {
  const done = new Set<string>();
  const batches: string[][] = [];
  let remaining = [...agents];

  while (remaining.length > 0) {
    const batch = remaining.filter(agent =>
      (dependencies.get(agent) ?? []).every(dependency => done.has(dependency) || !agents.includes(dependency))
    );
    if (batch.length === 0) {
      throw new ConfigurationError(`Circular agent dependency among: ${remaining.join(', ')}`);
    }
    batches.push(batch);
    for (const agent of batch) {
      done.add(agent);
    }
    remaining = remaining.filter(agent => !done.has(agent));
  }
  return batches;
}

function batchAgents(
  strategy: ExecutionStrategy,
  agents: readonly string[],
  dependencies: ReadonlyMap<string, readonly string[]>
): string[][] {
  switch (strategy) {
    case 'sequential':
      return agents.map(agent => [agent]);
    case 'parallel':
      return agents.length > 0 ? [[...agents]] : [];
    case 'dag':
      return topologicalBatches(agents, dependencies);
  }
}

function chooseRefinement(failedCount: number, complexity: number): RefinementStrategy {
  if (failedCount === 0) {
    return 'retry-with-feedback';
  }
  if (failedCount > 1) {
    return 'route-to-debug';
  }
  return complexity > 0.7 ? 'add-step' : 'retry-with-feedback';
}

function describeActions(strategy: ExecutionStrategy, agents: readonly string[], batches: readonly string[][]): string[] {
  if (agents.length === 0) {
    return ['No specialist matched; handle the work directly'];
  }
  switch (strategy) {
    case 'sequential': {
      const actions = [`Invoke ${agents[0]} agent`];
      if (agents.length > 1) {
        actions.push('Wait for completion before invoking next agent');
      }
      return actions;
    }
    case 'parallel':
      return [`Invoke all ${agents.length} agents in parallel`];
    case 'dag':
      return [
        `Execute ${batches.length} batches in topological order`,
        ...batches.map((batch, index) => `Batch ${index + 1}: ${batch.join(', ')}`),
      ];
  }
}

/**
 * Turns a routing decision into an execution plan: how hard the work looks,
 * whether the agents run one after another, all at once or in dependency
 * batches, and what to do after a failed round.
 */
export function planExecution(
  decision: RoutingDecision<Domain>,
  text: string,
  state: ExecutionState = {}
): ExecutionPlan {
  const completed = new Set(state.completedAgents ?? []);
  const failed = state.failedAgents ?? [];
  const agents = decision.suggestedAgents.filter(agent => !completed.has(agent));

  const agentDomains = new Map<string, Domain>();
  for (const entry of decision.allScores) {
    if (!agentDomains.has(entry.agent)) {
      agentDomains.set(entry.agent, entry.domain);
    }
  }

  const complexity = estimateComplexity(text, decision.domainCount);
  const strategy = chooseStrategy(agents.length, complexity, mentionsOrdering(text));
  const dependencies = strategy === 'dag' ? buildDependencies(agents, agentDomains) : new Map<string, string[]>();

  const batches = batchAgents(strategy, agents, dependencies);

  const parallelOpportunities =
    dependencies.size === 0
      ? [...agents]
      : agents.filter(agent => (dependencies.get(agent) ?? []).length === 0);

  const confidence = Math.max(
    0.7,
    0.95 - complexity * 0.15 - Math.max(0, (decision.domainCount - 2) * 0.05)
  );

  const domains = decision.orderedDomains.map(entry => entry.domain);
  let reasoning =
    `Task requires ${decision.domainCount} domains (${domains.join(', ')}). ` +
    `Selected ${agents.length} agents: ${agents.join(', ')}. ` +
    `Complexity: ${complexity.toFixed(2)}. Execution strategy: ${strategy}.`;
  if (failed.length > 0) {
    reasoning += ` Previous failures: ${failed.join(', ')}.`;
  }

  return {
    agents,
    complexity,
    strategy,
    dependencies,
    batches,
    parallelOpportunities,
    confidence,
    refinement: chooseRefinement(failed.length, complexity),
    reasoning,
    nextActions: describeActions(strategy, agents, batches),
  };
}
