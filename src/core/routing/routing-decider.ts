import { ConfigurationError } from '../errors.js';
import type { KeywordCatalog } from './keyword-catalog.js';
import type { DelegationStrategy, RoutingDecision, RoutingPolicy, ScoreEntry } from './types.js';

export const DEFAULT_SIGNIFICANT_SCORE = 2;
export const DEFAULT_MAX_SPECIALISTS = 3;

function assertPositiveInteger(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${label} must be a positive integer; received ${String(value)}`);
  }
}

export class RoutingDecider<K extends string> {
  private readonly rank: ReadonlyMap<K, number>;

  constructor(
    private readonly catalog: KeywordCatalog<K>,
    private readonly policy: RoutingPolicy<K>
  ) {
    assertPositiveInteger(policy.significantScore, 'significantScore');
    assertPositiveInteger(policy.maxSpecialists, 'maxSpecialists');
    if (!catalog.has(policy.orchestrationDomain)) {
      throw new ConfigurationError(
        `Orchestration domain "${policy.orchestrationDomain}" is not declared in the catalog`
      );
    }
    this.rank = new Map(catalog.allDomains().map((domain, index) => [domain, index]));
  }

  decide(scores: ReadonlyMap<K, number>): RoutingDecision<K> {
    const allScores: ScoreEntry<K>[] = this.catalog.allDomains().map(domain => ({
      domain,
      score: scores.get(domain) ?? 0,
      agent: this.catalog.agentFor(domain),
    }));

    const orderedDomains = allScores
      .filter(entry => entry.score > 0)
      .sort((left, right) => right.score - left.score || this.rankOf(left.domain) - this.rankOf(right.domain));

    const totalMatches = allScores.reduce((sum, entry) => sum + entry.score, 0);
    const strategy = this.resolveStrategy(orderedDomains);

    return {
      strategy,
      domainCount: orderedDomains.length,
      totalMatches,
      orderedDomains,
      suggestedAgents: this.suggestAgents(strategy, orderedDomains),
      allScores,
    };
  }

  private resolveStrategy(ordered: readonly ScoreEntry<K>[]): DelegationStrategy {
    if (ordered.length === 0) {
      return 'none';
    }
    if (ordered.length === 1) {
      return 'single-agent';
    }
    const significant = ordered.filter(entry => entry.score >= this.policy.significantScore).length;
    return significant >= 2 ? 'multi-agent' : 'single-agent';
  }

  private suggestAgents(strategy: DelegationStrategy, ordered: readonly ScoreEntry<K>[]): string[] {
    switch (strategy) {
      case 'none':
        return [];
      case 'single-agent':
        return [ordered[0].agent];
      case 'multi-agent': {
        const agents = [this.catalog.agentFor(this.policy.orchestrationDomain)];
        for (const entry of ordered.slice(0, this.policy.maxSpecialists)) {
          if (entry.domain === this.policy.orchestrationDomain || agents.includes(entry.agent)) {
            continue;
          }
          agents.push(entry.agent);
        }
        return agents;
      }
    }
  }

  private rankOf(domain: K): number {
    return this.rank.get(domain) ?? Number.MAX_SAFE_INTEGER;
  }
}
