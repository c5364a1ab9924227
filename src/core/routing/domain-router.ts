import type { DomainCatalogBundle } from './catalog-parser.js';
import { planExecution, type ExecutionPlan, type ExecutionState } from './execution-plan.js';
import type { KeywordCatalog } from './keyword-catalog.js';
import {
  DEFAULT_MAX_SPECIALISTS,
  DEFAULT_SIGNIFICANT_SCORE,
  RoutingDecider,
} from './routing-decider.js';
import { KeywordScorer } from './scorer.js';
import type { Domain, RoutingDecision } from './types.js';

export interface DomainRouterOptions {
  significantScore?: number;
  maxSpecialists?: number;
}

export class DomainRouter {
  readonly catalog: KeywordCatalog<Domain>;
  private readonly scorer: KeywordScorer<Domain>;
  private readonly decider: RoutingDecider<Domain>;

  constructor(bundle: DomainCatalogBundle, options: DomainRouterOptions = {}) {
    this.catalog = bundle.catalog;
    this.scorer = new KeywordScorer(bundle.catalog);
    this.decider = new RoutingDecider(bundle.catalog, {
      significantScore: options.significantScore ?? DEFAULT_SIGNIFICANT_SCORE,
      maxSpecialists: options.maxSpecialists ?? DEFAULT_MAX_SPECIALISTS,
      orchestrationDomain: bundle.orchestrationDomain,
    });
  }

  score(text: string): ReadonlyMap<Domain, number> {
    return this.scorer.score(text);
  }

  detect(text: string): RoutingDecision<Domain> {
    return this.decider.decide(this.scorer.score(text));
  }

  plan(text: string, state: ExecutionState = {}): ExecutionPlan {
    return planExecution(this.detect(text), text, state);
  }

  matchedKeywords(text: string, domain: Domain): string[] {
    return this.scorer.matchedKeywords(text, domain);
  }
}
