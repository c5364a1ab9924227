import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { KeywordCatalog } from './keyword-catalog.js';
import { RoutingDecider } from './routing-decider.js';

type Area = 'ui' | 'api' | 'db' | 'ops' | 'lead';

const catalog = KeywordCatalog.create<Area>({
  match: 'word',
  entries: [
    { name: 'ui', agent: 'ui-agent', keywords: ['button'] },
    { name: 'api', agent: 'api-agent', keywords: ['endpoint'] },
    { name: 'db', agent: 'db-agent', keywords: ['table'] },
    { name: 'ops', agent: 'ops-agent', keywords: ['deploy'] },
    { name: 'lead', agent: 'lead-agent', keywords: ['workflow'] },
  ],
});

function decider(significantScore = 2, maxSpecialists = 3): RoutingDecider<Area> {
  return new RoutingDecider(catalog, { significantScore, maxSpecialists, orchestrationDomain: 'lead' });
}

function scores(values: Partial<Record<Area, number>>): Map<Area, number> {
  return new Map(catalog.allDomains().map((domain): [Area, number] => [domain, values[domain] ?? 0]));
}

describe('RoutingDecider', () => {
  it('returns none without matches', () => {
    const decision = decider().decide(scores({}));

    expect(decision.strategy).toBe('none');
    expect(decision.suggestedAgents).toEqual([]);
    expect(decision.domainCount).toBe(0);
    expect(decision.totalMatches).toBe(0);
    expect(decision.allScores).toHaveLength(5);
  });

  it('picks the single matching domain', () => {
    const decision = decider().decide(scores({ db: 4 }));

    expect(decision.strategy).toBe('single-agent');
    expect(decision.suggestedAgents).toEqual(['db-agent']);
  });

  it('stays single-agent when only one domain is significant', () => {
    const decision = decider().decide(scores({ ui: 2, api: 1, db: 1 }));

    expect(decision.strategy).toBe('single-agent');
    expect(decision.suggestedAgents).toEqual(['ui-agent']);
    expect(decision.domainCount).toBe(3);
    expect(decision.totalMatches).toBe(4);
  });

  it('goes multi-agent with two significant domains, orchestrator first', () => {
    const decision = decider().decide(scores({ ui: 2, db: 3 }));

    expect(decision.strategy).toBe('multi-agent');
    expect(decision.suggestedAgents).toEqual(['lead-agent', 'db-agent', 'ui-agent']);
  });

  it('caps specialists and skips the orchestration domain', () => {
    const decision = decider(2, 3).decide(scores({ lead: 5, ui: 4, api: 3, db: 2, ops: 2 }));

    expect(decision.strategy).toBe('multi-agent');
    expect(decision.orderedDomains.map(entry => entry.domain)).toEqual(['lead', 'ui', 'api', 'db', 'ops']);
    expect(decision.suggestedAgents).toEqual(['lead-agent', 'ui-agent', 'api-agent']);
  });

  it('breaks score ties by catalog order', () => {
    const decision = decider().decide(scores({ ops: 2, api: 2, ui: 1 }));

    expect(decision.orderedDomains.map(entry => entry.domain)).toEqual(['api', 'ops', 'ui']);
    expect(decision.suggestedAgents).toEqual(['lead-agent', 'api-agent', 'ops-agent', 'ui-agent']);
  });

  it('honours a custom significance threshold', () => {
    const decision = decider(1).decide(scores({ ui: 1, api: 1 }));

    expect(decision.strategy).toBe('multi-agent');
    expect(decision.suggestedAgents).toEqual(['lead-agent', 'ui-agent', 'api-agent']);
  });

  it('does not duplicate agents shared by several domains', () => {
    const shared = KeywordCatalog.create<'a' | 'b' | 'lead'>({
      match: 'word',
      entries: [
        { name: 'a', agent: 'same-agent', keywords: ['x'] },
        { name: 'b', agent: 'same-agent', keywords: ['y'] },
        { name: 'lead', agent: 'lead-agent', keywords: ['z'] },
      ],
    });
    const decision = new RoutingDecider(shared, {
      significantScore: 2,
      maxSpecialists: 3,
      orchestrationDomain: 'lead',
    }).decide(new Map<'a' | 'b' | 'lead', number>([['a', 2], ['b', 2], ['lead', 0]]));

    expect(decision.suggestedAgents).toEqual(['lead-agent', 'same-agent']);
  });

  it('treats missing scores as zero', () => {
    const decision = decider().decide(new Map<Area, number>([['ui', 1]]));

    expect(decision.strategy).toBe('single-agent');
    expect(decision.allScores.find(entry => entry.domain === 'db')?.score).toBe(0);
  });

  it('rejects invalid policies', () => {
    expect(() => decider(0)).toThrow(ConfigurationError);
    expect(() => decider(2, 1.5)).toThrow('maxSpecialists must be a positive integer; received 1.5');
  });
});
