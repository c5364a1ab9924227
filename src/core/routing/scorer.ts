import type { KeywordCatalog } from './keyword-catalog.js';
import type { ScoreEntry } from './types.js';

function normalizeText(text: string): string {
  return text.toLowerCase();
}

function hasContent(text: string): boolean {
  return /[^\p{Cc}\s]/u.test(text);
}

/**
 * Counts, per catalog entry, the distinct keywords present in a text. A
 * keyword contributes its weight once no matter how often it occurs.
 */
export class KeywordScorer<K extends string> {
  constructor(private readonly catalog: KeywordCatalog<K>) {}

  score(text: string): ReadonlyMap<K, number> {
    const normalized = normalizeText(text);
    const scores = new Map<K, number>();

    for (const domain of this.catalog.allDomains()) {
      let score = 0;
      if (hasContent(normalized)) {
        for (const keyword of this.catalog.lookup(domain)) {
          if (keyword.regex.test(normalized)) {
            score += keyword.weight;
          }
        }
      }
      scores.set(domain, score);
    }

    return scores;
  }

  /** Keywords of one entry found in the text, in declaration order. */
  matchedKeywords(text: string, domain: K): string[] {
    const normalized = normalizeText(text);
    return this.catalog
      .lookup(domain)
      .filter(keyword => keyword.regex.test(normalized))
      .map(keyword => keyword.source);
  }

  entries(text: string): ScoreEntry<K>[] {
    const scores = this.score(text);
    return this.catalog.allDomains().map(domain => ({
      domain,
      score: scores.get(domain) ?? 0,
      agent: this.catalog.agentFor(domain),
    }));
  }
}
