import { ConfigurationError } from '../errors.js';
import type {
  CatalogDefinition,
  CompiledKeyword,
  KeywordDefinition,
  MatchMode,
} from './types.js';

interface CompiledEntry {
  agent: string;
  keywords: readonly CompiledKeyword[];
}

function normalizeKeyword(keyword: string | KeywordDefinition): KeywordDefinition {
  return typeof keyword === 'string' ? { pattern: keyword } : keyword;
}

function compileKeyword(
  owner: string,
  keyword: KeywordDefinition,
  match: MatchMode,
  siblings: ReadonlySet<string>
): CompiledKeyword {
  const source = keyword.pattern.trim().toLowerCase();
  if (!source) {
    throw new ConfigurationError(`Catalog entry "${owner}" contains an empty keyword`);
  }
  const weight = keyword.weight ?? 1;
  if (!Number.isInteger(weight) || weight < 1) {
    throw new ConfigurationError(
      `Catalog entry "${owner}" keyword "${source}" must have a positive integer weight; received ${String(keyword.weight)}`
    );
  }

  // A plural the entry also lists on its own is left to that keyword.
  const plural = siblings.has(`${source}s`) || siblings.has(`${source}es`) ? '' : '(?:e?s)?';
  const expression = match === 'word' ? `\\b(?:${source})${plural}\\b` : `(?:${source})`;
  try {
    return { source, weight, regex: new RegExp(expression, 'i') };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Catalog entry "${owner}" has an invalid keyword pattern "${source}": ${reason}`);
  }
}

/**
 * Read-only keyword table. Declaration order is preserved and doubles as the
 * tie-break order wherever scores are ranked.
 */
export class KeywordCatalog<K extends string> {
  private readonly order: readonly K[];
  private readonly entries: ReadonlyMap<K, CompiledEntry>;

  private constructor(
    readonly match: MatchMode,
    order: readonly K[],
    entries: ReadonlyMap<K, CompiledEntry>
  ) {
    this.order = order;
    this.entries = entries;
  }

  static create<K extends string>(definition: CatalogDefinition<K>): KeywordCatalog<K> {
    if (definition.entries.length === 0) {
      throw new ConfigurationError('Catalog must declare at least one entry');
    }

    const order: K[] = [];
    const entries = new Map<K, CompiledEntry>();

    for (const entry of definition.entries) {
      if (entries.has(entry.name)) {
        throw new ConfigurationError(`Catalog declares "${entry.name}" more than once`);
      }
      const agent = entry.agent.trim();
      if (!agent) {
        throw new ConfigurationError(`Catalog entry "${entry.name}" has no agent mapping`);
      }
      if (entry.keywords.length === 0) {
        throw new ConfigurationError(`Catalog entry "${entry.name}" has no keywords`);
      }

      const definitions = entry.keywords.map(normalizeKeyword);
      const sources = new Set(definitions.map(keyword => keyword.pattern.trim().toLowerCase()));
      const seen = new Set<string>();
      const keywords: CompiledKeyword[] = [];
      for (const keyword of definitions) {
        const compiled = compileKeyword(entry.name, keyword, definition.match, sources);
        if (seen.has(compiled.source)) {
          continue;
        }
        seen.add(compiled.source);
        keywords.push(Object.freeze(compiled));
      }

      order.push(entry.name);
      entries.set(entry.name, Object.freeze({ agent, keywords: Object.freeze(keywords) }));
    }

    return new KeywordCatalog(definition.match, Object.freeze(order), entries);
  }

  allDomains(): readonly K[] {
    return this.order;
  }

  has(domain: string): domain is K {
    return this.order.some(name => name === domain);
  }

  lookup(domain: K): readonly CompiledKeyword[] {
    return this.requireEntry(domain).keywords;
  }

  agentFor(domain: K): string {
    return this.requireEntry(domain).agent;
  }

  private requireEntry(domain: K): CompiledEntry {
    const entry = this.entries.get(domain);
    if (!entry) {
      throw new ConfigurationError(`Catalog has no entry for "${domain}"`);
    }
    return entry;
  }
}
