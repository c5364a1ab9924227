import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigurationError } from '../errors.js';
import {
  BUILTIN_DEPARTMENT_CATALOG,
  clearCatalogCache,
  getBuiltinCatalogDir,
  loadDepartmentCatalog,
  loadDomainCatalog,
} from './catalog-loader-node.js';
import { parseDepartmentCatalog, parseDomainCatalog } from './catalog-parser.js';
import { DOMAINS } from './types.js';

function domainDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    match: 'word',
    domains: DOMAINS.map(name => ({ name, agent: `${name}-agent`, keywords: [`${name}-word`] })),
    ...overrides,
  };
}

describe('parseDomainCatalog', () => {
  it('builds a catalog with the default orchestration domain', () => {
    const bundle = parseDomainCatalog(domainDocument(), 'inline');

    expect(bundle.orchestrationDomain).toBe('orchestration');
    expect(bundle.catalog.allDomains()).toEqual([...DOMAINS]);
    expect(bundle.catalog.agentFor('devops')).toBe('devops-agent');
  });

  it('rejects unknown domain names', () => {
    const document = domainDocument();
    const domains = document.domains;
    const withExtra = Array.isArray(domains) ? [...domains, { name: 'mobile', agent: 'x', keywords: ['y'] }] : [];

    expect(() => parseDomainCatalog({ ...document, domains: withExtra }, 'inline'))
      .toThrow('inline: domains[11].name "mobile" is not a known domain');
  });

  it('rejects a catalog that leaves a domain out', () => {
    const document = domainDocument({
      domains: DOMAINS.filter(name => name !== 'security')
        .map(name => ({ name, agent: `${name}-agent`, keywords: ['k'] })),
    });

    expect(() => parseDomainCatalog(document, 'inline')).toThrow('inline: no keywords declared for security');
  });

  it('rejects a missing agent mapping', () => {
    const document = domainDocument({
      domains: DOMAINS.map(name => ({ name, agent: name === 'tasks' ? '' : 'a', keywords: ['k'] })),
    });

    expect(() => parseDomainCatalog(document, 'inline')).toThrow('inline: domain "tasks" has no agent mapping');
  });

  it('rejects an invalid match mode', () => {
    expect(() => parseDomainCatalog(domainDocument({ match: 'fuzzy' }), 'inline')).toThrow(ConfigurationError);
  });
});

describe('parseDepartmentCatalog', () => {
  const bundledDocument: unknown = JSON.parse(
    readFileSync(join(getBuiltinCatalogDir(), BUILTIN_DEPARTMENT_CATALOG), 'utf-8')
  );

  function withRules(rules: unknown[]): Record<string, unknown> {
    if (typeof bundledDocument !== 'object' || bundledDocument === null) {
      throw new Error('bundled department catalog is not an object');
    }
    return { ...bundledDocument, assignmentRules: rules };
  }

  it('parses the bundled rules', () => {
    expect(parseDepartmentCatalog(bundledDocument, 'bundled').assignmentRules).toHaveLength(8);
  });

  it('rejects an unknown expected department in a rule', () => {
    const document = withRules([{ field: 'name', pattern: 'x', expected: 'sales', message: 'm' }]);

    expect(() => parseDepartmentCatalog(document, 'inline'))
      .toThrow('inline: assignmentRules[0].expected "sales" is not a known department');
  });

  it('rejects an invalid rule pattern', () => {
    const document = withRules([{ field: 'description', pattern: '[a-', expected: 'data', message: 'm' }]);

    expect(() => parseDepartmentCatalog(document, 'inline')).toThrow(ConfigurationError);
  });

  it('exposes department profiles from the bundled catalog', () => {
    const bundle = loadDepartmentCatalog();

    expect(bundle.defaultDepartment).toBe('engineering');
    expect(bundle.profiles.quality.roleType).toBe('Validation & Review');
    expect(bundle.profiles.data.tools).toEqual(['Read', 'Edit', 'Bash', 'Grep', 'Glob', 'TodoWrite']);
  });
});

describe('catalog loader', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'sdd-catalog-'));
    clearCatalogCache();
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    clearCatalogCache();
  });

  it('caches catalogs by path', () => {
    expect(loadDomainCatalog()).toBe(loadDomainCatalog());
  });

  it('loads a replacement domain catalog', () => {
    const path = join(testDir, 'domains.json');
    writeFileSync(path, JSON.stringify(domainDocument({ orchestrationDomain: 'tasks' })));

    expect(loadDomainCatalog(path).orchestrationDomain).toBe('tasks');
  });

  it('fails on a missing file', () => {
    const path = join(testDir, 'missing.json');

    expect(() => loadDomainCatalog(path)).toThrow(`Catalog file not found: ${path}`);
  });

  it('fails on malformed JSON', () => {
    const path = join(testDir, 'broken.json');
    writeFileSync(path, '{ "domains": [');

    expect(() => loadDomainCatalog(path)).toThrow(ConfigurationError);
  });
});
