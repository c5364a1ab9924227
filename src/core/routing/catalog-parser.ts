import { ConfigurationError } from '../errors.js';
import { KeywordCatalog } from './keyword-catalog.js';
import {
  DEPARTMENTS,
  DOMAINS,
  type AssignmentField,
  type AssignmentRule,
  type CatalogEntryDefinition,
  type Department,
  type DepartmentProfile,
  type Domain,
  type KeywordDefinition,
  type MatchMode,
} from './types.js';

export interface DomainCatalogBundle {
  catalog: KeywordCatalog<Domain>;
  orchestrationDomain: Domain;
}

export interface DepartmentCatalogBundle {
  purposes: KeywordCatalog<Department>;
  names: KeywordCatalog<Department>;
  profiles: Record<Department, DepartmentProfile>;
  defaultDepartment: Department;
  assignmentRules: readonly AssignmentRule[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function isDomain(value: unknown): value is Domain {
  return DOMAINS.some(domain => domain === value);
}

export function isDepartment(value: unknown): value is Department {
  return DEPARTMENTS.some(department => department === value);
}

function requireRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }
  return value;
}

function requireString(value: unknown, where: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigurationError(`${where} must be a non-empty string`);
  }
  return value;
}

function requireArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${where} must be an array`);
  }
  return value;
}

function parseMatchMode(value: unknown, where: string): MatchMode {
  if (value === 'word' || value === 'substring') {
    return value;
  }
  throw new ConfigurationError(`${where} must be "word" or "substring"; received ${JSON.stringify(value)}`);
}

function parseKeyword(value: unknown, where: string): string | KeywordDefinition {
  if (typeof value === 'string') {
    return value;
  }
  const record = requireRecord(value, where);
  const pattern = requireString(record.pattern, `${where}.pattern`);
  if (record.weight === undefined) {
    return { pattern };
  }
  if (typeof record.weight !== 'number') {
    throw new ConfigurationError(`${where}.weight must be a number`);
  }
  return { pattern, weight: record.weight };
}

function parseKeywords(value: unknown, where: string): Array<string | KeywordDefinition> {
  return requireArray(value, where).map((item, index) => parseKeyword(item, `${where}[${index}]`));
}

function assertComplete<K extends string>(
  declared: readonly K[],
  expected: readonly K[],
  source: string,
  label: string
): void {
  const missing = expected.filter(name => !declared.includes(name));
  if (missing.length > 0) {
    throw new ConfigurationError(`${source}: no ${label} declared for ${missing.join(', ')}`);
  }
}

export function parseDomainCatalog(raw: unknown, source: string): DomainCatalogBundle {
  const document = requireRecord(raw, source);
  const match = parseMatchMode(document.match ?? 'word', `${source}: match`);

  const entries: CatalogEntryDefinition<Domain>[] = requireArray(document.domains, `${source}: domains`)
    .map((item, index) => {
      const where = `${source}: domains[${index}]`;
      const entry = requireRecord(item, where);
      const name = entry.name;
      if (!isDomain(name)) {
        throw new ConfigurationError(`${where}.name "${String(name)}" is not a known domain`);
      }
      const agent = typeof entry.agent === 'string' ? entry.agent : '';
      if (!agent.trim()) {
        throw new ConfigurationError(`${source}: domain "${name}" has no agent mapping`);
      }
      return {
        name,
        agent,
        keywords: parseKeywords(entry.keywords, `${where}.keywords`),
      };
    });

  const catalog = KeywordCatalog.create({ match, entries });
  assertComplete(catalog.allDomains(), DOMAINS, source, 'keywords');

  const orchestrationDomain = document.orchestrationDomain ?? 'orchestration';
  if (!isDomain(orchestrationDomain)) {
    throw new ConfigurationError(`${source}: orchestrationDomain "${String(orchestrationDomain)}" is not a known domain`);
  }

  return { catalog, orchestrationDomain };
}

function parseAssignmentField(value: unknown, where: string): AssignmentField {
  if (value === 'name' || value === 'description') {
    return value;
  }
  throw new ConfigurationError(`${where} must be "name" or "description"`);
}

function compileRulePattern(pattern: string, where: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${where} has an invalid pattern "${pattern}": ${reason}`);
  }
}

export function parseDepartmentCatalog(raw: unknown, source: string): DepartmentCatalogBundle {
  const document = requireRecord(raw, source);
  const match = parseMatchMode(document.match ?? 'substring', `${source}: match`);

  const purposeEntries: CatalogEntryDefinition<Department>[] = [];
  const nameEntries: CatalogEntryDefinition<Department>[] = [];
  const profiles = new Map<Department, DepartmentProfile>();

  requireArray(document.departments, `${source}: departments`).forEach((item, index) => {
    const where = `${source}: departments[${index}]`;
    const entry = requireRecord(item, where);
    const name = entry.name;
    if (!isDepartment(name)) {
      throw new ConfigurationError(`${where}.name "${String(name)}" is not a known department`);
    }
    if (!isStringArray(entry.tools) || !isStringArray(entry.mcpAccess)) {
      throw new ConfigurationError(`${where} must list tools and mcpAccess as string arrays`);
    }

    profiles.set(name, Object.freeze({
      name,
      description: requireString(entry.description, `${where}.description`),
      roleType: requireString(entry.roleType, `${where}.roleType`),
      interactionLevel: requireString(entry.interactionLevel, `${where}.interactionLevel`),
      tools: Object.freeze([...entry.tools]),
      mcpAccess: Object.freeze([...entry.mcpAccess]),
    }));

    purposeEntries.push({
      name,
      agent: name,
      keywords: parseKeywords(entry.purposePatterns, `${where}.purposePatterns`),
    });
    const namePatterns = entry.namePatterns === undefined
      ? []
      : parseKeywords(entry.namePatterns, `${where}.namePatterns`);
    if (namePatterns.length > 0) {
      nameEntries.push({ name, agent: name, keywords: namePatterns });
    }
  });

  const purposes = KeywordCatalog.create({ match, entries: purposeEntries });
  assertComplete(purposes.allDomains(), DEPARTMENTS, source, 'purpose patterns');
  const names = KeywordCatalog.create({ match, entries: nameEntries });

  const defaultDepartment = document.defaultDepartment ?? 'engineering';
  if (!isDepartment(defaultDepartment)) {
    throw new ConfigurationError(`${source}: defaultDepartment "${String(defaultDepartment)}" is not a known department`);
  }

  const assignmentRules = (document.assignmentRules === undefined
    ? []
    : requireArray(document.assignmentRules, `${source}: assignmentRules`)
  ).map((item, index): AssignmentRule => {
    const where = `${source}: assignmentRules[${index}]`;
    const rule = requireRecord(item, where);
    const expected = rule.expected;
    if (!isDepartment(expected)) {
      throw new ConfigurationError(`${where}.expected "${String(expected)}" is not a known department`);
    }
    return Object.freeze({
      field: parseAssignmentField(rule.field, `${where}.field`),
      pattern: compileRulePattern(requireString(rule.pattern, `${where}.pattern`), where),
      expected,
      message: requireString(rule.message, `${where}.message`),
    });
  });

  return {
    purposes,
    names,
    profiles: buildProfileRecord(profiles),
    defaultDepartment,
    assignmentRules: Object.freeze(assignmentRules),
  };
}

function buildProfileRecord(profiles: ReadonlyMap<Department, DepartmentProfile>): Record<Department, DepartmentProfile> {
  const lookup = (department: Department): DepartmentProfile => {
    const profile = profiles.get(department);
    if (!profile) {
      throw new ConfigurationError(`No profile declared for department "${department}"`);
    }
    return profile;
  };
  return Object.freeze({
    architecture: lookup('architecture'),
    engineering: lookup('engineering'),
    quality: lookup('quality'),
    data: lookup('data'),
    product: lookup('product'),
    operations: lookup('operations'),
  });
}
