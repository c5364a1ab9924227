import { readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors.js';
import {
  parseDepartmentCatalog,
  parseDomainCatalog,
  type DepartmentCatalogBundle,
  type DomainCatalogBundle,
} from './catalog-parser.js';

const domainCatalogCache = new Map<string, DomainCatalogBundle>();
const departmentCatalogCache = new Map<string, DepartmentCatalogBundle>();

export function getBuiltinCatalogDir(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  return join(__dirname, '..', '..', '..', 'catalogs');
}

export const BUILTIN_DOMAIN_CATALOG = 'domains.json';
export const BUILTIN_DEPARTMENT_CATALOG = 'departments.json';

function readCatalogJson(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && (error as { code?: unknown }).code === 'ENOENT') {
      throw new ConfigurationError(`Catalog file not found: ${path}`);
    }
    throw error;
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Catalog file ${path} is not valid JSON: ${reason}`);
  }
}

/** Loads and caches a domain catalog; defaults to the bundled one. */
export function loadDomainCatalog(path?: string): DomainCatalogBundle {
  const catalogPath = resolve(path ?? join(getBuiltinCatalogDir(), BUILTIN_DOMAIN_CATALOG));
  const cached = domainCatalogCache.get(catalogPath);
  if (cached) {
    return cached;
  }
  const bundle = parseDomainCatalog(readCatalogJson(catalogPath), catalogPath);
  domainCatalogCache.set(catalogPath, bundle);
  return bundle;
}

export function loadDepartmentCatalog(path?: string): DepartmentCatalogBundle {
  const catalogPath = resolve(path ?? join(getBuiltinCatalogDir(), BUILTIN_DEPARTMENT_CATALOG));
  const cached = departmentCatalogCache.get(catalogPath);
  if (cached) {
    return cached;
  }
  const bundle = parseDepartmentCatalog(readCatalogJson(catalogPath), catalogPath);
  departmentCatalogCache.set(catalogPath, bundle);
  return bundle;
}

export function clearCatalogCache(): void {
  domainCatalogCache.clear();
  departmentCatalogCache.clear();
}
