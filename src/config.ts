import 'dotenv/config';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from './core/errors.js';
import { DEFAULT_MAX_SPECIALISTS, DEFAULT_SIGNIFICANT_SCORE } from './core/routing/routing-decider.js';

export interface SddRouterConfig {
    name: string;
    version: string;
    domainCatalogPath?: string;
    significantScore: number;
    maxSpecialists: number;
    featureDir?: string;
}

type Env = Record<string, string | undefined>;

let cachedVersion: string | null = null;

export function getPackageVersion(fallback = '1.0.0'): string {
    if (cachedVersion) {
        return cachedVersion;
    }

    try {
        const __filename = fileURLToPath(import.meta.url);
        const __dirname = dirname(__filename);
        const packageJsonPath = join(__dirname, '..', 'package.json');
        const content = readFileSync(packageJsonPath, 'utf-8');
        const parsed: unknown = JSON.parse(content);
        const version = typeof parsed === 'object' && parsed !== null && 'version' in parsed
            ? parsed.version
            : undefined;
        cachedVersion = typeof version === 'string' && version ? version : fallback;
    } catch (error) {
        if (typeof error === 'object' && error !== null && 'code' in error && (error as { code?: unknown }).code === 'ENOENT') {
            cachedVersion = fallback;
        } else {
            throw error;
        }
    }

    return cachedVersion;
}

function parsePositiveInteger(raw: string | undefined, variable: string, fallback: number): number {
    const value = raw?.trim();
    if (!value) {
        return fallback;
    }
    if (!/^\d+$/.test(value) || Number(value) < 1) {
        throw new ConfigurationError(`${variable} must be a positive integer, got "${value}"`);
    }
    return Number(value);
}

function optionalString(raw: string | undefined): string | undefined {
    const value = raw?.trim();
    return value ? value : undefined;
}

/** Reads settings from the environment; malformed numbers fail at startup. */
export function createConfig(env: Env = process.env): SddRouterConfig {
    return {
        name: 'sdd-router-mcp',
        version: getPackageVersion('0.0.0'),
        domainCatalogPath: optionalString(env.SDD_ROUTER_DOMAIN_CATALOG),
        significantScore: parsePositiveInteger(
            env.SDD_ROUTER_SIGNIFICANT_SCORE,
            'SDD_ROUTER_SIGNIFICANT_SCORE',
            DEFAULT_SIGNIFICANT_SCORE
        ),
        maxSpecialists: parsePositiveInteger(
            env.SDD_ROUTER_MAX_SPECIALISTS,
            'SDD_ROUTER_MAX_SPECIALISTS',
            DEFAULT_MAX_SPECIALISTS
        ),
        featureDir: optionalString(env.SDD_FEATURE_DIR),
    };
}
