import { readFile, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { glob } from 'glob';
import Ignore from 'ignore';
import { FileNotFoundError } from '../errors.js';
import { isDirectory, isFile, isMissing } from './artifact-reader-node.js';
import type { RepositoryFacts } from './constitution-checklist.js';

const DEFAULT_IGNORE = [
  'node_modules/**',
  '.git/**',
  'dist/**',
  'build/**',
  'coverage/**',
  '.next/**',
  '.nuxt/**',
  'vendor/**',
  'target/**',
  '__pycache__/**',
  '.venv/**',
];

/** Larger files are skipped when searching source text. */
const MAX_SCANNED_BYTES = 1024 * 1024;

const LIBRARY_DIRS = ['libs', 'packages', 'src/libs'];

const TEST_PATTERNS = ['**/{__tests__,test,tests,spec}/', '**/*.{test,spec}.{ts,js}'];

const CONTRACT_PATTERNS = [
  'specs/**/contracts/',
  '**/*contract*.ts',
  '**/*schema*.ts',
  '**/*contract*.json',
  '**/openapi.yaml',
  '**/swagger.json',
];

const SCRIPT_PATTERNS = ['.specify/scripts/bash/*.sh', '*.sh'];

/** Scripts that mention git only to audit other scripts. */
const AUDIT_SCRIPTS = new Set(['sanitization-audit.sh', 'constitutional-check.sh']);

const CORE_DOCS: ReadonlyArray<readonly string[]> = [
  ['README.md'],
  ['CLAUDE.md', '.claude/CLAUDE.md'],
  ['.specify/memory/constitution.md'],
  ['.specify/memory/constitution_update_checklist.md'],
];

const DEPENDENCY_MANIFESTS = ['package.json', 'requirements.txt', 'Gemfile', 'go.mod', 'Cargo.toml'];

const TRIGGERS_FILE = '.specify/memory/agent-collaboration-triggers.md';

const IDEMPOTENCY = /if.*exist|mkdir -p|--skip-existing|--force/;
const GIT_COMMAND = /^\s*git\s+(?:checkout|commit|push|branch|init|add)\b/m;
const GIT_APPROVAL = /request_git_approval|read -p.*[Yy]/;
const FEATURE_FLAGS = /feature.*flag|featureFlag|FEATURE_FLAG|enabled.*feature/;
const LOGGING = /console\.log|logger|logging|log\.info|log\.error/;
const VALIDATION = /validate|sanitize|escape|zod|yup|joi/;
const SECRETS_IGNORED = /\.env|secrets|credentials/;
const DESIGN_SYSTEM = /theme|design.*system|colors.*palette|typography/;
const ACCESS_CONTROL = /access.*control|authorization|permission|role|tier|RLS|row.*level.*security/;
const MODEL_CONFIG = /claude.*sonnet|claude.*opus|model.*selection|AI.*model/;

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isMissing(error)) {
      return undefined;
    }
    throw error;
  }
}

class RepositoryScan {
  private readonly gitignore = Ignore.default();

  constructor(readonly root: string, gitignoreText: string | undefined) {
    this.gitignore.add(DEFAULT_IGNORE);
    if (gitignoreText) {
      this.gitignore.add(gitignoreText);
    }
  }

  /** Relative paths matching any pattern, minus ignored ones, sorted. */
  async find(patterns: string[], options: { nodir?: boolean } = {}): Promise<string[]> {
    const found = await glob(patterns, {
      cwd: this.root,
      dot: true,
      nodir: options.nodir ?? false,
      ignore: DEFAULT_IGNORE,
    });
    return this.gitignore.filter(found).sort();
  }

  async anyMatch(patterns: string[]): Promise<boolean> {
    return (await this.find(patterns)).length > 0;
  }

  /** Text of every file under the given directories, skipping oversized ones. */
  async texts(dirs: string[]): Promise<string[]> {
    const files = await this.find(dirs.map(dir => `${dir}/**/*`), { nodir: true });
    const texts: string[] = [];
    for (const file of files) {
      const path = join(this.root, file);
      if ((await stat(path)).size > MAX_SCANNED_BYTES) {
        continue;
      }
      texts.push(await readFile(path, 'utf8'));
    }
    return texts;
  }

  async existing(paths: readonly string[]): Promise<string[]> {
    const present: string[] = [];
    for (const path of paths) {
      if (await isFile(join(this.root, path))) {
        present.push(path);
      }
    }
    return present;
  }
}

function anyText(texts: readonly string[], pattern: RegExp): boolean {
  return texts.some(text => pattern.test(text));
}

/**
 * Gathers the repository facts the constitution checklist evaluates:
 * project layout, scripts, documentation, agent definitions and a text
 * search of the source directories. Paths ignored by `.gitignore` are
 * left out.
 */
export async function scanRepository(root: string): Promise<RepositoryFacts> {
  if (!(await isDirectory(root))) {
    throw new FileNotFoundError(root, 'Repository');
  }
  const gitignoreText = await readOptional(join(root, '.gitignore'));
  const scan = new RepositoryScan(root, gitignoreText);

  const libraryDirs: string[] = [];
  for (const dir of LIBRARY_DIRS) {
    if (await isDirectory(join(root, dir))) {
      libraryDirs.push(`${dir}/`);
    }
  }

  const scripts: Array<{ name: string; text: string }> = [];
  for (const file of await scan.find(SCRIPT_PATTERNS, { nodir: true })) {
    scripts.push({ name: file, text: await readFile(join(root, file), 'utf8') });
  }
  const unapprovedGitScripts = scripts
    .filter(script => !AUDIT_SCRIPTS.has(basename(script.name)))
    .filter(script => GIT_COMMAND.test(script.text) && !GIT_APPROVAL.test(script.text))
    .map(script => script.name);

  const docs: string[] = [];
  for (const alternatives of CORE_DOCS) {
    const [found] = await scan.existing(alternatives);
    if (found) {
      docs.push(found);
    }
  }

  const sourceTexts = await scan.texts(['src', 'libs']);
  const specTexts = await scan.texts(['specs']);
  const agentTexts = await scan.texts(['.claude', '.specify']);
  for (const file of ['CLAUDE.md', 'AGENTS.md']) {
    const text = await readOptional(join(root, file));
    if (text !== undefined) {
      agentTexts.push(text);
    }
  }

  return {
    libraryDirs,
    hasTests: await scan.anyMatch(TEST_PATTERNS),
    hasContracts: await scan.anyMatch(CONTRACT_PATTERNS),
    hasIdempotentScripts: scripts.some(script => IDEMPOTENCY.test(script.text)),
    hasFeatureFlags: anyText(sourceTexts, FEATURE_FLAGS),
    unapprovedGitScripts,
    hasLogging: anyText(sourceTexts, LOGGING),
    docs,
    dependencyManifests: await scan.existing(DEPENDENCY_MANIFESTS),
    agentCount: (await scan.find(['.claude/agents/**/*.md'], { nodir: true })).length,
    hasCollaborationTriggers: await isFile(join(root, TRIGGERS_FILE)),
    hasValidation: anyText(sourceTexts, VALIDATION),
    gitignoreProtectsSecrets: gitignoreText !== undefined && SECRETS_IGNORED.test(gitignoreText),
    hasDesignSystem: anyText(sourceTexts, DESIGN_SYSTEM),
    hasAccessControl: anyText([...sourceTexts, ...specTexts], ACCESS_CONTROL),
    hasModelConfig: anyText(agentTexts, MODEL_CONFIG),
  };
}
