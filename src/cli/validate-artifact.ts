import { isAbsolute, resolve } from 'node:path';
import { createConfig } from '../config.js';
import { InputError } from '../core/errors.js';
import { defaultArtifactPath, readArtifact } from '../core/validation/artifact-reader-node.js';
import { renderValidationReport, toValidationJson } from '../core/validation/format.js';
import { scanRepository } from '../core/validation/repository-scanner-node.js';
import { REPORT_KINDS, type ReportKind, type ValidateOptions, type ValidationReport } from '../core/validation/types.js';
import { exitCodeFor, validateArtifact, validateConstitution } from '../core/validation/validate.js';
import { parseArgs } from './args.js';
import type { CliIO } from './io.js';
import { runCommand } from './run.js';

export const VALIDATE_USAGE = `Usage: sdd-validate <spec|plan|tasks> [OPTIONS] [FILE]
       sdd-validate constitution [OPTIONS] [DIR]

Options:
  --json              Output in JSON format
  --verbose, -v       Verbose output
  --strict            Enable strict validation (warnings above the threshold fail)
  --threshold N       Warnings allowed under --strict (default: 3 spec, 5 plan, 4 tasks, 3 constitution)
  --file, -f FILE     Artifact file to validate (repository directory for constitution)
  --help, -h          Show this help message

Without a file, specs/$SDD_FEATURE_DIR/<kind>.md is validated. The
constitution check scans the repository in DIR, or the working directory.

Examples:
  sdd-validate spec --file specs/001-feature/spec.md
  sdd-validate plan --strict specs/002-auth/plan.md
  sdd-validate tasks --json specs/002-auth/tasks.md
  sdd-validate constitution --verbose`;

function parseThreshold(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new InputError(`--threshold must be a non-negative integer, got "${raw}"`, 'input_invalid');
  }
  return Number(raw.trim());
}

function isReportKind(value: string): value is ReportKind {
  return REPORT_KINDS.some(kind => kind === value);
}

/** Exit code 0 on PASS, 1 on FAIL or input errors, 2 on WARN. */
export function runValidateArtifact(argv: readonly string[], io: CliIO): Promise<number> {
  return runCommand(io, async () => {
    const args = parseArgs(argv, [
      { long: 'json' },
      { long: 'verbose', short: 'v' },
      { long: 'strict' },
      { long: 'help', short: 'h' },
      { long: 'file', short: 'f', takesValue: true },
      { long: 'threshold', takesValue: true },
    ]);
    if (args.flags.has('help')) {
      io.stdout(VALIDATE_USAGE);
      return 0;
    }

    const [kind, bareFile, ...extra] = args.positionals;
    if (!kind) {
      throw new InputError(`Artifact kind is required (${REPORT_KINDS.join(', ')})`);
    }
    if (!isReportKind(kind)) {
      throw new InputError(
        `Unknown artifact kind "${kind}". Expected one of: ${REPORT_KINDS.join(', ')}`,
        'input_invalid'
      );
    }
    const warningThreshold = parseThreshold(args.values.get('threshold'));
    if (extra.length > 0) {
      throw new InputError(`Unexpected arguments: ${extra.join(' ')}`, 'input_invalid');
    }

    const options: ValidateOptions = { strict: args.flags.has('strict'), warningThreshold };
    const target = args.values.get('file') ?? bareFile;
    let report: ValidationReport;
    if (kind === 'constitution') {
      const root = target ? resolve(io.cwd, target) : io.cwd;
      report = validateConstitution(root, await scanRepository(root), options);
    } else {
      let file = target;
      if (!file) {
        const { featureDir } = createConfig(io.env);
        if (!featureDir) {
          throw new InputError('No file given. Use --file or set SDD_FEATURE_DIR');
        }
        file = defaultArtifactPath(io.cwd, featureDir, kind);
      } else if (!isAbsolute(file)) {
        file = resolve(io.cwd, file);
      }
      report = validateArtifact(kind, await readArtifact(file, kind), options);
    }

    if (args.flags.has('json')) {
      io.stdout(JSON.stringify(toValidationJson(report), null, 2));
    } else {
      io.stdout(renderValidationReport(report, io.color, { verbose: args.flags.has('verbose') }));
    }
    return exitCodeFor(report);
  });
}
