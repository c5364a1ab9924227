import { InputError } from '../core/errors.js';

export interface OptionSpec {
  long: string;
  short?: string;
  takesValue?: boolean;
}

export interface ParsedArgs {
  flags: Set<string>;
  values: Map<string, string>;
  positionals: string[];
}

/**
 * Minimal argv parser: `--name value`, `--name=value`, `-n value`, boolean
 * flags and bare positionals. Options are keyed by their long name.
 */
export function parseArgs(argv: readonly string[], specs: readonly OptionSpec[]): ParsedArgs {
  const parsed: ParsedArgs = { flags: new Set(), values: new Map(), positionals: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      parsed.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const spec = specs.find(candidate =>
      flag === `--${candidate.long}` || (candidate.short !== undefined && flag === `-${candidate.short}`)
    );
    if (!spec) {
      throw new InputError(`Unknown option: ${flag}`, 'input_invalid');
    }

    if (!spec.takesValue) {
      parsed.flags.add(spec.long);
      continue;
    }
    if (flag !== arg) {
      parsed.values.set(spec.long, arg.slice(eq + 1));
      continue;
    }
    if (i + 1 >= argv.length) {
      throw new InputError(`Option ${flag} requires a value`, 'input_invalid');
    }
    parsed.values.set(spec.long, argv[i + 1]);
    i++;
  }

  return parsed;
}
