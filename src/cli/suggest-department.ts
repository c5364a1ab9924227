import { InputError } from '../core/errors.js';
import type { DepartmentClassifier } from '../core/routing/department-classifier.js';
import { renderDepartmentSuggestion, toDepartmentSuggestionJson } from '../core/routing/format.js';
import { DEPARTMENTS } from '../core/routing/types.js';
import { createConfig } from '../config.js';
import { createServices } from '../services.js';
import { parseArgs } from './args.js';
import type { CliIO } from './io.js';
import { runCommand } from './run.js';

export const SUGGEST_DEPARTMENT_USAGE = `Usage: sdd-suggest-department [OPTIONS] [PURPOSE...]

Options:
  --purpose, -p TEXT       What the agent does
  --name, -n NAME          Agent name (kebab-case)
  --department, -d DEPT    Use this department instead of the suggestion
  --json                   Output in JSON format
  --verbose, -v            Show per-department scores
  --help, -h               Show this help message

Departments: ${DEPARTMENTS.join(', ')}

Examples:
  sdd-suggest-department --name api-tester --purpose "Writes integration tests for REST endpoints"
  sdd-suggest-department "Designs the overall system architecture"`;

export interface SuggestDepartmentDeps {
  classifier?: DepartmentClassifier;
}

export function runSuggestDepartment(
  argv: readonly string[],
  io: CliIO,
  deps: SuggestDepartmentDeps = {}
): Promise<number> {
  return runCommand(io, async () => {
    const args = parseArgs(argv, [
      { long: 'json' },
      { long: 'verbose', short: 'v' },
      { long: 'help', short: 'h' },
      { long: 'purpose', short: 'p', takesValue: true },
      { long: 'name', short: 'n', takesValue: true },
      { long: 'department', short: 'd', takesValue: true },
    ]);
    if (args.flags.has('help')) {
      io.stdout(SUGGEST_DEPARTMENT_USAGE);
      return 0;
    }

    const purpose = [args.values.get('purpose') ?? '', ...args.positionals]
      .filter(part => part.length > 0)
      .join(' ');
    if (!purpose.trim()) {
      throw new InputError('Agent purpose is required. Use --purpose or pass it as arguments');
    }

    const classifier = deps.classifier ?? createServices(createConfig(io.env)).classifier;
    const suggestion = classifier.suggest({
      purpose,
      name: args.values.get('name'),
      department: args.values.get('department'),
    });

    if (args.flags.has('json')) {
      io.stdout(JSON.stringify(toDepartmentSuggestionJson(suggestion), null, 2));
    } else {
      io.stdout(renderDepartmentSuggestion(suggestion, io.color, { verbose: args.flags.has('verbose') }));
    }
    return 0;
  });
}
