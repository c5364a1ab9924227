import { isAbsolute, resolve } from 'node:path';
import { createConfig } from '../config.js';
import { readInput } from '../core/input/read-input-node.js';
import type { DomainRouter } from '../core/routing/domain-router.js';
import { planExecution } from '../core/routing/execution-plan.js';
import {
  renderDomainDetection,
  renderExecutionPlan,
  toDomainDetectionJson,
  toExecutionPlanJson,
} from '../core/routing/format.js';
import { createServices } from '../services.js';
import { parseArgs } from './args.js';
import type { CliIO } from './io.js';
import { runCommand } from './run.js';

export const DETECT_DOMAIN_USAGE = `Usage: sdd-detect-domain [OPTIONS] [TEXT...]

Options:
  --json              Output in JSON format
  --verbose, -v       Verbose output
  --plan              Add an execution plan for the suggested agents
  --file, -f FILE     Analyze file contents
  --text, -t TEXT     Analyze text string
  --help, -h          Show this help message

Examples:
  sdd-detect-domain --file specs/001-feature/spec.md
  sdd-detect-domain --text "Create a React component with database integration"
  echo "API endpoint with caching" | sdd-detect-domain`;

export interface DetectDomainDeps {
  router?: DomainRouter;
}

/** Exit code 0 when any keyword matched, 1 otherwise or on input errors. */
export function runDetectDomain(
  argv: readonly string[],
  io: CliIO,
  deps: DetectDomainDeps = {}
): Promise<number> {
  return runCommand(io, async () => {
    const args = parseArgs(argv, [
      { long: 'json' },
      { long: 'verbose', short: 'v' },
      { long: 'plan' },
      { long: 'help', short: 'h' },
      { long: 'file', short: 'f', takesValue: true },
      { long: 'text', short: 't', takesValue: true },
    ]);
    if (args.flags.has('help')) {
      io.stdout(DETECT_DOMAIN_USAGE);
      return 0;
    }

    const text = [args.values.get('text') ?? '', ...args.positionals]
      .filter(part => part.length > 0)
      .join(' ');
    const file = args.values.get('file');
    const input = await readInput({
      file: file && !isAbsolute(file) ? resolve(io.cwd, file) : file,
      text,
      stdin: io.stdin,
    });
    if (!input.ok) {
      throw input.error;
    }

    const router = deps.router ?? createServices(createConfig(io.env)).router;
    const decision = router.detect(input.value);
    const verbose = args.flags.has('verbose');
    const plan = args.flags.has('plan') ? planExecution(decision, input.value) : undefined;

    if (args.flags.has('json')) {
      const json = toDomainDetectionJson(decision, { verbose });
      io.stdout(JSON.stringify(plan ? { ...json, execution_plan: toExecutionPlanJson(plan) } : json, null, 2));
    } else {
      const text = renderDomainDetection(decision, io.color, { verbose });
      io.stdout(plan ? `${text}\n\n${renderExecutionPlan(plan, io.color)}` : text);
    }
    return decision.totalMatches > 0 ? 0 : 1;
  });
}
