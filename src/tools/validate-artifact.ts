import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { isAbsolute, resolve } from 'path';
import { InputError } from '../core/errors.js';
import { defaultArtifactPath, readArtifact } from '../core/validation/artifact-reader-node.js';
import { toValidationJson } from '../core/validation/format.js';
import { scanRepository } from '../core/validation/repository-scanner-node.js';
import {
  REPORT_KINDS,
  type Artifact,
  type ArtifactKind,
  type ReportKind,
  type ValidateOptions,
  type ValidationReport,
} from '../core/validation/types.js';
import { artifactFromText, validateArtifact, validateConstitution } from '../core/validation/validate.js';
import type { ToolContext, ToolResponse } from '../workflow-types.js';
import { readBoolean, readNonNegativeInteger, readString, requireString } from './tool-args.js';

export const validateArtifactTool: Tool = {
  name: 'validate-artifact',
  description: `Validate a spec-driven development artifact (spec.md, plan.md or tasks.md) against its quality checklist, or check the whole project against its constitution.

# Instructions
Pass either filePath (relative paths resolve against projectPath) or the
document content inline. Plans read from disk also check for research.md,
data-model.md, quickstart.md and a contracts/ directory beside them.
With kind "constitution" the project at projectPath (or the directory in
filePath) is scanned for tests, contracts, scripts, documentation, agent
definitions and input validation; content is not accepted.
Strict mode turns too many warnings into a WARN status.`,
  inputSchema: {
    type: 'object',
    properties: {
      kind: {
        type: 'string',
        enum: [...REPORT_KINDS],
        description: 'Artifact type',
      },
      filePath: {
        type: 'string',
        description: 'Path to the artifact file',
      },
      content: {
        type: 'string',
        description: 'Artifact content; used instead of reading filePath',
      },
      strict: {
        type: 'boolean',
        description: 'Fail on warnings above the artifact threshold',
      },
      warningThreshold: {
        type: 'integer',
        minimum: 0,
        description: 'Warnings allowed in strict mode (default: 3 spec, 5 plan, 4 tasks, 3 constitution)',
      },
      projectPath: {
        type: 'string',
        description: 'Absolute path to the project root (optional - uses server context path if not provided)',
      },
    },
    required: ['kind'],
  },
};

function parseKind(value: string): ReportKind {
  const kind = REPORT_KINDS.find(candidate => candidate === value);
  if (!kind) {
    throw new InputError(
      `Unknown artifact kind "${value}". Expected one of: ${REPORT_KINDS.join(', ')}`,
      'input_invalid'
    );
  }
  return kind;
}

export function createValidateArtifactHandler(featureDir?: string) {
  async function loadArtifact(
    kind: ArtifactKind,
    args: Record<string, unknown>,
    projectPath: string
  ): Promise<Artifact> {
    const filePath = readString(args, 'filePath');
    const content = readString(args, 'content');
    if (content !== undefined) {
      return artifactFromText(filePath ?? `${kind}.md`, content);
    }
    if (filePath) {
      return readArtifact(isAbsolute(filePath) ? filePath : resolve(projectPath, filePath), kind);
    }
    if (featureDir) {
      return readArtifact(defaultArtifactPath(projectPath, featureDir, kind), kind);
    }
    throw new InputError('Either "filePath" or "content" is required');
  }

  async function checkConstitution(
    args: Record<string, unknown>,
    projectPath: string,
    options: ValidateOptions
  ): Promise<ValidationReport> {
    if (readString(args, 'content') !== undefined) {
      throw new InputError('The constitution check scans a directory; "content" is not accepted', 'input_invalid');
    }
    const filePath = readString(args, 'filePath');
    const root = filePath ? resolve(projectPath, filePath) : projectPath;
    return validateConstitution(root, await scanRepository(root), options);
  }

  return async function validateArtifactHandler(
    args: Record<string, unknown>,
    context: ToolContext
  ): Promise<ToolResponse> {
    const kind = parseKind(requireString(args, 'kind'));
    const options: ValidateOptions = {
      strict: readBoolean(args, 'strict') ?? false,
      warningThreshold: readNonNegativeInteger(args, 'warningThreshold'),
    };
    const report = kind === 'constitution'
      ? await checkConstitution(args, context.projectPath, options)
      : validateArtifact(kind, await loadArtifact(kind, args, context.projectPath), options);

    return {
      success: true,
      message: `${report.title}: ${report.status} (score ${report.score}%, ${report.passed}/${report.totalChecks} checks passed)`,
      data: toValidationJson(report),
      nextSteps: report.recommendations,
      projectContext: { projectPath: context.projectPath },
    };
  };
}
