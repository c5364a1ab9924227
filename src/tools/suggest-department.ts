import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { InputError } from '../core/errors.js';
import type { DepartmentClassifier } from '../core/routing/department-classifier.js';
import { toDepartmentSuggestionJson } from '../core/routing/format.js';
import { DEPARTMENTS } from '../core/routing/types.js';
import type { ToolContext, ToolResponse } from '../workflow-types.js';
import { readString, requireString } from './tool-args.js';

export const suggestDepartmentTool: Tool = {
  name: 'suggest-department',
  description: `Suggest the department for a new agent from its purpose and name.

# Instructions
Call before creating an agent definition. Returns the department with its
default role type, tools and MCP access, plus warnings when the name or
purpose suggests a different department than the one chosen.`,
  inputSchema: {
    type: 'object',
    properties: {
      purpose: {
        type: 'string',
        description: 'What the agent does',
      },
      name: {
        type: 'string',
        description: 'Agent name in kebab-case (optional)',
      },
      department: {
        type: 'string',
        enum: [...DEPARTMENTS],
        description: 'Explicit department; skips the suggestion but still checks the assignment',
      },
    },
    required: ['purpose'],
  },
};

export function createSuggestDepartmentHandler(classifier: DepartmentClassifier) {
  return async function suggestDepartmentHandler(
    args: Record<string, unknown>,
    _context: ToolContext
  ): Promise<ToolResponse> {
    const purpose = requireString(args, 'purpose');
    if (!purpose.trim()) {
      throw new InputError('Argument "purpose" must not be empty', 'input_invalid');
    }
    const suggestion = classifier.suggest({
      purpose,
      name: readString(args, 'name'),
      department: readString(args, 'department'),
    });
    return {
      success: true,
      message: suggestion.defaulted
        ? `No department matched; defaulting to ${suggestion.department}`
        : `Suggested department: ${suggestion.department}`,
      data: toDepartmentSuggestionJson(suggestion),
      nextSteps: suggestion.warnings.length > 0
        ? suggestion.warnings
        : [`Create the agent under the ${suggestion.department} department`],
    };
  };
}
