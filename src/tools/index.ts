import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolContext, ToolResponse } from '../workflow-types.js';
import type { RouterServices } from '../services.js';
import { TOOL_CATALOG_ORDER, type ToolName } from './catalog.js';
import { createDetectDomainHandler, detectDomainTool } from './detect-domain.js';
import { createPlanExecutionHandler, planExecutionTool } from './plan-execution.js';
import { createSuggestDepartmentHandler, suggestDepartmentTool } from './suggest-department.js';
import { createValidateArtifactHandler, validateArtifactTool } from './validate-artifact.js';

type ToolHandler = (
    args: Record<string, unknown>,
    context: ToolContext
) => Promise<ToolResponse>;

interface RegisteredTool {
    tool: Tool;
    handler: ToolHandler;
}

export type ToolRegistry = Record<ToolName, RegisteredTool>;

const TOOL_DEFINITIONS: Record<ToolName, Tool> = {
    'detect-domain': detectDomainTool,
    'plan-execution': planExecutionTool,
    'suggest-department': suggestDepartmentTool,
    'validate-artifact': validateArtifactTool,
};

export function createToolRegistry(services: RouterServices): ToolRegistry {
    return {
        'detect-domain': {
            tool: detectDomainTool,
            handler: createDetectDomainHandler(services.router),
        },
        'plan-execution': {
            tool: planExecutionTool,
            handler: createPlanExecutionHandler(services.router),
        },
        'suggest-department': {
            tool: suggestDepartmentTool,
            handler: createSuggestDepartmentHandler(services.classifier),
        },
        'validate-artifact': {
            tool: validateArtifactTool,
            handler: createValidateArtifactHandler(services.config.featureDir),
        },
    };
}

function isToolName(name: string): name is ToolName {
    return TOOL_CATALOG_ORDER.some(candidate => candidate === name);
}

export function getTools(): Tool[] {
    return TOOL_CATALOG_ORDER.map(name => TOOL_DEFINITIONS[name]);
}

export async function handleToolCall(
    registry: ToolRegistry,
    name: string,
    args: Record<string, unknown>,
    context?: Partial<ToolContext>
): Promise<ToolResponse> {
    if (!isToolName(name)) {
        throw new Error(`Unknown tool: ${name}`);
    }

    const argProjectPath = typeof args.projectPath === 'string' ? args.projectPath : undefined;
    const projectPath = argProjectPath || context?.projectPath || process.cwd();

    return registry[name].handler(args, { projectPath });
}
