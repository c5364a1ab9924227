import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { DomainRouter } from '../core/routing/domain-router.js';
import { toExecutionPlanJson } from '../core/routing/format.js';
import type { ToolContext, ToolResponse } from '../workflow-types.js';
import { readStringArray, requireString } from './tool-args.js';

export const planExecutionTool: Tool = {
  name: 'plan-execution',
  description: `Plan how the suggested agents for a piece of work should run.

# Instructions
Pass the same text you would give detect-domain. The plan says whether the
agents run one at a time, all at once or in dependency batches, how complex
the work looks and how confident the plan is. On a later round pass the
agents that already finished as completedAgents and the ones that failed as
failedAgents; the plan then leaves the finished agents out and suggests a
refinement (retry-with-feedback, add-step or route-to-debug).`,
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Text to analyze',
      },
      completedAgents: {
        type: 'array',
        items: { type: 'string' },
        description: 'Agents that already finished their part',
      },
      failedAgents: {
        type: 'array',
        items: { type: 'string' },
        description: 'Agents whose last attempt failed',
      },
    },
    required: ['text'],
  },
};

export function createPlanExecutionHandler(router: DomainRouter) {
  return async function planExecutionHandler(
    args: Record<string, unknown>,
    context: ToolContext
  ): Promise<ToolResponse> {
    const plan = router.plan(requireString(args, 'text'), {
      completedAgents: readStringArray(args, 'completedAgents'),
      failedAgents: readStringArray(args, 'failedAgents'),
    });
    return {
      success: true,
      message: `Execution strategy: ${plan.strategy} (${plan.agents.length} agents, ${plan.batches.length} batches)`,
      data: toExecutionPlanJson(plan),
      nextSteps: plan.nextActions,
      projectContext: { projectPath: context.projectPath },
    };
  };
}
