import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { DomainRouter } from '../core/routing/domain-router.js';
import { toDomainDetectionJson } from '../core/routing/format.js';
import type { Domain, RoutingDecision } from '../core/routing/types.js';
import type { ToolContext, ToolResponse } from '../workflow-types.js';
import { requireString } from './tool-args.js';

export const detectDomainTool: Tool = {
  name: 'detect-domain',
  description: `Detect which specialist domains a piece of work touches and which agents should handle it.

# Instructions
Pass a task description, spec excerpt or user request as text. The response
carries the delegation strategy (none, single-agent, multi-agent), the
matched domains with their keyword counts and the suggested agents in
delegation order. For multi-agent work the orchestrator comes first.`,
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Text to analyze',
      },
    },
    required: ['text'],
  },
};

function delegationSteps(decision: RoutingDecision<Domain>): string[] {
  switch (decision.strategy) {
    case 'none':
      return ['No specialist matched; handle the work directly'];
    case 'single-agent':
      return decision.suggestedAgents.map(agent => `Delegate the work to ${agent}`);
    case 'multi-agent': {
      const [orchestrator, ...specialists] = decision.suggestedAgents;
      return [`Delegate to ${orchestrator} to coordinate ${specialists.join(', ')}`];
    }
  }
}

export function createDetectDomainHandler(router: DomainRouter) {
  return async function detectDomainHandler(
    args: Record<string, unknown>,
    context: ToolContext
  ): Promise<ToolResponse> {
    const decision = router.detect(requireString(args, 'text'));
    return {
      success: true,
      message: `Strategy: ${decision.strategy} (${decision.domainCount} domains, ${decision.totalMatches} keyword matches)`,
      data: toDomainDetectionJson(decision, { verbose: true }),
      nextSteps: delegationSteps(decision),
      projectContext: { projectPath: context.projectPath },
    };
  };
}
