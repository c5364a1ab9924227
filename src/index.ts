#!/usr/bin/env node

import { createConfig } from './config.js';
import { SddRouterServer } from './server.js';

async function main(): Promise<void> {
    if (process.argv.includes('--help') || process.argv.includes('-h')) {
        console.log(`
sdd-router-mcp - MCP server for agent routing and spec artifact validation

Usage: sdd-router-mcp [options]

Options:
  --help, -h    Show this help message

Tools:
  detect-domain        Route a task description to specialist agents
  plan-execution       Order the suggested agents into sequential, parallel or batched runs
  suggest-department   Suggest a department for a new agent
  validate-artifact    Check spec.md, plan.md or tasks.md, or the project constitution

Environment Variables:
  SDD_ROUTER_DOMAIN_CATALOG      Path to a replacement domain catalog (JSON)
  SDD_ROUTER_SIGNIFICANT_SCORE   Matches a domain needs to count toward multi-agent (default: 2)
  SDD_ROUTER_MAX_SPECIALISTS     Specialists listed after the orchestrator (default: 3)
  SDD_FEATURE_DIR                Feature directory under specs/ used when no file is given

For Claude Desktop, add to your config:
  {
    "mcpServers": {
      "sdd-router": {
        "command": "npx",
        "args": ["sdd-router-mcp"]
      }
    }
  }
`);
        return;
    }

    const config = createConfig();
    const server = new SddRouterServer(config);
    await server.run();
}

main().catch((error) => {
    console.error('[sdd-router-mcp] Fatal error:', error);
    process.exit(1);
});
