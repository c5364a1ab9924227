// Common types for the sdd-router MCP server
import { encode } from '@toon-format/toon';

export interface ToolContext {
  projectPath: string;
}

export interface ToolResponse {
  success: boolean;
  message: string;
  data?: unknown;
  nextSteps?: string[];
  projectContext?: {
    projectPath: string;
  };
}

// MCP-compliant response format (matches CallToolResult from MCP SDK)
export interface MCPToolResponse {
  [key: string]: unknown;
  content: Array<{
    type: "text";
    text: string;
  }>;
  isError?: boolean;
}

export function toMCPResponse(response: ToolResponse, isError: boolean = false): MCPToolResponse {
  return {
    content: [{
      type: "text",
      text: encode(response)
    }],
    isError
  };
}
