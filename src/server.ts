import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    ListToolsRequestSchema,
    CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import type { SddRouterConfig } from './config.js';
import type { ToolResponse } from './workflow-types.js';
import { toMCPResponse } from './workflow-types.js';
import { createServices, type RouterServices } from './services.js';
import { createToolRegistry, getTools, handleToolCall, type ToolRegistry } from './tools/index.js';

export class SddRouterServer {
    private server: Server;
    private config: SddRouterConfig;
    private registry: ToolRegistry;
    private projectPath: string;

    constructor(config: SddRouterConfig, options: { services?: RouterServices; projectPath?: string } = {}) {
        this.config = config;
        this.registry = createToolRegistry(options.services ?? createServices(config));
        this.projectPath = options.projectPath ?? process.cwd();

        this.server = new Server(
            {
                name: config.name,
                version: config.version,
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupHandlers();
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => {
            return { tools: getTools() };
        });

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;

            try {
                const result = await handleToolCall(this.registry, name, args ?? {}, {
                    projectPath: this.projectPath,
                });
                return toMCPResponse(result);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                console.error(`[${this.config.name}] tool "${name}" failed: ${message}`);
                const errorResponse: ToolResponse = {
                    success: false,
                    message,
                };
                return toMCPResponse(errorResponse, true);
            }
        });
    }

    async run(): Promise<void> {
        console.error(`[${this.config.name}] Starting MCP server...`);

        const transport = new StdioServerTransport();
        await this.connectTransport(transport);

        console.error(`[${this.config.name}] Server running on stdio`);

        // StdioServerTransport doesn't listen for 'end'; exit with the parent.
        process.stdin.on('end', () => this.shutdown());

        process.on('SIGINT', () => this.shutdown());
        process.on('SIGTERM', () => this.shutdown());
    }

    async connectTransport(transport: Transport): Promise<void> {
        await this.server.connect(transport);
    }

    async closeTransport(): Promise<void> {
        await this.server.close();
    }

    private shutdown(): void {
        console.error(`[${this.config.name}] Shutting down...`);
        void this.server.close().finally(() => process.exit(0));
    }
}
