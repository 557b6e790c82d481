import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config.js';
import { createLogger, type Logger } from './logging/logger.js';
import { auditSecurityGroups, auditSecurityGroupsSchema } from './tools/audit-security-groups.js';

/**
 * Builds the MCP server with its tool handlers. Nothing is connected yet.
 */
export function createServer(logger: Logger): Server {
    const server = new Server(
        { name: 'sg-exposure-auditor', version: '1.0.0' },
        { capabilities: { tools: {} } }
    );

    /**
     * List all available tools.
     */
    server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: [
            {
                name: 'audit_security_groups',
                description:
                    'Audits an exported AWS security group inventory (security groups and network ' +
                    'interfaces per region) for internet exposure. ' +
                    'Flags critical, management and well-known service ports open to 0.0.0.0/0 or ::/0, ' +
                    'rules allowing all protocols, unrestricted egress, and security groups with no attachments. ' +
                    'Returns findings grouped by severity (CRITICAL/HIGH/MEDIUM/LOW/INFO) with remediation ' +
                    'guidance, summary statistics, and a per-group ingress table.',
                inputSchema: {
                    type: 'object' as const,
                    properties: {
                        inventoryJson: {
                            type: 'string',
                            description: 'The inventory document as a JSON string',
                        },
                        inventoryPath: {
                            type: 'string',
                            description: 'Path to an inventory JSON file readable by the server',
                        },
                        format: {
                            type: 'string',
                            enum: ['json', 'markdown'],
                            description: 'Report format (default: json)',
                        },
                    },
                },
            },
        ],
    }));

    /**
     * Handle tool execution requests.
     */
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;

        if (name === 'audit_security_groups') {
            try {
                const validated = auditSecurityGroupsSchema.parse(args);
                const result = await auditSecurityGroups(validated, { logger });
                return {
                    content: [{ type: 'text', text: result.text }],
                };
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : 'Unknown error occurred';
                logger.warn({ tool: name, err: error }, 'Audit failed');
                return {
                    content: [{ type: 'text', text: `Error: ${message}` }],
                    isError: true,
                };
            }
        }

        throw new Error(`Unknown tool: ${name}`);
    });

    return server;
}

/**
 * Loads configuration and serves the tools over stdio.
 * Rejects on invalid configuration before anything is connected.
 */
export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<void> {
    const config = loadConfig(env);
    const logger = createLogger(config.logging);

    const server = createServer(logger);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('Security group exposure auditor MCP server running');
}
