/**
 * @fileOverview: MCP server implementation using the official @modelcontextprotocol/sdk
 * @module: NamingAssistantMCPServer
 * @keyFunctions:
 *   - setupToolHandlers(): Register tool handlers with the MCP server
 *   - start(): Connect the server to stdio transport
 * @dependencies:
 *   - @modelcontextprotocol/sdk: Official MCP SDK
 *   - namingTools: Tool definitions and handlers
 *   - createNamingPipeline: Orchestrator wiring from configuration
 *   - logger: Logging utilities
 * @context: Exposes the naming assistant to MCP clients over stdio. Configuration is validated before the server is created; a missing key stops the process
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import packageJson from '../package.json';
import { AppConfig, loadConfig } from './core/config';
import { createNamingPipeline, NamingPipeline } from './pipeline/factory';
import { createNamingHandlers, namingTools, NamingToolHandler, ToolDefinition } from './tools/namingTools';
import { ConfigurationError, toErrorMessage } from './utils/errorHandler';
import { logger } from './utils/logger';

export const SERVER_NAME = 'naming-assistant';

class NamingAssistantMCPServer {
  private readonly server: Server;
  private readonly tools: ToolDefinition[];
  private readonly handlers: Record<string, NamingToolHandler>;
  private readonly pipeline: NamingPipeline;

  constructor(config: AppConfig, pipeline: NamingPipeline = createNamingPipeline(config)) {
    this.pipeline = pipeline;
    this.tools = namingTools;
    this.handlers = createNamingHandlers(pipeline);

    logger.info('🔍 Configuration loaded', {
      provider: config.openai.provider,
      chatModel: config.openai.chatModel,
      embeddingsModel: config.openai.embeddingsModel,
      searchEndpoint: config.search.endpoint,
      indexes: Object.values(config.retrieval.collections).map(c => c.indexName),
    });

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: packageJson.version,
      },
      {
        capabilities: {
          tools: {},
        },
        instructions:
          'Naming convention assistant: answers naming questions, looks up or proposes term abbreviations and reviews source files against indexed naming rules, a term dictionary and Q&A entries',
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      logger.info('📋 Listing available tools');
      return {
        tools: this.tools,
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      logger.info(`🔧 Executing tool: ${name}`);
      const startTime = Date.now();

      const handler = this.handlers[name];
      if (!handler) {
        logger.warn(`Unknown tool requested: ${name}`);
        return {
          content: [{ type: 'text' as const, text: `Unknown tool: ${name}` }],
          isError: true,
        };
      }

      const result = await handler(args ?? {});
      logger.info(`✅ Tool ${name} completed in ${Date.now() - startTime}ms`, {
        success: result.success,
      });

      return {
        content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
        ...(result.success ? {} : { isError: true }),
      };
    });
  }

  get historySize(): number {
    return this.pipeline.history.size;
  }

  async start(): Promise<void> {
    logger.info(`🚀 Starting Naming Assistant MCP Server v${packageJson.version}`);
    logger.info(`📦 Loaded ${this.tools.length} tools: ${this.tools.map(t => t.name).join(', ')}`);

    try {
      const transport = new StdioServerTransport();
      await this.server.connect(transport);
      logger.info('✅ MCP Server ready for requests');
    } catch (error) {
      logger.error(`💥 Failed to start server: ${toErrorMessage(error)}`);
      throw error;
    }
  }

  async close(): Promise<void> {
    this.pipeline.history.clear();
    await this.server.close();
  }
}

/**
 * Load configuration from the environment and start serving over stdio.
 */
export async function startServer(): Promise<NamingAssistantMCPServer> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`💥 ${error.message}`, error.details);
      process.exit(1);
    }
    throw error;
  }
  logger.configure(config.logging);

  const server = new NamingAssistantMCPServer(config);

  const shutdown = (signal: string) => {
    logger.info(`🔄 Received ${signal}, shutting down gracefully...`);
    server
      .close()
      .catch(error => logger.warn('Server close failed', { error: toErrorMessage(error) }))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
  return server;
}

// Start server if this file is executed directly
if (require.main === module) {
  startServer().catch(error => {
    logger.error('💥 Fatal error starting server', { error: toErrorMessage(error) });
    process.exit(1);
  });
}

export { NamingAssistantMCPServer };
