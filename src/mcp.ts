/**
 * Toolstream stdio server
 * Serves the tool registry over stdin/stdout through the MCP SDK
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ErrorCode,
  ListToolsRequestSchema,
  McpError
} from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config/index.js';
import { DEFAULT_SERVER_INFO, ServerInfo } from './services/ProtocolDispatcher.js';
import { createToolRegistry, ToolRegistry, toolResultText } from './tools/index.js';
import { getErrorMessage } from './types/index.js';
import { isValidationError } from './utils/validation.js';
import { logger } from './utils/logger.js';
import { metrics } from './utils/metrics.js';

function textResult(text: string, isError?: boolean): CallToolResult {
  const result: CallToolResult = { content: [{ type: 'text', text }] };
  if (isError) {
    result.isError = true;
  }
  return result;
}

/**
 * Build an SDK server exposing the registry's tools
 */
export function createStdioServer(
  registry: ToolRegistry = createToolRegistry(),
  serverInfo: ServerInfo = DEFAULT_SERVER_INFO
): Server {
  const server = new Server(
    { name: serverInfo.name, version: serverInfo.version },
    { capabilities: { tools: {} } }
  );
  const log = logger.child({ component: 'stdio' });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: registry.list() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const definition = registry.get(name);
    if (!definition) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool '${name}' not found`);
    }

    let validated: Record<string, unknown>;
    try {
      validated = registry.validateArguments(definition, args);
    } catch (error) {
      if (isValidationError(error)) {
        throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for tool '${name}': ${error.message}`);
      }
      throw error;
    }

    try {
      const result = await metrics.timeAsync(
        'toolstream_tool_call_duration_seconds',
        async () => definition.handler(validated, {}),
        { tool: name }
      );
      return textResult(toolResultText(result));
    } catch (error) {
      const message = getErrorMessage(error);
      log.warn('Tool execution failed', { tool: name, message });
      return textResult(`Tool execution failed: ${message}`, true);
    }
  });

  return server;
}

export async function runStdioServer(): Promise<void> {
  // stdout carries the protocol
  logger.useStderr();

  const config = loadConfig();
  logger.setLogLevel(config.logging.level);

  const registry = createToolRegistry();
  const server = createStdioServer(registry);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('Toolstream stdio server is running', { tools: registry.size() });

  // Graceful shutdown
  process.once('SIGINT', () => {
    logger.info('Shutting down Toolstream stdio server...');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', { errorMessage: getErrorMessage(error) });
        process.exit(1);
      }
    );
  });
}
