/**
 * Toolstream MCP Tools
 *
 * Descriptors for the built-in tools and the registry both transports serve.
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  echo,
  echoArgsSchema,
  getProcessStatus,
  getSessionInfo,
  processStatusArgsSchema
} from './handlers.js';
import { ToolDefinition, ToolRegistry } from './registry.js';

export * from './registry.js';

export const echoTool: Tool = {
  name: 'echo',
  description: 'Return the given message, optionally repeated on separate lines',
  inputSchema: {
    type: 'object',
    properties: {
      message: {
        type: 'string',
        description: 'Text to echo back'
      },
      repeat: {
        type: 'number',
        description: 'How many times to repeat the message (default: 1)',
        minimum: 1,
        maximum: 10
      }
    },
    required: ['message']
  }
};

export const processStatusTool: Tool = {
  name: 'get_process_status',
  description: 'Report the server process status: pid, runtime, uptime, CPU and memory usage',
  inputSchema: {
    type: 'object',
    properties: {
      includeMemory: {
        type: 'boolean',
        description: 'Include memory usage figures (default: true)'
      }
    }
  }
};

export const sessionInfoTool: Tool = {
  name: 'get_session_info',
  description: 'Describe the session the call was made in',
  inputSchema: {
    type: 'object',
    properties: {}
  }
};

/**
 * All built-in tools
 */
export const builtinTools: ToolDefinition[] = [
  { descriptor: echoTool, argsSchema: echoArgsSchema, handler: echo },
  { descriptor: processStatusTool, argsSchema: processStatusArgsSchema, handler: getProcessStatus },
  { descriptor: sessionInfoTool, handler: getSessionInfo }
];

/**
 * Registry of the built-in tools plus any extra definitions
 */
export function createToolRegistry(extra: ToolDefinition[] = []): ToolRegistry {
  return new ToolRegistry([...builtinTools, ...extra]);
}
