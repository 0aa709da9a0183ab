/**
 * Tool registry
 *
 * Holds the tools a server exposes. The registry is built once at startup and
 * read-only afterwards, so both transports can share one instance.
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import Joi from 'joi';
import { SessionSnapshot } from '../types/index.js';
import { isPlainObject, validate } from '../utils/index.js';

export interface ToolContext {
  session?: SessionSnapshot;
  correlationId?: string;
}

export type ToolHandler = (
  args: Record<string, unknown>,
  context: ToolContext
) => unknown | Promise<unknown>;

export interface ToolDefinition {
  descriptor: Tool;
  argsSchema?: Joi.ObjectSchema;
  handler: ToolHandler;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(definitions: ToolDefinition[] = []) {
    for (const definition of definitions) {
      const name = definition.descriptor.name;
      if (this.tools.has(name)) {
        throw new Error(`Duplicate tool name: ${name}`);
      }
      this.tools.set(name, definition);
    }
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /**
   * Descriptors in registration order
   */
  list(): Tool[] {
    return [...this.tools.values()].map(definition => definition.descriptor);
  }

  size(): number {
    return this.tools.size;
  }

  /**
   * Check arguments against the tool's schema, applying its defaults.
   * Throws ValidationError when they do not conform.
   */
  validateArguments(definition: ToolDefinition, args: unknown): Record<string, unknown> {
    const input = args ?? {};
    if (!definition.argsSchema) {
      return isPlainObject(input) ? input : {};
    }
    return validate<Record<string, unknown>>(definition.argsSchema, input);
  }
}

function isTextContent(item: unknown): item is { type: 'text'; text: string } {
  return isPlainObject(item) && item.type === 'text' && typeof item.text === 'string';
}

/**
 * Render a tool's return value as the text of a single content item
 */
export function toolResultText(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  if (Array.isArray(result) && result.length > 0 && result.every(isTextContent)) {
    return result.map(item => item.text).join('\n');
  }
  if (typeof result === 'object' && result !== null) {
    return JSON.stringify(result, null, 2);
  }
  return String(result);
}
