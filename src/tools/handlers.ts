/**
 * Built-in tool handlers
 *
 * Handlers receive validated arguments and return a string or a JSON-able
 * value; throwing marks the call as failed.
 */

import Joi from 'joi';
import { ToolContext } from './registry.js';

export const echoArgsSchema = Joi.object({
  message: Joi.string().required(),
  repeat: Joi.number().integer().min(1).max(10).default(1)
});

export const processStatusArgsSchema = Joi.object({
  includeMemory: Joi.boolean().default(true)
});

export function echo(args: Record<string, unknown>): string {
  const message = String(args.message);
  const repeat = typeof args.repeat === 'number' ? args.repeat : 1;
  return Array.from({ length: repeat }, () => message).join('\n');
}

export function getProcessStatus(args: Record<string, unknown>): Record<string, unknown> {
  const status: Record<string, unknown> = {
    status: 'running',
    pid: process.pid,
    node: process.version,
    platform: `${process.platform}/${process.arch}`,
    uptimeSeconds: Math.round(process.uptime()),
    cpu: process.cpuUsage()
  };

  if (args.includeMemory !== false) {
    const { rss, heapUsed, heapTotal, external } = process.memoryUsage();
    status.memory = { rss, heapUsed, heapTotal, external };
  }

  return status;
}

export function getSessionInfo(_args: Record<string, unknown>, context: ToolContext): Record<string, unknown> {
  const session = context.session;
  if (!session) {
    throw new Error('No session is bound to this call');
  }

  return {
    sessionId: session.id,
    createdAt: new Date(session.createdAt).toISOString(),
    lastAccessedAt: new Date(session.lastAccessedAt).toISOString(),
    clientInfo: session.clientInfo,
    initialized: session.context.initialized === true
  };
}
