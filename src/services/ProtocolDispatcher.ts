import {
  ClientInfo,
  ErrorCode,
  errorReply,
  getErrorMessage,
  isNotificationMethod,
  isProtocolError,
  JSONRPC_VERSION,
  NO_RESPONSE,
  NoResponse,
  PROTOCOL_VERSION,
  ProtocolError,
  RequestContext,
  RpcReply,
  RpcRequest,
  Session,
  successReply,
  toError
} from '../types/index.js';
import { ToolRegistry, toolResultText } from '../tools/registry.js';
import { isPlainObject, isValidationError } from '../utils/index.js';
import { logger, LogLevel, shortId } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';
import { ChannelService } from './ChannelService.js';
import { SessionService } from './SessionService.js';

export interface ServerInfo {
  name: string;
  version: string;
}

export interface DispatchResult {
  reply: RpcReply | NoResponse;
  session?: Session;
}

export const DEFAULT_SERVER_INFO: ServerInfo = {
  name: 'Toolstream MCP Server',
  version: process.env.npm_package_version || '0.1.0'
};

/**
 * Client-facing log levels and the logger level each one selects
 */
const LOGGING_LEVELS = new Map<string, LogLevel>([
  ['debug', 'debug'],
  ['info', 'info'],
  ['warning', 'warn'],
  ['error', 'error'],
  ['critical', 'error']
]);

const KNOWN_METHODS = new Set([
  'initialize',
  'ping',
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/read',
  'prompts/list',
  'prompts/get',
  'logging/setLevel'
]);

type ProgressValue =
  | { kind: 'begin'; title: string; message: string }
  | { kind: 'end'; message: string };

function paramsOf(request: RpcRequest): Record<string, unknown> {
  return isPlainObject(request.params) ? request.params : {};
}

function toClientInfo(value: unknown): ClientInfo {
  const info: ClientInfo = {};
  if (isPlainObject(value)) {
    for (const [key, field] of Object.entries(value)) {
      info[key] = field;
    }
  }
  return info;
}

function methodLabel(method: string): string {
  if (KNOWN_METHODS.has(method) || isNotificationMethod(method)) {
    return method;
  }
  return 'unknown';
}

/**
 * Capabilities the server grants in reply to what the client declared
 */
export function negotiateCapabilities(client: Record<string, unknown>): Record<string, unknown> {
  const capabilities: Record<string, unknown> = {
    tools: { listChanged: false },
    resources: {},
    prompts: {},
    logging: { supportedLevels: [...LOGGING_LEVELS.keys()] }
  };

  if ('sampling' in client) {
    capabilities.sampling = {};
  }
  if ('experimental' in client) {
    capabilities.experimental = { progress: true };
  }

  return capabilities;
}

/**
 * Routes validated JSON-RPC envelopes to their method handlers.
 *
 * Handlers raise ProtocolError for anything that maps to a JSON-RPC error
 * code, and tool failures are converted inside `tools/call`. Any other
 * exception is an internal fault and propagates to the transport, which
 * answers 500.
 */
export class ProtocolDispatcher {
  private readonly log = logger.child({ component: 'dispatcher' });

  constructor(
    private readonly sessions: SessionService,
    private readonly channels: ChannelService,
    private readonly tools: ToolRegistry,
    private readonly serverInfo: ServerInfo = DEFAULT_SERVER_INFO
  ) {}

  async dispatch(request: RpcRequest, context: RequestContext): Promise<DispatchResult> {
    const { method } = request;
    const id = request.id ?? null;

    metrics.incrementCounter('toolstream_rpc_requests_total', { method: methodLabel(method) });
    this.log.debug('Dispatching request', {
      method,
      correlationId: context.correlationId,
      sessionId: context.session ? shortId(context.session.id) : undefined
    });

    try {
      if (isNotificationMethod(method)) {
        this.handleNotification(request, context);
        return { reply: NO_RESPONSE, session: context.session };
      }

      switch (method) {
        case 'initialize':
          return this.initialize(request, context);

        case 'ping':
          return { reply: successReply(id, {}), session: context.session };

        case 'tools/list':
          return { reply: successReply(id, { tools: this.tools.list() }), session: context.session };

        case 'tools/call':
          return { reply: await this.callTool(request, context), session: context.session };

        case 'resources/list':
          return { reply: successReply(id, { resources: [] }), session: context.session };

        case 'resources/read':
          throw new ProtocolError(ErrorCode.MethodNotFound, 'Resources not implemented');

        case 'prompts/list':
          return { reply: successReply(id, { prompts: [] }), session: context.session };

        case 'prompts/get':
          throw new ProtocolError(ErrorCode.MethodNotFound, 'Prompts not implemented');

        case 'logging/setLevel':
          this.setLogLevel(request);
          return { reply: successReply(id, {}), session: context.session };

        default:
          throw new ProtocolError(ErrorCode.MethodNotFound, `Method not found: ${method}`);
      }
    } catch (error) {
      if (isProtocolError(error)) {
        metrics.incrementCounter('toolstream_rpc_errors_total', { code: String(error.code) });
        return { reply: errorReply(error.code, error.message, id), session: context.session };
      }

      metrics.incrementCounter('toolstream_rpc_errors_total', { code: String(ErrorCode.InternalError) });
      this.log.error(
        'Unexpected error while dispatching',
        { method, correlationId: context.correlationId },
        toError(error)
      );
      throw error;
    }
  }

  private initialize(request: RpcRequest, context: RequestContext): DispatchResult {
    const params = paramsOf(request);
    const clientInfo = toClientInfo(params.clientInfo);
    for (const [key, value] of Object.entries(context.network)) {
      if (value !== undefined) {
        clientInfo[key] = value;
      }
    }

    const client = isPlainObject(params.capabilities) ? params.capabilities : {};
    const server = negotiateCapabilities(client);

    let session: Session | undefined;
    if (context.session) {
      session = this.sessions.mergeClientInfo(context.session.id, clientInfo, { client, server });
    }
    if (!session) {
      session = this.sessions.create(clientInfo, { client, server });
    }

    this.log.info('Session initialized', {
      sessionId: shortId(session.id),
      client: typeof clientInfo.name === 'string' ? clientInfo.name : undefined,
      correlationId: context.correlationId
    });

    const reply = successReply(request.id, {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: server,
      serverInfo: { ...this.serverInfo }
    });
    return { reply, session };
  }

  private handleNotification(request: RpcRequest, context: RequestContext): void {
    const session = context.session;

    switch (request.method) {
      case 'notifications/initialized':
        if (session) {
          this.sessions.updateContext(session.id, { initialized: true });
        }
        this.log.debug('Client initialization complete', {
          sessionId: session ? shortId(session.id) : undefined
        });
        break;

      case 'notifications/progress':
        if (session) {
          this.channels.push(session.id, {
            jsonrpc: JSONRPC_VERSION,
            method: request.method,
            params: paramsOf(request)
          });
        }
        break;

      default:
        this.log.debug('Ignoring notification', { method: request.method });
    }
  }

  private async callTool(request: RpcRequest, context: RequestContext): Promise<RpcReply> {
    const params = paramsOf(request);
    const name = params.name;
    if (typeof name !== 'string' || name === '') {
      throw new ProtocolError(ErrorCode.InvalidParams, 'Tool name is required');
    }

    const definition = this.tools.get(name);
    if (!definition) {
      throw new ProtocolError(ErrorCode.MethodNotFound, `Tool '${name}' not found`);
    }

    let args: Record<string, unknown>;
    try {
      args = this.tools.validateArguments(definition, params.arguments);
    } catch (error) {
      if (isValidationError(error)) {
        throw new ProtocolError(ErrorCode.InvalidParams, `Invalid arguments for tool '${name}': ${error.message}`);
      }
      throw error;
    }

    const session = context.session;
    const idText = typeof request.id === 'object' ? JSON.stringify(request.id) : String(request.id);
    const progressToken = `tool_${idText}`;
    this.pushProgress(session, progressToken, {
      kind: 'begin',
      title: `Executing ${name}`,
      message: 'Starting tool execution...'
    });

    const timer = metrics.startTimer('toolstream_tool_call_duration_seconds', { tool: name });
    try {
      const result = await definition.handler(args, { session, correlationId: context.correlationId });
      const text = toolResultText(result);
      timer.stop();

      this.pushProgress(session, progressToken, { kind: 'end', message: 'Tool execution completed' });
      return successReply(request.id, { content: [{ type: 'text', text }] });
    } catch (error) {
      timer.stop();
      const message = getErrorMessage(error);

      this.log.warn('Tool execution failed', { tool: name, message, correlationId: context.correlationId });
      this.pushProgress(session, progressToken, { kind: 'end', message: `Tool execution failed: ${message}` });
      throw new ProtocolError(ErrorCode.InternalError, `Tool execution failed: ${message}`);
    }
  }

  private pushProgress(session: Session | undefined, progressToken: string, value: ProgressValue): void {
    if (!session) {
      return;
    }
    this.channels.push(session.id, {
      jsonrpc: JSONRPC_VERSION,
      method: 'notifications/progress',
      params: { progressToken, value }
    });
  }

  private setLogLevel(request: RpcRequest): void {
    const level = paramsOf(request).level;
    const mapped = typeof level === 'string' ? LOGGING_LEVELS.get(level) : undefined;
    if (!mapped) {
      throw new ProtocolError(ErrorCode.InvalidParams, `Invalid logging level: ${String(level)}`);
    }

    logger.setLogLevel(mapped);
    this.log.info('Log level changed', { level, loggerLevel: mapped });
  }
}
