/**
 * JSON-RPC envelope types for the MCP Streamable HTTP contract
 */

export const JSONRPC_VERSION = '2.0';
export const PROTOCOL_VERSION = '2025-03-26';
export const NOTIFICATION_PREFIX = 'notifications/';

export const ErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Request id as the client sent it. Only its presence is checked; replies
 * echo it back unchanged.
 */
export type RpcId = unknown;

export type RpcParams = Record<string, unknown> | unknown[];

export interface RpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  id?: RpcId;
  params?: RpcParams;
}

export interface RpcErrorObject {
  code: ErrorCode;
  message: string;
}

export interface RpcSuccessReply {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RpcId;
  result: unknown;
}

export interface RpcErrorReply {
  jsonrpc: typeof JSONRPC_VERSION;
  id?: RpcId;
  error: RpcErrorObject;
}

export type RpcReply = RpcSuccessReply | RpcErrorReply;

/**
 * Returned by the dispatcher for notifications; the transport answers 204
 */
export const NO_RESPONSE = Symbol('no-response');
export type NoResponse = typeof NO_RESPONSE;

export function isNotificationMethod(method: string): boolean {
  return method.startsWith(NOTIFICATION_PREFIX);
}

export function successReply(id: RpcId | undefined, result: unknown): RpcSuccessReply {
  return { jsonrpc: JSONRPC_VERSION, id: id ?? null, result };
}

export function errorReply(code: ErrorCode, message: string, id?: RpcId): RpcErrorReply {
  const reply: RpcErrorReply = { jsonrpc: JSONRPC_VERSION, error: { code, message } };
  if (id !== undefined) {
    reply.id = id;
  }
  return reply;
}

/**
 * Error raised inside method handlers that maps onto a fixed JSON-RPC code
 */
export class ProtocolError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}
