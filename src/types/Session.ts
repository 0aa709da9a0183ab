/**
 * Session types for the Streamable HTTP transport
 */

export interface ClientInfo {
  name?: string;
  version?: string;
  user_agent?: string;
  client_ip?: string;
  origin?: string;
  [key: string]: unknown;
}

export interface SessionCapabilities {
  client?: Record<string, unknown>;
  server?: Record<string, unknown>;
}

export interface Session {
  id: string;
  createdAt: number;
  lastAccessedAt: number;
  clientInfo: ClientInfo;
  capabilities: SessionCapabilities;
  context: Record<string, unknown>;
}

/**
 * Copy of a session record handed out for monitoring; mutating it has no
 * effect on the store.
 */
export type SessionSnapshot = Readonly<Session>;

export interface SessionStoreOptions {
  timeoutMs: number;
  sweepIntervalMs: number;
  now?: () => number;
}

/**
 * Network facts about the connection that carried a request
 */
export type NetworkOrigin = {
  user_agent?: string;
  client_ip?: string;
  origin?: string;
};

/**
 * Explicit request-scoped state passed from the transport to the dispatcher
 */
export interface RequestContext {
  session?: Session;
  network: NetworkOrigin;
  correlationId?: string;
}
