import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { Server } from 'http';
import { AddressInfo } from 'net';
import {
  ErrorCode,
  errorReply,
  getErrorMessage,
  NetworkOrigin,
  NO_RESPONSE,
  RpcId,
  Session,
  toError
} from './types/index.js';
import { ToolstreamConfig } from './config/types.js';
import {
  ChannelService,
  DEFAULT_SERVER_INFO,
  ProtocolDispatcher,
  ReaperService,
  ServerInfo,
  SessionService,
  StreamService
} from './services/index.js';
import { createToolRegistry, ToolRegistry } from './tools/index.js';
import { checkEnvelope } from './utils/validation.js';
import { logger, logHttpRequest, shortId } from './utils/logger.js';
import { metrics } from './utils/metrics.js';

export const SESSION_HEADER = 'Mcp-Session-Id';

const MCP_METHODS = ['GET', 'POST', 'DELETE'];
const SSE_METHODS = ['GET', 'POST'];

function logUnexpectedError(error: unknown, context: string, correlationId?: string): void {
  logger.error(`Unexpected error in ${context}`, {
    correlationId,
    errorMessage: getErrorMessage(error)
  }, toError(error));
}

function acceptsEventStream(req: Request): boolean {
  return (req.get('Accept') ?? '').includes('text/event-stream');
}

function sessionHeader(req: Request): string | undefined {
  return req.get(SESSION_HEADER) || undefined;
}

function networkOrigin(req: Request): NetworkOrigin {
  const origin: NetworkOrigin = {};
  const userAgent = req.get('User-Agent');
  const clientIp = req.ip ?? req.socket.remoteAddress;
  const requestOrigin = req.get('Origin');

  if (userAgent) origin.user_agent = userAgent;
  if (clientIp) origin.client_ip = clientIp;
  if (requestOrigin) origin.origin = requestOrigin;
  return origin;
}

// Extend Express Request with the correlation id
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export interface ToolstreamHttpServerOptions {
  tools?: ToolRegistry;
  serverInfo?: ServerInfo;
  now?: () => number;
}

/**
 * HTTP server for Toolstream
 * Serves the MCP Streamable HTTP transport on /mcp, the legacy push path on
 * /sse, and health and metrics endpoints.
 */
export class ToolstreamHttpServer {
  private app: express.Application;
  private server: Server | undefined;
  private config: ToolstreamConfig;
  private sessions: SessionService;
  private channels: ChannelService;
  private streams: StreamService;
  private dispatcher: ProtocolDispatcher;
  private reaper: ReaperService;
  private serverInfo: ServerInfo;

  constructor(config: ToolstreamConfig, options: ToolstreamHttpServerOptions = {}) {
    this.config = config;
    this.serverInfo = options.serverInfo ?? DEFAULT_SERVER_INFO;

    this.sessions = new SessionService({
      timeoutMs: config.session.timeoutMs,
      sweepIntervalMs: config.session.sweepIntervalMs,
      now: options.now
    });
    this.channels = new ChannelService({
      maxQueueSize: config.stream.maxQueueSize,
      overflowPolicy: config.stream.overflowPolicy
    });
    this.streams = new StreamService(this.sessions, this.channels, config.stream.heartbeatIntervalMs);
    this.dispatcher = new ProtocolDispatcher(
      this.sessions,
      this.channels,
      options.tools ?? createToolRegistry(),
      this.serverInfo
    );
    this.reaper = new ReaperService(this.sessions, config.session.sweepIntervalMs);

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  getSessions(): SessionService {
    return this.sessions;
  }

  getChannels(): ChannelService {
    return this.channels;
  }

  /**
   * Bound address once started
   */
  getAddress(): AddressInfo | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : undefined;
  }

  async start(): Promise<void> {
    const { host, port } = this.config.server;

    try {
      await new Promise<void>((resolve, reject) => {
        const server = this.app.listen(port, host);
        this.server = server;
        server.once('error', reject);
        server.once('listening', () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      logUnexpectedError(error, 'start Toolstream HTTP server');
      this.server = undefined;
      throw error;
    }

    this.reaper.start();
    const bound = this.getAddress();
    logger.info('Toolstream HTTP server started successfully', {
      host,
      port: bound?.port ?? port,
      url: `http://${host}:${bound?.port ?? port}`
    });
  }

  async stop(): Promise<void> {
    logger.info('Stopping Toolstream HTTP server...');

    this.reaper.stop();
    // Ends every open stream with outcome 'closed'
    this.channels.closeAll();

    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
        server.closeIdleConnections();
      });
    }

    logger.info('Toolstream HTTP server shutdown complete');
  }

  private setupMiddleware(): void {
    // Request logging and correlation id - placed first to catch all requests
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      const header = req.get('x-correlation-id');
      const correlationId = header || uuidv4();

      req.correlationId = correlationId;
      res.setHeader('X-Correlation-ID', correlationId);

      logger.debug(`HTTP ${req.method} ${req.path} started`, {
        correlationId,
        method: req.method,
        path: req.path,
        userAgent: req.get('User-Agent'),
        ip: req.ip
      });

      metrics.incrementCounter('toolstream_http_requests_total', {
        method: req.method,
        path: req.path
      });
      metrics.incrementGauge('toolstream_http_requests_in_flight');

      let done = false;
      const complete = (): void => {
        if (done) return;
        done = true;
        const duration = Date.now() - startTime;

        logHttpRequest(req.method, req.path, res.statusCode, duration, { correlationId });
        metrics.observeHistogram('toolstream_http_request_duration_seconds', duration / 1000, {
          method: req.method,
          path: req.path,
          status: res.statusCode.toString()
        });
        metrics.decrementGauge('toolstream_http_requests_in_flight');
      };
      res.once('finish', complete);
      res.once('close', complete);

      next();
    });

    // Security middleware
    this.app.use(helmet());
    this.app.use(cors({
      origin: this.config.security.corsOrigin,
      exposedHeaders: [SESSION_HEADER, 'X-Correlation-ID']
    }));

    // Rate limiting on the transport paths
    const limiter = rateLimit({
      windowMs: this.config.security.rateLimit.windowMs,
      limit: this.config.security.rateLimit.max,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
      message: errorReply(ErrorCode.InvalidRequest, 'Too many requests, please try again later.')
    });
    this.app.use(['/mcp', '/sse'], limiter);
  }

  private setupRoutes(): void {
    // Health check and monitoring endpoints
    this.app.get('/health', this.handleHealthCheck.bind(this));
    this.app.get('/metrics', this.handleMetricsJson.bind(this));
    this.app.get('/metrics/prometheus', this.handleMetrics.bind(this));

    // Unsupported verbs are refused before any session or envelope logic
    this.app.use('/mcp', this.methodGuard(MCP_METHODS));
    this.app.use('/sse', this.methodGuard(SSE_METHODS));

    const rpcBody = express.text({ type: () => true, limit: '10mb' });

    this.app.post('/mcp', rpcBody, (req, res) => this.handleRpcPost(req, res, false));
    this.app.get('/mcp', (req, res) => this.handleStream(req, res, false));
    this.app.delete('/mcp', this.handleSessionTermination.bind(this));

    this.app.post('/sse', rpcBody, (req, res) => this.handleRpcPost(req, res, true));
    this.app.get('/sse', (req, res) => this.handleStream(req, res, true));

    // 404 handler
    this.app.use((req: Request, res: Response) => {
      logger.warn('Route not found', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path
      });
      res.status(404).json({ error: 'Not Found', path: req.path });
    });

    // Global error handler - catches everything the handlers did not
    this.app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const status: unknown = Reflect.get(error, 'status');
      if (typeof status === 'number' && status >= 400 && status < 500) {
        logger.warn('Rejected malformed HTTP request', {
          correlationId: req.correlationId,
          path: req.path,
          status,
          errorMessage: error.message
        });
        res.status(status).json(errorReply(ErrorCode.InvalidRequest, error.message));
        return;
      }

      logger.error('Unhandled exception in HTTP request', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path
      }, error);

      metrics.incrementCounter('toolstream_http_errors_total', {
        method: req.method,
        path: req.path,
        error_type: error.name
      });

      res.status(500).json(errorReply(ErrorCode.InternalError, 'Internal server error'));
    });
  }

  private methodGuard(allowed: string[]) {
    return (req: Request, res: Response, next: NextFunction): void => {
      if (allowed.includes(req.method)) {
        next();
        return;
      }

      logger.debug('Method not allowed', { correlationId: req.correlationId, method: req.method, path: req.path });
      res.setHeader('Allow', allowed.join(', '));
      res.status(405).json({ error: 'Method not allowed', allowed_methods: allowed });
    };
  }

  // Transport handlers
  private async handleRpcPost(req: Request, res: Response, legacy: boolean): Promise<void> {
    const correlationId = req.correlationId;
    let requestId: RpcId | undefined;

    try {
      const raw: unknown = req.body;
      const body = typeof raw === 'string' ? raw : '';
      if (body.trim() === '') {
        res.status(400).json(errorReply(ErrorCode.ParseError, 'Parse error: Empty request body'));
        return;
      }

      let message: unknown;
      try {
        message = JSON.parse(body);
      } catch (error) {
        logger.debug('Rejected unparseable request body', { correlationId, errorMessage: getErrorMessage(error) });
        res.status(400).json(errorReply(ErrorCode.ParseError, `Parse error: ${getErrorMessage(error)}`));
        return;
      }

      const check = checkEnvelope(message);
      if (!check.ok) {
        res.status(400).json(check.reply);
        return;
      }
      const request = check.request;
      requestId = request.id;

      const network = networkOrigin(req);
      const header = sessionHeader(req);
      let session: Session | undefined;

      if (header) {
        session = this.sessions.get(header);
        if (!session) {
          logger.warn('Invalid or expired session', { correlationId, sessionId: shortId(header) });
          res.status(400).json(errorReply(ErrorCode.InvalidRequest, 'Invalid or expired session ID'));
          return;
        }
      } else if (legacy) {
        session = this.sessions.create(network);
      } else if (request.method !== 'initialize') {
        logger.warn('Request missing Mcp-Session-Id header', { correlationId, method: request.method });
        res.status(400).json(errorReply(ErrorCode.InvalidRequest, 'Missing Mcp-Session-Id header'));
        return;
      }

      const result = await this.dispatcher.dispatch(request, { session, network, correlationId });
      if (result.session) {
        res.setHeader(SESSION_HEADER, result.session.id);
      }

      if (result.reply === NO_RESPONSE) {
        res.status(204).end();
        return;
      }
      res.status(200).json(result.reply);
    } catch (error) {
      logUnexpectedError(error, 'RPC request', correlationId);
      if (!res.headersSent) {
        res.status(500).json(errorReply(ErrorCode.InternalError, 'Internal server error', requestId));
      }
    }
  }

  private async handleStream(req: Request, res: Response, legacy: boolean): Promise<void> {
    const correlationId = req.correlationId;

    try {
      if (!acceptsEventStream(req)) {
        if (legacy) {
          res.status(400).json(errorReply(ErrorCode.InvalidRequest, 'SSE requires Accept: text/event-stream'));
        } else {
          res.status(405).json(errorReply(
            ErrorCode.InvalidRequest,
            'Method not allowed. Use POST for MCP requests or add Accept: text/event-stream header for SSE.'
          ));
        }
        return;
      }

      const header = sessionHeader(req);
      let session: Session | undefined;
      if (header) {
        session = this.sessions.get(header);
        if (!session) {
          logger.warn('Invalid or expired session', { correlationId, sessionId: shortId(header) });
          res.status(400).json(errorReply(ErrorCode.InvalidRequest, 'Invalid or expired session ID'));
          return;
        }
      } else {
        session = this.sessions.create(networkOrigin(req));
        logger.info('Created session for event stream', { correlationId, sessionId: shortId(session.id) });
      }

      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader(SESSION_HEADER, session.id);
      res.flushHeaders();

      const abort = new AbortController();
      res.once('close', () => abort.abort());

      const outcome = await this.streams.stream(session, {
        write: (chunk: string) => res.write(chunk),
        drain: (signal: AbortSignal) => new Promise<void>((resolve) => {
          if (signal.aborted || res.destroyed) {
            resolve();
            return;
          }
          const done = (): void => {
            res.off('drain', done);
            res.off('close', done);
            signal.removeEventListener('abort', done);
            resolve();
          };
          res.once('drain', done);
          res.once('close', done);
          signal.addEventListener('abort', done, { once: true });
        })
      }, abort.signal);

      logger.debug('Event stream ended', { correlationId, sessionId: shortId(session.id), outcome });
      if (!res.writableEnded) {
        res.end();
      }
    } catch (error) {
      logUnexpectedError(error, 'event stream', correlationId);
      if (!res.headersSent) {
        res.status(500).json(errorReply(ErrorCode.InternalError, 'Internal server error'));
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  }

  private handleSessionTermination(req: Request, res: Response): void {
    const header = sessionHeader(req);
    if (!header) {
      res.status(400).json(errorReply(ErrorCode.InvalidRequest, 'Missing Mcp-Session-Id header'));
      return;
    }

    this.channels.remove(header);
    if (!this.sessions.remove(header)) {
      res.status(404).json(errorReply(ErrorCode.InvalidRequest, 'Session not found'));
      return;
    }

    metrics.incrementCounter('toolstream_sessions_terminated_total');
    logger.info('Session terminated', { correlationId: req.correlationId, sessionId: shortId(header) });
    res.status(200).json({
      jsonrpc: '2.0',
      result: { message: 'Session terminated successfully' }
    });
  }

  // Monitoring endpoint handlers
  private handleHealthCheck(req: Request, res: Response): void {
    logger.debug('Health check requested', { correlationId: req.correlationId });

    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: this.serverInfo.version,
      sessions: this.sessions.liveCount(),
      uptime: process.uptime()
    });
  }

  private handleMetricsJson(req: Request, res: Response): void {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      sessions: this.sessions.liveCount(),
      streams: this.channels.size(),
      uptime: process.uptime(),
      metrics: metrics.snapshot()
    });
  }

  private handleMetrics(req: Request, res: Response): void {
    try {
      const prometheusMetrics = metrics.getPrometheusMetrics();
      res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
      res.send(prometheusMetrics);
    } catch (error) {
      logUnexpectedError(error, 'generate Prometheus metrics', req.correlationId);
      res.status(500).json(errorReply(ErrorCode.InternalError, 'Failed to generate metrics'));
    }
  }
}
