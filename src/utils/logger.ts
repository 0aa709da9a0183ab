import * as fs from 'fs';
import * as path from 'path';

/**
 * Structured Logger for Toolstream
 * Writes one JSON object per line with level filtering and child contexts
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export interface LogContext {
  correlationId?: string;
  sessionId?: string;
  method?: string;
  tool?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
  metrics?: {
    [key: string]: number;
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

function errorCode(error: Error): string | number | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}

class Logger {
  private logLevel: LogLevel;
  private serviceName: string;
  private environment: string;
  private version: string;
  private testLogFile?: string;
  private baseContext: LogContext;
  private parent?: Logger;
  private stderrOnly = false;

  constructor(
    serviceName: string = 'toolstream',
    logLevel: LogLevel = 'info',
    environment: string = process.env.NODE_ENV || 'development',
    version: string = process.env.npm_package_version || '0.1.0',
    baseContext: LogContext = {},
    parent?: Logger
  ) {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
    this.environment = environment;
    this.version = version;
    this.baseContext = baseContext;
    this.parent = parent;
    
    // Set up test log file if running tests
    if (parent) {
      this.testLogFile = parent.getTestLogFile();
    } else if (this.environment === 'test' && process.env.TEST_LOG_FILE !== 'false') {
      const logDir = path.join(process.cwd(), 'test-logs');
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.testLogFile = path.join(logDir, `test-${Date.now()}-${process.pid}.log`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.getLogLevel());
    const messageLevelIndex = LOG_LEVELS.indexOf(level);
    return messageLevelIndex <= currentLevelIndex;
  }

  private formatLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
    metrics?: { [key: string]: number }
  ): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.serviceName,
        environment: this.environment,
        version: this.version
      }
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCode(error)
      };
    }

    if (metrics) {
      logEntry.metrics = metrics;
    }

    return logEntry;
  }

  private writeLog(logEntry: LogEntry): void {
    const output = JSON.stringify(logEntry);
    
    // Write to test log file if running tests
    if (this.testLogFile) {
      try {
        fs.appendFileSync(this.testLogFile, output + '\n');
        return;
      } catch (error) {
        // Fallback to console if file writing fails
        console.error('Failed to write to test log file:', error);
      }
    }

    if (this.isStderrOnly() || logEntry.level === 'error' || logEntry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog('error')) return;
    this.writeLog(this.formatLogEntry('error', message, context, error));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.writeLog(this.formatLogEntry('warn', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.writeLog(this.formatLogEntry('debug', message, context));
  }

  trace(message: string, context?: LogContext): void {
    if (!this.shouldLog('trace')) return;
    this.writeLog(this.formatLogEntry('trace', message, context));
  }

  /**
   * Log with custom metrics
   */
  metric(message: string, metrics: { [key: string]: number }, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context, undefined, metrics));
  }

  /**
   * Create a child logger with additional context.
   * Children follow the root logger's level.
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      this.logLevel,
      this.environment,
      this.version,
      { ...this.baseContext, ...additionalContext },
      this.parent ?? this
    );
  }

  /**
   * Set log level dynamically
   */
  setLogLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLogLevel(level);
      return;
    }
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.parent ? this.parent.getLogLevel() : this.logLevel;
  }

  /**
   * Send every level to stderr, keeping stdout free for a protocol stream
   */
  useStderr(enabled: boolean = true): void {
    if (this.parent) {
      this.parent.useStderr(enabled);
      return;
    }
    this.stderrOnly = enabled;
  }

  private isStderrOnly(): boolean {
    return this.parent ? this.parent.isStderrOnly() : this.stderrOnly;
  }

  /**
   * Get test log file path (for testing environments)
   */
  getTestLogFile(): string | undefined {
    return this.testLogFile;
  }
}

const envLevel = process.env.TOOLSTREAM_LOG_LEVEL;

// Create default logger instance
export const logger = new Logger('toolstream', isLogLevel(envLevel) ? envLevel : 'info');

// Export Logger class for custom instances
export { Logger };

/**
 * Shortens a session id for log output
 */
export function shortId(sessionId: string): string {
  return `${sessionId.slice(0, 8)}...`;
}

/**
 * Helper function to log HTTP requests
 */
export function logHttpRequest(
  method: string,
  path: string,
  statusCode: number,
  duration: number,
  context?: LogContext
): void {
  const message = `HTTP ${method} ${path} ${statusCode}`;
  
  logger.metric(message, {
    http_status_code: statusCode,
    http_duration_ms: duration,
    http_success: statusCode < 400 ? 1 : 0
  }, {
    ...context,
    http_method: method,
    http_path: path,
    http_status_code: statusCode
  });
}
