import { ToolstreamConfig, configSchema } from './types.js';

/**
 * Load configuration from environment variables
 * Following 12-factor app methodology
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolstreamConfig {
  const envConfig = {
    server: {
      host: env.TOOLSTREAM_HOST,
      port: parseInteger(env.TOOLSTREAM_PORT),
      mode: env.TOOLSTREAM_MODE,
    },
    session: {
      timeoutMs: parseInteger(env.TOOLSTREAM_SESSION_TIMEOUT),
      sweepIntervalMs: parseInteger(env.TOOLSTREAM_SESSION_SWEEP_INTERVAL),
    },
    stream: {
      heartbeatIntervalMs: parseInteger(env.TOOLSTREAM_HEARTBEAT_INTERVAL),
      maxQueueSize: parseInteger(env.TOOLSTREAM_STREAM_QUEUE_SIZE),
      overflowPolicy: env.TOOLSTREAM_STREAM_OVERFLOW,
    },
    logging: {
      level: env.TOOLSTREAM_LOG_LEVEL,
    },
    security: {
      corsOrigin: env.TOOLSTREAM_CORS_ORIGIN,
      rateLimit: {
        windowMs: parseInteger(env.TOOLSTREAM_RATE_LIMIT_WINDOW),
        max: parseInteger(env.TOOLSTREAM_RATE_LIMIT_MAX),
      },
    },
  };

  // Remove undefined values to let Joi apply defaults
  const cleanConfig = removeUndefined(envConfig);

  // Validate and apply defaults
  const { error, value } = configSchema.validate(cleanConfig, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

function parseInteger(raw: string | undefined): number | string | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  // Hand the raw string to Joi so the error names the bad value
  return Number.isNaN(parsed) ? raw : parsed;
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(removeUndefined);
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      cleaned[key] = removeUndefined(value);
    }
  }
  return cleaned;
}

/**
 * Get environment-specific configuration examples
 */
export function getConfigExamples(): Record<string, Record<string, string>> {
  return {
    development: {
      TOOLSTREAM_HOST: '127.0.0.1',
      TOOLSTREAM_PORT: '8000',
      TOOLSTREAM_LOG_LEVEL: 'debug',
      TOOLSTREAM_SESSION_TIMEOUT: '600000',
    },
    production: {
      TOOLSTREAM_HOST: '0.0.0.0',
      TOOLSTREAM_PORT: '8000',
      TOOLSTREAM_LOG_LEVEL: 'info',
      TOOLSTREAM_CORS_ORIGIN: 'https://app.example.com',
      TOOLSTREAM_STREAM_QUEUE_SIZE: '500',
    },
  };
}

export * from './types.js';
