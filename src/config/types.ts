import Joi from 'joi';
import type { LogLevel } from '../utils/logger.js';
import type { OverflowPolicy } from '../types/index.js';

export interface ToolstreamConfig {
  // Server configuration
  server: {
    host: string;
    port: number;
    mode: 'http' | 'stdio';
  };

  // Session lifecycle
  session: {
    timeoutMs: number;
    sweepIntervalMs: number;
  };

  // Server-push streams
  stream: {
    heartbeatIntervalMs: number;
    maxQueueSize: number;
    overflowPolicy: OverflowPolicy;
  };

  // Logging configuration
  logging: {
    level: LogLevel;
  };

  // Security configuration
  security: {
    corsOrigin: string;
    rateLimit: {
      windowMs: number;
      max: number;
    };
  };
}

export const configSchema = Joi.object<ToolstreamConfig>({
  server: Joi.object({
    host: Joi.string().default('127.0.0.1'),
    port: Joi.number().port().default(8000),
    mode: Joi.string().valid('http', 'stdio').default('http'),
  }).default(),

  session: Joi.object({
    timeoutMs: Joi.number().integer().min(1).default(3600000), // 1 hour
    sweepIntervalMs: Joi.number().integer().min(1).default(300000), // 5 minutes
  }).default(),

  stream: Joi.object({
    heartbeatIntervalMs: Joi.number().integer().min(1).default(30000),
    maxQueueSize: Joi.number().integer().min(1).default(1000),
    overflowPolicy: Joi.string().valid('drop-oldest', 'drop-newest').default('drop-oldest'),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'debug', 'trace').default('info'),
  }).default(),

  security: Joi.object({
    corsOrigin: Joi.string().default('*'),
    rateLimit: Joi.object({
      windowMs: Joi.number().integer().min(1).default(900000), // 15 minutes
      max: Joi.number().integer().min(1).default(1000),
    }).default(),
  }).default(),
}).default();
