import Joi from 'joi';
import {
  ErrorCode,
  NOTIFICATION_PREFIX,
  RpcErrorReply,
  RpcRequest,
  errorReply
} from '../types/index.js';

/**
 * Envelope grammar for inbound JSON-RPC messages
 */

export const envelopeSchema = Joi.object({
  jsonrpc: Joi.string().valid('2.0').required(),
  method: Joi.string().min(1).required(),
  id: Joi.when('method', {
    is: Joi.string().pattern(new RegExp(`^${NOTIFICATION_PREFIX}`)),
    then: Joi.any(),
    otherwise: Joi.any().required(),
  }),
  params: Joi.alternatives().try(Joi.object(), Joi.array()),
}).unknown(true);

const ENVELOPE_REASONS: Record<string, string> = {
  jsonrpc: "jsonrpc must be '2.0'",
  method: 'method is required and must be a string',
  id: 'id is required for non-notification requests',
  params: 'params must be an object or array',
};

function isObjectMessage(message: unknown): message is Record<string, unknown> {
  return typeof message === 'object' && message !== null && !Array.isArray(message);
}

export type EnvelopeCheck =
  | { ok: true; request: RpcRequest }
  | { ok: false; reply: RpcErrorReply };

/**
 * Check a parsed message against the envelope grammar, returning either the
 * typed request or the -32600 reply to send back.
 */
export function checkEnvelope(message: unknown): EnvelopeCheck {
  if (!isObjectMessage(message)) {
    return { ok: false, reply: errorReply(ErrorCode.InvalidRequest, 'Invalid Request: must be a JSON object') };
  }

  const { error, value } = envelopeSchema.validate(message);
  if (!error) {
    return { ok: true, request: value };
  }

  const field = error.details[0]?.path[0];
  const reason = (typeof field === 'string' && ENVELOPE_REASONS[field]) || error.message;
  return { ok: false, reply: errorReply(ErrorCode.InvalidRequest, `Invalid Request: ${reason}`, message.id) };
}

/**
 * Returns null when the message is a valid request or notification
 */
export function validateEnvelope(message: unknown): RpcErrorReply | null {
  const check = checkEnvelope(message);
  return check.ok ? null : check.reply;
}

export interface ValidationDetail {
  field: string;
  message: string;
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly details: ValidationDetail[]
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validate data against a schema
 */
export function validate<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    stripUnknown: false,
    allowUnknown: false,
  });

  if (error) {
    const details = error.details.map(detail => ({
      field: detail.path.join('.'),
      message: detail.message,
    }));
    
    const message = `Validation failed: ${details.map(d => `${d.field}: ${d.message}`).join(', ')}`;
    throw new ValidationError(message, details);
  }

  return value;
}

/**
 * Check if an error is a validation error
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
