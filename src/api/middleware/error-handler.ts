import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import {
  AppError,
  EmptyAnswerPoolError,
  RunStateError,
  ValidationError,
} from '../../shared/errors.js';
import { getLogger } from '../../shared/logger.js';

const logger = getLogger('server', { component: 'error-handler' });

export interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
    stack?: string;
  };
}

function numericField(error: object, key: 'statusCode'): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * AppErrors carry their own status. Fastify's own errors (malformed JSON,
 * body too large) carry a 4xx statusCode; anything else is a 500.
 */
function resolveStatusCode(error: Error): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  const code = numericField(error, 'statusCode');
  if (code !== undefined && code >= 400 && code < 600) {
    return code;
  }
  return 500;
}

function resolveErrorCode(error: Error): string {
  if (error instanceof AppError) {
    return error.code;
  }
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : 'INTERNAL_ERROR';
}

/** Internal errors get a generic message in production. */
function resolveMessage(error: Error, statusCode: number): string {
  if (error instanceof AppError) {
    return error.message;
  }
  if (statusCode >= 500 && process.env['NODE_ENV'] === 'production') {
    return 'An unexpected error occurred';
  }
  return error.message;
}

/** Structured context the client can act on, per error type. */
function resolveDetails(error: FastifyError | Error): unknown {
  if (error instanceof ValidationError) {
    return { field: error.field };
  }
  if (error instanceof EmptyAnswerPoolError) {
    return { pool: error.pool, profile: error.profileName };
  }
  if (error instanceof RunStateError) {
    return { status: error.status };
  }
  if ('validation' in error && error.validation) {
    return error.validation;
  }
  return undefined;
}

/**
 * Global Fastify error handler, registered with `app.setErrorHandler()`.
 * Every error leaves as `{ error: { code, message, details? } }`.
 */
export function globalErrorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  const statusCode = resolveStatusCode(error);
  const code = resolveErrorCode(error);
  const message = resolveMessage(error, statusCode);

  const logContext = {
    err: error,
    statusCode,
    code,
    requestId: request.id,
    method: request.method,
    url: request.url,
  };

  if (statusCode >= 500) {
    logger.error(logContext, `Server error: ${message}`);
  } else {
    logger.warn(logContext, `Client error: ${message}`);
  }

  const body: ErrorResponseBody = { error: { code, message } };

  const details = resolveDetails(error);
  if (details !== undefined) {
    body.error.details = details;
  }

  if (statusCode >= 500 && process.env['NODE_ENV'] === 'development' && error.stack) {
    body.error.stack = error.stack;
  }

  void reply.status(statusCode).send(body);
}
