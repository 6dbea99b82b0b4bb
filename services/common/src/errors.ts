import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { getLogger } from './logger';
import type { ErrorResponse } from './types';

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, { statusCode = 500, code = 'internal', retryable = false, details, cause }: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.retryable = retryable;
    this.details = details;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

type DomainErrorOptions = Pick<ServiceErrorOptions, 'details' | 'cause'>;

/** Malformed entity, filter or query. Never worth retrying. */
export class ValidationError extends ServiceError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(message, { ...options, statusCode: 400, code: 'validation_error', retryable: false });
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(message, { ...options, statusCode: 404, code: 'not_found', retryable: false });
    this.name = 'NotFoundError';
  }
}

export class EncodingFailure extends ServiceError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(message, { ...options, statusCode: 503, code: 'encoding_failure', retryable: true });
    this.name = 'EncodingFailure';
  }
}

export class StorageFailure extends ServiceError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(message, { ...options, statusCode: 503, code: 'storage_failure', retryable: true });
    this.name = 'StorageFailure';
  }
}

/** A hybrid request lost one of its retrieval branches. */
export class SearchFailure extends ServiceError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(message, { ...options, statusCode: 503, code: 'search_failure', retryable: true });
    this.name = 'SearchFailure';
  }
}

export class ConfigurationError extends ServiceError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(message, { ...options, statusCode: 500, code: 'configuration_error', retryable: false });
    this.name = 'ConfigurationError';
  }
}

export class TimeoutError extends Error {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms.`);
    this.name = 'TimeoutError';
  }
}

type ErrorFactory = (message: string, details?: Record<string, unknown>) => ServiceError;

function errorFactory(statusCode: number, code: string, retryable = false): ErrorFactory {
  return (message: string, details?: Record<string, unknown>) =>
    new ServiceError(message, { statusCode, code, retryable, details });
}

export const badGatewayError = errorFactory(502, 'bad_gateway', true);

export async function withTimeout<T>(operation: string, timeoutMs: number, action: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([action(), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
}

interface SanitizedError {
  statusCode: number;
  payload: ErrorResponse;
}

function isValidationFailure(err: unknown): err is Error & { validation: unknown[] } {
  return err instanceof Error && 'validation' in err && Array.isArray(err.validation);
}

function sanitizeError(err: unknown): SanitizedError {
  if (err instanceof ServiceError) {
    return {
      statusCode: err.statusCode,
      payload: {
        code: err.code,
        message: err.message,
        retryable: err.retryable,
        details: err.details
      }
    };
  }

  if (isValidationFailure(err)) {
    return {
      statusCode: 400,
      payload: {
        code: 'bad_request',
        message: err.message,
        retryable: false
      }
    };
  }

  return {
    statusCode: 500,
    payload: {
      code: 'internal',
      message: err instanceof Error ? 'An unexpected error occurred.' : 'Unknown error.',
      retryable: false
    }
  };
}

export const errorHandlerPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const logger = getLogger({ module: 'error-handler' });

  fastify.setErrorHandler(async (err: unknown, request: FastifyRequest, reply: FastifyReply) => {
    const sanitized = sanitizeError(err);
    const requestId = request.requestContext?.requestId;

    if (sanitized.statusCode >= 500) {
      logger.error({ err, requestId }, 'Request failed with server error.');
    } else {
      logger.warn({ err, requestId }, 'Request failed with client error.');
    }

    if (!reply.sent) {
      reply.status(sanitized.statusCode).send(sanitized.payload);
    }
  });
});
