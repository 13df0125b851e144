import type { Context } from 'hono';
import { ConfigError, InvoiceLedgerError } from '@invoice-ledger/extractor';
import type { Env } from '../index';
import { generateId } from './ulid';

export type ErrorStatus = 400 | 404 | 409 | 500 | 502;

export class AppError extends Error {
  constructor(
    public statusCode: ErrorStatus,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(404, message, 'NOT_FOUND');
  }
}

export class BadRequestError extends AppError {
  constructor(message = 'Invalid request') {
    super(400, message, 'BAD_REQUEST');
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Conflicting state') {
    super(409, message, 'CONFLICT');
  }
}

/**
 * Standardized error response format
 */
interface ErrorResponse {
  error: {
    id: string;
    code: string;
    message: string;
    request_id?: string;
    stack?: string;
  };
}

function statusOf(err: Error): { status: ErrorStatus; code: string } {
  if (err instanceof AppError) {
    return { status: err.statusCode, code: err.code ?? 'APP_ERROR' };
  }
  if (err instanceof ConfigError) {
    return { status: 400, code: err.code };
  }
  // Provider and file failures surfacing from a request
  if (err instanceof InvoiceLedgerError) {
    return { status: 502, code: err.code };
  }
  return { status: 500, code: 'INTERNAL_ERROR' };
}

export function errorHandler(err: Error, c: Context<{ Bindings: Env }>) {
  const requestId = c.get('requestId');
  const errorId = generateId('err');
  const isDev = c.env.ENVIRONMENT !== 'production';
  const { status, code } = statusOf(err);

  c.env.LOGGER.error('Request failed', err, {
    error_id: errorId,
    request_id: requestId,
    code,
    status,
  });

  const exposeMessage = status !== 500 || isDev;
  const response: ErrorResponse = {
    error: {
      id: errorId,
      code,
      message: exposeMessage ? err.message : 'Internal server error',
      request_id: requestId,
    },
  };

  if (isDev && status === 500 && err.stack) {
    response.error.stack = err.stack;
  }

  return c.json(response, status);
}
