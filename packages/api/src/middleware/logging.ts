/**
 * Structured Request Logging Middleware
 *
 * Provides:
 * - Request ID generation and propagation (X-Request-ID)
 * - One structured log entry per request with timing
 */

import type { Context, Next, MiddlewareHandler } from 'hono';
import type { Logger } from '@invoice-ledger/extractor';
import type { Env } from '../index';
import { generateId } from '../lib/ulid';

export const REQUEST_ID_HEADER = 'X-Request-ID';

// Extend Hono context with request metadata
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    requestStartTime: number;
  }
}

interface RequestLogEntry {
  request_id: string;
  method: string;
  path: string;
  query?: string;
  status: number;
  duration_ms: number;
  user_agent?: string;
  ip?: string;
}

/**
 * Extract client IP from common proxy headers
 */
function getClientIP(request: Request): string | undefined {
  return (
    request.headers.get('X-Real-IP') ??
    request.headers.get('X-Forwarded-For')?.split(',')[0]?.trim() ??
    undefined
  );
}

/**
 * Request logging middleware
 *
 * Usage:
 * ```typescript
 * app.use('*', requestLogging());
 * ```
 */
export function requestLogging(): MiddlewareHandler<{ Bindings: Env }> {
  return async (c: Context<{ Bindings: Env }>, next: Next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? generateId('req');
    const startTime = Date.now();

    c.set('requestId', requestId);
    c.set('requestStartTime', startTime);
    c.header(REQUEST_ID_HEADER, requestId);

    try {
      await next();
    } finally {
      const url = new URL(c.req.url);
      const entry: RequestLogEntry = {
        request_id: requestId,
        method: c.req.method,
        path: url.pathname,
        status: c.res.status,
        duration_ms: Date.now() - startTime,
      };

      if (url.search) {
        entry.query = url.search;
      }

      const userAgent = c.req.header('User-Agent');
      if (userAgent) {
        entry.user_agent = userAgent;
      }

      const clientIP = getClientIP(c.req.raw);
      if (clientIP) {
        entry.ip = clientIP;
      }

      c.env.LOGGER.info('http_request', { ...entry });
    }
  };
}

export function getRequestId(c: Context): string | undefined {
  return c.get('requestId');
}

/**
 * Logger for a specific component, tagged with the request ID
 */
export function createComponentLogger(c: Context<{ Bindings: Env }>, component: string): Logger {
  return c.env.LOGGER.child(component, { request_id: getRequestId(c) });
}
