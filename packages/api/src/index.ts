import { Hono } from 'hono';
import type { Logger } from '@invoice-ledger/extractor';
import { batchRoutes } from './batches/routes';
import type { BatchManager } from './batches/BatchManager';
import { configRoutes } from './config/routes';
import type { ConfigStore } from './config/store';
import { errorHandler } from './lib/errors';
import { generateId } from './lib/ulid';
import { requestLogging } from './middleware/logging';
import { providerRoutes } from './providers/routes';

export const API_VERSION = '0.1.0';

// Bindings supplied by the host (server.ts, or tests)
export interface Env {
  CONFIG: ConfigStore;
  BATCHES: BatchManager;
  LOGGER: Logger;
  ENVIRONMENT?: 'development' | 'test' | 'production';
}

export function createApp() {
  const app = new Hono<{ Bindings: Env }>();

  // Request logging and tracing (must be first to capture all requests)
  app.use('*', requestLogging());

  app.onError(errorHandler);
  app.notFound((c) => {
    return c.json(
      { error: { id: generateId('err'), code: 'NOT_FOUND', message: `No route for ${c.req.method} ${c.req.path}` } },
      404
    );
  });

  app.get('/', (c) => {
    return c.json({
      name: 'Invoice Ledger API',
      version: API_VERSION,
      status: 'ok',
    });
  });

  app.get('/api/health', async (c) => {
    const checks: Record<string, { status: 'ok' | 'error'; latency_ms?: number; error?: string }> = {};
    let allHealthy = true;

    // Configuration must load and validate
    const configStart = Date.now();
    try {
      await c.env.CONFIG.get();
      checks.config = { status: 'ok', latency_ms: Date.now() - configStart };
    } catch (error) {
      checks.config = {
        status: 'error',
        latency_ms: Date.now() - configStart,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
      allHealthy = false;
    }

    return c.json(
      {
        status: allHealthy ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        version: API_VERSION,
        checks,
      },
      allHealthy ? 200 : 503
    );
  });

  app.get('/api/version', (c) => {
    return c.json({
      version: API_VERSION,
      current_version: 'v1',
      supported_versions: ['v1'],
    });
  });

  app.route('/api/config', configRoutes);
  app.route('/api/providers', providerRoutes);
  app.route('/api/batches', batchRoutes);

  return app;
}

export type App = ReturnType<typeof createApp>;
