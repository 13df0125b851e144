import { serve } from '@hono/node-server';
import { createLogger, type LogLevel } from '@invoice-ledger/extractor';
import { BatchManager } from './batches/BatchManager';
import { FileConfigStore } from './config/store';
import { createApp, type Env } from './index';

const DEFAULT_PORT = 8787;

function readLogLevel(value: string | undefined): LogLevel {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

const logger = createLogger('invoice-ledger', { level: readLogLevel(process.env.LOG_LEVEL) });

const env: Env = {
  CONFIG: new FileConfigStore(process.env.INVOICE_LEDGER_CONFIG || undefined),
  BATCHES: new BatchManager({ logger }),
  LOGGER: logger,
  ENVIRONMENT: process.env.NODE_ENV === 'production' ? 'production' : 'development',
};

const app = createApp();
const port = Number(process.env.PORT) || DEFAULT_PORT;
const hostname = process.env.HOST || '127.0.0.1';

serve({ fetch: (request) => app.fetch(request, env), port, hostname }, (info) => {
  logger.info('Server listening', { address: info.address, port: info.port });
});
