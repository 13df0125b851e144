import { Hono } from 'hono';
import { createProvider, InvoiceLedgerError, mergeAppConfig, toProviderConfig } from '@invoice-ledger/extractor';
import type { Env } from '../index';
import { readJsonBody } from '../lib/body';
import { createComponentLogger } from '../middleware/logging';

const providerRoutes = new Hono<{ Bindings: Env }>();

/**
 * POST /providers/test - Check connectivity with the stored configuration,
 * optionally overridden by the request body (not persisted)
 */
providerRoutes.post('/test', async (c) => {
  const overrides = await readJsonBody(c);
  const config = mergeAppConfig(await c.env.CONFIG.get(), overrides);
  const providerConfig = toProviderConfig(config);
  const adapter = createProvider(providerConfig.kind);
  const logger = createComponentLogger(c, 'providers');

  try {
    adapter.validate(providerConfig);
    const check = await adapter.checkConnection(providerConfig);
    logger.info('Provider check succeeded', { provider: adapter.kind });
    return c.json({ provider: adapter.kind, ...check });
  } catch (error) {
    if (!(error instanceof InvoiceLedgerError)) throw error;
    logger.warn('Provider check failed', { provider: adapter.kind, code: error.code });
    return c.json({ provider: adapter.kind, ok: false, code: error.code, message: error.message });
  }
});

export { providerRoutes };
