import { Hono } from 'hono';
import { maskAppConfig } from '@invoice-ledger/extractor';
import type { Env } from '../index';
import { readJsonBody } from '../lib/body';
import { createComponentLogger } from '../middleware/logging';

const configRoutes = new Hono<{ Bindings: Env }>();

/**
 * GET /config - Effective configuration, secrets masked
 */
configRoutes.get('/', async (c) => {
  const config = await c.env.CONFIG.get();
  return c.json({ config: maskAppConfig(config) });
});

/**
 * PUT /config - Partial update; masked secrets keep their stored value
 */
configRoutes.put('/', async (c) => {
  const patch = await readJsonBody(c);
  const config = await c.env.CONFIG.update(patch);

  createComponentLogger(c, 'config').info('Configuration updated', { provider: config.provider });
  return c.json({ config: maskAppConfig(config) });
});

export { configRoutes };
