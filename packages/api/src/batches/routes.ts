import { Hono } from 'hono';
import { mergeAppConfig, type RenameOutcome } from '@invoice-ledger/extractor';
import type { Env } from '../index';
import { readJsonBody } from '../lib/body';
import { BadRequestError } from '../lib/errors';
import { createComponentLogger } from '../middleware/logging';

const batchRoutes = new Hono<{ Bindings: Env }>();

function serializeRenames(outcomes: readonly RenameOutcome[] | null) {
  return outcomes?.map((outcome) =>
    outcome.status === 'failed'
      ? { ...outcome, error: { code: outcome.error.code, message: outcome.error.message } }
      : outcome
  ) ?? null;
}

/**
 * POST /batches - Start a run. The body may override configuration keys
 * (scanDirectory, mode, ...) for this run only.
 */
batchRoutes.post('/', async (c) => {
  const overrides = await readJsonBody(c);
  const config = mergeAppConfig(await c.env.CONFIG.get(), overrides);
  const run = c.env.BATCHES.start(config);

  createComponentLogger(c, 'batches').info('Batch requested', { batch_id: run.id, root: run.root });
  return c.json({ batch: run }, 202);
});

/**
 * GET /batches - Runs, newest first
 */
batchRoutes.get('/', (c) => {
  return c.json({ batches: c.env.BATCHES.list() });
});

/**
 * GET /batches/:id - Run with its records and analysis
 */
batchRoutes.get('/:id', (c) => {
  const run = c.env.BATCHES.get(c.req.param('id'));
  return c.json({ batch: { ...run, renames: serializeRenames(run.renames) } });
});

/**
 * GET /batches/:id/events?after=<seq> - Event log since a sequence number
 */
batchRoutes.get('/:id/events', (c) => {
  const afterParam = c.req.query('after') ?? '0';
  const after = Number.parseInt(afterParam, 10);
  if (Number.isNaN(after) || after < 0) {
    throw new BadRequestError(`Invalid after parameter: ${afterParam}`);
  }

  return c.json(c.env.BATCHES.events(c.req.param('id'), after));
});

/**
 * POST /batches/:id/cancel
 */
batchRoutes.post('/:id/cancel', (c) => {
  const run = c.env.BATCHES.cancel(c.req.param('id'));
  createComponentLogger(c, 'batches').info('Batch cancellation requested', { batch_id: run.id });
  return c.json({ batch: run });
});

/**
 * POST /batches/:id/rename - Rename the run's files to <amount>-<buyer>
 */
batchRoutes.post('/:id/rename', async (c) => {
  const outcomes = await c.env.BATCHES.rename(c.req.param('id'));
  return c.json({ renames: serializeRenames(outcomes) });
});

export { batchRoutes };
