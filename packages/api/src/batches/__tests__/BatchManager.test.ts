import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, parseAppConfig, type AppConfig, type ProviderAdapter } from '@invoice-ledger/extractor';
import { ConflictError, NotFoundError } from '../../lib/errors';
import { BatchManager } from '../BatchManager';

type Answer = (content: string) => string | Promise<string>;

function fakeAdapter(answer: Answer): ProviderAdapter {
  return {
    kind: 'ollama',
    displayName: 'Fake',
    validate: () => undefined,
    extract: async (bytes) => answer(Buffer.from(bytes).toString('utf8')),
    checkConnection: async () => ({ ok: true, message: 'ok' }),
  };
}

const ANSWERS: Record<string, string> = {
  A: '{"total": 100, "buyer": "Globex"}',
  B: '{"total": 250.5, "buyer": "Globex"}',
};

const answers = fakeAdapter((content) => ANSWERS[content] ?? 'nothing');

/** Blocks the first extraction until released */
function gatedAdapter() {
  let release: () => void = () => undefined;
  let entered: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  const started = new Promise<void>((resolve) => {
    entered = resolve;
  });
  const adapter = fakeAdapter(async (content) => {
    entered();
    await opened;
    return ANSWERS[content] ?? 'nothing';
  });
  return { adapter, started, release: () => release() };
}

describe('BatchManager', () => {
  let dir: string;
  let config: AppConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'manager-test-'));
    await writeFile(join(dir, 'a.jpg'), 'A');
    await writeFile(join(dir, 'b.jpg'), 'B');
    config = parseAppConfig({
      scanDirectory: dir,
      mode: 'simple',
      enableValidate: false,
      enableExcel: false,
      enableMarkdown: false,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should run a batch to completion', async () => {
    const manager = new BatchManager({ runOptions: { adapter: answers } });

    const started = manager.start(config);
    expect(started.status).toBe('running');
    expect(started.id).toMatch(/^batch_[0-9A-Z]{26}$/);

    const run = await manager.wait(started.id);

    expect(run.status).toBe('completed');
    expect(run.records).toHaveLength(2);
    expect(run.analysis?.totalAmount).toBe(350.5);
    expect(run.progress).toEqual({
      processed: 2,
      total: 2,
      validCount: 2,
      partialCount: 0,
      failedCount: 0,
      totalAmount: 350.5,
    });
    expect(run.finishedAt).not.toBeNull();
  });

  it('should number events and return those after a sequence', async () => {
    const manager = new BatchManager({ runOptions: { adapter: answers } });
    const { id } = manager.start(config);
    await manager.wait(id);

    const all = manager.events(id);
    expect(all.events.map((stored) => stored.seq)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(all.next).toBe(8);
    expect(all.events[7].event.type).toBe('done');

    expect(manager.events(id, 6).events.map((stored) => stored.seq)).toEqual([7, 8]);
  });

  it('should keep only the newest events', async () => {
    const manager = new BatchManager({ runOptions: { adapter: answers }, maxEvents: 3 });
    const { id } = manager.start(config);
    await manager.wait(id);

    expect(manager.events(id).events.map((stored) => stored.seq)).toEqual([6, 7, 8]);
  });

  it('should refuse a second concurrent run', async () => {
    const gate = gatedAdapter();
    const manager = new BatchManager({ runOptions: { adapter: gate.adapter } });
    const { id } = manager.start(config);

    expect(() => manager.start(config)).toThrow(ConflictError);

    gate.release();
    await manager.wait(id);
    expect(manager.start(config).status).toBe('running');
    await manager.wait(manager.list()[0].id);
  });

  it('should cancel after the file in progress', async () => {
    const gate = gatedAdapter();
    const manager = new BatchManager({ runOptions: { adapter: gate.adapter } });
    const { id } = manager.start(config);

    await gate.started;
    manager.cancel(id);
    gate.release();
    const run = await manager.wait(id);

    expect(run.status).toBe('cancelled');
    expect(run.records.map((record) => record.sourcePath)).toEqual([join(dir, 'a.jpg')]);
    expect(() => manager.cancel(id)).toThrow(ConflictError);
  });

  it('should mark a run failed when the provider rejects the configuration', async () => {
    const adapter = fakeAdapter(() => {
      throw new ConfigError('model not found');
    });
    const manager = new BatchManager({ runOptions: { adapter } });
    const { id } = manager.start(config);

    const run = await manager.wait(id);

    expect(run.status).toBe('failed');
    expect(run.error).toEqual({ code: 'CONFIG_ERROR', message: 'model not found' });
  });

  it('should validate the provider before starting', () => {
    const manager = new BatchManager();
    const volcengine = { ...config, provider: 'volcengine' as const, volcengineApiKey: 'test-secret' };

    expect(() => manager.start(volcengine)).toThrow(ConfigError);
    expect(manager.list()).toEqual([]);
  });

  it('should require a directory', () => {
    expect(() => new BatchManager().start({ ...config, scanDirectory: '' })).toThrow('scanDirectory is not set');
  });

  it('should rename the files of a finished run once', async () => {
    const manager = new BatchManager({ runOptions: { adapter: answers } });
    const { id } = manager.start({ ...config, mode: 'full' });
    await manager.wait(id);

    const outcomes = await manager.rename(id);

    expect(outcomes).toEqual([
      { status: 'renamed', sourcePath: join(dir, 'a.jpg'), targetPath: join(dir, '100.00-Globex.jpg') },
      { status: 'renamed', sourcePath: join(dir, 'b.jpg'), targetPath: join(dir, '250.50-Globex.jpg') },
    ]);
    await expect(manager.rename(id)).rejects.toBeInstanceOf(ConflictError);
  });

  it('should refuse a rename while another is in flight', async () => {
    const manager = new BatchManager({ runOptions: { adapter: answers } });
    const { id } = manager.start({ ...config, mode: 'full' });
    await manager.wait(id);

    const first = manager.rename(id);
    await expect(manager.rename(id)).rejects.toThrow(`Files of batch ${id} are being renamed`);

    expect((await first).map((outcome) => outcome.status)).toEqual(['renamed', 'renamed']);
    expect(manager.get(id).renames?.map((outcome) => outcome.status)).toEqual(['renamed', 'renamed']);
  });

  it('should list runs newest first', async () => {
    const manager = new BatchManager({ runOptions: { adapter: answers } });
    const first = manager.start(config);
    await manager.wait(first.id);
    const second = manager.start(config);
    await manager.wait(second.id);

    expect(manager.list().map((run) => run.id)).toEqual([second.id, first.id]);
    expect(manager.list()[0]).not.toHaveProperty('records');
  });

  it('should raise NotFoundError for unknown runs', () => {
    expect(() => new BatchManager().get('batch_missing')).toThrow(NotFoundError);
  });
});
