import { describe, it, expect } from 'vitest';
import { createLogger, type LogEntry } from '../logger';
import { NetworkError } from '../errors';

function capture() {
  const entries: LogEntry[] = [];
  return { entries, write: (entry: LogEntry) => entries.push(entry) };
}

describe('createLogger', () => {
  it('should drop entries below the level', () => {
    const { entries, write } = capture();
    const logger = createLogger('batch', { level: 'warn', write });

    logger.info('ignored');
    logger.warn('kept', { file: 'a.jpg' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ type: 'log', level: 'warn', component: 'batch', message: 'kept', file: 'a.jpg' });
  });

  it('should prefix child components and carry bindings', () => {
    const { entries, write } = capture();
    const logger = createLogger('api', { write, bindings: { service: 'ledger' } });

    logger.child('batches', { request_id: 'req-1' }).info('started');

    expect(entries[0]).toMatchObject({ component: 'api:batches', service: 'ledger', request_id: 'req-1' });
  });

  it('should serialize errors with their code', () => {
    const { entries, write } = capture();

    createLogger('x', { write }).error('failed', new NetworkError('refused'));

    expect(entries[0].error).toMatchObject({ name: 'NetworkError', message: 'refused', code: 'NETWORK_ERROR' });
  });
});
