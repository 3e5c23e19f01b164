import { describe, it, expect, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import path from 'path';
import { Logger, LogEntry } from '../../src/utils/logger.js';
import { createTestDataDir, removeDir } from '../fixtures/index.js';

function readEntries(file: string): LogEntry[] {
  return readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map((line): LogEntry => JSON.parse(line));
}

describe('Logger', () => {
  let dir: string;

  afterEach(() => {
    removeDir(dir);
  });

  const createLogger = (level: 'warn' | 'debug'): { log: Logger; file: string } => {
    dir = createTestDataDir();
    const file = path.join(dir, 'test.log');
    return { log: new Logger('warden', level, 'test', '1.2.3', {}, file), file };
  };

  it('drops entries below the configured level', () => {
    const { log, file } = createLogger('warn');

    log.info('hidden');
    log.warn('shown', { taskId: 't1' });

    const [entry, ...rest] = readEntries(file);
    expect(rest).toEqual([]);
    expect(entry?.level).toBe('warn');
    expect(entry?.message).toBe('shown');
    expect(entry?.context).toEqual({ taskId: 't1', service: 'warden', environment: 'test', version: '1.2.3' });
  });

  it('merges child context under each call', () => {
    const { log, file } = createLogger('debug');

    log.child({ workerId: 'w1', taskId: 'base' }).debug('claimed', { taskId: 't2' });

    const [entry] = readEntries(file);
    expect(entry?.context).toMatchObject({ workerId: 'w1', taskId: 't2' });
  });

  it('records errors with their code', () => {
    const { log, file } = createLogger('warn');
    const failure = Object.assign(new Error('disk full'), { code: 'ENOSPC' });

    log.error('write failed', { operation: 'save' }, failure);

    const [entry] = readEntries(file);
    expect(entry?.error).toMatchObject({ name: 'Error', message: 'disk full', code: 'ENOSPC' });
  });

  it('times an operation and rethrows its failure', async () => {
    const { log, file } = createLogger('debug');

    expect(await log.timeAsync('sum', async () => 3)).toBe(3);
    await expect(log.timeAsync('explode', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    const messages = readEntries(file).map(entry => entry.message);
    expect(messages).toEqual([
      'Starting operation: sum',
      'Operation completed: sum',
      'Starting operation: explode',
      'Operation failed: explode',
    ]);
  });
});
