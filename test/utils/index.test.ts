import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, readFileSync, readdirSync } from 'fs';
import path from 'path';
import {
  KeyedMutex,
  ValidationError,
  asError,
  generateCorrelationId,
  hashContent,
  hashFile,
  readBufferSafe,
  removeFileSafe,
  sleep,
  taskPayloadSchema,
  utf8ByteLength,
  validate,
  workerIdSchema,
  writeFileAtomic,
} from '../../src/utils/index.js';
import { createTestDataDir, removeDir } from '../fixtures/index.js';

describe('utils', () => {
  describe('KeyedMutex', () => {
    it('runs calls sharing a key one at a time, in order', async () => {
      const mutex = new KeyedMutex();
      const events: string[] = [];
      const job = (name: string, ms: number) => async () => {
        events.push(`${name}:start`);
        await sleep(ms);
        events.push(`${name}:end`);
        return name;
      };

      const results = await Promise.all([mutex.run('k', job('a', 20)), mutex.run('k', job('b', 1))]);

      expect(results).toEqual(['a', 'b']);
      expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
      expect(mutex.isLocked('k')).toBe(false);
    });

    it('does not serialise different keys', async () => {
      const mutex = new KeyedMutex();
      const events: string[] = [];

      await Promise.all([
        mutex.run('x', async () => {
          events.push('x:start');
          await sleep(20);
          events.push('x:end');
        }),
        mutex.run('y', async () => {
          events.push('y:start');
        }),
      ]);

      expect(events).toEqual(['x:start', 'y:start', 'x:end']);
    });

    it('releases the key when the call throws', async () => {
      const mutex = new KeyedMutex();
      await expect(mutex.run('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
      expect(await mutex.run('k', async () => 'next')).toBe('next');
    });
  });

  it('measures UTF-8 bytes', () => {
    expect(utf8ByteLength('abc')).toBe(3);
    expect(utf8ByteLength('é')).toBe(2);
    expect(utf8ByteLength('✓')).toBe(3);
  });

  it('wraps non-errors', () => {
    const original = new Error('kept');
    expect(asError(original)).toBe(original);
    expect(asError('text').message).toBe('text');
  });

  it('generates short correlation ids', () => {
    expect(generateCorrelationId()).toMatch(/^[0-9a-z]{1,9}$/);
  });

  describe('validate', () => {
    it('returns the validated value', () => {
      expect(validate(workerIdSchema, 'worker-1')).toBe('worker-1');
    });

    it('collects every problem into one error', () => {
      let caught: unknown;
      try {
        validate(taskPayloadSchema.required(), { description: '', extra: 1 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError && caught.validationDetails.map(detail => detail.field)).toEqual([
        'description',
        'extra',
      ]);
    });

    it('explains the worker id pattern', () => {
      expect(() => validate(workerIdSchema, 'has space')).toThrow(
        'Validation failed: : Worker id can only contain letters, numbers, dots, colons, hyphens, and underscores'
      );
    });
  });

  describe('file helpers', () => {
    let dir: string;

    afterEach(() => {
      removeDir(dir);
    });

    it('writes atomically and leaves no temp files', async () => {
      dir = createTestDataDir();
      const target = path.join(dir, 'nested', 'file.txt');

      await writeFileAtomic(target, 'first');
      await writeFileAtomic(target, 'second');

      expect(readFileSync(target, 'utf8')).toBe('second');
      expect(readdirSync(path.join(dir, 'nested'))).toEqual(['file.txt']);
    });

    it('hashes files, with an empty hash for a missing one', async () => {
      dir = createTestDataDir();
      const target = path.join(dir, 'a.txt');
      await writeFileAtomic(target, 'hello');

      expect(await hashFile(target)).toBe(hashContent('hello'));
      expect(await hashFile(path.join(dir, 'missing.txt'))).toBe('');
      expect(await readBufferSafe(path.join(dir, 'missing.txt'))).toBeNull();
    });

    it('removes files that may not exist', async () => {
      dir = createTestDataDir();
      const target = path.join(dir, 'a.txt');
      await writeFileAtomic(target, 'x');

      await removeFileSafe(target);
      await removeFileSafe(target);
      expect(existsSync(target)).toBe(false);
    });
  });
});
