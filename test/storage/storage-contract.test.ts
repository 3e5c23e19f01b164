import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileStorageProvider } from '../../src/storage/FileStorageProvider.js';
import { RedisStorageProvider } from '../../src/storage/RedisStorageProvider.js';
import { StorageProvider } from '../../src/storage/StorageProvider.js';
import {
  GuardrailVerdict,
  InvalidTransitionError,
  NotClaimedError,
  NotFoundError,
  StorageError,
  TaskCreateInput,
  TaskPriority,
  UpdateCreateInput,
} from '../../src/types/index.js';
import { createPayload, createTestDataDir, removeDir } from '../fixtures/index.js';
import { MemoryRedisCommands } from '../helpers/MemoryRedisCommands.js';

/**
 * Both backends must behave identically: every case here runs against the
 * file provider and against the Redis provider over the in-process stand-in.
 */

const T0 = new Date('2026-01-15T10:00:00.000Z');
const at = (ms: number): Date => new Date(T0.getTime() + ms);

const LEASE_MS = 60_000;
const BACKOFF = { baseDelayMs: 1000, maxDelayMs: 8000 };

const verdict: GuardrailVerdict = { allowed: true, violations: [], evaluatedAt: T0 };

const taskInput = (overrides?: Partial<TaskCreateInput>): TaskCreateInput => ({
  type: 'write_tests',
  priority: 'normal',
  payload: createPayload(),
  maxAttempts: 3,
  ...overrides,
});

const updateInput = (overrides?: Partial<UpdateCreateInput>): UpdateCreateInput => ({
  targetPath: 'prompts/extra.md',
  proposedContent: 'new prompt text',
  proposedHash: 'hash-new',
  baseHash: '',
  reason: 'task-1',
  protected: false,
  verdict,
  ...overrides,
});

interface ProviderHarness {
  name: string;
  create(): { storage: StorageProvider; cleanup(): void };
}

const providers: ProviderHarness[] = [
  {
    name: 'FileStorageProvider',
    create() {
      const dir = createTestDataDir();
      return { storage: new FileStorageProvider(dir), cleanup: () => removeDir(dir) };
    },
  },
  {
    name: 'RedisStorageProvider',
    create() {
      return { storage: new RedisStorageProvider(new MemoryRedisCommands(), 'test:'), cleanup: () => undefined };
    },
  },
];

describe.each(providers)('$name contract', harness => {
  let storage: StorageProvider;
  let cleanup: () => void;

  beforeEach(async () => {
    const created = harness.create();
    storage = created.storage;
    cleanup = created.cleanup;
    await storage.initialize();
  });

  afterEach(async () => {
    await storage.close();
    cleanup();
  });

  describe('tasks', () => {
    it('assigns increasing sequences and lists in submission order', async () => {
      const first = await storage.createTask(taskInput(), T0);
      const second = await storage.createTask(taskInput({ priority: 'urgent' }), T0);

      expect(first.sequence).toBe(1);
      expect(second.sequence).toBe(2);
      expect(first.status).toBe('pending');
      expect(first.attemptCount).toBe(0);

      const listed = await storage.listTasks();
      expect(listed.map(task => task.id)).toEqual([first.id, second.id]);

      const fetched = await storage.getTask(first.id);
      expect(fetched?.payload).toEqual(createPayload());
      expect(fetched?.createdAt).toEqual(T0);
    });

    it('filters and pages listings', async () => {
      const ids: string[] = [];
      for (let i = 0; i < 4; i++) {
        ids.push((await storage.createTask(taskInput(), T0)).id);
      }
      await storage.cancelTask(ids[1] ?? '', T0);

      expect((await storage.listTasks({ status: 'cancelled' })).map(t => t.id)).toEqual([ids[1]]);
      expect((await storage.listTasks({ limit: 2, offset: 1 })).map(t => t.id)).toEqual([ids[1], ids[2]]);
    });

    it('returns null for an unknown task', async () => {
      expect(await storage.getTask('00000000-0000-4000-8000-000000000000')).toBeNull();
    });
  });

  describe('claiming', () => {
    it('claims by priority, then submission order', async () => {
      const priorities: TaskPriority[] = ['low', 'urgent', 'normal', 'urgent', 'high'];
      const ids: string[] = [];
      for (const priority of priorities) {
        ids.push((await storage.createTask(taskInput({ priority }), T0)).id);
      }

      const order: string[] = [];
      for (let i = 0; i < priorities.length; i++) {
        const claimed = await storage.claimTask('worker-1', LEASE_MS, T0);
        order.push(claimed?.id ?? 'none');
      }

      expect(order).toEqual([ids[1], ids[3], ids[4], ids[2], ids[0]]);
      expect(await storage.claimTask('worker-1', LEASE_MS, T0)).toBeNull();
    });

    it('records the lease on the claimed task', async () => {
      const created = await storage.createTask(taskInput(), T0);
      const claimed = await storage.claimTask('worker-1', LEASE_MS, at(5));

      expect(claimed?.id).toBe(created.id);
      expect(claimed?.status).toBe('claimed');
      expect(claimed?.claimedBy).toBe('worker-1');
      expect(claimed?.claimedAt).toEqual(at(5));
      expect(claimed?.leaseExpiresAt).toEqual(at(5 + LEASE_MS));
    });

    it('never hands the same task to two concurrent claimers', async () => {
      for (let i = 0; i < 5; i++) {
        await storage.createTask(taskInput(), T0);
      }

      const results = await Promise.all(
        Array.from({ length: 10 }, (_, i) => storage.claimTask(`worker-${i}`, LEASE_MS, T0))
      );
      const claimedIds = results.flatMap(task => (task ? [task.id] : []));

      expect(claimedIds).toHaveLength(5);
      expect(new Set(claimedIds).size).toBe(5);
    });
  });

  describe('lease-checked transitions', () => {
    it('starts and completes a held task', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      const running = await storage.startTask(id, 'worker-1', at(10));
      expect(running.status).toBe('running');

      const completed = await storage.completeTask(id, 'worker-1', { result: { output: 'done' } }, at(20));
      expect(completed.status).toBe('completed');
      expect(completed.result).toEqual({ output: 'done' });
      expect(completed.claimedBy).toBeUndefined();
      expect(completed.leaseExpiresAt).toBeUndefined();
      expect(completed.completedAt).toEqual(at(20));
    });

    it('rejects a worker that does not hold the lease', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      await expect(storage.startTask(id, 'worker-2', at(10))).rejects.toThrow(
        `Task ${id} is not claimed by worker worker-2: held by another worker`
      );
    });

    it('rejects a result delivered after the lease expired', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      await expect(
        storage.completeTask(id, 'worker-1', { result: { output: 'late' } }, at(LEASE_MS))
      ).rejects.toBeInstanceOf(NotClaimedError);
    });

    it('rejects a second completion', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);
      await storage.completeTask(id, 'worker-1', { result: { output: 'done' } }, at(1));

      await expect(
        storage.completeTask(id, 'worker-1', { result: { output: 'again' } }, at(2))
      ).rejects.toThrow(`Task ${id} is not claimed by worker worker-1: status completed`);
    });

    it('stores the verdicts passed with a completion', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);
      const completed = await storage.completeTask(
        id,
        'worker-1',
        { result: { output: 'done' }, verdicts: { pre: verdict, post: verdict } },
        at(1)
      );

      expect(completed.verdicts).toEqual({ pre: verdict, post: verdict });
      expect((await storage.getTask(id))?.verdicts).toEqual({ pre: verdict, post: verdict });
    });

    it('extends a lease from its current expiry', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      const extended = await storage.extendLease(id, 'worker-1', 30_000, at(1000));
      expect(extended.leaseExpiresAt).toEqual(at(LEASE_MS + 30_000));
    });
  });

  describe('failures and retries', () => {
    const error = { kind: 'ExternalServiceError' as const, message: 'upstream unavailable' };

    it('schedules a retry with backoff and makes it claimable when due', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      const failed = await storage.failTask(id, 'worker-1', { error, canRetry: true, backoff: BACKOFF }, at(100));
      expect(failed.status).toBe('retrying');
      expect(failed.attemptCount).toBe(1);
      expect(failed.error).toEqual(error);
      expect(failed.retryAt).toEqual(at(1100));

      expect(await storage.claimTask('worker-2', LEASE_MS, at(1099))).toBeNull();

      const reclaimed = await storage.claimTask('worker-2', LEASE_MS, at(1100));
      expect(reclaimed?.id).toBe(id);
      expect(reclaimed?.status).toBe('claimed');
      expect(reclaimed?.retryAt).toBeUndefined();
    });

    it('doubles the backoff per consumed attempt', async () => {
      const { id } = await storage.createTask(taskInput({ maxAttempts: 5 }), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);
      await storage.failTask(id, 'worker-1', { error, canRetry: true, backoff: BACKOFF }, T0);

      await storage.claimTask('worker-1', LEASE_MS, at(1000));
      const second = await storage.failTask(id, 'worker-1', { error, canRetry: true, backoff: BACKOFF }, at(1000));

      expect(second.attemptCount).toBe(2);
      expect(second.retryAt).toEqual(at(3000));
    });

    it('fails for good when the error is not retryable', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      const failed = await storage.failTask(
        id,
        'worker-1',
        { error: { kind: 'SecurityViolation', message: 'blocked' }, canRetry: false, backoff: BACKOFF },
        at(1)
      );
      expect(failed.status).toBe('failed');
      expect(failed.completedAt).toEqual(at(1));
      expect(failed.retryAt).toBeUndefined();
    });

    it('fails for good once attempts are used up', async () => {
      const { id } = await storage.createTask(taskInput({ maxAttempts: 2 }), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);
      await storage.failTask(id, 'worker-1', { error, canRetry: true, backoff: BACKOFF }, T0);
      await storage.claimTask('worker-1', LEASE_MS, at(1000));

      const final = await storage.failTask(id, 'worker-1', { error, canRetry: true, backoff: BACKOFF }, at(1000));
      expect(final.status).toBe('failed');
      expect(final.attemptCount).toBe(2);
    });
  });

  describe('cancellation', () => {
    it('cancels a pending task at once', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      const cancelled = await storage.cancelTask(id, at(1));

      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.completedAt).toEqual(at(1));
      expect(await storage.claimTask('worker-1', LEASE_MS, at(2))).toBeNull();
    });

    it('flags a held task and cancels it at completion, dropping the result', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      const flagged = await storage.cancelTask(id, at(1));
      expect(flagged.status).toBe('claimed');
      expect(flagged.cancelRequested).toBe(true);

      const completed = await storage.completeTask(id, 'worker-1', { result: { output: 'done' } }, at(2));
      expect(completed.status).toBe('cancelled');
      expect(completed.result).toBeNull();
    });

    it('refuses to cancel a finished task', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.cancelTask(id, T0);

      const attempt = storage.cancelTask(id, at(1));
      await expect(attempt).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(storage.cancelTask(id, at(1))).rejects.toThrow(`Task ${id} is already cancelled`);
    });

    it('reports an unknown task', async () => {
      await expect(
        storage.cancelTask('00000000-0000-4000-8000-000000000000', T0)
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('lease reaping', () => {
    it('requeues an expired task at its original place in the order', async () => {
      const first = await storage.createTask(taskInput(), T0);
      const second = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      const result = await storage.reapExpiredLeases(at(LEASE_MS));
      expect(result.requeued.map(task => task.id)).toEqual([first.id]);
      expect(result.requeued[0]?.attemptCount).toBe(1);
      expect(result.requeued[0]?.status).toBe('pending');

      const next = await storage.claimTask('worker-2', LEASE_MS, at(LEASE_MS));
      expect(next?.id).toBe(first.id);
      expect(second.sequence).toBeGreaterThan(first.sequence);
    });

    it('fails a task whose last attempt expired', async () => {
      const { id } = await storage.createTask(taskInput({ maxAttempts: 1 }), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      const result = await storage.reapExpiredLeases(at(LEASE_MS + 1));
      expect(result.failed.map(task => task.id)).toEqual([id]);

      const stored = await storage.getTask(id);
      expect(stored?.status).toBe('failed');
      expect(stored?.error).toEqual({ kind: 'LeaseExpired', message: 'Lease expired after 1 attempts' });
    });

    it('cancels an expired task that had a cancellation requested', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);
      await storage.cancelTask(id, at(1));

      const result = await storage.reapExpiredLeases(at(LEASE_MS));
      expect(result.cancelled.map(task => task.id)).toEqual([id]);
    });

    it('leaves live leases alone', async () => {
      await storage.createTask(taskInput(), T0);
      await storage.claimTask('worker-1', LEASE_MS, T0);

      const result = await storage.reapExpiredLeases(at(LEASE_MS - 1));
      expect(result).toEqual({ requeued: [], failed: [], cancelled: [] });
    });
  });

  describe('updates', () => {
    it('creates updates awaiting approval', async () => {
      const update = await storage.createUpdate(updateInput(), T0);

      expect(update.status).toBe('pending_approval');
      expect(await storage.getUpdate(update.id)).toEqual(update);
      expect((await storage.listUpdates({ status: 'applied' }))).toEqual([]);
    });

    it('transitions only from an expected status', async () => {
      const { id } = await storage.createUpdate(updateInput(), T0);

      const approved = await storage.transitionUpdate(
        id,
        ['pending_approval'],
        { status: 'approved', decidedBy: 'human:alice', decidedAt: at(1) },
        at(1)
      );
      expect(approved.status).toBe('approved');
      expect(approved.decidedBy).toBe('human:alice');
      expect(approved.updatedAt).toEqual(at(1));

      await expect(
        storage.transitionUpdate(id, ['pending_approval'], { status: 'rejected' }, at(2))
      ).rejects.toThrow(`Update ${id} is approved, expected pending_approval`);
    });

    it('keeps the backup reference across later transitions', async () => {
      const { id } = await storage.createUpdate(updateInput(), T0);
      await storage.transitionUpdate(id, ['pending_approval'], { status: 'pending_approval', backupRef: 'backup-1' }, at(1));

      const applied = await storage.transitionUpdate(id, ['pending_approval'], { status: 'applied', appliedAt: at(2) }, at(2));
      expect(applied.backupRef).toBe('backup-1');
      expect(applied.appliedAt).toEqual(at(2));
    });

    it('reports an unknown update', async () => {
      await expect(
        storage.transitionUpdate('missing', ['approved'], { status: 'applied' }, T0)
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('backups', () => {
    it('stores backups once and lists them oldest first', async () => {
      const later = { id: 'b2', updateRef: 'u2', targetPath: 'a.md', originalContent: null, contentHash: '', takenAt: at(10) };
      const earlier = { id: 'b1', updateRef: 'u1', targetPath: 'b.md', originalContent: 'aGk=', contentHash: 'h', takenAt: T0 };
      await storage.saveBackup(later);
      await storage.saveBackup(earlier);

      expect(await storage.getBackup('b1')).toEqual(earlier);
      expect((await storage.listBackups()).map(backup => backup.id)).toEqual(['b1', 'b2']);
      await expect(storage.saveBackup(earlier)).rejects.toBeInstanceOf(StorageError);

      await storage.deleteBackup('b1');
      expect(await storage.getBackup('b1')).toBeNull();
      expect((await storage.listBackups()).map(backup => backup.id)).toEqual(['b2']);
    });
  });

  describe('activity log', () => {
    it('numbers entries in append order and keeps the most recent under a limit', async () => {
      await storage.appendActivity({ kind: 'task.submitted', subjectId: 't1', actor: 'system:auto', detail: {} }, T0);
      await storage.appendActivity({ kind: 'task.claimed', subjectId: 't1', actor: 'worker:w1', detail: { attempt: 1 } }, at(1));
      await storage.appendActivity({ kind: 'task.submitted', subjectId: 't2', actor: 'system:auto', detail: {} }, at(2));

      const all = await storage.listActivity();
      expect(all.map(entry => entry.sequence)).toEqual([1, 2, 3]);
      expect(all[1]?.detail).toEqual({ attempt: 1 });
      expect(all[1]?.timestamp).toEqual(at(1));

      expect((await storage.listActivity({ subjectId: 't1' })).map(e => e.kind)).toEqual(['task.submitted', 'task.claimed']);
      expect((await storage.listActivity({ kind: 'task.submitted' })).map(e => e.subjectId)).toEqual(['t1', 't2']);
      expect((await storage.listActivity({ limit: 1 })).map(e => e.sequence)).toEqual([3]);
    });
  });

  describe('health and metrics', () => {
    it('reports healthy and counts tasks by status', async () => {
      const { id } = await storage.createTask(taskInput(), T0);
      await storage.createTask(taskInput(), T0);
      await storage.cancelTask(id, T0);
      await storage.createUpdate(updateInput(), T0);

      expect(await storage.healthCheck()).toEqual({ healthy: true });
      const metrics = await storage.getMetrics();
      expect(metrics.totalTasks).toBe(2);
      expect(metrics.pendingTasks).toBe(1);
      expect(metrics.cancelledTasks).toBe(1);
      expect(metrics.pendingUpdates).toBe(1);
    });
  });
});
