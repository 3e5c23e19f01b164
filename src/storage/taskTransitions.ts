import {
  Task,
  TaskCompleteInput,
  TaskFailInput,
  TaskPriority,
  priorityRank,
  retryDelayMs,
  NotClaimedError,
  InvalidTransitionError,
  TERMINAL_STATUSES,
} from '../types/index.js';

/**
 * Task state transitions as pure functions over a task snapshot. The file
 * backend runs them inside its lock; the Redis Lua scripts implement the
 * same rules field by field.
 */

const PRIORITY_SPREAD = 1e12;

/**
 * Claim order key: lower sorts first. Higher priority always wins, then
 * submission order.
 */
export function queueScore(priority: TaskPriority, sequence: number): number {
  return (3 - priorityRank(priority)) * PRIORITY_SPREAD + sequence;
}

export function compareClaimOrder(a: Task, b: Task): number {
  return queueScore(a.priority, a.sequence) - queueScore(b.priority, b.sequence);
}

export function leaseExpiredMessage(attempts: number): string {
  return `Lease expired after ${attempts} attempts`;
}

/**
 * Why `workerId` may not act on `task` at `now`, or null when it holds a
 * live lease.
 */
export function leaseProblem(task: Task, workerId: string, now: Date): string | null {
  if (task.status !== 'claimed' && task.status !== 'running') {
    return `status ${task.status}`;
  }
  if (task.claimedBy !== workerId) {
    return 'held by another worker';
  }
  if (!task.leaseExpiresAt || task.leaseExpiresAt.getTime() <= now.getTime()) {
    return 'lease expired';
  }
  return null;
}

export function assertLeaseHeld(task: Task, workerId: string, now: Date): void {
  const problem = leaseProblem(task, workerId, now);
  if (problem) {
    throw new NotClaimedError(task.id, workerId, problem);
  }
}

function released(task: Task, now: Date): Task {
  return { ...task, claimedBy: undefined, leaseExpiresAt: undefined, updatedAt: now };
}

export function isRetryDue(task: Task, now: Date): boolean {
  return task.status === 'retrying' && task.retryAt !== undefined && task.retryAt.getTime() <= now.getTime();
}

export function promoteRetry(task: Task, now: Date): Task {
  return { ...task, status: 'pending', retryAt: undefined, updatedAt: now };
}

export function claim(task: Task, workerId: string, leaseMs: number, now: Date): Task {
  return {
    ...task,
    status: 'claimed',
    claimedBy: workerId,
    claimedAt: now,
    leaseExpiresAt: new Date(now.getTime() + leaseMs),
    updatedAt: now,
  };
}

export function start(task: Task, workerId: string, now: Date): Task {
  assertLeaseHeld(task, workerId, now);
  return { ...task, status: 'running', updatedAt: now };
}

/**
 * A cancellation requested while the task was held wins over the result.
 */
export function complete(task: Task, workerId: string, input: TaskCompleteInput, now: Date): Task {
  assertLeaseHeld(task, workerId, now);
  const verdicts = input.verdicts ?? task.verdicts;
  if (task.cancelRequested) {
    return { ...released(task, now), status: 'cancelled', result: null, verdicts, completedAt: now };
  }
  return { ...released(task, now), status: 'completed', result: input.result, verdicts, completedAt: now };
}

export function fail(task: Task, workerId: string, input: TaskFailInput, now: Date): Task {
  assertLeaseHeld(task, workerId, now);
  const attemptCount = task.attemptCount + 1;
  const base: Task = {
    ...released(task, now),
    attemptCount,
    error: input.error,
    verdicts: input.verdicts ?? task.verdicts,
  };

  if (task.cancelRequested) {
    return { ...base, status: 'cancelled', completedAt: now };
  }
  if (input.canRetry && attemptCount < task.maxAttempts) {
    const retryAt = new Date(now.getTime() + retryDelayMs(attemptCount, input.backoff));
    return { ...base, status: 'retrying', retryAt };
  }
  return { ...base, status: 'failed', completedAt: now };
}

export function extendLease(task: Task, workerId: string, extraMs: number, now: Date): Task {
  assertLeaseHeld(task, workerId, now);
  const current = task.leaseExpiresAt ? task.leaseExpiresAt.getTime() : now.getTime();
  return { ...task, leaseExpiresAt: new Date(current + extraMs), updatedAt: now };
}

/**
 * Pending and retrying tasks leave the queue at once; a held task is only
 * flagged, and the flag takes effect at its next lease boundary.
 */
export function cancel(task: Task, now: Date): Task {
  if (TERMINAL_STATUSES.includes(task.status)) {
    throw new InvalidTransitionError(`Task ${task.id} is already ${task.status}`);
  }
  if (task.status === 'pending' || task.status === 'retrying') {
    return { ...task, status: 'cancelled', retryAt: undefined, completedAt: now, updatedAt: now };
  }
  if (task.cancelRequested) {
    return task;
  }
  return { ...task, cancelRequested: true, updatedAt: now };
}

export function isLeaseExpired(task: Task, now: Date): boolean {
  return (
    (task.status === 'claimed' || task.status === 'running') &&
    task.leaseExpiresAt !== undefined &&
    task.leaseExpiresAt.getTime() <= now.getTime()
  );
}

export type ReapOutcome = 'requeued' | 'failed' | 'cancelled';

/**
 * An expired lease consumes exactly one attempt. The task keeps its
 * sequence, so it regains its original place in the claim order.
 */
export function reap(task: Task, now: Date): { task: Task; outcome: ReapOutcome } {
  const attemptCount = task.attemptCount + 1;
  const base: Task = { ...released(task, now), attemptCount };

  if (task.cancelRequested) {
    return { task: { ...base, status: 'cancelled', completedAt: now }, outcome: 'cancelled' };
  }
  if (attemptCount >= task.maxAttempts) {
    return {
      task: {
        ...base,
        status: 'failed',
        completedAt: now,
        error: { kind: 'LeaseExpired', message: leaseExpiredMessage(attemptCount) },
      },
      outcome: 'failed',
    };
  }
  return { task: { ...base, status: 'pending' }, outcome: 'requeued' };
}
