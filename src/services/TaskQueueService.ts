import { v4 as uuidv4 } from 'uuid';
import { StorageProvider } from '../storage/index.js';
import {
  ActivityDetailValue,
  InvalidTaskTypeError,
  ReapResult,
  SubmitOptions,
  Task,
  TaskError,
  TaskFilters,
  TaskResult,
  TaskStatus,
  TaskVerdicts,
  isRetryable,
  isTaskType,
} from '../types/index.js';
import {
  Clock,
  hashContent,
  systemClock,
  validate,
  prioritySchema,
  taskPayloadSchema,
  submitOptionsSchema,
  taskFiltersSchema,
  workerIdSchema,
  leaseDurationSchema,
  uuidSchema,
} from '../utils/index.js';
import { logger } from '../utils/logger.js';
import { ActivityLogService } from './ActivityLogService.js';
import { LeaseService } from './LeaseService.js';

export interface QueueSettings {
  maxAttempts: number;
  leaseDurationMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export type QueueStats = Record<TaskStatus, number>;

function workerActor(workerId: string): string {
  return `worker:${workerId}`;
}

/**
 * Priority task queue with lease-based claiming. Every state change is
 * delegated to the storage provider as one atomic operation and then
 * written to the activity log.
 */
export class TaskQueueService {
  private leaseService: LeaseService;

  constructor(
    private storage: StorageProvider,
    private activity: ActivityLogService,
    private settings: QueueSettings,
    private clock: Clock = systemClock
  ) {
    this.leaseService = new LeaseService(storage, clock);
  }

  /**
   * Validate and enqueue a task. Returns its id.
   */
  async submit(
    type: string,
    priority: string,
    payload: unknown,
    options: SubmitOptions = {},
    correlationId?: string
  ): Promise<string> {
    // Closed world: an unknown type never reaches storage
    if (!isTaskType(type)) {
      throw new InvalidTaskTypeError(type);
    }
    const validPriority = validate(prioritySchema.required(), priority);
    const validPayload = validate(taskPayloadSchema.required(), payload);
    const validOptions = validate(submitOptionsSchema, options);

    const task = await this.storage.createTask(
      {
        type,
        priority: validPriority,
        payload: validPayload,
        maxAttempts: validOptions.maxAttempts ?? this.settings.maxAttempts,
      },
      this.clock()
    );

    const detail: Record<string, ActivityDetailValue> = { type, priority: validPriority };
    if (correlationId) {
      detail.correlationId = correlationId;
    }
    await this.activity.record('task.submitted', task.id, detail);

    logger.info(`Task ${task.id} submitted`, { taskId: task.id, type, priority: validPriority, correlationId });
    return task.id;
  }

  /**
   * Atomically lease the next task, or null when nothing is claimable.
   */
  async claim(workerId: string, leaseDurationMs: number = this.settings.leaseDurationMs): Promise<Task | null> {
    validate(workerIdSchema, workerId);
    const leaseMs = validate(leaseDurationSchema, leaseDurationMs);

    const task = await this.storage.claimTask(workerId, leaseMs, this.clock());
    if (!task) {
      return null;
    }

    await this.activity.record(
      'task.claimed',
      task.id,
      { attempt: task.attemptCount + 1, leaseExpiresAt: task.leaseExpiresAt?.toISOString() ?? null },
      workerActor(workerId)
    );
    return task;
  }

  async start(taskId: string, workerId: string): Promise<Task> {
    return this.storage.startTask(taskId, workerId, this.clock());
  }

  /**
   * Complete a held task. A cancellation requested meanwhile turns the
   * ack into `cancelled` and drops the result.
   */
  async ack(taskId: string, workerId: string, result: TaskResult, verdicts?: TaskVerdicts): Promise<Task> {
    const task = await this.storage.completeTask(taskId, workerId, { result, verdicts }, this.clock());

    if (task.status === 'cancelled') {
      await this.activity.record('task.cancelled', taskId, { resultDiscarded: true }, workerActor(workerId));
    } else {
      await this.activity.record(
        'task.completed',
        taskId,
        { writtenTo: result.writtenTo ?? null, updateId: result.updateId ?? null },
        workerActor(workerId)
      );
    }
    return task;
  }

  /**
   * Record a failed attempt. Retryable error kinds go back to the queue
   * with exponential backoff until attempts run out.
   */
  async fail(taskId: string, workerId: string, error: TaskError, verdicts?: TaskVerdicts): Promise<Task> {
    const task = await this.storage.failTask(
      taskId,
      workerId,
      {
        error,
        canRetry: isRetryable(error.kind),
        backoff: { baseDelayMs: this.settings.retryBaseDelayMs, maxDelayMs: this.settings.retryMaxDelayMs },
        verdicts,
      },
      this.clock()
    );

    const detail: Record<string, ActivityDetailValue> = {
      errorKind: error.kind,
      message: error.message,
      attemptCount: task.attemptCount,
    };
    if (error.rule) {
      detail.rule = error.rule;
    }
    if (error.blockedOutput !== undefined) {
      detail.blockedOutput = error.blockedOutput;
      detail.blockedOutputHash = hashContent(error.blockedOutput);
    }

    if (task.status === 'retrying') {
      detail.retryAt = task.retryAt?.toISOString() ?? null;
      await this.activity.record('task.retrying', taskId, detail, workerActor(workerId));
    } else if (task.status === 'cancelled') {
      await this.activity.record('task.cancelled', taskId, detail, workerActor(workerId));
    } else if (error.kind === 'SecurityViolation') {
      await this.activity.record('task.violation', taskId, detail, workerActor(workerId));
    } else {
      await this.activity.record('task.failed', taskId, detail, workerActor(workerId));
    }

    logger.warn(`Task ${taskId} attempt failed (${error.kind}), now ${task.status}`, {
      taskId,
      workerId,
      errorKind: error.kind,
      attemptCount: task.attemptCount,
    });
    return task;
  }

  /**
   * Push the lease further out. Throws `NotClaimedError` unless `workerId`
   * still holds a live lease, so it doubles as a holder check.
   */
  async extendLease(
    taskId: string,
    workerId: string,
    extraMs: number = this.settings.leaseDurationMs
  ): Promise<Task> {
    return this.leaseService.extendTaskLease(taskId, workerId, extraMs);
  }

  /**
   * Pending and retrying tasks are cancelled at once; held tasks are flagged.
   */
  async cancel(taskId: string, actor?: string): Promise<Task> {
    validate(uuidSchema, taskId);
    const task = await this.storage.cancelTask(taskId, this.clock());
    await this.activity.record(
      'task.cancelled',
      taskId,
      { requested: task.status !== 'cancelled', status: task.status },
      actor
    );
    return task;
  }

  async reapExpiredLeases(): Promise<ReapResult> {
    const result = await this.storage.reapExpiredLeases(this.clock());

    const outcomes: [Task[], string][] = [
      [result.requeued, 'requeued'],
      [result.failed, 'failed'],
      [result.cancelled, 'cancelled'],
    ];
    for (const [tasks, outcome] of outcomes) {
      for (const task of tasks) {
        await this.activity.record('task.lease_expired', task.id, { outcome, attemptCount: task.attemptCount });
      }
    }

    const reaped = result.requeued.length + result.failed.length + result.cancelled.length;
    if (reaped > 0) {
      logger.info(`Reaped ${reaped} expired leases`, {
        requeued: result.requeued.length,
        failed: result.failed.length,
        cancelled: result.cancelled.length,
      });
    }
    return result;
  }

  async get(taskId: string): Promise<Task | null> {
    return this.storage.getTask(taskId);
  }

  async list(filters: TaskFilters = {}): Promise<Task[]> {
    return this.storage.listTasks(validate(taskFiltersSchema, filters));
  }

  async getQueueStats(): Promise<QueueStats> {
    const stats: QueueStats = {
      pending: 0,
      claimed: 0,
      running: 0,
      retrying: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    for (const task of await this.storage.listTasks()) {
      stats[task.status] += 1;
    }
    return stats;
  }

  getLeaseService(): LeaseService {
    return this.leaseService;
  }

  /**
   * Fresh worker id for a process that did not bring one.
   */
  static newWorkerId(prefix = 'worker'): string {
    return `${prefix}-${uuidv4().slice(0, 8)}`;
  }
}
