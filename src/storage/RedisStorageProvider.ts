import { v4 as uuidv4 } from 'uuid';
import {
  Task,
  TaskCreateInput,
  TaskFilters,
  TaskCompleteInput,
  TaskFailInput,
  ReapResult,
  PendingUpdate,
  UpdateCreateInput,
  UpdateFilters,
  UpdateStatus,
  UpdateTransition,
  Backup,
  ActivityEntry,
  ActivityCreateInput,
  ActivityFilters,
  HealthStatus,
  NotFoundError,
  NotClaimedError,
  InvalidTransitionError,
  StorageError,
} from '../types/index.js';
import {
  BaseStorageProvider,
  pageTasks,
  filterActivity,
  unexpectedStatusMessage,
  newTask,
  newUpdate,
} from './StorageProvider.js';
import {
  FlatRecord,
  encodeDate,
  encodeTask,
  decodeTask,
  encodeUpdate,
  encodeUpdateTransition,
  decodeUpdate,
  encodeBackup,
  decodeBackup,
  encodeActivity,
  decodeActivity,
  encodeTaskError,
  encodeTaskResult,
  encodeVerdicts,
} from './records.js';
import type { ReapOutcome } from './taskTransitions.js';
import { RedisCommands, ScriptReply } from './redisCommands.js';
import { REDIS_SCRIPTS } from './redisScripts.js';
import { logger } from '../utils/logger.js';

const REAP_OUTCOMES: readonly ReapOutcome[] = ['requeued', 'failed', 'cancelled'];

function flatten(record: FlatRecord): string[] {
  return Object.entries(record).flat();
}

/**
 * Redis storage provider for Warden.
 * Claim order lives in a `pending` sorted set, retry backoff in `delayed`,
 * and leases in `leases` scored by expiry, the visibility timeout of the
 * queue. Every state change on a task is a Lua script.
 */
export class RedisStorageProvider extends BaseStorageProvider {
  private redis: RedisCommands;
  private keyPrefix: string;

  constructor(redis: RedisCommands, keyPrefix: string = 'warden:') {
    super();
    this.redis = redis;
    this.keyPrefix = keyPrefix;
  }

  protected async doInitialize(): Promise<void> {
    await this.redis.connect();
    await this.redis.ping();
  }

  protected async doClose(): Promise<void> {
    await this.redis.quit();
  }

  // Helper methods for key generation
  private taskPrefix(): string {
    return `${this.keyPrefix}task:`;
  }

  private taskKey(taskId: string): string {
    return `${this.taskPrefix()}${taskId}`;
  }

  private taskSequenceKey(): string {
    return `${this.keyPrefix}seq:tasks`;
  }

  private tasksKey(): string {
    return `${this.keyPrefix}tasks`;
  }

  private pendingKey(): string {
    return `${this.keyPrefix}pending`;
  }

  private delayedKey(): string {
    return `${this.keyPrefix}delayed`;
  }

  private leasesKey(): string {
    return `${this.keyPrefix}leases`;
  }

  private updateKey(updateId: string): string {
    return `${this.keyPrefix}update:${updateId}`;
  }

  private updateSequenceKey(): string {
    return `${this.keyPrefix}seq:updates`;
  }

  private updatesKey(): string {
    return `${this.keyPrefix}updates`;
  }

  private backupKey(backupId: string): string {
    return `${this.keyPrefix}backup:${backupId}`;
  }

  private backupsKey(): string {
    return `${this.keyPrefix}backups`;
  }

  private activityKey(): string {
    return `${this.keyPrefix}activity`;
  }

  private async requireTask(taskId: string): Promise<Task> {
    const task = await this.getTask(taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }
    return task;
  }

  /**
   * Turn a lease-checked script reply into the matching error, or re-read
   * the task on success.
   */
  private async afterLeaseScript(reply: ScriptReply, taskId: string, workerId: string): Promise<Task> {
    if (reply === 'missing') {
      throw new NotFoundError('Task', taskId);
    }
    if (reply !== 'ok') {
      throw new NotClaimedError(taskId, workerId, String(reply));
    }
    return this.requireTask(taskId);
  }

  // Task operations

  async createTask(input: TaskCreateInput, now: Date): Promise<Task> {
    this.ensureInitialized();

    const task = newTask(uuidv4(), 0, input, now);
    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.enqueue,
      [this.taskSequenceKey(), this.tasksKey(), this.pendingKey()],
      [this.taskKey(task.id), task.id, task.priority, ...flatten(encodeTask(task))]
    );
    if (typeof reply !== 'number') {
      throw new StorageError(`Unexpected enqueue reply for task ${task.id}`);
    }
    return { ...task, sequence: reply };
  }

  async getTask(taskId: string): Promise<Task | null> {
    this.ensureInitialized();
    const record = await this.redis.hGetAll(this.taskKey(taskId));
    return Object.keys(record).length === 0 ? null : decodeTask(record);
  }

  async listTasks(filters?: TaskFilters): Promise<Task[]> {
    this.ensureInitialized();
    const ids = await this.redis.zRange(this.tasksKey(), 0, -1);
    const tasks: Task[] = [];
    for (const id of ids) {
      const task = await this.getTask(id);
      if (task) tasks.push(task);
    }
    return pageTasks(tasks, filters);
  }

  async claimTask(workerId: string, leaseMs: number, now: Date): Promise<Task | null> {
    this.ensureInitialized();

    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.claim,
      [this.pendingKey(), this.delayedKey(), this.leasesKey()],
      [this.taskPrefix(), encodeDate(now), workerId, String(leaseMs)]
    );
    if (reply === null) {
      logger.trace('Redis: No tasks available in queue', { workerId });
      return null;
    }
    if (typeof reply !== 'string') {
      throw new StorageError('Unexpected claim reply');
    }
    logger.trace('Redis: Task claimed', { taskId: reply, workerId });
    return this.requireTask(reply);
  }

  async startTask(taskId: string, workerId: string, now: Date): Promise<Task> {
    this.ensureInitialized();
    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.start,
      [this.taskKey(taskId)],
      [encodeDate(now), workerId]
    );
    return this.afterLeaseScript(reply, taskId, workerId);
  }

  async completeTask(taskId: string, workerId: string, input: TaskCompleteInput, now: Date): Promise<Task> {
    this.ensureInitialized();
    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.complete,
      [this.taskKey(taskId), this.leasesKey()],
      [
        encodeDate(now),
        workerId,
        taskId,
        encodeTaskResult(input.result),
        input.verdicts ? encodeVerdicts(input.verdicts) : '',
      ]
    );
    return this.afterLeaseScript(reply, taskId, workerId);
  }

  async failTask(taskId: string, workerId: string, input: TaskFailInput, now: Date): Promise<Task> {
    this.ensureInitialized();
    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.fail,
      [this.taskKey(taskId), this.leasesKey(), this.delayedKey()],
      [
        encodeDate(now),
        workerId,
        taskId,
        encodeTaskError(input.error),
        input.canRetry ? '1' : '0',
        String(input.backoff.baseDelayMs),
        String(input.backoff.maxDelayMs),
        input.verdicts ? encodeVerdicts(input.verdicts) : '',
      ]
    );
    return this.afterLeaseScript(reply, taskId, workerId);
  }

  async extendLease(taskId: string, workerId: string, extraMs: number, now: Date): Promise<Task> {
    this.ensureInitialized();
    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.extend,
      [this.taskKey(taskId), this.leasesKey()],
      [encodeDate(now), workerId, taskId, String(extraMs)]
    );
    return this.afterLeaseScript(reply, taskId, workerId);
  }

  async cancelTask(taskId: string, now: Date): Promise<Task> {
    this.ensureInitialized();
    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.cancel,
      [this.taskKey(taskId), this.pendingKey(), this.delayedKey()],
      [encodeDate(now), taskId]
    );
    if (reply === 'missing') {
      throw new NotFoundError('Task', taskId);
    }
    if (reply !== 'ok') {
      throw new InvalidTransitionError(`Task ${taskId} is already ${String(reply).replace('terminal ', '')}`);
    }
    return this.requireTask(taskId);
  }

  async reapExpiredLeases(now: Date): Promise<ReapResult> {
    this.ensureInitialized();
    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.reap,
      [this.leasesKey(), this.pendingKey()],
      [this.taskPrefix(), encodeDate(now)]
    );

    const result: ReapResult = { requeued: [], failed: [], cancelled: [] };
    if (!Array.isArray(reply)) {
      return result;
    }
    for (let i = 0; i + 1 < reply.length; i += 2) {
      const id = reply[i];
      const outcome = REAP_OUTCOMES.find(candidate => candidate === reply[i + 1]);
      if (typeof id !== 'string' || !outcome) {
        throw new StorageError('Unexpected reap reply');
      }
      result[outcome].push(await this.requireTask(id));
    }
    return result;
  }

  // Update operations

  async createUpdate(input: UpdateCreateInput, now: Date): Promise<PendingUpdate> {
    this.ensureInitialized();
    const update = newUpdate(uuidv4(), input, now);
    const sequence = await this.redis.incr(this.updateSequenceKey());
    await this.redis.hSet(this.updateKey(update.id), encodeUpdate(update));
    await this.redis.zAdd(this.updatesKey(), sequence, update.id);
    return update;
  }

  async getUpdate(updateId: string): Promise<PendingUpdate | null> {
    this.ensureInitialized();
    const record = await this.redis.hGetAll(this.updateKey(updateId));
    return Object.keys(record).length === 0 ? null : decodeUpdate(record);
  }

  async listUpdates(filters?: UpdateFilters): Promise<PendingUpdate[]> {
    this.ensureInitialized();
    const ids = await this.redis.zRange(this.updatesKey(), 0, -1);
    const updates: PendingUpdate[] = [];
    for (const id of ids) {
      const update = await this.getUpdate(id);
      if (update && (!filters?.status || update.status === filters.status)) {
        updates.push(update);
      }
    }
    return updates;
  }

  async transitionUpdate(
    updateId: string,
    expected: readonly UpdateStatus[],
    patch: UpdateTransition,
    now: Date
  ): Promise<PendingUpdate> {
    this.ensureInitialized();
    const reply = await this.redis.runScript(
      REDIS_SCRIPTS.transitionUpdate,
      [this.updateKey(updateId)],
      [expected.join(','), ...flatten(encodeUpdateTransition(patch, now))]
    );
    if (reply === 'missing') {
      throw new NotFoundError('Update', updateId);
    }
    if (reply !== 'ok') {
      throw new InvalidTransitionError(unexpectedStatusMessage(updateId, String(reply), expected));
    }
    const update = await this.getUpdate(updateId);
    if (!update) {
      throw new NotFoundError('Update', updateId);
    }
    return update;
  }

  // Backup operations

  async saveBackup(backup: Backup): Promise<void> {
    this.ensureInitialized();
    const created = await this.redis.setIfAbsent(this.backupKey(backup.id), encodeBackup(backup));
    if (!created) {
      throw new StorageError(`Backup ${backup.id} already exists`);
    }
    await this.redis.sAdd(this.backupsKey(), backup.id);
  }

  async getBackup(backupId: string): Promise<Backup | null> {
    this.ensureInitialized();
    const content = await this.redis.get(this.backupKey(backupId));
    return content === null ? null : decodeBackup(content);
  }

  async listBackups(): Promise<Backup[]> {
    this.ensureInitialized();
    const ids = await this.redis.sMembers(this.backupsKey());
    const backups: Backup[] = [];
    for (const id of ids) {
      const backup = await this.getBackup(id);
      if (backup) backups.push(backup);
    }
    return backups.sort((a, b) => a.takenAt.getTime() - b.takenAt.getTime());
  }

  async deleteBackup(backupId: string): Promise<void> {
    this.ensureInitialized();
    await this.redis.del(this.backupKey(backupId));
    await this.redis.sRem(this.backupsKey(), backupId);
  }

  // Activity log: RPUSH is atomic, so the new list length is the entry's sequence

  async appendActivity(input: ActivityCreateInput, now: Date): Promise<ActivityEntry> {
    this.ensureInitialized();
    const entry = { id: uuidv4(), timestamp: now, ...input };
    const sequence = await this.redis.rPush(this.activityKey(), encodeActivity(entry));
    return { ...entry, sequence };
  }

  async listActivity(filters?: ActivityFilters): Promise<ActivityEntry[]> {
    this.ensureInitialized();
    const lines = await this.redis.lRange(this.activityKey(), 0, -1);
    return filterActivity(lines.map((line, index) => decodeActivity(line, index + 1)), filters);
  }

  // Health and metrics

  async healthCheck(): Promise<HealthStatus> {
    try {
      const response = await this.redis.ping();
      return { healthy: response === 'PONG' };
    } catch (error) {
      return { healthy: false, message: `Redis connection failed: ${String(error)}` };
    }
  }

  async getMetrics(): Promise<Record<string, number>> {
    this.ensureInitialized();
    const tasks = await this.listTasks();
    const updates = await this.listUpdates({ status: 'pending_approval' });
    return {
      totalTasks: tasks.length,
      pendingTasks: tasks.filter(t => t.status === 'pending').length,
      claimedTasks: tasks.filter(t => t.status === 'claimed').length,
      runningTasks: tasks.filter(t => t.status === 'running').length,
      retryingTasks: tasks.filter(t => t.status === 'retrying').length,
      completedTasks: tasks.filter(t => t.status === 'completed').length,
      failedTasks: tasks.filter(t => t.status === 'failed').length,
      cancelledTasks: tasks.filter(t => t.status === 'cancelled').length,
      pendingUpdates: updates.length,
    };
  }
}
