import { StorageProvider } from '../storage/index.js';
import { Task, TaskStatus } from '../types/index.js';
import { isLeaseExpired } from '../storage/taskTransitions.js';
import { Clock, systemClock, validate, leaseDurationSchema } from '../utils/index.js';
import { logger } from '../utils/logger.js';

export interface LeaseStats {
  activeLeases: number;
  expiredLeases: number;
  tasksByStatus: Partial<Record<TaskStatus, number>>;
  nextExpiryAt?: Date;
}

/**
 * Lease bookkeeping for workers: extension by the holder and monitoring.
 * Reclaiming expired leases is the reaper's job.
 */
export class LeaseService {
  constructor(
    private storage: StorageProvider,
    private clock: Clock = systemClock
  ) {}

  /**
   * Push the lease of a task the worker holds `extraMs` further out.
   */
  async extendTaskLease(taskId: string, workerId: string, extraMs: number): Promise<Task> {
    const extension = validate(leaseDurationSchema, extraMs);
    const task = await this.storage.extendLease(taskId, workerId, extension, this.clock());

    logger.debug(`Extended lease for task ${taskId} by ${extension}ms`, {
      taskId,
      workerId,
      leaseExpiresAt: task.leaseExpiresAt?.toISOString(),
    });
    return task;
  }

  async getLeaseStats(): Promise<LeaseStats> {
    const now = this.clock();
    const tasks = await this.storage.listTasks();

    const tasksByStatus: Partial<Record<TaskStatus, number>> = {};
    let activeLeases = 0;
    let expiredLeases = 0;
    let nextExpiryAt: Date | undefined;

    for (const task of tasks) {
      tasksByStatus[task.status] = (tasksByStatus[task.status] ?? 0) + 1;
      if (task.status !== 'claimed' && task.status !== 'running') {
        continue;
      }
      if (isLeaseExpired(task, now)) {
        expiredLeases++;
        continue;
      }
      activeLeases++;
      if (task.leaseExpiresAt && (!nextExpiryAt || task.leaseExpiresAt < nextExpiryAt)) {
        nextExpiryAt = task.leaseExpiresAt;
      }
    }

    return { activeLeases, expiredLeases, tasksByStatus, nextExpiryAt };
  }
}
