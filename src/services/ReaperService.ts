import { ReapResult } from '../types/index.js';
import { asError } from '../utils/index.js';
import { logger } from '../utils/logger.js';
import { TaskQueueService } from './TaskQueueService.js';

/**
 * Periodically returns tasks with expired leases to the queue.
 */
export class ReaperService {
  private interval: NodeJS.Timeout | null = null;
  private inFlight: Promise<ReapResult | null> | null = null;

  constructor(
    private queue: TaskQueueService,
    private intervalMs: number
  ) {}

  start(): void {
    if (this.interval) {
      return;
    }
    this.interval = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    logger.info(`Reaper started (interval: ${this.intervalMs}ms)`, { intervalMs: this.intervalMs });
  }

  /**
   * Stop the timer and wait for a sweep that is already running.
   */
  async stop(): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      logger.info('Reaper stopped');
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  async reapNow(): Promise<ReapResult> {
    return this.queue.reapExpiredLeases();
  }

  // Overlapping ticks are skipped rather than queued.
  private async tick(): Promise<ReapResult | null> {
    if (this.inFlight) {
      return null;
    }
    this.inFlight = this.reapNow().catch((error: unknown) => {
      logger.error('Reaper sweep failed', { operation: 'reap' }, asError(error));
      return null;
    });
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }
}
