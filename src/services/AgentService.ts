import {
  NotClaimedError,
  Task,
  TaskError,
  TaskResult,
  TaskVerdicts,
  toTaskError,
} from '../types/index.js';
import { buildPrompt } from '../prompts/index.js';
import { Clock, asError, systemClock } from '../utils/index.js';
import { logger } from '../utils/logger.js';
import { ActivityLogService } from './ActivityLogService.js';
import { CompletionService, withTimeout } from './CompletionService.js';
import { GovernanceService } from './GovernanceService.js';
import { GuardrailService, violationError } from './GuardrailService.js';
import { ReaperService } from './ReaperService.js';
import { TaskQueueService } from './TaskQueueService.js';
import { WorkspaceService } from './WorkspaceService.js';

export type RunOutcome =
  | 'idle'
  | 'completed'
  | 'failed'
  | 'retrying'
  | 'violation'
  | 'proposed'
  | 'cancelled'
  | 'discarded';

export interface AgentSettings {
  concurrency: number;
  pollIntervalMs: number;
  completionTimeoutMs: number;
  model: string;
  maxTokens: number;
  workerPrefix?: string;
}

export interface AgentDependencies {
  queue: TaskQueueService;
  guardrails: GuardrailService;
  governance: GovernanceService;
  workspace: WorkspaceService;
  completion: CompletionService;
  activity: ActivityLogService;
  reaper: ReaperService;
  clock?: Clock;
}

/**
 * Worker loops that claim tasks and carry each one through pre-check,
 * completion, post-check and result routing.
 */
export class AgentService {
  private running = false;
  private loops: Promise<void>[] = [];
  private wakeups = new Set<() => void>();
  private readonly clock: Clock;

  constructor(
    private deps: AgentDependencies,
    private settings: AgentSettings
  ) {
    this.clock = deps.clock ?? systemClock;
  }

  isRunning(): boolean {
    return this.running;
  }

  workerIds(): string[] {
    const prefix = this.settings.workerPrefix ?? `worker-${process.pid}`;
    return Array.from({ length: this.settings.concurrency }, (_, i) => `${prefix}-${i + 1}`);
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.deps.reaper.start();
    this.loops = this.workerIds().map(workerId => this.workerLoop(workerId));
    logger.info(`Agent started with ${this.loops.length} workers`, { concurrency: this.settings.concurrency });
  }

  /**
   * Stop claiming and wait for in-flight tasks to finish.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    for (const wake of [...this.wakeups]) {
      wake();
    }
    await Promise.all(this.loops);
    this.loops = [];
    await this.deps.reaper.stop();
    logger.info('Agent stopped');
  }

  /**
   * One claim-and-process cycle for `workerId`.
   */
  async runOnce(workerId: string): Promise<RunOutcome> {
    const claimed = await this.deps.queue.claim(workerId);
    if (!claimed) {
      return 'idle';
    }
    return this.process(claimed, workerId);
  }

  private async workerLoop(workerId: string): Promise<void> {
    while (this.running) {
      let outcome: RunOutcome = 'idle';
      try {
        outcome = await this.runOnce(workerId);
      } catch (error) {
        logger.error('Worker cycle failed', { workerId }, asError(error));
      }
      if (outcome === 'idle' && this.running) {
        await this.idleWait();
      }
    }
  }

  private idleWait(): Promise<void> {
    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined;
      const wake = (): void => {
        clearTimeout(timer);
        this.wakeups.delete(wake);
        resolve();
      };
      timer = setTimeout(wake, this.settings.pollIntervalMs);
      this.wakeups.add(wake);
    });
  }

  private async process(claimed: Task, workerId: string): Promise<RunOutcome> {
    const { queue, guardrails, governance, workspace, completion } = this.deps;
    const log = logger.child({ workerId, taskId: claimed.id });
    const startedAt = this.clock().getTime();
    const verdicts: TaskVerdicts = {};

    try {
      const task = await queue.start(claimed.id, workerId);

      const pre = guardrails.checkTask(task.type, task.payload);
      verdicts.pre = pre;
      if (!pre.allowed) {
        return await this.failTask(task, workerId, violationError(pre, `Task ${task.id}`), verdicts);
      }

      const fileContent = task.payload.filePath ? await workspace.readInput(task.payload.filePath) : undefined;
      const prompt = buildPrompt(task.type, task.payload, fileContent);

      const { generatedText } = await logger.timeAsync(
        'completion',
        () =>
          withTimeout(
            signal =>
              completion.complete(
                { taskType: task.type, prompt, model: this.settings.model, maxTokens: this.settings.maxTokens },
                { signal }
              ),
            this.settings.completionTimeoutMs
          ),
        { workerId, taskId: task.id, taskType: task.type }
      );

      const post = guardrails.checkOutput(generatedText, task.payload.language);
      verdicts.post = post;
      if (!post.allowed) {
        log.warn('Generated output blocked', { rules: post.violations.map(v => v.ruleName).join(',') });
        return await this.failTask(
          task,
          workerId,
          violationError(post, `Output of task ${task.id}`),
          verdicts,
          generatedText
        );
      }

      const result: TaskResult = { output: generatedText };

      // Renewing the lease proves this worker still owns the task before
      // anything is written; a lost lease lands in discard() below.
      const current = await queue.extendLease(task.id, workerId);
      if (current.cancelRequested) {
        log.info('Cancellation requested, discarding output');
        await queue.ack(task.id, workerId, result, verdicts);
        return 'cancelled';
      }

      let outcome: RunOutcome = 'completed';
      const target = task.payload.target;
      if (target?.scope === 'agent') {
        const update = await governance.propose(target.path, generatedText, task.id);
        result.updateId = update.id;
        result.updateStatus = update.status;
        outcome = 'proposed';
      } else if (target?.scope === 'workspace') {
        result.writtenTo = await workspace.write(target.path, generatedText);
      }

      result.durationMs = this.clock().getTime() - startedAt;
      const acked = await queue.ack(task.id, workerId, result, verdicts);
      if (acked.status === 'cancelled') {
        return 'cancelled';
      }
      log.info(`Task ${outcome}`, { durationMs: result.durationMs });
      return outcome;
    } catch (error) {
      if (error instanceof NotClaimedError) {
        return this.discard(claimed, workerId, error);
      }
      return this.failTask(claimed, workerId, error, verdicts);
    }
  }

  private async failTask(
    task: Task,
    workerId: string,
    error: unknown,
    verdicts: TaskVerdicts,
    blockedOutput?: string
  ): Promise<RunOutcome> {
    // Output the post-check refused is kept on the error for audit, never written
    const taskError: TaskError =
      blockedOutput === undefined ? toTaskError(error) : { ...toTaskError(error), blockedOutput };
    try {
      const failed = await this.deps.queue.fail(task.id, workerId, taskError, verdicts);
      if (failed.status === 'retrying') {
        return 'retrying';
      }
      if (failed.status === 'cancelled') {
        return 'cancelled';
      }
      return taskError.kind === 'SecurityViolation' ? 'violation' : 'failed';
    } catch (failError) {
      if (failError instanceof NotClaimedError) {
        return this.discard(task, workerId, failError);
      }
      throw failError;
    }
  }

  // The lease was lost: another worker may own the task now, so nothing is persisted.
  private async discard(task: Task, workerId: string, error: NotClaimedError): Promise<RunOutcome> {
    logger.warn(`Discarding result of task ${task.id}`, { workerId, taskId: task.id, reason: error.message });
    await this.deps.activity.record('task.discarded', task.id, { reason: error.message }, `worker:${workerId}`);
    return 'discarded';
  }
}
