import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { StorageProvider, unexpectedStatusMessage } from '../storage/index.js';
import {
  ActivityEntry,
  Actor,
  Backup,
  GuardrailVerdict,
  InvalidTransitionError,
  NotFoundError,
  PendingUpdate,
  RollbackResult,
  SYSTEM_AUTO_ACTOR,
  StaleUpdateError,
  StorageError,
  UpdateDecision,
  UpdateStatus,
  formatActor,
} from '../types/index.js';
import {
  Clock,
  KeyedMutex,
  asError,
  systemClock,
  hashContent,
  hashFile,
  readBufferSafe,
  removeFileSafe,
  writeFileAtomic,
  validate,
  actorSchema,
  decisionSchema,
  decisionNoteSchema,
  retentionDaysSchema,
} from '../utils/index.js';
import { logger } from '../utils/logger.js';
import { ActivityLogService } from './ActivityLogService.js';
import { GuardrailService, violationError } from './GuardrailService.js';

/**
 * Files under the agent root whose updates always need a human approver.
 * A trailing `/*` covers a whole directory.
 */
export const PROTECTED_PATHS: readonly string[] = [
  'src/index.ts',
  'src/cli.ts',
  'src/services/AgentService.ts',
  'src/services/GovernanceService.ts',
  'src/services/GuardrailService.ts',
  'src/guardrails/*',
];

export function isProtectedPath(targetPath: string): boolean {
  const normalized = path.posix.normalize(targetPath.replace(/\\/g, '/'));
  return PROTECTED_PATHS.some(entry =>
    entry.endsWith('/*') ? normalized.startsWith(entry.slice(0, -1)) : normalized === entry
  );
}

const DAY_MS = 24 * 60 * 60 * 1000;

export interface GovernanceSettings {
  backupRetentionDays: number;
}

function mergeVerdicts(first: GuardrailVerdict, second: GuardrailVerdict): GuardrailVerdict {
  return {
    allowed: first.allowed && second.allowed,
    violations: [...first.violations, ...second.violations],
    evaluatedAt: second.evaluatedAt,
  };
}

/**
 * Approval-gated changes to the agent's own files. Every update is backed
 * up before it is written and can be rolled back byte for byte.
 *
 * Transitions for one update run one at a time in this process; the
 * storage compare-and-set on status guards against other processes.
 */
export class GovernanceService {
  private mutex = new KeyedMutex();

  constructor(
    private storage: StorageProvider,
    private guardrails: GuardrailService,
    private activity: ActivityLogService,
    private settings: GovernanceSettings,
    private clock: Clock = systemClock
  ) {}

  /**
   * Record a proposed change. Unprotected changes are applied right away
   * by the system actor; protected ones wait for a human decision.
   */
  async propose(
    targetPath: string,
    content: string,
    originatingTaskId: string,
    actor: Actor = SYSTEM_AUTO_ACTOR
  ): Promise<PendingUpdate> {
    const verdict = mergeVerdicts(
      this.guardrails.checkPath(targetPath, 'agent'),
      this.guardrails.checkOutput(content)
    );

    if (!verdict.allowed) {
      const rule = verdict.violations.find(v => v.severity === 'block')?.ruleName ?? null;
      await this.activity.record(
        'proposal.blocked',
        originatingTaskId,
        { targetPath, rule, proposed: false },
        formatActor(actor)
      );
      throw violationError(verdict, `Update to ${targetPath}`);
    }

    const canonicalPath = this.canonicalPath(targetPath);
    const isProtected = isProtectedPath(canonicalPath);
    const update = await this.storage.createUpdate(
      {
        targetPath: canonicalPath,
        proposedContent: content,
        proposedHash: hashContent(content),
        baseHash: await hashFile(this.absolutePath(canonicalPath)),
        reason: originatingTaskId,
        protected: isProtected,
        verdict,
      },
      this.clock()
    );

    await this.activity.record(
      'update.proposed',
      update.id,
      { targetPath: canonicalPath, protected: isProtected, reason: originatingTaskId },
      formatActor(actor)
    );
    logger.info(`Update ${update.id} proposed for ${canonicalPath}`, {
      updateId: update.id,
      targetPath: canonicalPath,
      protected: isProtected,
    });

    if (isProtected) {
      return update;
    }
    return this.apply(update.id, SYSTEM_AUTO_ACTOR);
  }

  async decide(updateId: string, decision: UpdateDecision, actor: Actor, note?: string): Promise<PendingUpdate> {
    const validDecision = validate(decisionSchema, decision);
    const validActor = validate(actorSchema.required(), actor);
    const validNote = validate(decisionNoteSchema, note);

    return this.mutex.run(updateId, async () => {
      const update = await this.requireUpdate(updateId);
      if (update.status !== 'pending_approval') {
        throw new InvalidTransitionError(unexpectedStatusMessage(updateId, update.status, ['pending_approval']));
      }
      if (validDecision === 'approve' && update.protected && validActor.kind !== 'human') {
        throw new InvalidTransitionError(`Update ${updateId} targets a protected path and needs a human approver`);
      }

      const now = this.clock();
      const status: UpdateStatus = validDecision === 'approve' ? 'approved' : 'rejected';
      const decided = await this.storage.transitionUpdate(
        updateId,
        ['pending_approval'],
        { status, decidedAt: now, decidedBy: formatActor(validActor), decisionNote: validNote },
        now
      );

      await this.activity.record(
        status === 'approved' ? 'update.approved' : 'update.rejected',
        updateId,
        { targetPath: update.targetPath, note: validNote ?? null },
        formatActor(validActor)
      );
      return decided;
    });
  }

  /**
   * Back up the target, write the proposed content and mark the update
   * applied. A failure after the backup leaves the update `approved` with
   * its backup attached; applying again picks up from there.
   */
  async apply(updateId: string, actor: Actor = SYSTEM_AUTO_ACTOR): Promise<PendingUpdate> {
    return this.mutex.run(updateId, () => this.applyLocked(updateId, actor));
  }

  private async applyLocked(updateId: string, actor: Actor): Promise<PendingUpdate> {
    const update = await this.requireUpdate(updateId);
    const autoApplicable = update.status === 'pending_approval' && !update.protected && update.verdict.allowed;
    if (update.status !== 'approved' && !autoApplicable) {
      if (update.status === 'pending_approval') {
        throw new InvalidTransitionError(`Update ${updateId} needs approval before it can be applied`);
      }
      throw new InvalidTransitionError(unexpectedStatusMessage(updateId, update.status, ['approved']));
    }

    try {
      const absolute = this.absolutePath(update.targetPath);
      const currentHash = await hashFile(absolute);
      let backupRef = update.backupRef;

      // Already written by an earlier attempt that failed before the final CAS
      const alreadyWritten = currentHash === update.proposedHash && backupRef !== undefined;
      if (!alreadyWritten) {
        if (currentHash !== update.baseHash) {
          throw new StaleUpdateError(updateId, update.targetPath);
        }
        backupRef = await this.ensureBackup(update, absolute, currentHash);
        await writeFileAtomic(absolute, update.proposedContent);
      }

      const now = this.clock();
      const applied = await this.storage.transitionUpdate(
        updateId,
        [update.status],
        { status: 'applied', appliedAt: now, backupRef },
        now
      );

      await this.activity.record(
        'update.applied',
        updateId,
        { targetPath: update.targetPath, backupRef: backupRef ?? null },
        formatActor(actor)
      );
      logger.info(`Update ${updateId} applied to ${update.targetPath}`, { updateId, backupRef });
      return applied;
    } catch (error) {
      const failure = asError(error);
      await this.activity.record(
        'update.apply_failed',
        updateId,
        { targetPath: update.targetPath, error: failure.message },
        formatActor(actor)
      );
      logger.error(`Failed to apply update ${updateId}`, { updateId }, failure);
      throw error;
    }
  }

  private async ensureBackup(update: PendingUpdate, absolute: string, currentHash: string): Promise<string> {
    if (update.backupRef && (await this.storage.getBackup(update.backupRef))) {
      return update.backupRef;
    }

    const original = await readBufferSafe(absolute);
    const backup: Backup = {
      id: uuidv4(),
      updateRef: update.id,
      targetPath: update.targetPath,
      originalContent: original === null ? null : original.toString('base64'),
      contentHash: currentHash,
      takenAt: this.clock(),
    };
    await this.storage.saveBackup(backup);

    // Attach before writing so a crash after the write can still roll back
    await this.storage.transitionUpdate(
      update.id,
      [update.status],
      { status: update.status, backupRef: backup.id },
      this.clock()
    );
    return backup.id;
  }

  /**
   * Restore the backed-up bytes. Rolling back twice is a no-op.
   */
  async rollback(updateId: string, actor: Actor = SYSTEM_AUTO_ACTOR): Promise<RollbackResult> {
    return this.mutex.run(updateId, async () => {
      const update = await this.requireUpdate(updateId);
      if (update.status === 'rolled_back') {
        return { update, changed: false };
      }
      if (update.status !== 'applied') {
        throw new InvalidTransitionError(unexpectedStatusMessage(updateId, update.status, ['applied']));
      }

      const backup = update.backupRef ? await this.storage.getBackup(update.backupRef) : null;
      if (!backup) {
        throw new StorageError(`Backup for update ${updateId} is missing`);
      }

      const absolute = this.absolutePath(update.targetPath);
      if (backup.originalContent === null) {
        await removeFileSafe(absolute);
      } else {
        await writeFileAtomic(absolute, Buffer.from(backup.originalContent, 'base64'));
      }

      const now = this.clock();
      const rolledBack = await this.storage.transitionUpdate(
        updateId,
        ['applied'],
        { status: 'rolled_back', rolledBackAt: now },
        now
      );
      await this.activity.record(
        'update.rolled_back',
        updateId,
        { targetPath: update.targetPath, backupRef: backup.id, restored: backup.originalContent !== null },
        formatActor(actor)
      );
      return { update: rolledBack, changed: true };
    });
  }

  async getChangeLog(updateId: string): Promise<ActivityEntry[]> {
    return this.activity.list({ subjectId: updateId });
  }

  async listUpdates(status?: UpdateStatus): Promise<PendingUpdate[]> {
    return this.storage.listUpdates(status ? { status } : undefined);
  }

  async getUpdate(updateId: string): Promise<PendingUpdate | null> {
    return this.storage.getUpdate(updateId);
  }

  /**
   * Delete backups older than `days` that no applied or in-flight update
   * still needs. Returns the ids removed.
   */
  async cleanupBackups(days: number = this.settings.backupRetentionDays): Promise<string[]> {
    const retention = validate(retentionDaysSchema, days);
    const cutoff = this.clock().getTime() - retention * DAY_MS;
    const removed: string[] = [];

    for (const backup of await this.storage.listBackups()) {
      if (backup.takenAt.getTime() >= cutoff) {
        continue;
      }
      const update = await this.storage.getUpdate(backup.updateRef);
      if (update && (update.status === 'applied' || update.status === 'approved')) {
        continue;
      }
      await this.storage.deleteBackup(backup.id);
      removed.push(backup.id);
    }

    if (removed.length > 0) {
      logger.info(`Removed ${removed.length} expired backups`, { retentionDays: retention });
    }
    return removed;
  }

  private async requireUpdate(updateId: string): Promise<PendingUpdate> {
    const update = await this.storage.getUpdate(updateId);
    if (!update) {
      throw new NotFoundError('Update', updateId);
    }
    return update;
  }

  private absolutePath(targetPath: string): string {
    return this.guardrails.resolvePath(targetPath, 'agent');
  }

  // Stored paths are relative to the agent root with forward slashes.
  private canonicalPath(targetPath: string): string {
    const root = this.guardrails.getPolicy().agentRoot;
    return path.relative(root, this.absolutePath(targetPath)).split(path.sep).join('/');
  }
}
