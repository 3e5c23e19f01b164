import { StorageProvider } from '../storage/index.js';
import {
  ActivityDetailValue,
  ActivityEntry,
  ActivityFilters,
  ActivityKind,
  SYSTEM_AUTO_ACTOR,
  formatActor,
} from '../types/index.js';
import { Clock, systemClock } from '../utils/index.js';
import { logger } from '../utils/logger.js';

/**
 * Append-only audit trail of task and update events. Entries are never
 * edited; their sequence is the order they were written in.
 */
export class ActivityLogService {
  constructor(
    private storage: StorageProvider,
    private clock: Clock = systemClock
  ) {}

  async record(
    kind: ActivityKind,
    subjectId: string,
    detail: Record<string, ActivityDetailValue> = {},
    actor: string = formatActor(SYSTEM_AUTO_ACTOR)
  ): Promise<ActivityEntry> {
    const entry = await this.storage.appendActivity({ kind, subjectId, actor, detail }, this.clock());
    logger.debug(`Activity ${kind}`, { subjectId, actor, sequence: entry.sequence });
    return entry;
  }

  async list(filters?: ActivityFilters): Promise<ActivityEntry[]> {
    return this.storage.listActivity(filters);
  }
}
