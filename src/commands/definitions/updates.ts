/**
 * Self-update governance commands, grouped under `warden updates`
 */

import chalk from '../../utils/chalk.js';
import { ActivityEntry, PendingUpdate, RollbackResult, UpdateStatus } from '../../types/index.js';
import { formatActivityList, formatUpdate, formatUpdateList } from '../formatters.js';
import { defineCommand } from '../types.js';
import { parseActor } from '../utils.js';

const UPDATE_STATUSES: readonly UpdateStatus[] = ['pending_approval', 'approved', 'rejected', 'applied', 'rolled_back'];

const GROUP = 'updates';

const idParameter = {
  name: 'updateId',
  type: 'string',
  description: 'Update id',
  required: true,
  positional: true,
} as const;

const actorParameter = {
  name: 'actor',
  type: 'string',
  description: 'Who decides, as kind:id (a bare id is a human)',
  default: 'human:operator',
} as const;

export const listUpdates = defineCommand<PendingUpdate[]>({
  name: 'list',
  group: GROUP,
  description: 'List proposed self-updates',
  parameters: [
    { name: 'status', type: 'string', description: 'Only updates in this status', choices: UPDATE_STATUSES },
  ],
  async handler(context, args) {
    const status = UPDATE_STATUSES.find(candidate => candidate === args.string('status'));
    return { success: true, data: await context.governance.listUpdates(status) };
  },
  formatResult: updates => formatUpdateList(updates),
});

interface UpdateDetail {
  update: PendingUpdate;
  changeLog: ActivityEntry[];
}

export const showUpdate = defineCommand<UpdateDetail>({
  name: 'show',
  group: GROUP,
  description: 'Show an update with its change log',
  parameters: [idParameter],
  async handler(context, args) {
    const updateId = args.requireString('updateId');
    const update = await context.governance.getUpdate(updateId);
    if (!update) {
      return { success: false, error: `Update ${updateId} not found` };
    }
    return { success: true, data: { update, changeLog: await context.governance.getChangeLog(updateId) } };
  },
  formatResult: ({ update, changeLog }) =>
    `${formatUpdate(update)}\n${chalk.bold('Change log:')}\n${formatActivityList(changeLog)}`,
});

export const approveUpdate = defineCommand<PendingUpdate>({
  name: 'approve',
  group: GROUP,
  description: 'Approve a pending update and, unless --no-apply, apply it',
  parameters: [
    idParameter,
    actorParameter,
    { name: 'note', type: 'string', description: 'Decision note' },
    { name: 'apply', type: 'boolean', description: 'Apply right after approving', default: true },
  ],
  async handler(context, args) {
    const updateId = args.requireString('updateId');
    const actor = parseActor(args.requireString('actor'));
    const approved = await context.governance.decide(updateId, 'approve', actor, args.string('note'));
    if (!args.boolean('apply')) {
      return { success: true, data: approved, message: `Update ${updateId} approved` };
    }
    const applied = await context.governance.apply(updateId, actor);
    return { success: true, data: applied, message: `Update ${updateId} approved and applied` };
  },
  formatResult: update => formatUpdate(update),
});

export const rejectUpdate = defineCommand<PendingUpdate>({
  name: 'reject',
  group: GROUP,
  description: 'Reject a pending update',
  parameters: [idParameter, actorParameter, { name: 'note', type: 'string', description: 'Decision note' }],
  async handler(context, args) {
    const updateId = args.requireString('updateId');
    const rejected = await context.governance.decide(
      updateId,
      'reject',
      parseActor(args.requireString('actor')),
      args.string('note')
    );
    return { success: true, data: rejected, message: `Update ${updateId} rejected` };
  },
  formatResult: update => formatUpdate(update),
});

export const applyUpdate = defineCommand<PendingUpdate>({
  name: 'apply',
  group: GROUP,
  description: 'Apply an approved update (also resumes an interrupted apply)',
  parameters: [idParameter, actorParameter],
  async handler(context, args) {
    const updateId = args.requireString('updateId');
    const applied = await context.governance.apply(updateId, parseActor(args.requireString('actor')));
    return { success: true, data: applied, message: `Update ${updateId} applied` };
  },
  formatResult: update => formatUpdate(update),
});

export const rollbackUpdate = defineCommand<RollbackResult>({
  name: 'rollback',
  group: GROUP,
  description: 'Restore the file an applied update replaced',
  parameters: [idParameter, actorParameter],
  async handler(context, args) {
    const updateId = args.requireString('updateId');
    const result = await context.governance.rollback(updateId, parseActor(args.requireString('actor')));
    const message = result.changed ? `Update ${updateId} rolled back` : `Update ${updateId} was already rolled back`;
    return { success: true, data: result, message };
  },
  formatResult: result => formatUpdate(result.update),
});

export const cleanupBackups = defineCommand<string[]>({
  name: 'cleanup',
  group: GROUP,
  description: 'Delete old backups that no applied update needs',
  parameters: [
    { name: 'days', type: 'number', description: 'Keep backups younger than this many days' },
  ],
  async handler(context, args) {
    const removed = await context.governance.cleanupBackups(args.number('days'));
    return { success: true, data: removed, message: `Removed ${removed.length} backups` };
  },
  formatResult: removed => removed.join('\n'),
});
