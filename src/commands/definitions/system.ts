/**
 * Operational commands: audit trail, status, command checks and the worker loop
 */

import chalk from '../../utils/chalk.js';
import {
  ACTIVITY_KINDS,
  ActivityEntry,
  GuardrailVerdict,
  HealthStatus,
} from '../../types/index.js';
import type { RunOutcome } from '../../services/AgentService.js';
import type { LeaseStats } from '../../services/LeaseService.js';
import type { QueueStats } from '../../services/TaskQueueService.js';
import { formatActivityList, formatQueueStats, formatVerdict } from '../formatters.js';
import { defineCommand } from '../types.js';

export const listActivity = defineCommand<ActivityEntry[]>({
  name: 'activity',
  description: 'Show the append-only activity log',
  parameters: [
    { name: 'subject', type: 'string', description: 'Only entries about this task or update id' },
    { name: 'kind', type: 'string', description: 'Only entries of this kind', choices: ACTIVITY_KINDS },
    { name: 'limit', type: 'number', description: 'Most recent entries to show', default: 50 },
  ],
  async handler(context, args) {
    const entries = await context.activity.list({
      subjectId: args.string('subject'),
      kind: ACTIVITY_KINDS.find(kind => kind === args.string('kind')),
      limit: args.number('limit'),
    });
    return { success: true, data: entries };
  },
  formatResult: entries => formatActivityList(entries),
});

export const checkCommand = defineCommand<GuardrailVerdict>({
  name: 'check-command',
  description: 'Evaluate a shell command against the command allowlist',
  parameters: [
    { name: 'command', type: 'string', description: 'Command line to check', required: true, positional: true },
  ],
  async handler(context, args) {
    const verdict = context.guardrails.checkCommand(args.requireString('command'));
    return verdict.allowed
      ? { success: true, data: verdict }
      : { success: false, data: verdict, error: verdict.violations.map(v => v.message).join('; ') };
  },
  formatResult: verdict => formatVerdict(verdict),
});

interface SystemStatus {
  health: HealthStatus;
  queue: QueueStats;
  leases: LeaseStats;
  storage: Record<string, number>;
}

export const systemStatus = defineCommand<SystemStatus>({
  name: 'status',
  description: 'Storage health, queue depth and lease state',
  parameters: [],
  async handler(context) {
    const [health, queue, leases, storage] = await Promise.all([
      context.storage.healthCheck(),
      context.queue.getQueueStats(),
      context.lease.getLeaseStats(),
      context.storage.getMetrics(),
    ]);
    return { success: health.healthy, data: { health, queue, leases, storage }, error: health.message };
  },
  formatResult: ({ health, queue, leases, storage }) => {
    let output = `${chalk.bold('Storage:')} ${health.healthy ? chalk.green('healthy') : chalk.red('unhealthy')}`;
    if (health.message) output += ` (${health.message})`;
    output += '\n' + formatQueueStats(queue);
    output += `\n${chalk.bold('Leases:')}\n`;
    output += `  active     ${leases.activeLeases}\n`;
    output += `  expired    ${leases.expiredLeases}\n`;
    if (leases.nextExpiryAt) {
      output += `  next expiry ${leases.nextExpiryAt.toISOString()}\n`;
    }
    const metrics = Object.entries(storage);
    if (metrics.length > 0) {
      output += `\n${chalk.bold('Storage metrics:')}\n`;
      output += metrics.map(([key, value]) => `  ${key} ${value}`).join('\n');
    }
    return output;
  },
});

interface RunSummary {
  workers: string[];
  outcome?: RunOutcome;
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export const runAgent = defineCommand<RunSummary>({
  name: 'run',
  description: 'Run worker loops until interrupted, or process a single task with --once',
  parameters: [
    { name: 'concurrency', type: 'number', description: 'Worker loops to run', alias: 'c' },
    { name: 'once', type: 'boolean', description: 'Claim and process at most one task, then exit' },
  ],
  async handler(context, args) {
    const concurrency = args.number('concurrency');
    const agent = context.createAgent(concurrency === undefined ? {} : { concurrency });
    const workers = agent.workerIds();

    if (args.boolean('once')) {
      const [workerId] = workers;
      if (!workerId) {
        return { success: false, error: 'No workers configured' };
      }
      const outcome = await agent.runOnce(workerId);
      return { success: true, data: { workers: [workerId], outcome }, message: `Worker ${workerId}: ${outcome}` };
    }

    agent.start();
    const signal = await waitForShutdownSignal();
    await agent.stop();
    return { success: true, data: { workers }, message: `Stopped on ${signal}` };
  },
  formatResult: summary => `Workers: ${summary.workers.join(', ')}`,
});
