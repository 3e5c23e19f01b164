/**
 * Service context creation for command handlers
 */

import type { WardenConfig } from '../config/index.js';
import { StorageProvider } from '../storage/StorageProvider.js';
import { ActivityLogService } from '../services/ActivityLogService.js';
import { AgentService } from '../services/AgentService.js';
import { AnthropicCompletionService, CompletionService } from '../services/CompletionService.js';
import { GovernanceService } from '../services/GovernanceService.js';
import { GuardrailService, policyFromConfig } from '../services/GuardrailService.js';
import { ReaperService } from '../services/ReaperService.js';
import { TaskQueueService } from '../services/TaskQueueService.js';
import { WorkspaceService } from '../services/WorkspaceService.js';
import { DEFAULT_RULES } from '../guardrails/rules.js';
import { Clock, systemClock } from '../utils/index.js';
import { ServiceContext } from './types.js';

export interface ContextOptions {
  completion?: CompletionService;
  clock?: Clock;
}

/**
 * Wire every service from one configuration and storage provider
 */
export function createServiceContext(
  config: WardenConfig,
  storage: StorageProvider,
  options: ContextOptions = {}
): ServiceContext {
  const clock = options.clock ?? systemClock;
  const activity = new ActivityLogService(storage, clock);
  const guardrails = new GuardrailService(policyFromConfig(config), DEFAULT_RULES, clock);
  const queue = new TaskQueueService(storage, activity, config.queue, clock);
  const reaper = new ReaperService(queue, config.queue.reaperIntervalMs);
  const governance = new GovernanceService(storage, guardrails, activity, config.governance, clock);
  const workspace = new WorkspaceService(guardrails);

  const createAgent: ServiceContext['createAgent'] = overrides => {
    let completion = options.completion;
    if (!completion) {
      if (!config.agent.apiKey) {
        throw new Error('An Anthropic API key is required to run tasks (set ANTHROPIC_API_KEY)');
      }
      completion = new AnthropicCompletionService(config.agent.apiKey);
    }
    return new AgentService(
      { queue, guardrails, governance, workspace, completion, activity, reaper, clock },
      { ...config.agent, ...overrides }
    );
  };

  return {
    config,
    storage,
    activity,
    guardrails,
    queue,
    lease: queue.getLeaseService(),
    reaper,
    governance,
    workspace,
    createAgent,
  };
}
