import { mkdtempSync, mkdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { loadConfig, WardenConfig } from '../../src/config/index.js';
import {
  CompletionOptions,
  CompletionRequest,
  CompletionResponse,
  CompletionService,
} from '../../src/services/CompletionService.js';
import { ExternalServiceError, TaskPayload } from '../../src/types/index.js';
import type { Clock } from '../../src/utils/index.js';

export const createTestDataDir = (prefix: string = 'warden-test-'): string => {
  return mkdtempSync(path.join(tmpdir(), prefix));
};

export const removeDir = (dir: string): void => {
  rmSync(dir, { recursive: true, force: true });
};

/**
 * Settable clock. Services read time only through it.
 */
export class FakeClock {
  private current: number;

  constructor(start: string | number = '2026-01-15T10:00:00.000Z') {
    this.current = typeof start === 'number' ? start : Date.parse(start);
  }

  readonly now: Clock = () => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export const createPayload = (overrides?: Partial<TaskPayload>): TaskPayload => ({
  description: 'Write unit tests for the add function',
  code: 'def add(a, b):\n    return a + b\n',
  language: 'python',
  ...overrides,
});

export interface TestDirs {
  root: string;
  dataDir: string;
  workspaceRoot: string;
  agentRoot: string;
}

export const createTestDirs = (): TestDirs => {
  const root = createTestDataDir();
  const dirs = {
    root,
    dataDir: path.join(root, 'data'),
    workspaceRoot: path.join(root, 'workspace'),
    agentRoot: path.join(root, 'agent'),
  };
  mkdirSync(dirs.workspaceRoot, { recursive: true });
  mkdirSync(dirs.agentRoot, { recursive: true });
  return dirs;
};

export const createTestConfig = (dirs: TestDirs, env: Record<string, string> = {}): WardenConfig =>
  loadConfig({
    WARDEN_STORAGE_PROVIDER: 'file',
    WARDEN_FILE_DATA_DIR: dirs.dataDir,
    WARDEN_WORKSPACE_ROOT: dirs.workspaceRoot,
    WARDEN_AGENT_ROOT: dirs.agentRoot,
    WARDEN_RETRY_BASE_DELAY_MS: '1000',
    WARDEN_RETRY_MAX_DELAY_MS: '8000',
    WARDEN_LEASE_DURATION_MS: '60000',
    WARDEN_CONCURRENCY: '1',
    WARDEN_POLL_INTERVAL_MS: '10',
    WARDEN_COMPLETION_TIMEOUT_MS: '1000',
    ...env,
  });

export type CompletionStep = string | Error | ((request: CompletionRequest, options: CompletionOptions) => Promise<string>);

/**
 * Completion backend that replays scripted steps in order and records
 * every request it receives.
 */
export class ScriptedCompletionService implements CompletionService {
  readonly requests: CompletionRequest[] = [];
  private steps: CompletionStep[];

  constructor(...steps: CompletionStep[]) {
    this.steps = steps;
  }

  async complete(request: CompletionRequest, options: CompletionOptions = {}): Promise<CompletionResponse> {
    this.requests.push(request);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new ExternalServiceError('No scripted completion left');
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return { generatedText: await step(request, options) };
    }
    return { generatedText: step };
  }
}

// Helper function to wait for a certain time (useful for testing time-based operations)
export const sleep = (ms: number): Promise<void> => {
  return new Promise(resolve => setTimeout(resolve, ms));
};
