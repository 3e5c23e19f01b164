import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ALLOWED_EXTENSIONS,
  getConfigExamples,
  loadConfig,
} from '../../src/config/index.js';

describe('loadConfig', () => {
  it('fills in defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.storage.provider).toBe('file');
    expect(config.storage.fileStorage).toEqual({ dataDir: './data', lockTimeout: 30000 });
    expect(config.queue).toEqual({
      maxAttempts: 3,
      leaseDurationMs: 600000,
      retryBaseDelayMs: 5000,
      retryMaxDelayMs: 300000,
      reaperIntervalMs: 30000,
    });
    expect(config.guardrails.maxPayloadBytes).toBe(1024 * 1024);
    expect(config.guardrails.allowedExtensions).toEqual(DEFAULT_ALLOWED_EXTENSIONS);
    expect(config.governance).toEqual({ agentRoot: '.', backupRetentionDays: 30 });
    expect(config.agent.concurrency).toBe(3);
    expect(config.agent.apiKey).toBeUndefined();
    expect(config.logging.level).toBe('info');
  });

  it('reads numbers and lists from the environment', () => {
    const config = loadConfig({
      WARDEN_MAX_ATTEMPTS: '5',
      WARDEN_LEASE_DURATION_MS: '120000',
      WARDEN_ALLOWED_EXTENSIONS: '.py, .rs ,,',
      WARDEN_ALLOWED_COMMANDS: 'git,cargo',
      WARDEN_CONCURRENCY: '8',
      WARDEN_LOG_LEVEL: 'debug',
    });

    expect(config.queue.maxAttempts).toBe(5);
    expect(config.queue.leaseDurationMs).toBe(120000);
    expect(config.guardrails.allowedExtensions).toEqual(['.py', '.rs']);
    expect(config.guardrails.allowedCommands).toEqual(['git', 'cargo']);
    expect(config.agent.concurrency).toBe(8);
    expect(config.logging.level).toBe('debug');
  });

  it('prefers the warden api key variable', () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: 'test-key' }).agent.apiKey).toBe('test-key');
    expect(
      loadConfig({ ANTHROPIC_API_KEY: 'test-key', WARDEN_ANTHROPIC_API_KEY: 'test-warden-key' }).agent.apiKey
    ).toBe('test-warden-key');
  });

  it('configures redis storage', () => {
    const config = loadConfig({
      WARDEN_STORAGE_PROVIDER: 'redis',
      WARDEN_STORAGE_CONNECTION_STRING: 'redis://localhost:6379',
      WARDEN_REDIS_DATABASE: '2',
    });

    expect(config.storage.redis).toEqual({ database: 2, keyPrefix: 'warden:' });
  });

  it('requires a connection string for redis', () => {
    expect(() => loadConfig({ WARDEN_STORAGE_PROVIDER: 'redis' })).toThrow(
      'Configuration validation failed: "storage.connectionString" is required'
    );
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ WARDEN_STORAGE_PROVIDER: 'mongodb' })).toThrow('Configuration validation failed');
    expect(() => loadConfig({ WARDEN_MAX_ATTEMPTS: '0' })).toThrow('"queue.maxAttempts" must be greater than or equal to 1');
    expect(() => loadConfig({ WARDEN_ALLOWED_EXTENSIONS: 'py' })).toThrow('Configuration validation failed');
    expect(() => loadConfig({ WARDEN_LOG_LEVEL: 'verbose' })).toThrow('Configuration validation failed');
  });

  it('accepts the documented examples', () => {
    const examples = getConfigExamples();
    expect(loadConfig(examples.development).logging.level).toBe('debug');
    expect(loadConfig(examples.production).storage.provider).toBe('redis');
  });
});
