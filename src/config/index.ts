import { WardenConfig, configSchema } from './types.js';

type Env = Record<string, string | undefined>;

function parseIntOrUndefined(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Load configuration from environment variables.
 * Called once at the composition root; components receive their slice.
 */
export function loadConfig(env: Env = process.env): WardenConfig {
  const envConfig = {
    storage: {
      provider: env.WARDEN_STORAGE_PROVIDER,
      connectionString: env.WARDEN_STORAGE_CONNECTION_STRING,
      fileStorage: {
        dataDir: env.WARDEN_FILE_DATA_DIR,
        lockTimeout: parseIntOrUndefined(env.WARDEN_FILE_LOCK_TIMEOUT),
      },
      redis: {
        database: parseIntOrUndefined(env.WARDEN_REDIS_DATABASE),
        keyPrefix: env.WARDEN_REDIS_KEY_PREFIX,
      },
    },
    queue: {
      maxAttempts: parseIntOrUndefined(env.WARDEN_MAX_ATTEMPTS),
      leaseDurationMs: parseIntOrUndefined(env.WARDEN_LEASE_DURATION_MS),
      retryBaseDelayMs: parseIntOrUndefined(env.WARDEN_RETRY_BASE_DELAY_MS),
      retryMaxDelayMs: parseIntOrUndefined(env.WARDEN_RETRY_MAX_DELAY_MS),
      reaperIntervalMs: parseIntOrUndefined(env.WARDEN_REAPER_INTERVAL_MS),
    },
    guardrails: {
      workspaceRoot: env.WARDEN_WORKSPACE_ROOT,
      maxPayloadBytes: parseIntOrUndefined(env.WARDEN_MAX_PAYLOAD_BYTES),
      maxOutputBytes: parseIntOrUndefined(env.WARDEN_MAX_OUTPUT_BYTES),
      allowedExtensions: parseList(env.WARDEN_ALLOWED_EXTENSIONS),
      allowedCommands: parseList(env.WARDEN_ALLOWED_COMMANDS),
    },
    governance: {
      agentRoot: env.WARDEN_AGENT_ROOT,
      backupRetentionDays: parseIntOrUndefined(env.WARDEN_BACKUP_RETENTION_DAYS),
    },
    agent: {
      concurrency: parseIntOrUndefined(env.WARDEN_CONCURRENCY),
      pollIntervalMs: parseIntOrUndefined(env.WARDEN_POLL_INTERVAL_MS),
      completionTimeoutMs: parseIntOrUndefined(env.WARDEN_COMPLETION_TIMEOUT_MS),
      model: env.WARDEN_MODEL,
      maxTokens: parseIntOrUndefined(env.WARDEN_MAX_TOKENS),
      apiKey: env.WARDEN_ANTHROPIC_API_KEY ?? env.ANTHROPIC_API_KEY,
    },
    logging: {
      level: env.WARDEN_LOG_LEVEL,
    },
  };

  // Remove undefined values to let Joi apply defaults
  const cleanConfig = removeUndefined(envConfig);

  const { error, value } = configSchema.validate(cleanConfig, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(removeUndefined);
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      cleaned[key] = removeUndefined(entry);
    }
  }
  return cleaned;
}

export function getConfigExamples(): Record<'development' | 'production', Record<string, string>> {
  return {
    development: {
      WARDEN_STORAGE_PROVIDER: 'file',
      WARDEN_FILE_DATA_DIR: './data',
      WARDEN_WORKSPACE_ROOT: './workspace',
      WARDEN_CONCURRENCY: '1',
      WARDEN_LOG_LEVEL: 'debug',
    },
    production: {
      WARDEN_STORAGE_PROVIDER: 'redis',
      WARDEN_STORAGE_CONNECTION_STRING: 'redis://localhost:6379',
      WARDEN_REDIS_KEY_PREFIX: 'warden:',
      WARDEN_WORKSPACE_ROOT: '/srv/warden/workspace',
      WARDEN_AGENT_ROOT: '/srv/warden/agent',
      WARDEN_CONCURRENCY: '3',
      WARDEN_LOG_LEVEL: 'info',
    },
  };
}

export * from './types.js';
