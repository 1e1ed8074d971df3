/**
 * Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Storage backend selection
 */
export const StoreKind = {
  MEMORY: 'memory',
  FILE: 'file',
} as const;

export type StoreKind = (typeof StoreKind)[keyof typeof StoreKind];

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Storage
  store: z.enum([StoreKind.MEMORY, StoreKind.FILE]).default(StoreKind.FILE),
  dataDir: z.string().min(1).default('.durable-agents/data'),

  // Back-pressure and history limits
  /** Runs allowed to wait behind the active run of one session */
  maxQueuedRunsPerSession: z.coerce.number().int().min(1).max(10000).default(100),
  /** History events allowed per orchestration instance before it is failed */
  maxHistoryEvents: z.coerce.number().int().min(10).max(1000000).default(10000),

  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3001),
  host: z.string().default('0.0.0.0'),
  apiKey: z.string().min(1).optional(),
  /** Default wait used by start-and-wait requests (3 minutes) */
  waitTimeoutMs: z.coerce.number().int().min(0).max(3600000).default(180000),

  // Agents
  openaiModel: z.string().min(1).default('gpt-4.1'),
  weatherMcpUrl: z.string().url().optional(),
});

export type DurableAgentsConfig = z.infer<typeof configSchema>;

/**
 * Treat empty environment values as unset so defaults apply.
 */
function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): DurableAgentsConfig {
  const raw = {
    store: readEnv('DURABLE_AGENTS_STORE'),
    dataDir: readEnv('DURABLE_AGENTS_DATA_DIR'),
    maxQueuedRunsPerSession: readEnv('DURABLE_AGENTS_MAX_QUEUED_RUNS_PER_SESSION'),
    maxHistoryEvents: readEnv('DURABLE_AGENTS_MAX_HISTORY_EVENTS'),
    port: readEnv('DURABLE_AGENTS_PORT'),
    host: readEnv('DURABLE_AGENTS_HOST'),
    apiKey: readEnv('DURABLE_AGENTS_API_KEY'),
    waitTimeoutMs: readEnv('DURABLE_AGENTS_WAIT_TIMEOUT_MS'),
    openaiModel: readEnv('DURABLE_AGENTS_OPENAI_MODEL'),
    weatherMcpUrl: readEnv('WEATHER_MCP_URL'),
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      store: result.data.store,
      dataDir: result.data.dataDir,
      maxQueuedRunsPerSession: result.data.maxQueuedRunsPerSession,
      maxHistoryEvents: result.data.maxHistoryEvents,
      authEnabled: result.data.apiKey !== undefined,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: DurableAgentsConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): DurableAgentsConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
