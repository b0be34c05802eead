/**
 * Groundline configuration
 *
 * Every setting comes from the environment with a typed default. Invalid
 * numbers fall back to the default.
 */

import { EngineLimits } from './schemas/validation.js';

export type StorageKind = 'sqlite' | 'memory';

export interface GroundlineConfig {
  port: number;
  wsPort: number;
  /** Serve the bridge WebSocket on the HTTP port under /ws (when WS_PORT is unset) */
  singlePort: boolean;
  jwtSecret?: string;
  storage: StorageKind;
  dbPath: string;
  maxThreadWindow: number;
  timeWindowMs: number;
  maxWords: number;
  classifierTimeoutMs: number;
  classifierAttempts: number;
  maxThreads: number;
  anthropicApiKey?: string;
  model: string;
  promptsDir: string;
}

export const DEFAULT_MODEL = 'claude-3-5-haiku-latest';

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, fallback: number, min = 1): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed >= min ? parsed : fallback;
}

function floatFrom(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseFloat(value);
  return !isNaN(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): GroundlineConfig {
  const storage: StorageKind = env.GROUNDLINE_STORAGE === 'memory' ? 'memory' : 'sqlite';

  return {
    port: intFrom(env.PORT, 3000),
    wsPort: intFrom(env.WS_PORT, 3001),
    singlePort: !env.WS_PORT,
    jwtSecret: env.JWT_SECRET || undefined,
    storage,
    dbPath: env.GROUNDLINE_DB_PATH || '.groundline/groundline.db',
    maxThreadWindow: intFrom(env.GROUNDLINE_MAX_THREAD_WINDOW, EngineLimits.MAX_THREAD_WINDOW),
    timeWindowMs: Math.round(
      floatFrom(env.GROUNDLINE_TIME_WINDOW_MINUTES, EngineLimits.TIME_WINDOW_MS / 60000) * 60 * 1000
    ),
    maxWords: intFrom(env.GROUNDLINE_MAX_WORDS, EngineLimits.MAX_GROUND_TRUTH_WORDS),
    classifierTimeoutMs: intFrom(env.GROUNDLINE_CLASSIFIER_TIMEOUT_MS, EngineLimits.CLASSIFIER_TIMEOUT_MS),
    classifierAttempts: intFrom(env.GROUNDLINE_CLASSIFIER_ATTEMPTS, EngineLimits.CLASSIFIER_MAX_ATTEMPTS),
    maxThreads: intFrom(env.GROUNDLINE_MAX_THREADS, EngineLimits.MAX_THREADS),
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    model: env.GROUNDLINE_MODEL || DEFAULT_MODEL,
    promptsDir: env.GROUNDLINE_PROMPTS_DIR || 'prompts',
  };
}
