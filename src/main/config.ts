import os from 'os';
import path from 'path';
import { z } from 'zod';
import { config as loadEnv } from 'dotenv';
import { DB_SETTINGS, SEARCH_SETTINGS, TTS_SETTINGS } from '../shared/constants';

export interface AppConfig {
  dbPath: string;
  storageTimeoutMs: number;
  busyTimeoutMs: number;
  ttsUrl: string | null;
  ttsTimeoutMs: number;
  searchDebounceMs: number;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  VERBS_DB_PATH: z.string().optional(),
  VERBS_STORAGE_TIMEOUT_MS: positiveInt(DB_SETTINGS.STORAGE_TIMEOUT_MS),
  VERBS_BUSY_TIMEOUT_MS: positiveInt(DB_SETTINGS.BUSY_TIMEOUT_MS),
  VERBS_TTS_URL: z.string().url().optional(),
  VERBS_TTS_TIMEOUT_MS: positiveInt(TTS_SETTINGS.TIMEOUT_MS),
  VERBS_SEARCH_DEBOUNCE_MS: positiveInt(SEARCH_SETTINGS.DEBOUNCE_MS),
});

export function defaultDbPath(): string {
  return path.join(os.homedir(), DB_SETTINGS.DATA_DIR, DB_SETTINGS.FILE_NAME);
}

/**
 * Build the configuration from environment variables. Empty values count
 * as unset.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = EnvSchema.parse(present);

  return {
    dbPath: parsed.VERBS_DB_PATH ?? defaultDbPath(),
    storageTimeoutMs: parsed.VERBS_STORAGE_TIMEOUT_MS,
    busyTimeoutMs: parsed.VERBS_BUSY_TIMEOUT_MS,
    ttsUrl: parsed.VERBS_TTS_URL ?? null,
    ttsTimeoutMs: parsed.VERBS_TTS_TIMEOUT_MS,
    searchDebounceMs: parsed.VERBS_SEARCH_DEBOUNCE_MS,
  };
}

/**
 * Load `.env` (if any) into process.env, then read the configuration.
 */
export function loadConfig(): AppConfig {
  loadEnv();
  return configFromEnv(process.env);
}
