import { DatabaseConnection } from './database';
import { SettingsRepository, VerbRepository } from './database/repositories';
import { loadSeedVerbs } from './database/seed';
import type { AppConfig } from './main/config';
import { VerbService } from './main/services/verb.service';
import { PreferencesService } from './main/services/preferences.service';
import { PronunciationService } from './main/services/pronunciation.service';
import { SearchSession } from './main/services/search-session';
import { HttpSpeechEngine, SilentSpeechEngine } from './main/services/speech-engine';
import type { SpeechEngine } from './shared/types';

export interface App {
  verbs: VerbService;
  preferences: PreferencesService;
  pronunciation: PronunciationService;
  createSearchSession(): SearchSession;
  close(): Promise<void>;
}

export interface AppOverrides {
  speechEngine?: SpeechEngine;
}

/**
 * Composition root: builds every service once, sharing one connection.
 * The caller owns the returned App and must close it.
 */
export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const connection = new DatabaseConnection({
    filePath: config.dbPath,
    busyTimeoutMs: config.busyTimeoutMs,
  });

  const verbs = new VerbService(new VerbRepository(connection), {
    timeoutMs: config.storageTimeoutMs,
    seed: loadSeedVerbs,
  });
  const preferences = new PreferencesService(new SettingsRepository(connection));

  const engine = overrides.speechEngine ?? (config.ttsUrl
    ? new HttpSpeechEngine({ baseUrl: config.ttsUrl, timeoutMs: config.ttsTimeoutMs })
    : new SilentSpeechEngine());
  const pronunciation = new PronunciationService(verbs, engine);

  return {
    verbs,
    preferences,
    pronunciation,
    createSearchSession: () => new SearchSession(verbs, config.searchDebounceMs),
    close: async () => {
      await engine.stop();
      connection.close();
    },
  };
}
