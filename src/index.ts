export { createApp, type App, type AppOverrides } from './app';
export { loadConfig, configFromEnv, type AppConfig } from './main/config';
export { DatabaseConnection, type DatabaseOptions } from './database';
export { VerbRepository, SettingsRepository, type VerbStore } from './database/repositories';
export { decodeVerbRow, encodeVerbRecord, upgradeVerbRow } from './database/mappers/verb-row.mapper';
export { loadSeedVerbs } from './database/seed';
export { VerbService, type VerbServiceOptions } from './main/services/verb.service';
export { SearchSession, type SearchSource } from './main/services/search-session';
export { PreferencesService } from './main/services/preferences.service';
export { PronunciationService } from './main/services/pronunciation.service';
export { HttpSpeechEngine, SilentSpeechEngine } from './main/services/speech-engine';
export { Failure } from './main/utils/failures';
export { generateSearchTerms } from './shared/utils/search-terms';
export * from './shared/utils/verb-forms';
export * from './shared/types';
