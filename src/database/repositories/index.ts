export { VerbRepository, type VerbStore } from './verb.repository';
export { SettingsRepository } from './settings.repository';
