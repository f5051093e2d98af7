import type { DialectCode } from './verb.types';

export interface UserPreferences {
  dialect: DialectCode;
  isDarkMode: boolean;
  isPremium: boolean;
}

export type PreferencesUpdate = Partial<UserPreferences>;
