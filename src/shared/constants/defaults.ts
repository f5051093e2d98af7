import type { UserPreferences } from '../types/preferences.types';

// Default user preferences
export const DEFAULT_PREFERENCES: UserPreferences = {
  dialect: 'en-US',
  isDarkMode: false,
  isPremium: false,
};

// Search behaviour
export const SEARCH_SETTINGS = {
  MAX_PARTIAL_RESULTS: 50,
  DEBOUNCE_MS: 300,
} as const;

// Database settings
export const DB_SETTINGS = {
  FILE_NAME: 'irregular-verbs.db',
  DATA_DIR: '.irregular-verbs',
  PREFERENCES_KEY: 'user_preferences',
  STORAGE_TIMEOUT_MS: 5000,
  BUSY_TIMEOUT_MS: 2000,
} as const;

// Legacy rows carry no part of speech
export const MIGRATED_PART_OF_SPEECH = 'verb';

// Speech settings
export const TTS_SETTINGS = {
  TIMEOUT_MS: 15000,
} as const;
