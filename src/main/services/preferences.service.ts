import { z } from 'zod';
import type { SettingsRepository } from '../../database/repositories';
import type { PreferencesUpdate, Result, UserPreferences } from '../../shared/types';
import { DB_SETTINGS, DEFAULT_PREFERENCES } from '../../shared/constants';
import { isDialectCode } from '../../shared/utils/verb-forms';
import { Failure, errorMessage, fail, ok } from '../utils/failures';

// Unknown or missing fields fall back to the defaults
const StoredPreferencesSchema = z.object({
  dialect: z.enum(['en-US', 'en-UK']).catch(DEFAULT_PREFERENCES.dialect),
  isDarkMode: z.boolean().catch(DEFAULT_PREFERENCES.isDarkMode),
  isPremium: z.boolean().catch(DEFAULT_PREFERENCES.isPremium),
});

/**
 * User preferences persisted as a single JSON blob in the settings table.
 */
export class PreferencesService {
  private readonly key = DB_SETTINGS.PREFERENCES_KEY;

  constructor(private readonly settings: SettingsRepository) {}

  /**
   * Stored preferences, or the defaults when absent or unreadable.
   */
  async get(): Promise<UserPreferences> {
    try {
      const stored = await this.settings.get(this.key);
      if (stored === null) {
        return { ...DEFAULT_PREFERENCES };
      }
      return StoredPreferencesSchema.parse(JSON.parse(stored));
    } catch (error) {
      new Failure('preferences', 'Failed to retrieve preferences', {
        details: errorMessage(error),
        cause: error,
      }).log();
      return { ...DEFAULT_PREFERENCES };
    }
  }

  async save(preferences: UserPreferences): Promise<Result<UserPreferences>> {
    try {
      await this.settings.set(this.key, JSON.stringify(preferences));
      return ok(preferences);
    } catch (error) {
      const failure = new Failure('preferences', 'Failed to save preferences', {
        details: errorMessage(error),
        cause: error,
      });
      failure.log();
      return fail(failure);
    }
  }

  async update(patch: PreferencesUpdate): Promise<Result<UserPreferences>> {
    const current = await this.get();
    return this.save({ ...current, ...patch });
  }

  async setDialect(code: string): Promise<Result<UserPreferences>> {
    if (!isDialectCode(code)) {
      return fail(new Failure('validation', `Invalid dialect "${code}". Must be en-US or en-UK`));
    }
    return this.update({ dialect: code });
  }

  async setDarkMode(isDarkMode: boolean): Promise<Result<UserPreferences>> {
    return this.update({ isDarkMode });
  }

  async setPremium(isPremium: boolean): Promise<Result<UserPreferences>> {
    return this.update({ isPremium });
  }

  /**
   * Back to defaults, keeping the premium status.
   */
  async reset(): Promise<Result<UserPreferences>> {
    const { isPremium } = await this.get();
    return this.save({ ...DEFAULT_PREFERENCES, isPremium });
  }
}
