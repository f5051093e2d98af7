/**
 * Pronunciation Service.
 * Resolves the dialect-specific spelling of a verb form and hands it to a
 * speech engine.
 */
import type { VerbService } from './verb.service';
import type { Result, SpeechEngine } from '../../shared/types';
import { dialectLocale, getForm, isDialectCode, isVerbTense } from '../../shared/utils/verb-forms';
import { Failure, errorMessage, fail, ok } from '../utils/failures';

export class PronunciationService {
  constructor(
    private readonly verbs: Pick<VerbService, 'getById'>,
    private readonly engine: SpeechEngine
  ) {}

  /**
   * Speak one form of a verb. Returns the text that was spoken.
   */
  async speak(verbId: string, tense: string, dialect: string): Promise<Result<string>> {
    if (!verbId.trim()) {
      return this.failure('Verb ID cannot be empty');
    }
    if (!isVerbTense(tense)) {
      return this.failure(`Invalid tense "${tense}". Must be base, past or participle`);
    }
    if (!isDialectCode(dialect)) {
      return this.failure(`Invalid dialect "${dialect}". Must be en-US or en-UK`);
    }

    const lookup = await this.verbs.getById(verbId);
    if (!lookup.success) {
      return this.failure('Failed to play pronunciation', lookup.error.message);
    }
    if (!lookup.data) {
      return this.failure(`Verb not found: ${verbId}`);
    }

    const text = getForm(lookup.data, tense, dialect);
    const response = await this.engine.speak({ text, language: dialectLocale(dialect) });
    if (!response.success) {
      return this.failure('Failed to play pronunciation', response.error);
    }

    return ok(text);
  }

  async stop(): Promise<Result<void>> {
    try {
      await this.engine.stop();
      return ok(undefined);
    } catch (error) {
      return this.failure('Failed to stop pronunciation', errorMessage(error));
    }
  }

  private failure<T>(message: string, details?: string): Result<T> {
    const failure = new Failure('tts', message, { details });
    failure.log();
    return fail(failure);
  }
}
