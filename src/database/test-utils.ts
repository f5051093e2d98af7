/**
 * Test utilities: in-memory SQLite connections and verb fixtures.
 */
import { DatabaseConnection } from './index';
import type { Meaning, VerbRecord, VerbRow } from '../shared/types';

export function createTestConnection(): DatabaseConnection {
  return new DatabaseConnection({ filePath: ':memory:', busyTimeoutMs: 100 });
}

export function makeMeaning(overrides: Partial<Meaning> = {}): Meaning {
  return {
    definition: 'to do something',
    partOfSpeech: 'verb',
    examples: [],
    contextualUsages: [],
    ...overrides,
  };
}

export function makeVerb(overrides: Partial<VerbRecord> & Pick<VerbRecord, 'id' | 'base'>): VerbRecord {
  return {
    past: `${overrides.base}ed`,
    participle: `${overrides.base}ed`,
    pastUK: '',
    pastUS: '',
    participleUK: '',
    participleUS: '',
    meanings: [makeMeaning()],
    ...overrides,
  };
}

/**
 * A row as written before the meanings column existed.
 */
export function makeLegacyRow(overrides: Partial<VerbRow> & Pick<VerbRow, 'id' | 'base'>): VerbRow {
  return {
    past: `${overrides.base}ed`,
    participle: `${overrides.base}ed`,
    past_uk: null,
    past_us: null,
    participle_uk: null,
    participle_us: null,
    meaning: 'legacy meaning',
    pronunciation_text_us: null,
    pronunciation_text_uk: null,
    contextual_usage: null,
    examples: null,
    meanings: null,
    search_terms: overrides.base,
    ...overrides,
  };
}

export function insertRawRow(connection: DatabaseConnection, row: VerbRow): void {
  connection.get().prepare(`
    INSERT INTO verbs (
      id, base, past, participle, past_uk, past_us, participle_uk, participle_us,
      meaning, pronunciation_text_us, pronunciation_text_uk, contextual_usage,
      examples, meanings, search_terms
    ) VALUES (
      @id, @base, @past, @participle, @past_uk, @past_us, @participle_uk, @participle_us,
      @meaning, @pronunciation_text_us, @pronunciation_text_uk, @contextual_usage,
      @examples, @meanings, @search_terms
    )
  `).run(row);
}
