import type Database from 'better-sqlite3';

export const migration001 = {
  version: 1,
  name: 'initial_schema',
  up: (db: Database.Database) => {
    // Verbs table (single-meaning layout; meanings column arrives in 002)
    db.exec(`
      CREATE TABLE IF NOT EXISTS verbs (
        id TEXT PRIMARY KEY,
        base TEXT NOT NULL,
        past TEXT NOT NULL,
        participle TEXT NOT NULL,
        past_uk TEXT,
        past_us TEXT,
        participle_uk TEXT,
        participle_us TEXT,
        meaning TEXT NOT NULL,
        pronunciation_text_us TEXT,
        pronunciation_text_uk TEXT,
        contextual_usage TEXT,
        examples TEXT,
        search_terms TEXT,
        UNIQUE(base, past, participle)
      )
    `);

    // Settings table (key/value, preferences live here as one JSON blob)
    db.exec(`
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    // Indexes for both search phases
    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_search_terms ON verbs(search_terms);
      CREATE INDEX IF NOT EXISTS idx_verb_forms ON verbs(base, past, participle);
    `);
  },
};
