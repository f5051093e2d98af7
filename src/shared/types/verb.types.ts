// Dialect codes used by forms, preferences and speech
export type DialectCode = 'en-US' | 'en-UK';

// Verb form selector for pronunciation and lookups
export type VerbTense = 'base' | 'past' | 'participle';

// A named sub-category of a meaning (e.g. "movement")
export interface ContextualUsage {
  context: string;
  description: string;
  examples: string[];
}

// One distinct sense of a verb
export interface Meaning {
  definition: string;
  partOfSpeech: string;
  register?: string;
  examples: string[];
  contextualUsages: ContextualUsage[];
}

// Verb as seen by services and the presentation layer
export interface VerbRecord {
  id: string;
  base: string;
  past: string;
  participle: string;
  pastUK: string;       // '' = use past
  pastUS: string;       // '' = use past
  participleUK: string; // '' = use participle
  participleUS: string; // '' = use participle
  pronunciationTextUS?: string;
  pronunciationTextUK?: string;
  meanings: Meaning[];
}

// Raw row of the verbs table, both schema generations
export interface VerbRow {
  id: string;
  base: string;
  past: string;
  participle: string;
  past_uk: string | null;
  past_us: string | null;
  participle_uk: string | null;
  participle_us: string | null;
  meaning: string;
  pronunciation_text_us: string | null;
  pronunciation_text_uk: string | null;
  contextual_usage: string | null;  // legacy JSON object: context -> description
  examples: string | null;          // legacy JSON array of strings
  meanings: string | null;          // JSON array of Meaning
  search_terms: string | null;
}
