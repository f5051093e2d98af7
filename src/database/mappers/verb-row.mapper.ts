import type { z } from 'zod';
import type { ContextualUsage, Meaning, VerbRecord, VerbRow } from '../../shared/types';
import {
  LegacyContextualUsageSchema,
  LegacyExamplesSchema,
  MeaningListSchema,
} from '../../shared/schemas/verb.schemas';
import { MIGRATED_PART_OF_SPEECH } from '../../shared/constants';
import { generateSearchTerms } from '../../shared/utils/search-terms';

/**
 * Parse a JSON column and validate it. Malformed or mismatching data is
 * treated as absent (null) so that one corrupt row never fails a query.
 */
function parseJsonColumn<S extends z.ZodTypeAny>(value: string | null, schema: S): z.output<S> | null {
  if (!value) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    return null;
  }

  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Build the single meaning of a row written before the meanings column
 * existed.
 *
 * Examples are shared out evenly across the contexts in stored order
 * (floor(examples / contexts) each). Examples whose text was not given to
 * any context stay on the meaning itself, so a repeat of an assigned
 * example is dropped. Without contexts every example stays on the meaning.
 */
export function buildLegacyMeaning(
  definition: string,
  contextualUsage: Record<string, string> | null,
  examples: string[] | null
): Meaning {
  const pool = examples ?? [];
  const contexts = Object.entries(contextualUsage ?? {});

  if (contexts.length === 0) {
    return {
      definition,
      partOfSpeech: MIGRATED_PART_OF_SPEECH,
      examples: [...pool],
      contextualUsages: [],
    };
  }

  const examplesPerContext = Math.floor(pool.length / contexts.length);
  const assignedExamples = new Set<string>();
  let next = 0;

  const contextualUsages: ContextualUsage[] = contexts.map(([context, description]) => {
    const assigned = pool.slice(next, next + examplesPerContext);
    next += assigned.length;
    assigned.forEach((example) => assignedExamples.add(example));
    return { context, description, examples: assigned };
  });

  return {
    definition,
    partOfSpeech: MIGRATED_PART_OF_SPEECH,
    examples: pool.filter((example) => !assignedExamples.has(example)),
    contextualUsages,
  };
}

/**
 * Decode the meanings of a row, whichever schema version wrote it.
 *
 * - current layout: `meanings` parses to a non-empty list, used as-is
 * - legacy layout: one meaning rebuilt from meaning/contextual_usage/examples
 */
export function decodeMeanings(row: Pick<VerbRow, 'meaning' | 'contextual_usage' | 'examples' | 'meanings'>): {
  meanings: Meaning[];
  fromLegacy: boolean;
} {
  const current = parseJsonColumn(row.meanings, MeaningListSchema);
  if (current && current.length > 0) {
    return { meanings: current, fromLegacy: false };
  }

  const legacy = buildLegacyMeaning(
    row.meaning,
    parseJsonColumn(row.contextual_usage, LegacyContextualUsageSchema),
    parseJsonColumn(row.examples, LegacyExamplesSchema)
  );
  return { meanings: [legacy], fromLegacy: true };
}

export function decodeVerbRow(row: VerbRow): VerbRecord {
  const record: VerbRecord = {
    id: row.id,
    base: row.base,
    past: row.past,
    participle: row.participle,
    pastUK: row.past_uk ?? '',
    pastUS: row.past_us ?? '',
    participleUK: row.participle_uk ?? '',
    participleUS: row.participle_us ?? '',
    meanings: decodeMeanings(row).meanings,
  };

  if (row.pronunciation_text_us !== null) record.pronunciationTextUS = row.pronunciation_text_us;
  if (row.pronunciation_text_uk !== null) record.pronunciationTextUK = row.pronunciation_text_uk;

  return record;
}

/**
 * Encode a record for storage. Legacy columns are filled from the first
 * meaning so that an older reader still sees sensible data; search_terms
 * is always regenerated.
 */
export function encodeVerbRecord(record: VerbRecord): VerbRow {
  const first = record.meanings[0];

  let legacyContextualUsage: string | null = null;
  let legacyExamples: string | null = null;

  if (first) {
    if (first.contextualUsages.length > 0) {
      legacyContextualUsage = JSON.stringify(
        Object.fromEntries(first.contextualUsages.map((usage) => [usage.context, usage.description]))
      );
    }

    const allExamples = [
      ...first.examples,
      ...first.contextualUsages.flatMap((usage) => usage.examples),
    ];
    if (allExamples.length > 0) {
      legacyExamples = JSON.stringify(allExamples);
    }
  }

  return {
    id: record.id,
    base: record.base,
    past: record.past,
    participle: record.participle,
    past_uk: record.pastUK,
    past_us: record.pastUS,
    participle_uk: record.participleUK,
    participle_us: record.participleUS,
    meaning: first?.definition ?? '',
    pronunciation_text_us: record.pronunciationTextUS ?? null,
    pronunciation_text_uk: record.pronunciationTextUK ?? null,
    contextual_usage: legacyContextualUsage,
    examples: legacyExamples,
    meanings: JSON.stringify(record.meanings.map(toStoredMeaning)),
    search_terms: generateSearchTerms(record),
  };
}

/**
 * Bring a row of either layout to the current one. Idempotent.
 */
export function upgradeVerbRow(row: VerbRow): VerbRow {
  return encodeVerbRecord(decodeVerbRow(row));
}

// Fixed key order keeps the stored JSON stable across rewrites
function toStoredMeaning(meaning: Meaning) {
  return {
    definition: meaning.definition,
    partOfSpeech: meaning.partOfSpeech,
    register: meaning.register ?? null,
    examples: meaning.examples,
    contextualUsages: meaning.contextualUsages.map((usage) => ({
      context: usage.context,
      description: usage.description,
      examples: usage.examples,
    })),
  };
}
