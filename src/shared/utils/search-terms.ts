import type { VerbRecord } from '../types/verb.types';

type SearchTermSource = Pick<
  VerbRecord,
  'base' | 'past' | 'participle' | 'pastUK' | 'pastUS' | 'participleUK' | 'participleUS' | 'meanings'
>;

const MIN_DEFINITION_WORD_LENGTH = 3;

/**
 * Build the denormalized search-terms string for a verb.
 *
 * The value is only ever substring-matched with LIKE, so term order carries
 * no meaning. It must be regenerated on every write of the record.
 */
export function generateSearchTerms(verb: SearchTermSource): string {
  const terms = new Set<string>();

  const forms = [
    verb.base,
    verb.past,
    verb.participle,
    verb.pastUK,
    verb.pastUS,
    verb.participleUK,
    verb.participleUS,
  ];
  for (const form of forms) {
    if (form) terms.add(form.toLowerCase());
  }

  for (const meaning of verb.meanings) {
    for (const word of meaning.definition.toLowerCase().split(/\s+/)) {
      if (word.length >= MIN_DEFINITION_WORD_LENGTH) terms.add(word);
    }
    for (const usage of meaning.contextualUsages) {
      terms.add(usage.context.toLowerCase());
    }
  }

  return [...terms].join(' ');
}
