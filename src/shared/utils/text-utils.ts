/**
 * Text utilities for query normalization and Unicode-aware word matching.
 */

/**
 * Normalize a raw search query: trim, lowercase.
 * Returns '' for whitespace-only input.
 */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}

/**
 * Escape LIKE wildcards so user input is matched literally.
 * Pair with `ESCAPE '\'` in the SQL.
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

// Unicode-aware word boundary around an already regex-escaped word
function getWordBoundaryPattern(escapedWord: string): string {
  // (?<![\p{L}\p{N}]) - not preceded by a letter or number
  // (?![\p{L}\p{N}]) - not followed by a letter or number
  return `(?<![\\p{L}\\p{N}])${escapedWord}(?![\\p{L}\\p{N}])`;
}

/**
 * Create a Unicode-aware word boundary regex for matching whole words.
 *
 * JavaScript's \b word boundary only works with ASCII characters.
 *
 * @param word - The word to create a regex for
 * @param flags - Regex flags (default: 'gi' for global case-insensitive)
 */
export function createWordBoundaryRegex(word: string, flags = 'gi'): RegExp {
  const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = getWordBoundaryPattern(escaped);

  // Ensure 'u' flag is present for Unicode support
  const finalFlags = flags.includes('u') ? flags : flags + 'u';

  return new RegExp(pattern, finalFlags);
}
