import type { DatabaseConnection } from '../index';
import type { VerbRecord, VerbRow } from '../../shared/types';
import { SEARCH_SETTINGS } from '../../shared/constants';
import { escapeLikePattern } from '../../shared/utils/text-utils';
import { decodeMeanings, decodeVerbRow, encodeVerbRecord, upgradeVerbRow } from '../mappers/verb-row.mapper';

/**
 * Storage primitives the verb service depends on.
 */
export interface VerbStore {
  insert(record: VerbRecord): Promise<void>;
  insertMany(records: VerbRecord[]): Promise<void>;
  getById(id: string): Promise<VerbRecord | null>;
  findExactByBase(normalizedQuery: string): Promise<VerbRecord[]>;
  findPartial(normalizedQuery: string, limit?: number): Promise<VerbRecord[]>;
  count(): Promise<number>;
  optimize(): Promise<void>;
  backfillMeanings(): Promise<number>;
}

const INSERT_OR_REPLACE = `
  INSERT OR REPLACE INTO verbs (
    id, base, past, participle, past_uk, past_us, participle_uk, participle_us,
    meaning, pronunciation_text_us, pronunciation_text_uk, contextual_usage,
    examples, meanings, search_terms
  ) VALUES (
    @id, @base, @past, @participle, @past_uk, @past_us, @participle_uk, @participle_us,
    @meaning, @pronunciation_text_us, @pronunciation_text_uk, @contextual_usage,
    @examples, @meanings, @search_terms
  )
`;

// SQLite reads a negative LIMIT as "no limit"
function clampPartialLimit(limit: number): number {
  const max = SEARCH_SETTINGS.MAX_PARTIAL_RESULTS;
  if (!Number.isFinite(limit)) return max;
  return Math.max(0, Math.min(Math.trunc(limit), max));
}

export class VerbRepository implements VerbStore {
  constructor(private readonly connection: DatabaseConnection) {}

  private get db() {
    return this.connection.get();
  }

  async insert(record: VerbRecord): Promise<void> {
    this.db.prepare(INSERT_OR_REPLACE).run(encodeVerbRecord(record));
  }

  async insertMany(records: VerbRecord[]): Promise<void> {
    const statement = this.db.prepare(INSERT_OR_REPLACE);
    this.db.transaction((rows: VerbRow[]) => {
      for (const row of rows) {
        statement.run(row);
      }
    })(records.map(encodeVerbRecord));
  }

  async getById(id: string): Promise<VerbRecord | null> {
    const row = this.db.prepare(`
      SELECT * FROM verbs WHERE id = ?
    `).get(id) as VerbRow | undefined;

    return row ? decodeVerbRow(row) : null;
  }

  async findExactByBase(normalizedQuery: string): Promise<VerbRecord[]> {
    const rows = this.db.prepare(`
      SELECT * FROM verbs
      WHERE LOWER(base) = ?
    `).all(normalizedQuery) as VerbRow[];

    return rows.map(decodeVerbRow);
  }

  /**
   * Substring match on search_terms, excluding exact base matches.
   * Ranked base prefix > past prefix > participle prefix > anything else,
   * then alphabetically by base.
   */
  async findPartial(
    normalizedQuery: string,
    limit: number = SEARCH_SETTINGS.MAX_PARTIAL_RESULTS
  ): Promise<VerbRecord[]> {
    const escaped = escapeLikePattern(normalizedQuery);
    const contains = `%${escaped}%`;
    const prefix = `${escaped}%`;

    const rows = this.db.prepare(`
      SELECT * FROM verbs
      WHERE search_terms LIKE @contains ESCAPE '\\'
        AND LOWER(base) != @query
      ORDER BY
        CASE
          WHEN LOWER(base) LIKE @prefix ESCAPE '\\' THEN 1
          WHEN LOWER(past) LIKE @prefix ESCAPE '\\' THEN 2
          WHEN LOWER(participle) LIKE @prefix ESCAPE '\\' THEN 3
          ELSE 4
        END,
        base ASC
      LIMIT @limit
    `).all({
      contains,
      prefix,
      query: normalizedQuery,
      limit: clampPartialLimit(limit),
    }) as VerbRow[];

    return rows.map(decodeVerbRow);
  }

  async count(): Promise<number> {
    const row = this.db.prepare(`
      SELECT COUNT(*) as count FROM verbs
    `).get() as { count: number };

    return row.count;
  }

  async optimize(): Promise<void> {
    this.db.exec('VACUUM');
    this.db.exec('ANALYZE');
  }

  /**
   * Rewrite rows that still only carry the legacy single-meaning columns.
   * Returns the number of rows rewritten.
   */
  async backfillMeanings(): Promise<number> {
    const rows = this.db.prepare(`
      SELECT * FROM verbs
    `).all() as VerbRow[];

    const legacyRows = rows.filter((row) => decodeMeanings(row).fromLegacy);
    if (legacyRows.length === 0) {
      return 0;
    }

    const statement = this.db.prepare(INSERT_OR_REPLACE);
    this.db.transaction((pending: VerbRow[]) => {
      for (const row of pending) {
        statement.run(upgradeVerbRow(row));
      }
    })(legacyRows);

    return legacyRows.length;
  }
}
