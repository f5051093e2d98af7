/**
 * Verb Service.
 * Search, lookup and store initialization over a VerbStore. Every call
 * returns a Result; storage errors never escape as exceptions.
 */
import type { VerbStore } from '../../database/repositories';
import type { ErrorSeverity, Result, VerbRecord } from '../../shared/types';
import { DB_SETTINGS } from '../../shared/constants';
import { normalizeQuery } from '../../shared/utils/text-utils';
import { Failure, errorMessage, fail, ok } from '../utils/failures';
import { TimeoutError, withTimeout } from '../utils/timeout';
import { createLogger } from '../utils/logger';

export interface VerbServiceOptions {
  /**
   * Upper bound for a single storage call on an asynchronous VerbStore.
   * The SQLite repository answers synchronously, so its calls settle before
   * this timer can fire; lock waits there are bounded by the connection's
   * busy timeout, whose SQLITE_BUSY errors are reported as timeouts too.
   */
  timeoutMs?: number;
  /** Records written when the store is found empty */
  seed?: () => VerbRecord[];
}

const log = createLogger('VerbService');

function isBusyError(error: unknown): boolean {
  return error instanceof Error && 'code' in error &&
    (error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED');
}

export class VerbService {
  private readonly timeoutMs: number;
  private readonly seed: () => VerbRecord[];

  constructor(private readonly store: VerbStore, options: VerbServiceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DB_SETTINGS.STORAGE_TIMEOUT_MS;
    this.seed = options.seed ?? (() => []);
  }

  /**
   * Exact base-form matches first, then ranked partial matches.
   * An empty query returns [] without touching the store.
   */
  async search(query: string): Promise<Result<VerbRecord[]>> {
    const normalized = normalizeQuery(query);
    if (!normalized) {
      return ok([]);
    }

    return this.run('Failed to search verbs', 'medium', async () => {
      const exact = await this.store.findExactByBase(normalized);
      const partial = await this.store.findPartial(normalized);
      log.debug(`"${normalized}": ${exact.length} exact, ${partial.length} partial`);
      return [...exact, ...partial];
    });
  }

  /**
   * Lookup by id. A miss is `null`, not a failure.
   */
  async getById(id: string): Promise<Result<VerbRecord | null>> {
    if (!id.trim()) {
      return ok(null);
    }
    return this.run('Failed to get verb', 'medium', () => this.store.getById(id));
  }

  /**
   * Seed an empty store; otherwise bring legacy rows to the current layout.
   */
  async initializeStore(): Promise<Result<void>> {
    return this.run('Failed to initialize database', 'high', async () => {
      const count = await this.store.count();

      if (count === 0) {
        const verbs = this.seed();
        await this.store.insertMany(verbs);
        await this.store.optimize();
        log.info(`Seeded ${verbs.length} verbs`);
        return;
      }

      const upgraded = await this.store.backfillMeanings();
      if (upgraded > 0) {
        log.info(`Upgraded ${upgraded} legacy verb rows`);
      }
    });
  }

  async getCount(): Promise<Result<number>> {
    return this.run('Failed to get verb count', 'medium', () => this.store.count());
  }

  async optimize(): Promise<Result<void>> {
    return this.run('Failed to optimize database', 'low', () => this.store.optimize());
  }

  private async run<T>(
    message: string,
    severity: ErrorSeverity,
    operation: () => Promise<T>
  ): Promise<Result<T>> {
    try {
      return ok(await withTimeout(operation(), this.timeoutMs, message));
    } catch (error) {
      const timedOut = error instanceof TimeoutError || isBusyError(error);
      const failure = new Failure(timedOut ? 'timeout' : 'storage', message, {
        details: errorMessage(error),
        severity,
        cause: error,
      });
      failure.log();
      return fail(failure);
    }
  }
}
