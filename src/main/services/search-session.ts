import type { Result, SearchState, SearchStateListener, VerbRecord } from '../../shared/types';
import { SEARCH_SETTINGS } from '../../shared/constants';

export interface SearchSource {
  search(query: string): Promise<Result<VerbRecord[]>>;
}

const INITIAL_STATE: SearchState = {
  query: '',
  results: [],
  loading: false,
  error: null,
};

/**
 * Search-as-you-type controller.
 *
 * Queries are debounced; every issued search takes a sequence number and
 * its response is applied only while that number is still the latest, so
 * a slow earlier search can never overwrite a later one.
 */
export class SearchSession {
  private state: SearchState = INITIAL_STATE;
  private readonly listeners = new Set<SearchStateListener>();
  private timer: NodeJS.Timeout | null = null;
  private sequence = 0;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly source: SearchSource,
    private readonly debounceMs: number = SEARCH_SETTINGS.DEBOUNCE_MS
  ) {}

  getState(): SearchState {
    return this.state;
  }

  subscribe(listener: SearchStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setQuery(query: string): void {
    this.cancelPending();

    if (!query.trim()) {
      // Invalidate anything still in flight
      this.sequence++;
      this.update({ query, results: [], loading: false, error: null });
      return;
    }

    this.update({ query });
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.execute(query);
    }, this.debounceMs);
  }

  /**
   * Search immediately, skipping the debounce.
   */
  async submit(query: string): Promise<void> {
    this.cancelPending();
    this.update({ query });
    await this.execute(query);
  }

  /**
   * Resolves once the search started by the last debounce has settled.
   */
  async settled(): Promise<void> {
    await this.inFlight;
  }

  dispose(): void {
    this.cancelPending();
    this.sequence++;
    this.listeners.clear();
  }

  private async execute(query: string): Promise<void> {
    const requestId = ++this.sequence;
    this.update({ loading: true });

    const result = await this.source.search(query);
    if (requestId !== this.sequence) {
      return; // superseded
    }

    if (result.success) {
      this.update({ results: result.data, loading: false, error: null });
    } else {
      this.update({ loading: false, error: result.error });
    }
  }

  private cancelPending(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private update(patch: Partial<SearchState>): void {
    this.state = { ...this.state, ...patch };
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}
