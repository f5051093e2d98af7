import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { SearchSession, type SearchSource } from './search-session';
import { makeVerb } from '../../database/test-utils';
import type { Result, SearchStateListener, VerbRecord } from '../../shared/types';

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const went = makeVerb({ id: 'go', base: 'go', past: 'went', participle: 'gone' });
const gone = makeVerb({ id: 'wend', base: 'wend', past: 'wended', participle: 'gone' });

describe('SearchSession', () => {
  let search: Mock<(query: string) => Promise<Result<VerbRecord[]>>>;
  let session: SearchSession;

  beforeEach(() => {
    vi.useFakeTimers();
    search = vi.fn<(query: string) => Promise<Result<VerbRecord[]>>>();
    const source: SearchSource = { search };
    session = new SearchSession(source, 300);
  });

  afterEach(() => {
    session.dispose();
    vi.useRealTimers();
  });

  it('debounces typing into one search', async () => {
    search.mockResolvedValue({ success: true, data: [went] });

    session.setQuery('g');
    await vi.advanceTimersByTimeAsync(100);
    session.setQuery('go');
    await vi.advanceTimersByTimeAsync(300);
    await session.settled();

    expect(search).toHaveBeenCalledTimes(1);
    expect(search).toHaveBeenCalledWith('go');
    expect(session.getState()).toEqual({ query: 'go', results: [went], loading: false, error: null });
  });

  it('discards a response that arrives after a newer one', async () => {
    const first = deferred<Result<VerbRecord[]>>();
    const second = deferred<Result<VerbRecord[]>>();
    search.mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);

    session.setQuery('go');
    await vi.advanceTimersByTimeAsync(300);
    session.setQuery('gon');
    await vi.advanceTimersByTimeAsync(300);

    second.resolve({ success: true, data: [gone] });
    await session.settled();
    first.resolve({ success: true, data: [went] });
    await vi.advanceTimersByTimeAsync(0);

    expect(session.getState()).toEqual({ query: 'gon', results: [gone], loading: false, error: null });
  });

  it('clears results at once for a blank query', async () => {
    const pending = deferred<Result<VerbRecord[]>>();
    search.mockReturnValueOnce(pending.promise);

    session.setQuery('go');
    await vi.advanceTimersByTimeAsync(300);
    expect(session.getState().loading).toBe(true);

    session.setQuery('  ');
    expect(session.getState()).toEqual({ query: '  ', results: [], loading: false, error: null });

    pending.resolve({ success: true, data: [went] });
    await vi.advanceTimersByTimeAsync(0);

    expect(session.getState().results).toEqual([]);
    expect(search).toHaveBeenCalledTimes(1);
  });

  it('keeps the failure of the latest search', async () => {
    const error = { kind: 'storage', message: 'Failed to search verbs', severity: 'medium' } as const;
    search.mockResolvedValue({ success: false, error });

    await session.submit('go');

    expect(session.getState()).toEqual({ query: 'go', results: [], loading: false, error });
  });

  it('notifies subscribers until they unsubscribe', async () => {
    search.mockResolvedValue({ success: true, data: [went] });
    const listener = vi.fn<SearchStateListener>();
    const unsubscribe = session.subscribe(listener);

    await session.submit('go');
    expect(listener.mock.calls.map(([state]) => state.loading)).toEqual([false, true, false]);

    unsubscribe();
    await session.submit('gone');
    expect(listener).toHaveBeenCalledTimes(3);
  });

  it('drops a pending search on dispose', async () => {
    session.setQuery('go');
    session.dispose();
    await vi.advanceTimersByTimeAsync(300);

    expect(search).not.toHaveBeenCalled();
  });
});
