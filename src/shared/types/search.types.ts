import type { FailureLike } from './failure.types';
import type { VerbRecord } from './verb.types';

// Search session state exposed to the presentation layer
export interface SearchState {
  query: string;
  results: VerbRecord[];
  loading: boolean;
  error: FailureLike | null;
}

export type SearchStateListener = (state: SearchState) => void;
