/**
 * Search provider boundary.
 *
 * `search(query, maxResults)` returns ranked passages. An empty index or
 * a query with no hits yields an empty list; failures are ProviderError.
 */

import type { SearchSource } from "../config/pipeline/index.js";
import type { SearchResult } from "../types/index.js";

export interface SearchOptions {
  signal?: AbortSignal;
}

export interface SearchProvider {
  /** Which retrieval source this provider serves */
  readonly source: SearchSource;
  search(query: string, maxResults: number, options?: SearchOptions): Promise<SearchResult[]>;
}

/** Search providers available to a run, keyed by source. */
export type SearchProviders = Readonly<Partial<Record<SearchSource, SearchProvider>>>;
