/**
 * Knowledge-base search over an OpenAI vector store.
 *
 * Files are expected to carry `url`, `title` and `date` attributes set at
 * ingestion time; files without a `url` attribute are cited by filename.
 */

import OpenAI, { APIError } from "openai";

import type { SearchResult } from "../types/index.js";
import type { SearchOptions, SearchProvider } from "./search.js";
import { ProviderError, errorMessage } from "./errors.js";

/** The fields of a vector store hit this provider reads. */
export interface VectorStoreHit {
  filename: string;
  score: number;
  attributes?: Record<string, string | number | boolean> | null;
  content: Array<{ text: string }>;
}

export type SearchVectorStoreFn = (
  vectorStoreId: string,
  params: { query: string; max_num_results: number },
  options: { signal?: AbortSignal }
) => Promise<{ data: VectorStoreHit[] }>;

/** Passage snippets are cut to this many characters. */
const SNIPPET_LIMIT = 1200;

const PROVIDER = "openai-vector-store";

function stringAttribute(hit: VectorStoreHit, key: string): string | undefined {
  const value = hit.attributes?.[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Convert a vector store hit to a search result.
 */
export function hitToSearchResult(hit: VectorStoreHit): SearchResult {
  const text = hit.content.map((c) => c.text).join("\n").replace(/\s+/g, " ").trim();
  const snippet = text.length > SNIPPET_LIMIT ? `${text.slice(0, SNIPPET_LIMIT)}…` : text;
  const publishedDate = stringAttribute(hit, "date");

  return {
    title: stringAttribute(hit, "title") ?? hit.filename,
    url: stringAttribute(hit, "url") ?? `kb://${hit.filename}`,
    snippet,
    ...(publishedDate ? { publishedDate } : {}),
  };
}

export class VectorStoreSearchProvider implements SearchProvider {
  readonly source = "knowledge_base" as const;

  constructor(
    private readonly vectorStoreId: string,
    private readonly searchVectorStore: SearchVectorStoreFn
  ) {}

  static fromClient(client: OpenAI, vectorStoreId: string): VectorStoreSearchProvider {
    return new VectorStoreSearchProvider(vectorStoreId, (id, params, options) =>
      client.vectorStores.search(id, params, options)
    );
  }

  async search(
    query: string,
    maxResults: number,
    options: SearchOptions = {}
  ): Promise<SearchResult[]> {
    let page: { data: VectorStoreHit[] };
    try {
      page = await this.searchVectorStore(
        this.vectorStoreId,
        { query, max_num_results: maxResults },
        { signal: options.signal }
      );
    } catch (err) {
      throw new ProviderError(`${PROVIDER}: ${errorMessage(err)}`, {
        provider: PROVIDER,
        status: err instanceof APIError ? err.status : undefined,
        cause: err,
      });
    }

    return [...page.data]
      .sort((a, b) => b.score - a.score)
      .slice(0, maxResults)
      .map(hitToSearchResult);
  }
}
