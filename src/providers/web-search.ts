/**
 * Web search over the Serper Google Search API.
 */

import { z } from "zod";

import type { SearchResult } from "../types/index.js";
import type { SearchOptions, SearchProvider } from "./search.js";
import { ProviderError, errorMessage } from "./errors.js";

export const SERPER_ENDPOINT = "https://google.serper.dev/search";

const PROVIDER = "serper";

/**
 * The subset of the Serper response this provider reads. Unknown fields
 * (knowledge graph, related searches, ...) are ignored.
 */
const SerperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string(),
        link: z.string().url(),
        snippet: z.string().default(""),
        date: z.string().optional(),
      })
    )
    .default([]),
});

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface WebSearchOptions {
  apiKey: string;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
  endpoint?: string;
}

export class WebSearchProvider implements SearchProvider {
  readonly source = "web" as const;
  private readonly apiKey: string;
  private readonly fetchFn: FetchFn;
  private readonly endpoint: string;

  constructor(options: WebSearchOptions) {
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.endpoint = options.endpoint ?? SERPER_ENDPOINT;
  }

  async search(
    query: string,
    maxResults: number,
    options: SearchOptions = {}
  ): Promise<SearchResult[]> {
    let res: Response;
    try {
      res = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers: {
          "X-API-KEY": this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ q: query, num: maxResults }),
        signal: options.signal,
      });
    } catch (err) {
      throw new ProviderError(`${PROVIDER}: ${errorMessage(err)}`, {
        provider: PROVIDER,
        cause: err,
      });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new ProviderError(
        `${PROVIDER}: HTTP ${res.status}${body ? `: ${body.slice(0, 200)}` : ""}`,
        { provider: PROVIDER, status: res.status }
      );
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new ProviderError(`${PROVIDER}: response is not JSON (${errorMessage(err)})`, {
        provider: PROVIDER,
        status: res.status,
        cause: err,
      });
    }

    const parsed = SerperResponseSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "invalid";
      throw new ProviderError(`${PROVIDER}: malformed response (${where})`, {
        provider: PROVIDER,
        status: res.status,
      });
    }

    return parsed.data.organic.slice(0, maxResults).map((item) => ({
      title: item.title,
      url: item.link,
      snippet: item.snippet,
      ...(item.date ? { publishedDate: item.date } : {}),
    }));
  }
}
