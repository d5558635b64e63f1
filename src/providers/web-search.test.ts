/**
 * Web search provider tests.
 *
 * Run: node --import tsx --test src/providers/web-search.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { WebSearchProvider, SERPER_ENDPOINT, type FetchFn } from "./web-search.js";
import { ProviderError } from "./errors.js";

interface Recorded {
  url: string;
  init: RequestInit;
}

function fakeFetch(status: number, body: string, calls: Recorded[] = []): FetchFn {
  return async (url, init) => {
    calls.push({ url, init });
    return new Response(body, { status, headers: { "Content-Type": "application/json" } });
  };
}

test("search: posts the query with the API key", async () => {
  const calls: Recorded[] = [];
  const provider = new WebSearchProvider({
    apiKey: "test-secret",
    fetch: fakeFetch(200, JSON.stringify({ organic: [] }), calls),
  });

  await provider.search("private credit 2025", 10);

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, SERPER_ENDPOINT);
  assert.equal(calls[0].init.method, "POST");
  assert.deepEqual(calls[0].init.headers, {
    "X-API-KEY": "test-secret",
    "Content-Type": "application/json",
  });
  assert.equal(calls[0].init.body, '{"q":"private credit 2025","num":10}');
});

test("search: maps organic results", async () => {
  const body = JSON.stringify({
    searchParameters: { q: "x" },
    organic: [
      {
        title: "Fed data release",
        link: "https://www.federalreserve.gov/releases/z1/",
        snippet: "Financial accounts of the United States.",
        date: "Jun 12, 2025",
        position: 1,
      },
      { title: "No snippet", link: "https://example.com/a" },
    ],
  });
  const provider = new WebSearchProvider({ apiKey: "test-secret", fetch: fakeFetch(200, body) });

  const results = await provider.search("x", 10);
  assert.deepEqual(results, [
    {
      title: "Fed data release",
      url: "https://www.federalreserve.gov/releases/z1/",
      snippet: "Financial accounts of the United States.",
      publishedDate: "Jun 12, 2025",
    },
    { title: "No snippet", url: "https://example.com/a", snippet: "" },
  ]);
});

test("search: a response without organic results is empty", async () => {
  const provider = new WebSearchProvider({ apiKey: "test-secret", fetch: fakeFetch(200, "{}") });
  assert.deepEqual(await provider.search("x", 5), []);
});

test("search: non-2xx status is a ProviderError with status", async () => {
  const provider = new WebSearchProvider({
    apiKey: "test-secret",
    fetch: fakeFetch(403, "Unauthorized"),
  });

  await assert.rejects(provider.search("x", 5), (err) => {
    assert.ok(err instanceof ProviderError);
    assert.equal(err.status, 403);
    assert.equal(err.message, "serper: HTTP 403: Unauthorized");
    return true;
  });
});

test("search: malformed body is a ProviderError", async () => {
  const provider = new WebSearchProvider({
    apiKey: "test-secret",
    fetch: fakeFetch(200, JSON.stringify({ organic: [{ title: "t", link: "not a url" }] })),
  });

  await assert.rejects(provider.search("x", 5), (err) => {
    assert.ok(err instanceof ProviderError);
    assert.equal(err.message, "serper: malformed response (organic.0.link: Invalid url)");
    return true;
  });
});
