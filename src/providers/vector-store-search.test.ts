/**
 * Vector store search provider tests.
 *
 * Run: node --import tsx --test src/providers/vector-store-search.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  VectorStoreSearchProvider,
  hitToSearchResult,
  type VectorStoreHit,
} from "./vector-store-search.js";
import { ProviderError } from "./errors.js";

function hit(overrides: Partial<VectorStoreHit> = {}): VectorStoreHit {
  return {
    filename: "allocations-2025.pdf",
    score: 0.5,
    attributes: {},
    content: [{ text: "Pension plans raised private credit targets." }],
    ...overrides,
  };
}

test("hitToSearchResult: uses attributes when present", () => {
  const result = hitToSearchResult(
    hit({
      attributes: {
        url: "https://example.org/allocations",
        title: "Allocation survey",
        date: "2025-06-30",
      },
    })
  );

  assert.deepEqual(result, {
    title: "Allocation survey",
    url: "https://example.org/allocations",
    snippet: "Pension plans raised private credit targets.",
    publishedDate: "2025-06-30",
  });
});

test("hitToSearchResult: falls back to filename and kb:// url", () => {
  const result = hitToSearchResult(
    hit({
      attributes: null,
      content: [{ text: "First  chunk\n" }, { text: "second chunk" }],
    })
  );

  assert.deepEqual(result, {
    title: "allocations-2025.pdf",
    url: "kb://allocations-2025.pdf",
    snippet: "First chunk second chunk",
  });
});

test("search: orders by score and caps at maxResults", async () => {
  const provider = new VectorStoreSearchProvider("vs_test", async (id, params) => {
    assert.equal(id, "vs_test");
    assert.deepEqual(params, { query: "private credit", max_num_results: 2 });
    return {
      data: [
        hit({ filename: "a.pdf", score: 0.2 }),
        hit({ filename: "b.pdf", score: 0.9 }),
        hit({ filename: "c.pdf", score: 0.5 }),
      ],
    };
  });

  const results = await provider.search("private credit", 2);
  assert.deepEqual(
    results.map((r) => r.title),
    ["b.pdf", "c.pdf"]
  );
});

test("search: an empty store yields no results", async () => {
  const provider = new VectorStoreSearchProvider("vs_test", async () => ({ data: [] }));
  assert.deepEqual(await provider.search("anything", 5), []);
});

test("search: failures become ProviderError", async () => {
  const provider = new VectorStoreSearchProvider("vs_test", async () => {
    throw new Error("vector store not found");
  });

  await assert.rejects(provider.search("q", 5), (err) => {
    assert.ok(err instanceof ProviderError);
    assert.equal(err.message, "openai-vector-store: vector store not found");
    return true;
  });
});
