/**
 * Stage runner tests.
 *
 * Run: node --import tsx --test src/pipeline/stage-runner.test.ts
 */

import { after, test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { StageRunner, buildStageContext } from "./stage-runner.js";
import { RunCancelledError } from "./errors.js";
import { ConfigError } from "../config/env.js";
import { MissingContextError, PromptTemplateLoader } from "../prompts/index.js";
import { ProviderError } from "../providers/errors.js";
import type { SearchProviders } from "../providers/search.js";
import { FakeCompletionProvider, FakeSearchProvider, type CompletionOutcome } from "../testing/fakes.js";
import type { StageRequest } from "../types/index.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const dir = mkdtempSync(join(tmpdir(), "stage-runner-"));
writeFileSync(
  join(dir, "sample.md"),
  "Topic: {{topic}}\n{{#if stage.kb_research}}KB: {{stage.kb_research}}\n{{/if}}Web: {{stage.web_research}}"
);
writeFileSync(join(dir, "search.md"), "Q: {{topic}}\n{{retrieval.passages}}");
after(() => rmSync(dir, { recursive: true, force: true }));

const loader = new PromptTemplateLoader(dir);

function request(overrides: Partial<StageRequest> = {}): StageRequest {
  return {
    stageName: "synthesis",
    template: "sample.md",
    upstreamContext: { web_research: "W" },
    variables: { topic: "T" },
    settings: { model: "m", maxOutputTokens: 10, timeoutMs: 1000 },
    ...overrides,
  };
}

function runnerWith(outcome: CompletionOutcome, search?: SearchProviders) {
  const completion = new FakeCompletionProvider(() => outcome);
  return { completion, runner: new StageRunner({ loader, completion, search }) };
}

// ---------------------------------------------------------------------------
// Prompt assembly
// ---------------------------------------------------------------------------

test("run: renders upstream outputs and returns the completion", async () => {
  const { completion, runner } = runnerWith({
    text: "synthesized",
    usage: { inputTokens: 11, outputTokens: 2 },
  });

  const result = await runner.run(request());

  assert.equal(completion.calls.length, 1);
  assert.equal(completion.calls[0].prompt, "Topic: T\nWeb: W");
  assert.equal(completion.calls[0].model, "m");
  assert.equal(completion.calls[0].options.maxOutputTokens, 10);
  assert.ok(result.success);
  assert.equal(result.stageName, "synthesis");
  assert.equal(result.output, "synthesized");
  assert.deepEqual(result.usage, { inputTokens: 11, outputTokens: 2 });
  assert.deepEqual(result.sources, []);
});

test("run: optional upstream stages render when present", async () => {
  const { completion, runner } = runnerWith("ok");
  await runner.run(request({ upstreamContext: { web_research: "W", kb_research: "K" } }));
  assert.equal(completion.calls[0].prompt, "Topic: T\nKB: K\nWeb: W");
});

test("run: a missing upstream output throws MissingContextError before any call", async () => {
  const { completion, runner } = runnerWith("unused");

  await assert.rejects(runner.run(request({ upstreamContext: {} })), (err) => {
    assert.ok(err instanceof MissingContextError);
    assert.equal(err.stageName, "synthesis");
    assert.deepEqual(err.missingVariables, ["stage.web_research"]);
    return true;
  });
  assert.equal(completion.calls.length, 0);
});

test("buildStageContext: maps upstream outputs to stage variables", () => {
  const context = buildStageContext(request({ upstreamContext: { seo: "S" } }), []);
  assert.deepEqual(context, {
    topic: "T",
    "stage.seo": "S",
    "retrieval.passages": "(no passages found)",
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

test("run: ProviderError is captured into the result", async () => {
  const { runner } = runnerWith(new ProviderError("boom", { status: 503 }));

  const result = await runner.run(request());

  assert.equal(result.success, false);
  if (result.success) return;
  assert.deepEqual(result.error, {
    name: "ProviderError",
    message: "boom",
    status: 503,
    timedOut: false,
  });
});

test("run: a slow call times out as a ProviderError", async () => {
  const { runner } = runnerWith({ text: "late", delayMs: 1000 });

  const result = await runner.run(
    request({ settings: { model: "m", maxOutputTokens: 10, timeoutMs: 20 } })
  );

  assert.equal(result.success, false);
  if (result.success) return;
  assert.deepEqual(result.error, {
    name: "ProviderError",
    message: "synthesis completion timed out after 20ms",
    timedOut: true,
  });
});

test("run: run cancellation throws RunCancelledError", async () => {
  const { runner } = runnerWith({ text: "late", delayMs: 1000 });
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 10);

  await assert.rejects(runner.run(request(), { signal: controller.signal }), RunCancelledError);
});

test("run: an already-cancelled run makes no call", async () => {
  const { completion, runner } = runnerWith("unused");
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(runner.run(request(), { signal: controller.signal }), RunCancelledError);
  assert.equal(completion.calls.length, 0);
});

// ---------------------------------------------------------------------------
// Retrieval
// ---------------------------------------------------------------------------

test("run: retrieved passages are rendered and kept on the result", async () => {
  const passages = [
    { title: "A", url: "https://a.com", snippet: "s", publishedDate: "2025-01-02" },
  ];
  const web = new FakeSearchProvider("web", passages);
  const { completion, runner } = runnerWith("found", { web });

  const result = await runner.run(
    request({
      stageName: "web_research",
      template: "search.md",
      upstreamContext: {},
      retrieval: { source: "web", query: "T latest", maxResults: 5 },
    })
  );

  assert.deepEqual(web.queries, ["T latest"]);
  assert.equal(completion.calls[0].prompt, "Q: T\n[1] A (2025-01-02)\nhttps://a.com\ns");
  assert.deepEqual(result.sources, passages);
});

test("run: a failed search fails the stage without a completion call", async () => {
  const web = new FakeSearchProvider("web", new ProviderError("serper: HTTP 500", { status: 500 }));
  const { completion, runner } = runnerWith("unused", { web });

  const result = await runner.run(
    request({
      stageName: "web_research",
      template: "search.md",
      upstreamContext: {},
      retrieval: { source: "web", query: "q", maxResults: 5 },
    })
  );

  assert.equal(result.success, false);
  assert.equal(completion.calls.length, 0);
});

test("run: a retrieval source with no provider is a configuration error", async () => {
  const { runner } = runnerWith("unused", {});

  await assert.rejects(
    runner.run(
      request({
        stageName: "kb_research",
        template: "search.md",
        upstreamContext: {},
        retrieval: { source: "knowledge_base", query: "q", maxResults: 5 },
      })
    ),
    ConfigError
  );
});
