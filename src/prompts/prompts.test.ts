/**
 * Prompt template system tests.
 *
 * Run: node --import tsx --test src/prompts/prompts.test.ts
 *
 * Tests cover:
 *   1. Context building from policy, standards, drafts and verdicts
 *   2. Template parsing and variable validation
 *   3. Conditional blocks
 *   4. Rendering, including missing context
 *   5. Loader and the shipped stage templates
 */

import { after, test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  buildDraftContext,
  buildRunContext,
  buildVerdictContext,
  formatPassages,
  isPromptVariable,
} from "./context.js";
import {
  extractVariables,
  getValidVariables,
  parseTemplate,
  referencedStages,
  TemplateParseError,
} from "./template.js";
import { MissingContextError, renderPrompt } from "./renderer.js";
import { PromptTemplateLoader, TemplateLoadError } from "./loader.js";
import {
  ConditionalParseError,
  evaluateCondition,
  parseConditionalBlocks,
  resolveConditionals,
} from "./conditional.js";
import { STAGE_CATALOG } from "../pipeline/stages.js";
import { LlmStageName } from "../config/pipeline/index.js";
import { parseDraft } from "../validation/draft.js";
import { articleText, testConfig, testStandards } from "../testing/fixtures.js";
import type { ValidationVerdict } from "../types/index.js";

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

test("buildRunContext: flattens policy and standards into strings", () => {
  const context = buildRunContext({
    topic: "Private credit",
    runId: "20260302-abc123",
    date: "2026-03-02",
    policy: testConfig().policy,
    standards: testStandards(),
  });

  assert.equal(context.topic, "Private credit");
  assert.equal(context["run.date"], "2026-03-02");
  assert.equal(context["policy.minWordCount"], "1750");
  assert.equal(context["policy.requiredSections"], "Key Insights, Conclusion");
  assert.equal(context["policy.forbiddenSections"], "");
  assert.equal(context["standards.perspective"], "third person");
  assert.equal(context["standards.forbiddenPhrases"], "guaranteed returns");
  assert.equal(context["seo.descriptionMaxLength"], "160");
  assert.ok(Object.isFrozen(context));
});

test("buildDraftContext: counts distinct citations and domains", () => {
  const draft = parseDraft(
    articleText({ words: 30, citations: 3, domains: 2, sections: ["Key Insights", "Conclusion"] })
  );
  const context = buildDraftContext(draft);

  assert.equal(context["draft.wordCount"], "30");
  assert.equal(context["draft.citationCount"], "3");
  assert.equal(context["draft.distinctDomainCount"], "2");
  assert.equal(context["draft.sections"], "Key Insights | Conclusion");
});

test("buildVerdictContext: summarizes metrics and issue counts", () => {
  const verdict: ValidationVerdict = {
    approved: false,
    metrics: { wordCount: 1700, citationCount: 10, distinctDomainCount: 3 },
    issues: [
      { rule: "length", severity: "blocking", actual: 1700, required: 1750, description: "short" },
      { rule: "custom", severity: "warning", ruleId: "x", excerpts: [], description: "meh" },
    ],
  };

  assert.deepEqual(buildVerdictContext(verdict), {
    "verdict.status": "rejected",
    "verdict.summary": "1700 words, 10 citations, 3 distinct domains; 1 blocking issue(s), 1 warning(s)",
  });
});

test("formatPassages: numbers passages and shows dates when present", () => {
  assert.equal(formatPassages([]), "(no passages found)");
  assert.equal(
    formatPassages([
      { title: "Fed note", url: "https://federalreserve.gov/n", snippet: "Grew.", publishedDate: "2026-02-01" },
      { title: "SEC", url: "https://sec.gov/x", snippet: "Rose." },
    ]),
    "[1] Fed note (2026-02-01)\nhttps://federalreserve.gov/n\nGrew.\n\n[2] SEC\nhttps://sec.gov/x\nRose."
  );
});

test("isPromptVariable: static names and completion-backed stages only", () => {
  assert.equal(isPromptVariable("topic"), true);
  assert.equal(isPromptVariable("stage.seo"), true);
  assert.equal(isPromptVariable("stage.setup"), false);
  assert.equal(isPromptVariable("draft.title"), false);
});

test("getValidVariables: includes one stage variable per completion-backed stage", () => {
  const vars = getValidVariables();
  for (const stage of LlmStageName.options) {
    assert.ok(vars.includes(`stage.${stage}`));
  }
  assert.deepEqual([...vars].sort(), vars);
});

// ---------------------------------------------------------------------------
// Template parsing
// ---------------------------------------------------------------------------

test("extractVariables: deduplicates and sorts", () => {
  assert.deepEqual(extractVariables("{{topic}} {{ run.id }} {{topic}}"), ["run.id", "topic"]);
});

test("parseTemplate: rejects unknown variables", () => {
  assert.throws(
    () => parseTemplate("{{topic}} {{article.title}}", "bad"),
    (err: unknown) => {
      assert.ok(err instanceof TemplateParseError);
      assert.deepEqual(err.invalidVariables, ["article.title"]);
      return true;
    }
  );
});

test("referencedStages: collects stages from placeholders and conditionals", () => {
  const template = parseTemplate(
    "{{stage.web_research}}{{#if stage.kb_research}}x{{/if}}{{topic}}",
    "sample"
  );
  assert.deepEqual(referencedStages(template), ["kb_research", "web_research"]);
});

// ---------------------------------------------------------------------------
// Conditionals
// ---------------------------------------------------------------------------

test("parseConditionalBlocks: reads operator and literal", () => {
  const [block] = parseConditionalBlocks('{{#if verdict.status == "approved"}}ok{{/if}}', "t");
  assert.equal(block.variable, "verdict.status");
  assert.equal(block.operator, "==");
  assert.equal(block.value, "approved");
  assert.equal(block.body, "ok");
});

test("parseConditionalBlocks: rejects values outside a known enum", () => {
  assert.throws(
    () => parseConditionalBlocks('{{#if verdict.status == "pending"}}x{{/if}}', "t"),
    ConditionalParseError
  );
});

test("parseConditionalBlocks: rejects nesting and unbalanced tags", () => {
  assert.throws(
    () => parseConditionalBlocks("{{#if topic}}{{#if run.id}}x{{/if}}{{/if}}", "t"),
    ConditionalParseError
  );
  assert.throws(() => parseConditionalBlocks("{{#if topic}}x", "t"), ConditionalParseError);
});

test("evaluateCondition: absent values", () => {
  assert.equal(evaluateCondition({ operator: "truthy" }, undefined), false);
  assert.equal(evaluateCondition({ operator: "truthy" }, ""), false);
  assert.equal(evaluateCondition({ operator: "==", value: "1" }, undefined), false);
  assert.equal(evaluateCondition({ operator: "!=", value: "1" }, undefined), true);
  assert.equal(evaluateCondition({ operator: "!=", value: "1" }, "1"), false);
});

test("resolveConditionals: keeps or drops each block", () => {
  const source = 'A{{#if topic}}[t]{{/if}}{{#if iteration.number != "1"}}[again]{{/if}}B';
  assert.equal(resolveConditionals(source, () => undefined), "A[again]B");
  assert.equal(
    resolveConditionals(source, (name) => (name === "topic" ? "x" : "1")),
    "A[t]B"
  );
});

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const OPTIONAL_KB = parseTemplate(
  "A{{#if stage.kb_research}}[{{stage.kb_research}}]{{/if}}B {{stage.web_research}}",
  "sample"
);

test("renderPrompt: substitutes values and resolves conditionals", () => {
  assert.equal(
    renderPrompt(OPTIONAL_KB, { "stage.web_research": "web", "stage.kb_research": "kb" }),
    "A[kb]B web"
  );
  assert.equal(renderPrompt(OPTIONAL_KB, { "stage.web_research": "web" }), "AB web");
});

test("renderPrompt: a bare missing variable is a MissingContextError", () => {
  assert.throws(
    () => renderPrompt(OPTIONAL_KB, {}, { stageName: "synthesis" }),
    (err: unknown) => {
      assert.ok(err instanceof MissingContextError);
      assert.equal(err.templateName, "sample");
      assert.equal(err.stageName, "synthesis");
      assert.deepEqual(err.missingVariables, ["stage.web_research"]);
      return true;
    }
  );
});

test("renderPrompt: substituted values are not re-expanded", () => {
  const template = parseTemplate("{{topic}}", "t");
  assert.equal(renderPrompt(template, { topic: "{{run.id}}" }), "{{run.id}}");
});

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

const dir = mkdtempSync(join(tmpdir(), "prompts-test-"));
after(() => rmSync(dir, { recursive: true, force: true }));
writeFileSync(join(dir, "one.md"), "One {{topic}}");
writeFileSync(join(dir, "two.txt"), "Two");
writeFileSync(join(dir, "notes.json"), "{}");
mkdirSync(join(dir, "nested"));

test("PromptTemplateLoader: loads, names and caches templates", () => {
  const loader = new PromptTemplateLoader(dir);
  const first = loader.load("one.md");

  assert.equal(first.name, "one");
  assert.deepEqual(first.variables, ["topic"]);
  assert.equal(loader.load("one.md"), first);
  loader.clearCache();
  assert.notEqual(loader.load("one.md"), first);
});

test("PromptTemplateLoader: lists only template files", () => {
  assert.deepEqual(PromptTemplateLoader.listTemplates(dir), ["one.md", "two.txt"]);
  assert.deepEqual([...new PromptTemplateLoader(dir).loadAll().keys()], ["one.md", "two.txt"]);
});

test("PromptTemplateLoader: missing files, bad extensions and directories", () => {
  const loader = new PromptTemplateLoader(dir);
  assert.throws(() => loader.load("absent.md"), TemplateLoadError);
  assert.throws(() => loader.load("notes.json"), TemplateLoadError);
  assert.throws(() => new PromptTemplateLoader(join(dir, "missing")), TemplateLoadError);
});

test("shipped templates: every stage template parses", () => {
  const loader = new PromptTemplateLoader();
  for (const definition of Object.values(STAGE_CATALOG)) {
    assert.doesNotThrow(() => loader.load(definition.template), definition.template);
  }
});

test("shipped templates: reference only the stages each stage reads", () => {
  const loader = new PromptTemplateLoader();
  for (const definition of Object.values(STAGE_CATALOG)) {
    const referenced = referencedStages(loader.load(definition.template));
    for (const stage of referenced) {
      assert.ok(
        definition.reads.includes(stage),
        `${definition.template} references ${stage} but ${definition.name} does not read it`
      );
    }
  }
});
