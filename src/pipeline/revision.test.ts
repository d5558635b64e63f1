/**
 * Revision loop and fix request tests.
 *
 * Run: node --import tsx --test src/pipeline/revision.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  RevisionLoopController,
  getNextState,
  isTerminal,
  type RevisionRequest,
  type RevisionTransition,
} from "./revision.js";
import { buildFixRequest } from "./fix-requests.js";
import { parseDraft } from "../validation/draft.js";
import type { RuleSet } from "../validation/rules.js";
import { articleText } from "../testing/fixtures.js";
import { ZERO_USAGE, type StageResult, type ValidationVerdict } from "../types/index.js";

const RULES: RuleSet = {
  minWordCount: 1750,
  minCitations: 10,
  minDistinctDomains: 3,
  requiredSections: ["Key Insights", "Conclusion"],
  forbiddenSections: [],
  extraRules: [],
};

const SECTIONS = ["Key Insights", "Conclusion"];
const SHORT = articleText({ words: 1700, citations: 10, domains: 3, sections: SECTIONS });
const GOOD = articleText({ words: 1800, citations: 10, domains: 3, sections: SECTIONS });

function revised(output: string): StageResult {
  return { success: true, stageName: "revision", output, usage: ZERO_USAGE, durationMs: 0, sources: [] };
}

function failedRevision(): StageResult {
  return {
    success: false,
    stageName: "revision",
    error: { name: "ProviderError", message: "upstream 502", status: 502, timedOut: false },
    usage: ZERO_USAGE,
    durationMs: 0,
    sources: [],
  };
}

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

test("getNextState: follows the transition table", () => {
  assert.equal(getNextState("validating", "APPROVE"), "approved");
  assert.equal(getNextState("validating", "REJECT"), "revising");
  assert.equal(getNextState("revising", "REVISED"), "validating");
  assert.equal(getNextState("revising", "APPROVE"), null);
  assert.equal(getNextState("approved", "REJECT"), null);
});

test("isTerminal: only approved and exhausted", () => {
  assert.equal(isTerminal("approved"), true);
  assert.equal(isTerminal("exhausted"), true);
  assert.equal(isTerminal("validating"), false);
  assert.equal(isTerminal("revising"), false);
});

test("constructor: rejects a non-positive budget", () => {
  assert.throws(
    () => new RevisionLoopController({ rules: RULES, maxIterations: 0, revise: async () => revised(GOOD) }),
    RangeError
  );
});

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

test("run: an approved first draft spends no iterations", async () => {
  let calls = 0;
  const controller = new RevisionLoopController({
    rules: RULES,
    maxIterations: 3,
    revise: async () => {
      calls++;
      return revised(GOOD);
    },
  });

  const outcome = await controller.run(parseDraft(GOOD));

  assert.equal(outcome.state, "approved");
  assert.equal(outcome.iterations, 0);
  assert.equal(calls, 0);
  assert.deepEqual(outcome.transitions, [
    { from: "validating", to: "approved", event: "APPROVE", iteration: 0 },
  ]);
});

test("run: one revision that fixes the draft is approved", async () => {
  const requests: RevisionRequest[] = [];
  const controller = new RevisionLoopController({
    rules: RULES,
    maxIterations: 3,
    revise: async (request) => {
      requests.push(request);
      return revised(GOOD);
    },
  });

  const outcome = await controller.run(parseDraft(SHORT));

  assert.equal(outcome.state, "approved");
  assert.equal(outcome.iterations, 1);
  assert.equal(outcome.draft.wordCount, 1800);
  assert.deepEqual(
    outcome.verdicts.map((v) => v.approved),
    [false, true]
  );
  assert.deepEqual(
    outcome.transitions.map((t) => t.event),
    ["REJECT", "REVISED", "APPROVE"]
  );

  assert.equal(requests.length, 1);
  assert.equal(requests[0].iteration, 1);
  assert.equal(
    requests[0].fixRequest,
    "Required fixes:\n" +
      "1. Expand the article by at least 50 words (currently 1700, minimum 1750) by " +
      "deepening existing sections with sourced analysis; do not pad."
  );
});

test("run: never-fixed drafts exhaust after exactly maxIterations revisions", async () => {
  const seen: RevisionTransition[] = [];
  const controller = new RevisionLoopController({
    rules: RULES,
    maxIterations: 3,
    revise: async () => revised(SHORT),
    onTransition: (t) => seen.push(t),
  });

  const outcome = await controller.run(parseDraft(SHORT));

  assert.equal(outcome.state, "exhausted");
  assert.equal(outcome.iterations, 3);
  assert.equal(outcome.verdicts.length, 4);
  assert.equal(
    outcome.transitions.filter((t) => t.from === "validating" && t.to === "revising").length,
    3
  );
  assert.deepEqual(outcome.transitions[outcome.transitions.length - 1], {
    from: "validating",
    to: "exhausted",
    event: "EXHAUST",
    iteration: 3,
  });
  assert.deepEqual(
    outcome.verdict.issues.map((i) => i.rule),
    ["length"]
  );
  assert.deepEqual(seen, outcome.transitions);
});

test("run: iteration count is monotonic and bounded", async () => {
  for (const maxIterations of [1, 2, 5]) {
    const controller = new RevisionLoopController({
      rules: RULES,
      maxIterations,
      revise: async () => revised(""),
    });

    const outcome = await controller.run(parseDraft(SHORT));
    const counts = outcome.transitions.map((t) => t.iteration);

    assert.equal(outcome.state, "exhausted");
    assert.equal(outcome.iterations, maxIterations);
    assert.ok(counts.every((c, i) => i === 0 || c >= counts[i - 1]));
    assert.ok(counts.every((c) => c <= maxIterations));
  }
});

test("run: a failed revision keeps the draft and spends the iteration", async () => {
  const outputs = [failedRevision(), revised(GOOD)];
  const drafts: number[] = [];
  const controller = new RevisionLoopController({
    rules: RULES,
    maxIterations: 3,
    revise: async (request) => {
      drafts.push(request.draft.wordCount);
      const next = outputs.shift();
      assert.ok(next);
      return next;
    },
  });

  const outcome = await controller.run(parseDraft(SHORT));

  assert.equal(outcome.state, "approved");
  assert.equal(outcome.iterations, 2);
  assert.deepEqual(drafts, [1700, 1700]);
});

// ---------------------------------------------------------------------------
// Fix requests
// ---------------------------------------------------------------------------

test("buildFixRequest: numbers blocking issues and lists warnings as optional", () => {
  const verdict: ValidationVerdict = {
    approved: false,
    metrics: { wordCount: 1800, citationCount: 8, distinctDomainCount: 2 },
    issues: [
      { rule: "citations", severity: "blocking", actual: 8, required: 10, description: "" },
      {
        rule: "diversity",
        severity: "blocking",
        actual: 2,
        required: 3,
        domains: ["a.com", "b.com"],
        description: "",
      },
      { rule: "structure", severity: "blocking", kind: "forbidden", section: "Introduction", description: "" },
      {
        rule: "freshness",
        severity: "blocking",
        url: "https://a.com/x",
        dataClass: "market_data",
        windowDays: 90,
        date: "2025-01-31",
        ageDays: 243,
        description: "",
      },
      {
        rule: "custom",
        ruleId: "forbidden-phrases",
        severity: "warning",
        description: "Draft uses forbidden phrase(s): game-changer",
        excerpts: ["game-changer"],
      },
    ],
  };

  assert.equal(
    buildFixRequest(verdict),
    [
      "Required fixes:",
      "1. Add at least 2 additional independently sourced inline citations in the form " +
        "[Source, Date](URL) (currently 8, minimum 10).",
      "2. Cite at least 1 additional distinct source domain(s) beyond a.com, b.com.",
      '3. Remove the "Introduction" section and fold any essential content into other sections.',
      "4. Replace the citation https://a.com/x (dated 2025-01-31) with a source from the last 90 days.",
      "",
      "Optional improvements:",
      '- Draft uses forbidden phrase(s): game-changer: "game-changer"',
    ].join("\n")
  );
});

test("buildFixRequest: undated citations and missing sections", () => {
  const verdict: ValidationVerdict = {
    approved: false,
    metrics: { wordCount: 1800, citationCount: 10, distinctDomainCount: 3 },
    issues: [
      { rule: "structure", severity: "blocking", kind: "missing", section: "Conclusion", description: "" },
      {
        rule: "freshness",
        severity: "blocking",
        url: "https://b.com/y",
        dataClass: "allocation_data",
        windowDays: 180,
        description: "",
      },
    ],
  };

  assert.equal(
    buildFixRequest(verdict),
    "Required fixes:\n" +
      '1. Add a "Conclusion" section as a level-2 heading.\n' +
      "2. Add the publication date to the citation label for https://b.com/y, or replace it " +
      "with a source dated within the last 180 days."
  );
});
