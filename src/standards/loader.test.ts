/**
 * Editorial standards loader tests.
 *
 * Run: node --import tsx --test src/standards/loader.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { fileURLToPath } from "node:url";

import {
  StandardsValidationError,
  loadEditorialStandards,
  loadEditorialStandardsFromFile,
} from "./index.js";

const SHIPPED = fileURLToPath(new URL("../../config/editorial-standards.json", import.meta.url));

const VALID = {
  name: "Test standards",
  audience: "institutional allocators",
  tone: { primary: ["educational", "authoritative"], perspective: "third_person" },
  forbiddenPhrases: ["Risk-Free", "guaranteed returns", "risk-free "],
  preferredDomains: ["SEC.gov"],
  disclaimer: "Educational content only.",
  seo: { titleMaxLength: 60, descriptionMinLength: 150, descriptionMaxLength: 160, maxKeywords: 10 },
  socialChannels: ["linkedin"],
};

function issuesOf(input: unknown): StandardsValidationError["issues"] {
  try {
    loadEditorialStandards(input);
  } catch (err) {
    if (err instanceof StandardsValidationError) return err.issues;
    throw err;
  }
  assert.fail("expected StandardsValidationError");
}

test("loadEditorialStandardsFromFile: the shipped standards are valid", () => {
  const standards = loadEditorialStandardsFromFile(SHIPPED);
  assert.ok(standards.forbiddenPhrases.includes("guaranteed returns"));
  assert.deepEqual(standards.socialChannels, ["linkedin", "twitter", "email"]);
  assert.equal(standards.sourceCredibility?.domainScores["sec.gov"], 10);
  assert.ok(standards.vagueReferences.includes("studies show"));
});

test("loadEditorialStandards: normalizes phrases, domains and tone", () => {
  const standards = loadEditorialStandards(VALID);

  assert.deepEqual(standards.forbiddenPhrases, ["guaranteed returns", "risk-free"]);
  assert.deepEqual(standards.preferredDomains, ["sec.gov"]);
  assert.deepEqual(standards.tone.primary, ["authoritative", "educational"]);
  assert.deepEqual(standards.tone.avoid, []);
  assert.ok(Object.isFrozen(standards.tone));
});

test("loadEditorialStandards: normalizes vague references and credibility domains", () => {
  const standards = loadEditorialStandards({
    ...VALID,
    vagueReferences: ["Studies Show", "experts say", "studies show"],
    sourceCredibility: { domainScores: { "WWW.SEC.gov": 10, "Reddit.com": 2 } },
  });

  assert.deepEqual(standards.vagueReferences, ["experts say", "studies show"]);
  assert.deepEqual(standards.sourceCredibility, {
    domainScores: { "sec.gov": 10, "reddit.com": 2 },
    defaultScore: 5,
    minAverage: 6,
    lowScore: 4,
    maxLowShare: 0.2,
  });
  assert.equal(loadEditorialStandards(VALID).sourceCredibility, undefined);
});

test("loadEditorialStandards: rejects an out-of-range low-source share", () => {
  const issues = issuesOf({
    ...VALID,
    sourceCredibility: { domainScores: {}, maxLowShare: 1.5 },
  });
  assert.equal(issues[0].path, "sourceCredibility.maxLowShare");
});

test("loadEditorialStandards: accepts a JSON string", () => {
  assert.equal(loadEditorialStandards(JSON.stringify(VALID)).name, "Test standards");
  assert.equal(issuesOf("{ not json")[0].code, "invalid_json");
});

test("loadEditorialStandards: reports schema paths", () => {
  const issues = issuesOf({ ...VALID, socialChannels: ["fax"] });
  assert.equal(issues[0].path, "socialChannels.0");
});

test("loadEditorialStandards: rejects an inverted description range", () => {
  const issues = issuesOf({ ...VALID, seo: { ...VALID.seo, descriptionMinLength: 200 } });
  assert.deepEqual(issues, [
    { path: "seo.descriptionMinLength", message: "min description length must be <= max", code: "invalid_range" },
  ]);
});

test("loadEditorialStandards: a tone cannot be both primary and avoided", () => {
  const issues = issuesOf({
    ...VALID,
    tone: { ...VALID.tone, avoid: ["educational"] },
  });
  assert.equal(issues[0].message, '"educational" cannot be both primary and avoided');
});

test("StandardsValidationError.format: lists issues", () => {
  try {
    loadEditorialStandardsFromFile("does/not/exist.json");
    assert.fail("expected StandardsValidationError");
  } catch (err) {
    assert.ok(err instanceof StandardsValidationError);
    const lines = err.format().split("\n");
    assert.equal(lines[0], "Standards validation failed:");
    assert.ok(lines[1].startsWith("  - (file): not found: "));
  }
});
