/**
 * Draft parsing and citation extraction tests.
 *
 * Run: node --import tsx --test src/validation/draft.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { countWords, extractHeadings, parseDraft, stripWrapper } from "./draft.js";
import {
  classifySentence,
  domainOf,
  extractCitations,
  parseLabelDate,
  sentenceAround,
} from "./citations.js";

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

test("parseDraft: strips front matter and splits title from sections", () => {
  const draft = parseDraft(
    "---\ntitle: x\n---\n# Title Here\n\n## Key Insights at a Glance\n\n" +
      "Text with a [link label](https://www.Example.com/a).\n"
  );

  assert.equal(
    draft.body,
    "# Title Here\n\n## Key Insights at a Glance\n\nText with a [link label](https://www.Example.com/a)."
  );
  assert.equal(draft.title, "Title Here");
  assert.deepEqual(draft.sections, [{ level: 2, title: "Key Insights at a Glance" }]);
  assert.equal(draft.wordCount, 12);
  assert.deepEqual(draft.citations, [
    {
      label: "link label",
      url: "https://www.Example.com/a",
      domain: "example.com",
      sentence: "Text with a [link label](https://www.Example.com/a).",
    },
  ]);
});

test("stripWrapper: unwraps a markdown code fence", () => {
  assert.equal(stripWrapper("```markdown\n# T\n\nBody\n```\n"), "# T\n\nBody");
});

test("parseDraft: cleans emphasis from headings", () => {
  const draft = parseDraft("## **Conclusion** ##\n\ntext");
  assert.deepEqual(draft.sections, [{ level: 2, title: "Conclusion" }]);
  assert.equal(draft.title, undefined);
});

test("extractHeadings: skips headings inside fenced code blocks", () => {
  const body = [
    "# Title",
    "## Key Insights",
    "```markdown",
    "## Conclusion",
    "```",
    "Closing text.",
  ].join("\n");

  assert.deepEqual(extractHeadings(body), [
    { level: 1, title: "Title" },
    { level: 2, title: "Key Insights" },
  ]);
});

test("countWords: ignores markup-only tokens and images", () => {
  assert.equal(countWords("## Heading\n\n- one, two -- 3\n\n![chart](https://x.com/c.png)"), 4);
  assert.equal(countWords(""), 0);
  assert.equal(countWords("   \n  "), 0);
});

test("parseDraft: empty text gives an empty draft", () => {
  const draft = parseDraft("");
  assert.equal(draft.wordCount, 0);
  assert.deepEqual(draft.citations, []);
  assert.deepEqual(draft.sections, []);
});

// ---------------------------------------------------------------------------
// Citations
// ---------------------------------------------------------------------------

test("domainOf: lowercases and drops www", () => {
  assert.equal(domainOf("https://WWW.SEC.gov/files/x.pdf"), "sec.gov");
  assert.equal(domainOf("https://data.bls.gov/a"), "data.bls.gov");
  assert.equal(domainOf("https://["), undefined);
});

test("parseLabelDate: recognizes the supported formats", () => {
  assert.equal(parseLabelDate("Report 2025-03-15"), "2025-03-15");
  assert.equal(parseLabelDate("Fed, June 2025"), "2025-06-30");
  assert.equal(parseLabelDate("Serper, Jun 12, 2025"), "2025-06-12");
  assert.equal(parseLabelDate("BLS, Sep 2024"), "2024-09-30");
  assert.equal(parseLabelDate("Preqin, Q1 2025"), "2025-03-31");
  assert.equal(parseLabelDate("2024 annual review"), "2024-12-31");
  assert.equal(parseLabelDate("Investor letter"), undefined);
  assert.equal(parseLabelDate("Bad 2025-02-30"), undefined);
});

test("classifySentence: allocation keywords win over market keywords", () => {
  assert.equal(classifySentence("Pensions raised allocations as yields rose."), "allocation_data");
  assert.equal(classifySentence("Spreads tightened by 40 basis points."), "market_data");
  assert.equal(classifySentence("Managers hired more staff."), undefined);
});

test("sentenceAround: finds the enclosing sentence", () => {
  const text = "First one. Yields rose ([Fed](https://f.gov/a)). Last one.";
  const start = text.indexOf("[Fed]");
  const end = text.indexOf(")") + 1;
  assert.equal(sentenceAround(text, start, end), "Yields rose ([Fed](https://f.gov/a)).");
});

test("extractCitations: keeps document order, repeats and data tags", () => {
  const citations = extractCitations(
    "- Default rates fell ([Moody's, Q2 2025](https://moodys.com/d)).\n" +
      "See [guide](ftp://files.example.com/g) and [again](https://moodys.com/d)."
  );

  assert.equal(citations.length, 2);
  assert.deepEqual(citations[0], {
    label: "Moody's, Q2 2025",
    url: "https://moodys.com/d",
    domain: "moodys.com",
    date: "2025-06-30",
    dataClass: "market_data",
    sentence: "Default rates fell ([Moody's, Q2 2025](https://moodys.com/d)).",
  });
  assert.equal(citations[1].label, "again");
  assert.equal(citations[1].dataClass, undefined);
});
