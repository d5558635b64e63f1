/**
 * Validation gate.
 *
 * `validate(draft, rules)` judges a draft against a run's rule set and
 * returns a verdict. It never throws for a bad draft and never mutates
 * its inputs; the same draft and rules always give an identical verdict.
 *
 * Rules run in a fixed order so fix requests come out in a stable
 * sequence:
 *
 *   length → citations → diversity → structure → freshness → extra rules
 *
 * An empty draft stops after the length rule.
 */

import type {
  Draft,
  StructureIssue,
  ValidationIssue,
  ValidationVerdict,
  VerdictMetrics,
} from "../types/index.js";
import { checkFreshness } from "./freshness.js";
import type { RuleSet } from "./rules.js";

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

interface Measured extends VerdictMetrics {
  readonly domains: readonly string[];
}

function measure(draft: Readonly<Draft>): Measured {
  const urls = new Set(draft.citations.map((c) => c.url));
  const domains = [...new Set(draft.citations.map((c) => c.domain))].sort();
  return {
    wordCount: draft.wordCount,
    citationCount: urls.size,
    distinctDomainCount: domains.length,
    domains,
  };
}

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

function normalize(title: string): string {
  return title.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * A heading satisfies a section name when it equals it or starts with it,
 * ignoring case: "Key Insights at a Glance" matches "Key Insights".
 */
export function headingMatches(heading: string, section: string): boolean {
  const h = normalize(heading);
  const s = normalize(section);
  return h === s || h.startsWith(`${s} `) || h.startsWith(`${s}:`);
}

function checkStructure(draft: Readonly<Draft>, rules: RuleSet): StructureIssue[] {
  const issues: StructureIssue[] = [];
  const titles = draft.sections.map((s) => s.title);

  for (const section of rules.requiredSections) {
    if (!titles.some((t) => headingMatches(t, section))) {
      issues.push({
        rule: "structure",
        severity: "blocking",
        kind: "missing",
        section,
        description: `Required section "${section}" is missing`,
      });
    }
  }

  for (const section of rules.forbiddenSections) {
    const found = titles.find((t) => headingMatches(t, section));
    if (found !== undefined) {
      issues.push({
        rule: "structure",
        severity: "blocking",
        kind: "forbidden",
        section,
        description: `Section "${found}" is not allowed`,
      });
    }
  }

  return issues;
}

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

function verdict(issues: ValidationIssue[], metrics: Measured): ValidationVerdict {
  return Object.freeze({
    approved: !issues.some((i) => i.severity === "blocking"),
    issues: Object.freeze(issues),
    metrics: Object.freeze({
      wordCount: metrics.wordCount,
      citationCount: metrics.citationCount,
      distinctDomainCount: metrics.distinctDomainCount,
    }),
  });
}

export function validate(draft: Readonly<Draft>, rules: RuleSet): ValidationVerdict {
  const metrics = measure(draft);

  if (metrics.wordCount === 0) {
    return verdict(
      [
        {
          rule: "length",
          severity: "blocking",
          actual: 0,
          required: rules.minWordCount,
          description: "Draft is empty",
        },
      ],
      metrics
    );
  }

  const issues: ValidationIssue[] = [];

  if (metrics.wordCount < rules.minWordCount) {
    issues.push({
      rule: "length",
      severity: "blocking",
      actual: metrics.wordCount,
      required: rules.minWordCount,
      description: `Draft has ${metrics.wordCount} words; at least ${rules.minWordCount} required`,
    });
  }

  if (metrics.citationCount < rules.minCitations) {
    issues.push({
      rule: "citations",
      severity: "blocking",
      actual: metrics.citationCount,
      required: rules.minCitations,
      description:
        `Draft cites ${metrics.citationCount} distinct source(s); ` +
        `at least ${rules.minCitations} required`,
    });
  }

  if (metrics.distinctDomainCount < rules.minDistinctDomains) {
    issues.push({
      rule: "diversity",
      severity: "blocking",
      actual: metrics.distinctDomainCount,
      required: rules.minDistinctDomains,
      domains: metrics.domains,
      description:
        `Citations come from ${metrics.distinctDomainCount} distinct domain(s)` +
        (metrics.domains.length > 0 ? ` (${metrics.domains.join(", ")})` : "") +
        `; at least ${rules.minDistinctDomains} required`,
    });
  }

  issues.push(...checkStructure(draft, rules));

  if (rules.freshness) {
    issues.push(...checkFreshness(draft.citations, rules.freshness));
  }

  for (const rule of rules.extraRules) {
    issues.push(...rule.check(draft));
  }

  return verdict(issues, metrics);
}
