/**
 * Heuristics over the draft, plugged into the gate as DraftRules. All
 * report warnings: they shape the fix request but never block approval
 * on their own.
 */

import type { SourceCredibility } from "../standards/index.js";
import type { CustomIssue, Draft } from "../types/index.js";
import type { DraftRule } from "./rules.js";

const EXCERPT_LIMIT = 120;

const FIGURE_RE =
  /\$\s?\d|\d(?:\.\d+)?\s?%|\b\d+(?:\.\d+)?\s?(?:trillion|billion|million|bps|basis points)\b/i;
const CITED_RE = /\]\(https?:\/\//;
const LINK_RE = /\[[^\]\n]*\]\([^)\s]*\)/g;
const LINK_TOKEN_RE = /\u0000(\d+)\u0000/g;

function excerpt(text: string): string {
  const clean = text.replace(/\s+/g, " ").trim();
  return clean.length > EXCERPT_LIMIT ? `${clean.slice(0, EXCERPT_LIMIT - 1)}…` : clean;
}

/**
 * Split one line into sentences. Links are swapped for tokens first so a
 * label such as "[Fed, Jan. 2025]" never ends a sentence.
 */
function splitSentences(line: string): string[] {
  const links: string[] = [];
  const masked = line.replace(LINK_RE, (link) => `\u0000${links.push(link) - 1}\u0000`);

  return masked
    .split(/(?<=[.!?])\s+/)
    .filter((sentence) => sentence !== "")
    .map((sentence) =>
      sentence.replace(LINK_TOKEN_RE, (token: string, index: string) => links[Number(index)] ?? token)
    );
}

/**
 * Sentences of the body outside headings, code fences and tables.
 */
export function proseSentences(body: string): string[] {
  const sentences: string[] = [];
  let inFence = false;

  for (const line of body.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("```")) {
      inFence = !inFence;
      continue;
    }
    if (inFence || trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith("|")) {
      continue;
    }
    sentences.push(...splitSentences(trimmed));
  }

  return sentences;
}

/**
 * Flags sentences that state a dollar amount, percentage or large count
 * with no inline citation.
 */
export function unsourcedStatisticsRule(): DraftRule {
  const id = "unsourced-statistics";
  return {
    id,
    check(draft: Readonly<Draft>): CustomIssue[] {
      const excerpts = proseSentences(draft.body)
        .filter((s) => FIGURE_RE.test(s) && !CITED_RE.test(s))
        .map(excerpt);
      if (excerpts.length === 0) return [];

      return [
        {
          rule: "custom",
          ruleId: id,
          severity: "warning",
          description: `${excerpts.length} sentence(s) state figures without an inline citation`,
          excerpts,
        },
      ];
    },
  };
}

/**
 * Flags editorial-standards phrases the draft uses. Matching is
 * case-insensitive; phrases are expected lowercased.
 */
export function forbiddenPhrasesRule(phrases: readonly string[]): DraftRule {
  const id = "forbidden-phrases";
  return {
    id,
    check(draft: Readonly<Draft>): CustomIssue[] {
      const text = draft.body.toLowerCase().replace(/[‘’]/g, "'");
      const found = phrases.filter((p) => text.includes(p.toLowerCase()));
      if (found.length === 0) return [];

      return [
        {
          rule: "custom",
          ruleId: id,
          severity: "warning",
          description: `Draft uses forbidden phrase(s): ${found.join(", ")}`,
          excerpts: found,
        },
      ];
    },
  };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Flags sentences that lean on an unnamed authority ("studies show",
 * "experts say"). Phrases match whole words, case-insensitively.
 */
export function vagueReferencesRule(phrases: readonly string[]): DraftRule {
  const id = "vague-references";
  const patterns = phrases.map((p) => ({
    phrase: p,
    re: new RegExp(`\\b${escapeRegExp(p)}\\b`, "i"),
  }));

  return {
    id,
    check(draft: Readonly<Draft>): CustomIssue[] {
      const sentences = proseSentences(draft.body);
      const found = patterns.filter(({ re }) => sentences.some((s) => re.test(s)));
      if (found.length === 0) return [];

      return [
        {
          rule: "custom",
          ruleId: id,
          severity: "warning",
          description: `Draft uses vague reference(s) instead of naming a source: ${found
            .map((f) => f.phrase)
            .join(", ")}`,
          excerpts: sentences.filter((s) => found.some(({ re }) => re.test(s))).map(excerpt),
        },
      ];
    },
  };
}

/**
 * Credibility score of one domain: the longest `domainScores` key equal to
 * the domain or a parent of it, else the default.
 */
export function credibilityOf(domain: string, credibility: Readonly<SourceCredibility>): number {
  let best: { key: string; score: number } | undefined;
  for (const [key, score] of Object.entries(credibility.domainScores)) {
    const matches = domain === key || domain.endsWith(`.${key}`);
    if (matches && (!best || key.length > best.key.length)) best = { key, score };
  }
  return best ? best.score : credibility.defaultScore;
}

/**
 * Scores each distinct cited URL by its domain. Warns when the mean score
 * is below `minAverage`, and when more than `maxLowShare` of the sources
 * score at or below `lowScore`.
 */
export function sourceCredibilityRule(credibility: Readonly<SourceCredibility>): DraftRule {
  const id = "source-credibility";
  return {
    id,
    check(draft: Readonly<Draft>): CustomIssue[] {
      const sources = new Map<string, string>();
      for (const citation of draft.citations) sources.set(citation.url, citation.domain);
      if (sources.size === 0) return [];

      const scored = [...sources.values()].map((domain) => ({
        domain,
        score: credibilityOf(domain, credibility),
      }));
      const average = scored.reduce((sum, s) => sum + s.score, 0) / scored.length;
      const low = scored.filter((s) => s.score <= credibility.lowScore);
      const lowDomains = [...new Set(low.map((s) => s.domain))];

      const issues: CustomIssue[] = [];
      if (average < credibility.minAverage) {
        issues.push({
          rule: "custom",
          ruleId: id,
          severity: "warning",
          description: `Average source credibility is low (${average.toFixed(1)} of 10, minimum ${credibility.minAverage}); cite primary or institutional sources`,
          excerpts: lowDomains,
        });
      }
      if (low.length > scored.length * credibility.maxLowShare) {
        issues.push({
          rule: "custom",
          ruleId: id,
          severity: "warning",
          description: `Too many low-credibility sources (${low.length} of ${scored.length}); replace them`,
          excerpts: lowDomains,
        });
      }
      return issues;
    },
  };
}
