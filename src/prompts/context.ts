/**
 * Typed prompt context.
 *
 * Defines the context object that stage templates are rendered against.
 * Every legal `{{path.to.value}}` placeholder maps to a key here. There are
 * two kinds of variables:
 *
 *   STATIC   run-level values built by the orchestrator
 *              topic                → the run's topic
 *              policy.minCitations  → RunPolicy.minCitations
 *              standards.disclaimer → EditorialStandards.disclaimer
 *              draft.body           → current Draft body
 *
 *   STAGE    upstream stage outputs, one per completion-backed stage
 *              stage.web_research   → latest web_research output
 *              stage.seo            → latest seo output
 *
 * A stage variable is only present when the upstream stage produced output
 * in this run. Templates that can run without it wrap it in
 * `{{#if stage.x}}…{{/if}}`; a bare `{{stage.x}}` with no value is a
 * MissingContextError at render time.
 *
 * Adding a new static variable requires exactly two changes:
 *   1. Add the key to STATIC_VARIABLES
 *   2. Populate it in one of the builders below
 */

import { LlmStageName, type RunPolicy } from "../config/pipeline/index.js";
import type { EditorialStandards } from "../standards/index.js";
import type { Draft, SearchResult, ValidationVerdict } from "../types/index.js";

// ---------------------------------------------------------------------------
// Variable names
// ---------------------------------------------------------------------------

export const STATIC_VARIABLES = [
  // Run
  "topic",
  "run.id",
  "run.date",
  // Policy
  "policy.wordCountTarget",
  "policy.minWordCount",
  "policy.minCitations",
  "policy.minDistinctDomains",
  "policy.maxIterations",
  "policy.requiredSections",
  "policy.forbiddenSections",
  // Editorial standards
  "standards.name",
  "standards.audience",
  "standards.tone",
  "standards.avoidTone",
  "standards.perspective",
  "standards.forbiddenPhrases",
  "standards.preferredDomains",
  "standards.disclaimer",
  "standards.socialChannels",
  // SEO limits
  "seo.titleMaxLength",
  "seo.descriptionMinLength",
  "seo.descriptionMaxLength",
  "seo.maxKeywords",
  // Per-invocation
  "retrieval.passages",
  "draft.body",
  "draft.wordCount",
  "draft.citationCount",
  "draft.distinctDomainCount",
  "draft.sections",
  "fix.instructions",
  "iteration.number",
  "verdict.status",
  "verdict.summary",
] as const;

export type StaticPromptVariable = (typeof STATIC_VARIABLES)[number];

/** `stage.<name>` for every completion-backed stage. */
export type StageVariable = `stage.${LlmStageName}`;

/** A legal prompt variable name. */
export type PromptVariable = StaticPromptVariable | StageVariable;

/**
 * The concrete context object passed to the renderer.
 * Absent keys are "not available in this run", never empty strings.
 */
export type PromptContext = { readonly [K in PromptVariable]?: string };

const STATIC_SET: ReadonlySet<string> = new Set<string>(STATIC_VARIABLES);

const STAGE_PREFIX = "stage.";

/**
 * Check whether a string is a legal prompt variable name.
 */
export function isPromptVariable(name: string): name is PromptVariable {
  if (STATIC_SET.has(name)) return true;
  if (!name.startsWith(STAGE_PREFIX)) return false;
  return LlmStageName.safeParse(name.slice(STAGE_PREFIX.length)).success;
}

/**
 * The context key holding a stage's output.
 */
export function stageVariable(stage: LlmStageName): StageVariable {
  return `stage.${stage}`;
}

/**
 * Look up a variable by its raw placeholder name.
 */
export function lookupVariable(context: PromptContext, name: string): string | undefined {
  return isPromptVariable(name) ? context[name] : undefined;
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export interface RunContextInput {
  topic: string;
  runId: string;
  /** Run date, YYYY-MM-DD */
  date: string;
  policy: Readonly<RunPolicy>;
  standards: Readonly<EditorialStandards>;
}

/**
 * Build the run-level variables shared by every stage of one run.
 */
export function buildRunContext(input: RunContextInput): PromptContext {
  const { topic, runId, date, policy, standards } = input;

  return Object.freeze({
    topic,
    "run.id": runId,
    "run.date": date,

    "policy.wordCountTarget": String(policy.wordCountTarget),
    "policy.minWordCount": String(policy.minWordCount),
    "policy.minCitations": String(policy.minCitations),
    "policy.minDistinctDomains": String(policy.minDistinctDomains),
    "policy.maxIterations": String(policy.maxIterations),
    "policy.requiredSections": policy.requiredSections.join(", "),
    "policy.forbiddenSections": policy.forbiddenSections.join(", "),

    "standards.name": standards.name,
    "standards.audience": standards.audience,
    "standards.tone": standards.tone.primary.join(", "),
    "standards.avoidTone": standards.tone.avoid.join(", "),
    "standards.perspective": standards.tone.perspective.replace(/_/g, " "),
    "standards.forbiddenPhrases": standards.forbiddenPhrases.join("; "),
    "standards.preferredDomains": standards.preferredDomains.join(", "),
    "standards.disclaimer": standards.disclaimer,
    "standards.socialChannels": standards.socialChannels.join(", "),

    "seo.titleMaxLength": String(standards.seo.titleMaxLength),
    "seo.descriptionMinLength": String(standards.seo.descriptionMinLength),
    "seo.descriptionMaxLength": String(standards.seo.descriptionMaxLength),
    "seo.maxKeywords": String(standards.seo.maxKeywords),
  });
}

/**
 * Build the `draft.*` variables for stages that read the current draft.
 */
export function buildDraftContext(draft: Readonly<Draft>): PromptContext {
  const domains = new Set(draft.citations.map((c) => c.domain));
  const urls = new Set(draft.citations.map((c) => c.url));

  return Object.freeze({
    "draft.body": draft.body,
    "draft.wordCount": String(draft.wordCount),
    "draft.citationCount": String(urls.size),
    "draft.distinctDomainCount": String(domains.size),
    "draft.sections": draft.sections.map((s) => s.title).join(" | "),
  });
}

/**
 * Build the `verdict.*` variables for the metadata stage.
 */
export function buildVerdictContext(verdict: Readonly<ValidationVerdict>): PromptContext {
  const blocking = verdict.issues.filter((i) => i.severity === "blocking").length;
  const warnings = verdict.issues.length - blocking;

  return Object.freeze({
    "verdict.status": verdict.approved ? "approved" : "rejected",
    "verdict.summary":
      `${verdict.metrics.wordCount} words, ` +
      `${verdict.metrics.citationCount} citations, ` +
      `${verdict.metrics.distinctDomainCount} distinct domains; ` +
      `${blocking} blocking issue(s), ${warnings} warning(s)`,
  });
}

/**
 * Format retrieved passages as a numbered list for `retrieval.passages`.
 */
export function formatPassages(results: readonly SearchResult[]): string {
  if (results.length === 0) return "(no passages found)";

  return results
    .map((r, i) => {
      const date = r.publishedDate ? ` (${r.publishedDate})` : "";
      return `[${i + 1}] ${r.title}${date}\n${r.url}\n${r.snippet}`;
    })
    .join("\n\n");
}
