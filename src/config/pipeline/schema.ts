/**
 * Pipeline configuration schema definition.
 *
 * A PipelineConfig is built once per run (defaults, then an optional JSON
 * file, then CLI/run overrides) and frozen. Every threshold the validation
 * gate and the revision loop consult is carried here explicitly so that
 * concurrent runs with different policies never share mutable state.
 */

import { z } from "zod";
import { DataClass, ReasoningEffort, Verbosity } from "./enums.js";

/**
 * Completion parameters for a single stage.
 *
 * Only the recognized fields are accepted; unknown keys are rejected so a
 * typo in a config file fails at load time instead of being ignored.
 */
export const CompletionSettingsSchema = z
  .object({
    /** Model identifier passed to the completion provider */
    model: z.string().min(1).describe("Model identifier"),

    /** Upper bound on generated tokens */
    maxOutputTokens: z
      .number()
      .int()
      .positive()
      .describe("Maximum output tokens for the completion"),

    /** Optional reasoning effort hint */
    reasoningEffort: ReasoningEffort.optional(),

    /** Optional verbosity hint */
    verbosity: Verbosity.optional(),
  })
  .strict();

export type CompletionSettings = z.infer<typeof CompletionSettingsSchema>;

/**
 * Recency windows for data-bearing citations.
 */
export const FreshnessPolicySchema = z
  .object({
    /** Evaluate the freshness rule at all */
    enabled: z.boolean(),

    /** Maximum citation age in days, per data class */
    windowsDays: z
      .object({
        market_data: z.number().int().positive(),
        allocation_data: z.number().int().positive(),
      })
      .strict() satisfies z.ZodType<Record<DataClass, number>>,
  })
  .strict();

export type FreshnessPolicy = z.infer<typeof FreshnessPolicySchema>;

/**
 * Run policy: the thresholds and budgets a single run is held to.
 */
export const RunPolicySchema = z
  .object({
    /** Word count the writer is asked to aim for */
    wordCountTarget: z.number().int().min(1),

    /** Length rule threshold */
    minWordCount: z.number().int().min(0),

    /** Citation count rule threshold (distinct inline citation URLs) */
    minCitations: z.number().int().min(0),

    /** Source diversity rule threshold (distinct citation domains) */
    minDistinctDomains: z.number().int().min(0),

    /** Revision budget, global to the run */
    maxIterations: z.number().int().min(1),

    /** Skip the knowledge-base research stage */
    skipKnowledgeBase: z.boolean(),

    /** Per-call completion/search timeout */
    stageTimeoutMs: z.number().int().positive(),

    /** Headings the article must contain */
    requiredSections: z.array(z.string().min(1)),

    /** Headings the article must not contain */
    forbiddenSections: z.array(z.string().min(1)),

    /** Freshness rule configuration */
    freshness: FreshnessPolicySchema,
  })
  .strict();

export type RunPolicy = z.infer<typeof RunPolicySchema>;

/**
 * How many passages each retrieval step asks for.
 */
export const RetrievalPolicySchema = z
  .object({
    knowledgeBaseResults: z.number().int().min(1).max(50),
    webResults: z.number().int().min(1).max(100),
  })
  .strict();

export type RetrievalPolicy = z.infer<typeof RetrievalPolicySchema>;

/**
 * Completion settings for every completion-backed stage.
 */
export const StageSettingsSchema = z
  .object({
    kb_research: CompletionSettingsSchema,
    web_research: CompletionSettingsSchema,
    synthesis: CompletionSettingsSchema,
    writer: CompletionSettingsSchema,
    metrics: CompletionSettingsSchema,
    seo: CompletionSettingsSchema,
    revision: CompletionSettingsSchema,
    social: CompletionSettingsSchema,
    summary: CompletionSettingsSchema,
    metadata: CompletionSettingsSchema,
  })
  .strict();

export type StageSettings = z.infer<typeof StageSettingsSchema>;

/**
 * Complete pipeline configuration.
 */
export const PipelineConfigSchema = z
  .object({
    policy: RunPolicySchema.describe("Thresholds and budgets for one run"),
    retrieval: RetrievalPolicySchema.describe("Search result counts"),
    stages: StageSettingsSchema.describe("Per-stage completion settings"),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
