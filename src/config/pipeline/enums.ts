/**
 * Enumerations shared by the pipeline configuration and the stage catalog.
 */

import { z } from "zod";

/**
 * Every stage the orchestrator can record in a run's history.
 *
 * `setup` is derived locally and never calls the completion provider;
 * all other stages are completion-backed (see LlmStageName).
 */
export const StageName = z.enum([
  "setup",
  "kb_research",
  "web_research",
  "synthesis",
  "writer",
  "metrics",
  "seo",
  "revision",
  "social",
  "summary",
  "metadata",
]);
export type StageName = z.infer<typeof StageName>;

/** Stages that render a prompt and make exactly one completion call. */
export const LlmStageName = StageName.exclude(["setup"]);
export type LlmStageName = z.infer<typeof LlmStageName>;

/** Reasoning effort hint forwarded to the completion provider. */
export const ReasoningEffort = z.enum(["minimal", "low", "medium", "high"]);
export type ReasoningEffort = z.infer<typeof ReasoningEffort>;

/** Output verbosity hint forwarded to the completion provider. */
export const Verbosity = z.enum(["low", "medium", "high"]);
export type Verbosity = z.infer<typeof Verbosity>;

/**
 * Citation data classes subject to the freshness rule.
 *
 *   market_data     — prices, returns, yields, index levels, flows
 *   allocation_data — portfolio allocations, targets, commitments
 */
export const DataClass = z.enum(["market_data", "allocation_data"]);
export type DataClass = z.infer<typeof DataClass>;

/** Where a stage's retrieval step searches. */
export const SearchSource = z.enum(["knowledge_base", "web"]);
export type SearchSource = z.infer<typeof SearchSource>;
