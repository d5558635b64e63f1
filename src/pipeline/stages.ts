/**
 * Stage catalog.
 *
 * One entry per completion-backed stage: its template, whether its
 * failure fails the run, which earlier outputs it reads, and where it
 * retrieves from.
 */

import type {
  LlmStageName,
  PipelineConfig,
  SearchSource,
} from "../config/pipeline/index.js";
import type { RetrievalRequest, StageCompletionSettings } from "../types/index.js";

export interface StageDefinition {
  readonly name: LlmStageName;
  /** Template filename under the prompts directory */
  readonly template: string;
  /** A failed mandatory stage fails the run */
  readonly mandatory: boolean;
  /** Earlier stages whose latest successful output is passed upstream */
  readonly reads: readonly LlmStageName[];
  readonly retrieval?: SearchSource;
}

export const STAGE_CATALOG: Readonly<Record<LlmStageName, StageDefinition>> = Object.freeze({
  kb_research: {
    name: "kb_research",
    template: "kb-research.md",
    mandatory: false,
    reads: [],
    retrieval: "knowledge_base",
  },
  web_research: {
    name: "web_research",
    template: "web-research.md",
    mandatory: true,
    reads: [],
    retrieval: "web",
  },
  synthesis: {
    name: "synthesis",
    template: "synthesis.md",
    mandatory: true,
    reads: ["kb_research", "web_research"],
  },
  writer: { name: "writer", template: "writer.md", mandatory: true, reads: ["synthesis"] },
  metrics: { name: "metrics", template: "metrics.md", mandatory: false, reads: [] },
  seo: { name: "seo", template: "seo.md", mandatory: true, reads: [] },
  // A failed revision spends its iteration and the loop re-validates.
  revision: { name: "revision", template: "revision.md", mandatory: false, reads: ["synthesis"] },
  social: { name: "social", template: "social.md", mandatory: true, reads: [] },
  summary: { name: "summary", template: "summary.md", mandatory: true, reads: [] },
  metadata: {
    name: "metadata",
    template: "metadata.md",
    mandatory: true,
    reads: ["seo", "metrics", "web_research"],
  },
});

/** Parallel batches, in pipeline order. */
export const RESEARCH_BATCH: readonly LlmStageName[] = ["kb_research", "web_research"];
export const ENHANCEMENT_BATCH: readonly LlmStageName[] = ["metrics", "seo"];
export const DISTRIBUTION_BATCH: readonly LlmStageName[] = ["social", "summary"];

/**
 * Completion settings for a stage under a run's config.
 */
export function stageSettings(
  config: Readonly<PipelineConfig>,
  stage: LlmStageName
): StageCompletionSettings {
  return Object.freeze({ ...config.stages[stage], timeoutMs: config.policy.stageTimeoutMs });
}

/**
 * The retrieval step for a stage, if it has one.
 *
 * Web research asks for recent data explicitly; the knowledge base is
 * searched with the bare topic.
 */
export function retrievalFor(
  definition: StageDefinition,
  config: Readonly<PipelineConfig>,
  topic: string,
  date: string
): RetrievalRequest | undefined {
  switch (definition.retrieval) {
    case "knowledge_base":
      return Object.freeze({
        source: "knowledge_base",
        query: topic,
        maxResults: config.retrieval.knowledgeBaseResults,
      });
    case "web":
      return Object.freeze({
        source: "web",
        query: `${topic} latest data ${date.slice(0, 4)}`,
        maxResults: config.retrieval.webResults,
      });
    case undefined:
      return undefined;
  }
}
