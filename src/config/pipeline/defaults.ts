/**
 * Default pipeline configuration.
 *
 * Thresholds follow the editorial bar for long-form investment-education
 * articles: 1,750 words, 10 distinct cited sources across at least three
 * domains, and a fixed section skeleton. Research and drafting stages run on
 * the full model; analysis and distribution stages run on the mini model.
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  policy: {
    wordCountTarget: 2000,
    minWordCount: 1750,
    minCitations: 10,
    minDistinctDomains: 3,
    maxIterations: 3,
    skipKnowledgeBase: false,
    stageTimeoutMs: 180_000,
    requiredSections: ["Key Insights", "Key Takeaways", "Conclusion"],
    forbiddenSections: ["Introduction", "Executive Summary"],
    freshness: {
      enabled: true,
      windowsDays: {
        market_data: 90,
        allocation_data: 180,
      },
    },
  },

  retrieval: {
    knowledgeBaseResults: 8,
    webResults: 10,
  },

  stages: {
    kb_research: { model: "gpt-5-mini", maxOutputTokens: 1600, reasoningEffort: "low" },
    web_research: { model: "gpt-5", maxOutputTokens: 2000, reasoningEffort: "low" },
    synthesis: { model: "gpt-5", maxOutputTokens: 1600, reasoningEffort: "medium" },
    writer: { model: "gpt-5", maxOutputTokens: 6000, reasoningEffort: "medium", verbosity: "high" },
    metrics: { model: "gpt-5-mini", maxOutputTokens: 700, reasoningEffort: "minimal" },
    seo: { model: "gpt-5-mini", maxOutputTokens: 900, reasoningEffort: "minimal" },
    revision: { model: "gpt-5", maxOutputTokens: 6000, reasoningEffort: "medium", verbosity: "high" },
    social: { model: "gpt-5-mini", maxOutputTokens: 900, verbosity: "medium" },
    summary: { model: "gpt-5-mini", maxOutputTokens: 500, verbosity: "low" },
    metadata: { model: "gpt-5-mini", maxOutputTokens: 900, reasoningEffort: "minimal" },
  },
};
