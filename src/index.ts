/**
 * Article pipeline library entry point.
 *
 * ```typescript
 * import OpenAI from "openai";
 * import {
 *   OpenAICompletionProvider,
 *   PipelineOrchestrator,
 *   WebSearchProvider,
 *   loadEditorialStandardsFromFile,
 *   writeArtifacts,
 * } from "article-pipeline";
 *
 * const client = new OpenAI();
 * const orchestrator = new PipelineOrchestrator({
 *   completion: OpenAICompletionProvider.fromClient(client),
 *   search: { web: new WebSearchProvider({ apiKey: process.env.SERPER_API_KEY ?? "" }) },
 *   standards: loadEditorialStandardsFromFile("config/editorial-standards.json"),
 * });
 *
 * const report = await orchestrator.generate("Private credit outlook 2026");
 * writeArtifacts(report, "output");
 * ```
 */

export {
  ConfigError,
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfigError,
  applyRunOverrides,
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  type PipelineConfig,
  type RunOverrides,
  type RunPolicy,
} from "./config/index.js";

export { createLogger, silentLogger, type Logger, type LogLevel } from "./logging/index.js";

export {
  MissingContextError,
  PromptTemplateLoader,
  renderPrompt,
  type PromptContext,
} from "./prompts/index.js";

export {
  OpenAICompletionProvider,
  ProviderError,
  VectorStoreSearchProvider,
  WebSearchProvider,
  type CompletionProvider,
  type SearchProvider,
  type SearchProviders,
} from "./providers/index.js";

export {
  PipelineOrchestrator,
  RunCancelledError,
  describeFailure,
  writeArtifacts,
  type GenerateOptions,
  type OrchestratorDeps,
} from "./pipeline/index.js";

export {
  StandardsValidationError,
  loadEditorialStandards,
  loadEditorialStandardsFromFile,
  type EditorialStandards,
} from "./standards/index.js";

export { buildRuleSet, parseDraft, validate } from "./validation/index.js";

export * from "./types/index.js";
