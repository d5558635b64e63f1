/**
 * Pipeline configuration module.
 *
 * Usage:
 *   import { loadPipelineConfig, DEFAULT_PIPELINE_CONFIG } from "./config/pipeline/index.js";
 *
 *   const config = applyRunOverrides(
 *     loadPipelineConfig(DEFAULT_PIPELINE_CONFIG),
 *     { maxIterations: 2, skipKnowledgeBase: true }
 *   );
 */

export {
  StageName,
  LlmStageName,
  ReasoningEffort,
  Verbosity,
  DataClass,
  SearchSource,
} from "./enums.js";

export type {
  PipelineConfig,
  RunPolicy,
  FreshnessPolicy,
  RetrievalPolicy,
  StageSettings,
  CompletionSettings,
} from "./schema.js";

export {
  PipelineConfigSchema,
  RunPolicySchema,
  FreshnessPolicySchema,
  RetrievalPolicySchema,
  StageSettingsSchema,
  CompletionSettingsSchema,
} from "./schema.js";

export {
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  applyRunOverrides,
  deepFreeze,
  formatZodIssues,
  PipelineConfigError,
  type ConfigValidationIssue,
  type RunOverrides,
} from "./loader.js";

export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
