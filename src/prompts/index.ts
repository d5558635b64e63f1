/**
 * Prompt template system.
 *
 * Stage prompts live as Markdown templates under prompts/. Templates use
 * `{{variable}}` placeholders and `{{#if …}}…{{/if}}` conditional blocks
 * validated against the typed prompt context.
 *
 * ```typescript
 * import {
 *   PromptTemplateLoader,
 *   buildRunContext,
 *   renderPrompt,
 * } from "./prompts/index.js";
 *
 * const loader = new PromptTemplateLoader();
 * const template = loader.load("synthesis.md");
 *
 * const prompt = renderPrompt(template, {
 *   ...buildRunContext({ topic, runId, date, policy, standards }),
 *   "stage.web_research": webFindings,
 * }, { stageName: "synthesis" });
 * ```
 *
 * Conditional syntax:
 *
 *   Truthy:     {{#if variable}}body{{/if}}
 *   Equality:   {{#if variable == "value"}}body{{/if}}
 *   Inequality: {{#if variable != "value"}}body{{/if}}
 *
 * See conditional.ts for full documentation.
 */

// Context
export {
  STATIC_VARIABLES,
  buildRunContext,
  buildDraftContext,
  buildVerdictContext,
  formatPassages,
  isPromptVariable,
  lookupVariable,
  stageVariable,
  type PromptContext,
  type PromptVariable,
  type StaticPromptVariable,
  type StageVariable,
  type RunContextInput,
} from "./context.js";

// Template parsing
export {
  parseTemplate,
  extractVariables,
  isValidVariable,
  getValidVariables,
  referencedStages,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

// Rendering
export {
  renderPrompt,
  MissingContextError,
  type RenderOptions,
} from "./renderer.js";

// Loader
export {
  PromptTemplateLoader,
  TemplateLoadError,
  DEFAULT_PROMPTS_DIR,
} from "./loader.js";

// Conditionals
export {
  parseConditionalBlocks,
  evaluateCondition,
  resolveConditionals,
  getEnumValues,
  ConditionalParseError,
  type ConditionalBlock,
  type ConditionalOperator,
} from "./conditional.js";
