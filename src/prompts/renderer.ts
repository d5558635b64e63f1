/**
 * Prompt renderer.
 *
 * Takes a ParsedTemplate and a PromptContext and produces the final
 * prompt string.
 *
 * Processing pipeline:
 *
 *   1. Conditional blocks are resolved first — each `{{#if …}}…{{/if}}`
 *      block is either included or excluded based on context values.
 *   2. Every remaining {{variable}} in the resolved text MUST have a value
 *      in the context. A missing value is never replaced with empty text;
 *      it raises MissingContextError, which aborts the run.
 *   3. Variables are substituted.
 *
 * The renderer does NOT perform any content generation — it is purely
 * mechanical text substitution and conditional evaluation.
 */

import type { StageName } from "../config/pipeline/index.js";
import type { ParsedTemplate } from "./template.js";
import { extractVariables, PLACEHOLDER_RE } from "./template.js";
import { lookupVariable, type PromptContext } from "./context.js";
import { resolveConditionals } from "./conditional.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * A template references context (usually an upstream stage output) that
 * does not exist in the run. This is a pipeline configuration error.
 */
export class MissingContextError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    public readonly stageName?: StageName,
    message?: string
  ) {
    super(
      message ??
        `Cannot render template "${templateName}"` +
          (stageName ? ` for stage "${stageName}"` : "") +
          `: context is missing value(s) for: ${missingVariables.join(", ")}`
    );
    this.name = "MissingContextError";
  }
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /** Stage being rendered; carried on MissingContextError. */
  stageName?: StageName;
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

/**
 * Render a parsed template against a prompt context.
 *
 * @throws MissingContextError if any remaining variable has no value
 */
export function renderPrompt(
  template: ParsedTemplate,
  context: PromptContext,
  options: RenderOptions = {}
): string {
  const templateName = template.name ?? "(anonymous)";
  const lookup = (name: string): string | undefined => lookupVariable(context, name);

  // --- 1. Resolve conditional blocks ---
  const resolvedSource = template.conditionals.length > 0
    ? resolveConditionals(template.source, lookup)
    : template.source;

  // --- 2. Check for missing variables in the resolved text ---
  // Variables inside excluded blocks are gone at this point.
  const missing = extractVariables(resolvedSource).filter(
    (name) => lookup(name) === undefined
  );

  if (missing.length > 0) {
    throw new MissingContextError(templateName, missing, options.stageName);
  }

  // --- 3. Perform substitution on the resolved text ---
  return resolvedSource.replace(
    PLACEHOLDER_RE,
    (_match, name: string) => lookup(name) ?? ""
  );
}
