/**
 * Prompt template parsing and variable extraction.
 *
 * A prompt template is a plain-text string (loaded from a .md or .txt file
 * under prompts/) containing `{{variable.path}}` placeholders and optional
 * `{{#if …}}…{{/if}}` conditional blocks. This module extracts those
 * constructs and validates their names against the prompt context so that
 * a typo fails when the template is loaded, not halfway through a run.
 *
 * TEMPLATE FORMAT:
 *
 *   VARIABLE SUBSTITUTION:
 *     {{topic}}                   — run-level value
 *     {{policy.minCitations}}     — dotted path (flattened by convention)
 *     {{stage.synthesis}}         — upstream stage output
 *
 *   CONDITIONAL BLOCKS:
 *     {{#if stage.kb_research}}
 *     {{stage.kb_research}}
 *     {{/if}}
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Variable names are dotted alphanumeric paths
 *   - Whitespace inside braces is trimmed: {{ topic }} is valid
 *   - Unrecognized variable names are rejected at parse time
 *   - Duplicate placeholders in a template are fine (same value rendered)
 *   - No nested conditionals
 */

import {
  STATIC_VARIABLES,
  isPromptVariable,
  type PromptVariable,
  type StageVariable,
} from "./context.js";
import {
  parseConditionalBlocks,
  type ConditionalBlock,
} from "./conditional.js";
import { LlmStageName } from "../config/pipeline/index.js";

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches `{{variable.name}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

// ---------------------------------------------------------------------------
// Parsed template
// ---------------------------------------------------------------------------

/**
 * A parsed and validated prompt template.
 */
export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: PromptVariable[];
  /** Parsed conditional blocks ({{#if …}}…{{/if}}). */
  conditionals: ConditionalBlock[];
  /** Optional name/id for error messages. */
  name?: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

// ---------------------------------------------------------------------------
// Variable names
// ---------------------------------------------------------------------------

/**
 * Check whether a string is a valid prompt variable name.
 */
export function isValidVariable(name: string): name is PromptVariable {
  return isPromptVariable(name);
}

/**
 * Return all valid variable names (sorted).
 */
export function getValidVariables(): PromptVariable[] {
  const stageVars = LlmStageName.options.map((s): StageVariable => `stage.${s}`);
  return [...STATIC_VARIABLES, ...stageVars].sort();
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    const name = match[1];
    if (name !== undefined) found.add(name);
  }
  return [...found].sort();
}

/**
 * Upstream stages a template references, via placeholders or conditionals.
 */
export function referencedStages(template: ParsedTemplate): LlmStageName[] {
  const names = new Set<LlmStageName>();
  const vars: string[] = [
    ...template.variables,
    ...template.conditionals.map((c) => c.variable),
  ];
  for (const v of vars) {
    if (!v.startsWith("stage.")) continue;
    const parsed = LlmStageName.safeParse(v.slice("stage.".length));
    if (parsed.success) names.add(parsed.data);
  }
  return [...names].sort();
}

// ---------------------------------------------------------------------------
// Parsing + validation
// ---------------------------------------------------------------------------

/**
 * Parse a template string, extracting and validating all variables
 * and conditional blocks.
 *
 * @throws TemplateParseError      if any {{variable}} name is invalid
 * @throws ConditionalParseError   if any conditional references invalid vars/enums
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const conditionals = parseConditionalBlocks(source, name ?? "(anonymous)");

  const rawVariables = extractVariables(source);
  const variables = rawVariables.filter(isValidVariable);

  if (variables.length !== rawVariables.length) {
    const invalid = rawVariables.filter((v) => !isValidVariable(v));
    throw new TemplateParseError(name ?? "(anonymous)", invalid);
  }

  return {
    source,
    variables,
    conditionals,
    name,
  };
}
