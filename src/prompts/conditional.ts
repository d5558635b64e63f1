/**
 * Conditional block parsing, validation, and evaluation.
 *
 * Extends the prompt template syntax with `{{#if …}}…{{/if}}` blocks
 * that include or exclude content based on context values.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SUPPORTED SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   PRESENCE (truthy) check — include block when the value exists and is
 *   non-empty. This is how a template consumes an optional upstream stage:
 *
 *     {{#if stage.kb_research}}
 *     Knowledge-base findings:
 *     {{stage.kb_research}}
 *     {{/if}}
 *
 *   EQUALITY check — include block when value matches a literal:
 *
 *     {{#if verdict.status == "approved"}}
 *     Mark the article as publish-ready.
 *     {{/if}}
 *
 *   INEQUALITY check — include block when value does NOT match:
 *
 *     {{#if iteration.number != "1"}}
 *     This is a repeat revision; earlier fixes did not fully land.
 *     {{/if}}
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONSTRAINTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   - No nesting — `{{#if}}` blocks cannot contain other `{{#if}}` blocks
 *   - No `{{#else}}` — use a separate `{{#if}}` with `!=` instead
 *   - No arbitrary expressions — only variable references and string literals
 *   - Variable names validated at parse time
 *   - Enum values validated at parse time for variables with known value sets
 *   - Absent variables evaluate to false for truthy and ==, true for !=
 */

import { isPromptVariable, type PromptVariable } from "./context.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Supported conditional operators. */
export type ConditionalOperator = "==" | "!=" | "truthy";

/**
 * A parsed conditional block from a template.
 */
export interface ConditionalBlock {
  /** The context variable being tested. */
  variable: PromptVariable;
  /** The comparison operator. */
  operator: ConditionalOperator;
  /** The literal value for == / != comparisons (undefined for truthy). */
  value?: string;
  /** The body text inside the block (may contain {{var}} placeholders). */
  body: string;
  /** The full raw text of the block including opening/closing tags. */
  raw: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConditionalParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" has invalid conditional(s):\n  - ${issues.join("\n  - ")}`
    );
    this.name = "ConditionalParseError";
  }
}

// ---------------------------------------------------------------------------
// Enum validation map
// ---------------------------------------------------------------------------

/**
 * Variables with constrained values. `==` / `!=` comparisons against these
 * are checked at parse time; other variables accept any literal.
 */
const ENUM_VALUES: Partial<Record<PromptVariable, ReadonlySet<string>>> = {
  "verdict.status": new Set(["approved", "rejected"]),
  "standards.perspective": new Set(["first person plural", "second person", "third person"]),
};

/**
 * Check whether a variable has a known enum value set.
 */
export function getEnumValues(variable: PromptVariable): ReadonlySet<string> | undefined {
  return ENUM_VALUES[variable];
}

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches `{{#if variable}}`, `{{#if variable == "value"}}`, or
 * `{{#if variable != "value"}}` followed by body and `{{/if}}`.
 *
 * Groups:
 *   1: variable name
 *   2: operator (== or !=), optional
 *   3: comparison value (inside quotes), optional
 *   4: body content
 */
const CONDITIONAL_RE =
  /\{\{#if\s+([a-zA-Z][a-zA-Z0-9_.]*)\s*(?:(==|!=)\s*"([^"]*)")?\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;

/**
 * Detects nested conditionals (invalid).
 */
const NESTED_IF_RE = /\{\{#if\s/;

function toOperator(raw: string | undefined): ConditionalOperator {
  if (raw === "==" || raw === "!=") return raw;
  return "truthy";
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Extract all conditional blocks from a template source string.
 *
 * @throws ConditionalParseError if blocks reference invalid variables or enum values
 */
export function parseConditionalBlocks(
  source: string,
  templateName: string
): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];

  for (const match of source.matchAll(CONDITIONAL_RE)) {
    const [raw, variable = "", operator, value, body = ""] = match;

    if (!isPromptVariable(variable)) {
      issues.push(`Unknown variable "${variable}" in conditional`);
      continue;
    }

    if (NESTED_IF_RE.test(body)) {
      issues.push(
        `Nested conditionals are not supported (found {{#if inside {{#if ${variable}…}})`
      );
      continue;
    }

    const op = toOperator(operator);

    if (op !== "truthy" && value !== undefined) {
      const enumSet = ENUM_VALUES[variable];
      if (enumSet && !enumSet.has(value)) {
        const allowed = [...enumSet].sort().join(", ");
        issues.push(
          `Invalid value "${value}" for "${variable}" (allowed: ${allowed})`
        );
        continue;
      }
    }

    blocks.push({
      variable,
      operator: op,
      value: op !== "truthy" ? value : undefined,
      body,
      raw,
    });
  }

  // Check for unmatched {{#if}} or {{/if}} tags
  const openTags = source.match(/\{\{#if\s/g) ?? [];
  const closeTags = source.match(/\{\{\/if\}\}/g) ?? [];
  if (openTags.length !== closeTags.length) {
    issues.push(
      `Mismatched conditional tags: ${openTags.length} opening {{#if}}, ${closeTags.length} closing {{/if}}`
    );
  }

  if (issues.length > 0) {
    throw new ConditionalParseError(templateName, issues);
  }

  return blocks;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Evaluate a single conditional block against a context value.
 *
 *   - truthy: present and non-empty
 *   - ==: present and an exact string match
 *   - !=: absent, or not an exact string match
 */
export function evaluateCondition(
  block: Pick<ConditionalBlock, "operator" | "value">,
  contextValue: string | undefined
): boolean {
  switch (block.operator) {
    case "truthy":
      return contextValue !== undefined && contextValue !== "";

    case "==":
      return contextValue !== undefined && contextValue === block.value;

    case "!=":
      return contextValue === undefined || contextValue !== block.value;
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve all conditional blocks in a template source string.
 *
 * Each `{{#if …}}…{{/if}}` block is replaced with its body when the
 * condition holds, or removed otherwise.
 *
 * @param lookup - Returns the context value for a variable name, or undefined
 */
export function resolveConditionals(
  source: string,
  lookup: (name: string) => string | undefined
): string {
  return source.replace(
    CONDITIONAL_RE,
    (_match, variable: string, op: string | undefined, value: string | undefined, body: string) =>
      evaluateCondition({ operator: toOperator(op), value }, lookup(variable)) ? body : ""
  );
}
