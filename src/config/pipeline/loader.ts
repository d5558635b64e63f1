/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Merging defaults, an optional config file, and per-run overrides
 * - Validating against the schema with fail-fast behavior
 * - Checking cross-field constraints Zod can't express
 * - Freezing configuration to enforce immutability for the run
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ZodIssue } from "zod";

import { PipelineConfigSchema, type PipelineConfig, type RunPolicy } from "./schema.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or a local code for cross-field checks */
  code: string;
}

/**
 * Per-run overrides accepted from the run invocation surface.
 * `minSources` is the citation-count threshold.
 */
export interface RunOverrides {
  wordCountTarget?: number;
  minWordCount?: number;
  minSources?: number;
  minDistinctDomains?: number;
  maxIterations?: number;
  skipKnowledgeBase?: boolean;
  stageTimeoutMs?: number;
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Cross-field checks on a schema-valid policy.
 */
function checkPolicyConstraints(policy: RunPolicy): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  const required = new Set(policy.requiredSections.map((s) => s.toLowerCase()));
  for (const forbidden of policy.forbiddenSections) {
    if (required.has(forbidden.toLowerCase())) {
      issues.push({
        path: ["policy", "forbiddenSections"],
        message: `"${forbidden}" cannot be both required and forbidden`,
        code: "contradiction",
      });
    }
  }

  return issues;
}

/**
 * Validate and load pipeline configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen PipelineConfig
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown): Readonly<PipelineConfig> {
  const result = PipelineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  const crossField = checkPolicyConstraints(result.data.policy);
  if (crossField.length > 0) {
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${crossField.length} validation error(s)`,
      crossField
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate pipeline configuration without loading.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);

  if (!result.success) {
    return { success: false, errors: formatZodIssues(result.error.issues) };
  }

  const crossField = checkPolicyConstraints(result.data.policy);
  if (crossField.length > 0) {
    return { success: false, errors: crossField };
  }

  return { success: true, config: result.data };
}

/**
 * Load a pipeline configuration file and layer it over the defaults.
 *
 * The file may be partial: top-level sections (`policy`, `retrieval`,
 * `stages`) are merged one level deep, so a file containing only
 * `{"policy": {"maxIterations": 5}}` keeps every other default.
 */
export function loadPipelineConfigFile(path: string): Readonly<PipelineConfig> {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new PipelineConfigError(`Pipeline config file not found: ${fullPath}`, [
      { path: [], message: `file not found: ${fullPath}`, code: "not_found" },
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PipelineConfigError(`Pipeline config is not valid JSON: ${fullPath}`, [
      { path: [], message, code: "invalid_json" },
    ]);
  }

  return loadPipelineConfig(mergeOverDefaults(raw));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function mergeOverDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;

  const merged: Record<string, unknown> = { ...raw };
  const sections: Record<string, object> = {
    policy: DEFAULT_PIPELINE_CONFIG.policy,
    retrieval: DEFAULT_PIPELINE_CONFIG.retrieval,
    stages: DEFAULT_PIPELINE_CONFIG.stages,
  };

  for (const [key, defaults] of Object.entries(sections)) {
    const value = raw[key];
    if (value === undefined) {
      merged[key] = defaults;
    } else if (isRecord(value)) {
      merged[key] = { ...defaults, ...value };
    }
  }

  return merged;
}

/**
 * Apply per-run overrides and re-validate.
 * Returns a new frozen config; the input is left untouched.
 */
export function applyRunOverrides(
  base: Readonly<PipelineConfig>,
  overrides: RunOverrides
): Readonly<PipelineConfig> {
  const policy: RunPolicy = {
    ...base.policy,
    wordCountTarget: overrides.wordCountTarget ?? base.policy.wordCountTarget,
    minWordCount: overrides.minWordCount ?? base.policy.minWordCount,
    minCitations: overrides.minSources ?? base.policy.minCitations,
    minDistinctDomains: overrides.minDistinctDomains ?? base.policy.minDistinctDomains,
    maxIterations: overrides.maxIterations ?? base.policy.maxIterations,
    skipKnowledgeBase: overrides.skipKnowledgeBase ?? base.policy.skipKnowledgeBase,
    stageTimeoutMs: overrides.stageTimeoutMs ?? base.policy.stageTimeoutMs,
  };

  return loadPipelineConfig({ ...base, policy });
}
