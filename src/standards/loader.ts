/**
 * Editorial standards loader.
 *
 * NORMALIZATION:
 * The loader normalizes inputs by:
 * - Applying default values for optional fields
 * - Lowercasing and sorting forbidden phrases, vague references and
 *   preferred domains; lowercasing credibility domains
 * - Validating cross-field constraints
 * - Deep freezing for immutability
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { deepFreeze } from "../config/pipeline/index.js";
import {
  EditorialStandardsSchema,
  type EditorialStandards,
} from "./editorial-schema.js";

/**
 * Validation error for standards loading.
 */
export class StandardsValidationError extends Error {
  public readonly issues: StandardsIssue[];

  constructor(message: string, issues: StandardsIssue[]) {
    super(message);
    this.name = "StandardsValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Standards validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface StandardsIssue {
  path: string;
  message: string;
  code: string;
}

function lowerKeys(scores: Record<string, number>): Record<string, number> {
  const lowered: Record<string, number> = {};
  for (const [domain, score] of Object.entries(scores)) {
    lowered[domain.trim().toLowerCase().replace(/^www\./, "")] = score;
  }
  return lowered;
}

function normalizeEditorialStandards(standards: EditorialStandards): EditorialStandards {
  const lowerSorted = (values: readonly string[]): string[] =>
    [...new Set(values.map((v) => v.trim().toLowerCase()))].sort();

  return {
    ...standards,
    tone: {
      ...standards.tone,
      primary: [...standards.tone.primary].sort(),
      avoid: [...standards.tone.avoid].sort(),
    },
    forbiddenPhrases: lowerSorted(standards.forbiddenPhrases),
    preferredDomains: lowerSorted(standards.preferredDomains),
    vagueReferences: lowerSorted(standards.vagueReferences),
    ...(standards.sourceCredibility
      ? {
          sourceCredibility: {
            ...standards.sourceCredibility,
            domainScores: lowerKeys(standards.sourceCredibility.domainScores),
          },
        }
      : {}),
  };
}

/**
 * Validate additional constraints that Zod can't express.
 */
function validateEditorialConstraints(standards: EditorialStandards): StandardsIssue[] {
  const issues: StandardsIssue[] = [];

  if (standards.seo.descriptionMinLength > standards.seo.descriptionMaxLength) {
    issues.push({
      path: "seo.descriptionMinLength",
      message: "min description length must be <= max",
      code: "invalid_range",
    });
  }

  const primarySet = new Set(standards.tone.primary);
  for (const avoided of standards.tone.avoid) {
    if (primarySet.has(avoided)) {
      issues.push({
        path: "tone",
        message: `"${avoided}" cannot be both primary and avoided`,
        code: "contradiction",
      });
    }
  }

  return issues;
}

/**
 * Load and validate editorial standards from raw input.
 *
 * @param input - Raw standards object or JSON string
 * @throws StandardsValidationError if validation fails
 */
export function loadEditorialStandards(input: unknown): Readonly<EditorialStandards> {
  let data: unknown = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StandardsValidationError("Editorial standards are not valid JSON", [
        { path: "(root)", message, code: "invalid_json" },
      ]);
    }
  }

  const result = EditorialStandardsSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join(".") || "(root)",
      message: i.message,
      code: i.code,
    }));
    throw new StandardsValidationError(
      `Editorial standards validation failed: ${issues.length} error(s)`,
      issues
    );
  }

  const constraintIssues = validateEditorialConstraints(result.data);
  if (constraintIssues.length > 0) {
    throw new StandardsValidationError(
      "Editorial standards constraint validation failed",
      constraintIssues
    );
  }

  return deepFreeze(normalizeEditorialStandards(result.data));
}

/**
 * Load editorial standards from a JSON file.
 */
export function loadEditorialStandardsFromFile(filePath: string): Readonly<EditorialStandards> {
  const fullPath = resolve(filePath);
  if (!existsSync(fullPath)) {
    throw new StandardsValidationError(`Standards file not found: ${fullPath}`, [
      { path: "(file)", message: `not found: ${fullPath}`, code: "not_found" },
    ]);
  }
  return loadEditorialStandards(readFileSync(fullPath, "utf-8"));
}
