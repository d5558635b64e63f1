/**
 * Validation gate output.
 */

import type { DataClass } from "../config/pipeline/index.js";

export type IssueSeverity = "blocking" | "warning";

interface IssueBase {
  readonly description: string;
  readonly severity: IssueSeverity;
}

export interface LengthIssue extends IssueBase {
  readonly rule: "length";
  readonly actual: number;
  readonly required: number;
}

export interface CitationCountIssue extends IssueBase {
  readonly rule: "citations";
  readonly actual: number;
  readonly required: number;
}

export interface DiversityIssue extends IssueBase {
  readonly rule: "diversity";
  readonly actual: number;
  readonly required: number;
  readonly domains: readonly string[];
}

export interface StructureIssue extends IssueBase {
  readonly rule: "structure";
  readonly kind: "missing" | "forbidden";
  readonly section: string;
}

export interface FreshnessIssue extends IssueBase {
  readonly rule: "freshness";
  readonly url: string;
  readonly dataClass: DataClass;
  readonly windowDays: number;
  /** Citation date; absent when the citation carries none */
  readonly date?: string;
  readonly ageDays?: number;
}

/** Issue raised by a pluggable DraftRule. */
export interface CustomIssue extends IssueBase {
  readonly rule: "custom";
  readonly ruleId: string;
  /** Offending excerpts, for the fix request */
  readonly excerpts: readonly string[];
}

export type ValidationIssue =
  | LengthIssue
  | CitationCountIssue
  | DiversityIssue
  | StructureIssue
  | FreshnessIssue
  | CustomIssue;

export type IssueRule = ValidationIssue["rule"];

export interface VerdictMetrics {
  readonly wordCount: number;
  readonly citationCount: number;
  readonly distinctDomainCount: number;
}

export interface ValidationVerdict {
  /** True iff no blocking issue exists */
  readonly approved: boolean;
  /** Issues in rule-evaluation order */
  readonly issues: readonly ValidationIssue[];
  readonly metrics: VerdictMetrics;
}
