/**
 * Rule sets.
 *
 * A RuleSet is everything the gate needs to judge a draft, built once per
 * run from that run's policy and standards. It carries its own reference
 * date so validation never reads the clock.
 */

import type { DataClass, RunPolicy } from "../config/pipeline/index.js";
import type { EditorialStandards } from "../standards/index.js";
import type { CustomIssue, Draft } from "../types/index.js";
import {
  forbiddenPhrasesRule,
  sourceCredibilityRule,
  unsourcedStatisticsRule,
  vagueReferencesRule,
} from "./extra-rules.js";

/**
 * A pluggable check evaluated after the built-in rules. Must be pure.
 */
export interface DraftRule {
  readonly id: string;
  check(draft: Readonly<Draft>): CustomIssue[];
}

export interface FreshnessRule {
  /** Maximum citation age in days, per data class */
  readonly windowsDays: Readonly<Record<DataClass, number>>;
  /** "Today" for age computation, YYYY-MM-DD */
  readonly referenceDate: string;
}

export interface RuleSet {
  readonly minWordCount: number;
  readonly minCitations: number;
  readonly minDistinctDomains: number;
  readonly requiredSections: readonly string[];
  readonly forbiddenSections: readonly string[];
  /** Absent when the freshness rule is disabled */
  readonly freshness?: FreshnessRule;
  readonly extraRules: readonly DraftRule[];
}

/**
 * Build the rule set for one run.
 *
 * @param referenceDate - Run creation time; its UTC date anchors freshness
 */
export function buildRuleSet(
  policy: Readonly<RunPolicy>,
  standards: Readonly<EditorialStandards>,
  referenceDate: Date
): RuleSet {
  const extraRules: DraftRule[] = [unsourcedStatisticsRule()];
  if (standards.forbiddenPhrases.length > 0) {
    extraRules.push(forbiddenPhrasesRule(standards.forbiddenPhrases));
  }
  if (standards.vagueReferences.length > 0) {
    extraRules.push(vagueReferencesRule(standards.vagueReferences));
  }
  if (standards.sourceCredibility) {
    extraRules.push(sourceCredibilityRule(standards.sourceCredibility));
  }

  return Object.freeze({
    minWordCount: policy.minWordCount,
    minCitations: policy.minCitations,
    minDistinctDomains: policy.minDistinctDomains,
    requiredSections: Object.freeze([...policy.requiredSections]),
    forbiddenSections: Object.freeze([...policy.forbiddenSections]),
    ...(policy.freshness.enabled
      ? {
          freshness: Object.freeze({
            windowsDays: Object.freeze({ ...policy.freshness.windowsDays }),
            referenceDate: referenceDate.toISOString().slice(0, 10),
          }),
        }
      : {}),
    extraRules: Object.freeze(extraRules),
  });
}
