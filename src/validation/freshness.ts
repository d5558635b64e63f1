/**
 * Freshness rule: data-bearing citations must be dated and recent.
 */

import type { DataClass } from "../config/pipeline/index.js";
import type { Citation, FreshnessIssue } from "../types/index.js";
import type { FreshnessRule } from "./rules.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const CLASS_LABELS: Record<DataClass, string> = {
  market_data: "market data",
  allocation_data: "allocation data",
};

/**
 * Whole days from `date` to `referenceDate`, both YYYY-MM-DD. Negative
 * when the date is after the reference.
 */
export function ageInDays(date: string, referenceDate: string): number {
  const from = Date.parse(`${date}T00:00:00Z`);
  const to = Date.parse(`${referenceDate}T00:00:00Z`);
  return Math.floor((to - from) / DAY_MS);
}

/**
 * One blocking issue per cited URL whose data-bearing citation is undated
 * or older than its class window. Citations without a data class are
 * not checked.
 */
export function checkFreshness(
  citations: readonly Citation[],
  rule: FreshnessRule
): FreshnessIssue[] {
  const issues: FreshnessIssue[] = [];
  const reported = new Set<string>();

  for (const citation of citations) {
    const dataClass = citation.dataClass;
    if (!dataClass || reported.has(citation.url)) continue;

    const windowDays = rule.windowsDays[dataClass];
    const label = CLASS_LABELS[dataClass];

    if (!citation.date) {
      reported.add(citation.url);
      issues.push({
        rule: "freshness",
        severity: "blocking",
        url: citation.url,
        dataClass,
        windowDays,
        description: `Citation ${citation.url} supports ${label} but carries no date`,
      });
      continue;
    }

    const ageDays = ageInDays(citation.date, rule.referenceDate);
    if (ageDays > windowDays) {
      reported.add(citation.url);
      issues.push({
        rule: "freshness",
        severity: "blocking",
        url: citation.url,
        dataClass,
        windowDays,
        date: citation.date,
        ageDays,
        description:
          `Citation ${citation.url} is ${ageDays} days old; ` +
          `${label} must be within ${windowDays} days`,
      });
    }
  }

  return issues;
}
