/**
 * Fix requests: a rejected verdict turned into one numbered instruction
 * list for the revision stage.
 */

import type { ValidationIssue, ValidationVerdict } from "../types/index.js";

/**
 * The instruction for a single issue.
 */
export function fixInstruction(issue: ValidationIssue): string {
  switch (issue.rule) {
    case "length":
      return (
        `Expand the article by at least ${Math.max(issue.required - issue.actual, 1)} words ` +
        `(currently ${issue.actual}, minimum ${issue.required}) by deepening existing ` +
        `sections with sourced analysis; do not pad.`
      );
    case "citations":
      return (
        `Add at least ${issue.required - issue.actual} additional independently sourced ` +
        `inline citations in the form [Source, Date](URL) (currently ${issue.actual}, ` +
        `minimum ${issue.required}).`
      );
    case "diversity":
      return (
        `Cite at least ${issue.required - issue.actual} additional distinct source domain(s)` +
        (issue.domains.length > 0 ? ` beyond ${issue.domains.join(", ")}` : "") +
        `.`
      );
    case "structure":
      return issue.kind === "missing"
        ? `Add a "${issue.section}" section as a level-2 heading.`
        : `Remove the "${issue.section}" section and fold any essential content into other sections.`;
    case "freshness":
      return issue.date
        ? `Replace the citation ${issue.url} (dated ${issue.date}) with a source from ` +
            `the last ${issue.windowDays} days.`
        : `Add the publication date to the citation label for ${issue.url}, or replace it ` +
            `with a source dated within the last ${issue.windowDays} days.`;
    case "custom":
      return issue.excerpts.length > 0
        ? `${issue.description}: ${issue.excerpts.map((e) => `"${e}"`).join("; ")}`
        : issue.description;
  }
}

/**
 * Build the fix request for a verdict: blocking issues numbered in verdict
 * order, then warnings as optional items.
 */
export function buildFixRequest(verdict: Readonly<ValidationVerdict>): string {
  const blocking = verdict.issues.filter((i) => i.severity === "blocking");
  const warnings = verdict.issues.filter((i) => i.severity === "warning");

  const lines: string[] = ["Required fixes:"];
  if (blocking.length === 0) {
    lines.push("(none)");
  } else {
    blocking.forEach((issue, i) => lines.push(`${i + 1}. ${fixInstruction(issue)}`));
  }

  if (warnings.length > 0) {
    lines.push("", "Optional improvements:");
    for (const issue of warnings) lines.push(`- ${fixInstruction(issue)}`);
  }

  return lines.join("\n");
}
