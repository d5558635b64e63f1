/**
 * Run artifacts.
 *
 * An approved run produces the article, metadata, social and summary
 * artifacts. A failed run produces only a diagnostic: the failure reason,
 * the last verdict's full issue list when there is one, and the stage
 * history.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import type { EditorialStandards } from "../standards/index.js";
import type {
  Artifact,
  ArtifactName,
  Draft,
  RunFailure,
  RunReport,
  RunSetup,
  RunSnapshot,
  ValidationVerdict,
} from "../types/index.js";

function artifact(setup: RunSetup, name: ArtifactName, content: string): Artifact {
  const text = content.endsWith("\n") ? content : `${content}\n`;
  return Object.freeze({ name, filename: `${setup.prefix}-${name}.md`, content: text });
}

/**
 * The article body, with the standards disclaimer appended when the draft
 * does not already carry it.
 */
export function articleContent(draft: Readonly<Draft>, disclaimer: string): string {
  const body = draft.body.trimEnd();
  if (body.toLowerCase().includes(disclaimer.toLowerCase())) return body;
  return `${body}\n\n---\n\n*${disclaimer}*`;
}

export interface ApprovedOutputs {
  draft: Readonly<Draft>;
  metadata: string;
  social: string;
  summary: string;
}

export function approvedArtifacts(
  setup: RunSetup,
  outputs: ApprovedOutputs,
  standards: Readonly<EditorialStandards>
): Artifact[] {
  return [
    artifact(setup, "article", articleContent(outputs.draft, standards.disclaimer)),
    artifact(setup, "metadata", outputs.metadata),
    artifact(setup, "social", outputs.social),
    artifact(setup, "summary", outputs.summary),
  ];
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

/** One-line description of a run failure. */
export function describeFailure(failure: RunFailure): string {
  switch (failure.kind) {
    case "exhausted":
      return (
        `Revision budget exhausted after ${failure.iterations} iteration(s); ` +
        `the last draft still has ${failure.verdict.issues.filter((i) => i.severity === "blocking").length} blocking issue(s)`
      );
    case "stage_failed":
      return (
        `Mandatory stage "${failure.stageName}" failed: ${failure.error.message}` +
        (failure.error.status !== undefined ? ` (status ${failure.error.status})` : "") +
        (failure.error.timedOut ? " (timed out)" : "")
      );
    case "missing_context":
      return failure.message;
    case "cancelled":
      return `Run cancelled: ${failure.message}`;
    case "configuration":
      return `Configuration error: ${failure.message}`;
  }
}

function verdictLines(verdict: ValidationVerdict): string[] {
  const lines = [
    "## Last verdict",
    "",
    `- Approved: ${verdict.approved ? "yes" : "no"}`,
    `- Words: ${verdict.metrics.wordCount}`,
    `- Citations: ${verdict.metrics.citationCount}`,
    `- Distinct domains: ${verdict.metrics.distinctDomainCount}`,
    "",
    "### Issues",
    "",
  ];
  if (verdict.issues.length === 0) {
    lines.push("(none)");
  } else {
    verdict.issues.forEach((issue, i) => {
      lines.push(`${i + 1}. [${issue.severity}] ${issue.rule}: ${issue.description}`);
    });
  }
  return lines;
}

/**
 * Render the diagnostic artifact for a failed run.
 */
export function diagnosticContent(
  run: RunSnapshot,
  verdict: ValidationVerdict | undefined
): string {
  const lines = [
    `# Run failed: ${run.topic}`,
    "",
    `- Run: ${run.id}`,
    `- Started: ${run.createdAt}`,
    `- Status: ${run.status}`,
    `- Iterations: ${run.iterationCount} of ${run.maxIterations}`,
    "",
    "## Reason",
    "",
    run.failure ? describeFailure(run.failure) : "Unknown",
    "",
  ];

  if (verdict) lines.push(...verdictLines(verdict), "");

  lines.push("## Stage history", "", "| # | Stage | Result | Duration (ms) | Tokens in/out |", "|---|---|---|---|---|");
  run.history.forEach((r, i) => {
    const outcome = r.success ? "ok" : `failed: ${r.error.message.replace(/\|/g, "\\|")}`;
    lines.push(
      `| ${i + 1} | ${r.stageName} | ${outcome} | ${r.durationMs} | ` +
        `${r.usage.inputTokens}/${r.usage.outputTokens} |`
    );
  });

  return lines.join("\n");
}

export function diagnosticArtifacts(
  setup: RunSetup,
  run: RunSnapshot,
  verdict: ValidationVerdict | undefined
): Artifact[] {
  return [artifact(setup, "diagnostic", diagnosticContent(run, verdict))];
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

/**
 * Write a report's artifacts to `<outputDir>/<date>-<slug>/`.
 * @returns the written file paths
 */
export function writeArtifacts(report: RunReport, outputDir: string): string[] {
  const folder = resolve(outputDir, report.setup.folder);
  mkdirSync(folder, { recursive: true });

  return report.artifacts.map((a) => {
    const path = join(folder, a.filename);
    writeFileSync(path, a.content, "utf-8");
    return path;
  });
}
