#!/usr/bin/env node
/**
 * CLI tool to preview and diff rendered stage prompts.
 *
 * Renders one stage's prompt for a topic exactly as the pipeline would,
 * with placeholder text standing in for upstream stage outputs and
 * retrieved passages. No provider is called. Optionally saves the result
 * as a named snapshot and diffs later renders against it, so a template
 * or config edit that shifts a prompt shows up before any tokens are
 * spent.
 *
 * Usage:
 *   npm run preview-prompt -- --stage writer --topic "Private credit outlook"
 *   npm run preview-prompt -- --stage revision --topic "Private credit outlook" --draft draft.md
 *   npm run preview-prompt -- --stage writer --topic "Private credit outlook" --save baseline
 *   npm run preview-prompt -- --stage writer --topic "Private credit outlook" --against baseline
 *
 * Exit codes:
 *   0 - Success (preview, or diff with no differences)
 *   1 - Error (unknown stage, template or missing context)
 *   2 - Diff found differences
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  DEFAULT_PIPELINE_CONFIG,
  LlmStageName,
  loadPipelineConfig,
  loadPipelineConfigFile,
  type PipelineConfig,
} from "../config/pipeline/index.js";
import { ConfigError } from "../config/env.js";
import { STAGE_CATALOG, deriveSetup } from "../pipeline/index.js";
import {
  PromptTemplateLoader,
  buildDraftContext,
  buildRunContext,
  renderPrompt,
  stageVariable,
  type PromptContext,
  type StageVariable,
} from "../prompts/index.js";
import {
  loadEditorialStandardsFromFile,
  type EditorialStandards,
} from "../standards/index.js";
import { parseDraft } from "../validation/index.js";
import { isEntryPoint } from "./entry.js";

// ============================================================
// Types
// ============================================================

export interface PreviewOptions {
  stage: LlmStageName;
  topic: string;
  loader: PromptTemplateLoader;
  config: Readonly<PipelineConfig>;
  standards: Readonly<EditorialStandards>;
  /** Markdown draft supplying the `draft.*` variables */
  draftText?: string;
  now?: Date;
}

export interface PreviewResult {
  stage: LlmStageName;
  templateName: string;
  rendered: string;
  metadata: {
    topic: string;
    upstream: LlmStageName[];
    retrieval: string | null;
    variableCount: number;
    lineCount: number;
    charCount: number;
  };
}

interface DiffLine {
  type: "added" | "removed" | "context";
  lineNumber: number;
  text: string;
}

export interface DiffResult {
  snapshotId: string;
  hasChanges: boolean;
  added: number;
  removed: number;
  unchanged: number;
  lines: DiffLine[];
}

// ============================================================
// Preview Logic
// ============================================================

/** Per-invocation variables filled with `<name>` unless a draft is given. */
const PLACEHOLDER_VARIABLES = [
  "retrieval.passages",
  "draft.body",
  "draft.wordCount",
  "draft.citationCount",
  "draft.distinctDomainCount",
  "draft.sections",
  "fix.instructions",
  "verdict.status",
  "verdict.summary",
] as const;

function placeholders(): PromptContext {
  const context: Partial<Record<(typeof PLACEHOLDER_VARIABLES)[number], string>> = {};
  for (const name of PLACEHOLDER_VARIABLES) context[name] = `<${name}>`;
  return { ...context, "iteration.number": "1" };
}

/**
 * Render a stage prompt without calling any provider.
 *
 * @throws MissingContextError if the template needs a value the preview cannot supply
 */
export function renderPreview(options: PreviewOptions): PreviewResult {
  const { stage, loader, config, standards } = options;
  const definition = STAGE_CATALOG[stage];
  const setup = deriveSetup(options.topic, options.now ?? new Date());

  const template = loader.load(definition.template);

  const upstream: Partial<Record<StageVariable, string>> = {};
  for (const name of definition.reads) upstream[stageVariable(name)] = `<${name} output>`;

  const context: PromptContext = {
    ...placeholders(),
    ...buildRunContext({
      topic: setup.topic,
      runId: "preview",
      date: setup.date,
      policy: config.policy,
      standards,
    }),
    ...(options.draftText !== undefined ? buildDraftContext(parseDraft(options.draftText)) : {}),
    ...upstream,
  };

  const rendered = renderPrompt(template, context, { stageName: stage });

  return {
    stage,
    templateName: definition.template,
    rendered,
    metadata: {
      topic: setup.topic,
      upstream: [...definition.reads],
      retrieval: definition.retrieval ?? null,
      variableCount: template.variables.length,
      lineCount: rendered.split("\n").length,
      charCount: rendered.length,
    },
  };
}

// ============================================================
// Snapshot Management
// ============================================================

/** Default directory for named prompt snapshots. */
const SNAPSHOT_DIR = "output/prompt-snapshots";

export function snapshotPath(dir: string, snapshotId: string, stage: LlmStageName): string {
  return resolve(join(dir, `${snapshotId}--${stage}.txt`));
}

export function saveSnapshot(
  dir: string,
  snapshotId: string,
  stage: LlmStageName,
  rendered: string
): string {
  mkdirSync(resolve(dir), { recursive: true });
  const filePath = snapshotPath(dir, snapshotId, stage);
  writeFileSync(filePath, rendered, "utf-8");
  return filePath;
}

export function loadSnapshot(dir: string, snapshotId: string, stage: LlmStageName): string {
  const filePath = snapshotPath(dir, snapshotId, stage);
  if (!existsSync(filePath)) {
    throw new ConfigError(
      `Snapshot not found: ${filePath}\nSave a snapshot first with: --save ${snapshotId}`
    );
  }
  return readFileSync(filePath, "utf-8");
}

// ============================================================
// Diff Engine
// ============================================================

/**
 * Replace values that change on every render (run IDs, dates,
 * timestamps) with stable placeholders.
 */
export function normalizeForDiff(text: string): string {
  return text
    .replace(/\b\d{8}-[0-9a-f]{6}\b/g, "<RUN_ID>")
    .replace(/\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\S*/g, "<TIMESTAMP>")
    .replace(/\b\d{4}-\d{2}-\d{2}\b/g, "<DATE>");
}

function linesEqual(a: string, b: string): boolean {
  return a.trimEnd() === b.trimEnd();
}

/**
 * Line-level diff by longest common subsequence. Trailing whitespace is
 * ignored.
 */
export function computeDiff(oldText: string, newText: string): DiffResult {
  const oldLines = oldText.split("\n");
  const newLines = newText.split("\n");
  const m = oldLines.length;
  const n = newLines.length;

  // lcs[i][j]: LCS length of oldLines[i..] and newLines[j..]
  const lcs: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let i = m - 1; i >= 0; i--) {
    for (let j = n - 1; j >= 0; j--) {
      lcs[i][j] = linesEqual(oldLines[i], newLines[j])
        ? lcs[i + 1][j + 1] + 1
        : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  const lines: DiffLine[] = [];
  let i = 0;
  let j = 0;
  while (i < m || j < n) {
    if (i < m && j < n && linesEqual(oldLines[i], newLines[j])) {
      lines.push({ type: "context", lineNumber: j + 1, text: newLines[j] });
      i++;
      j++;
    } else if (i < m && (j === n || lcs[i + 1][j] >= lcs[i][j + 1])) {
      lines.push({ type: "removed", lineNumber: i + 1, text: oldLines[i] });
      i++;
    } else {
      lines.push({ type: "added", lineNumber: j + 1, text: newLines[j] });
      j++;
    }
  }

  const added = lines.filter((l) => l.type === "added").length;
  const removed = lines.filter((l) => l.type === "removed").length;

  return {
    snapshotId: "",
    hasChanges: added > 0 || removed > 0,
    added,
    removed,
    unchanged: lines.length - added - removed,
    lines,
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

let useColors = process.stdout.isTTY === true && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * Format a diff for the terminal, showing changed lines with
 * `contextLines` of surrounding context.
 */
export function formatDiff(diff: DiffResult, contextLines = 3): string {
  if (!diff.hasChanges) return c("green", "No differences found.");

  const output = [
    c("bold", `─── Diff against snapshot: ${diff.snapshotId} ───`),
    c("red", `  - ${diff.removed} removed`) +
      "  " +
      c("green", `+ ${diff.added} added`) +
      "  " +
      c("dim", `${diff.unchanged} unchanged`),
    "",
  ];

  const shown = new Set<number>();
  diff.lines.forEach((line, i) => {
    if (line.type === "context") return;
    const from = Math.max(0, i - contextLines);
    const to = Math.min(diff.lines.length - 1, i + contextLines);
    for (let k = from; k <= to; k++) shown.add(k);
  });

  let lastShown = -1;
  diff.lines.forEach((line, i) => {
    if (!shown.has(i)) return;
    if (lastShown !== -1 && i > lastShown + 1) output.push(c("dim", "  ..."));
    lastShown = i;

    switch (line.type) {
      case "added":
        output.push(c("green", `+ ${line.text}`));
        break;
      case "removed":
        output.push(c("red", `- ${line.text}`));
        break;
      case "context":
        output.push(c("dim", `  ${line.text}`));
        break;
    }
  });

  return output.join("\n");
}

function printPreviewHeader(result: PreviewResult): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Prompt Preview"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
  console.log(`  ${c("cyan", "Stage:")}      ${result.stage}`);
  console.log(`  ${c("cyan", "Template:")}   ${result.templateName}`);
  console.log(`  ${c("cyan", "Topic:")}      ${result.metadata.topic}`);
  console.log(`  ${c("cyan", "Upstream:")}   ${result.metadata.upstream.join(", ") || "(none)"}`);
  console.log(`  ${c("cyan", "Retrieval:")}  ${result.metadata.retrieval ?? "(none)"}`);
  console.log(`  ${c("cyan", "Lines:")}      ${result.metadata.lineCount}`);
  console.log(`  ${c("cyan", "Characters:")} ${result.metadata.charCount}`);
  console.log(`  ${c("cyan", "Variables:")}  ${result.metadata.variableCount}`);
  console.log("");
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Main
// ============================================================

const USAGE = `
Usage: preview-prompt --stage <name> --topic <text> [options]

Options:
  --stage <name>          Stage to render (${LlmStageName.options.join(", ")})
  --topic <text>          Article topic
  --draft <path>          Markdown draft supplying the draft.* variables
  --config <path>         Pipeline config JSON (default: built-in defaults)
  --standards <path>      Editorial standards JSON (default: config/editorial-standards.json)
  --prompts <dir>         Prompt template directory (default: prompts/)
  --save <snapshotId>     Save the rendered prompt as a named snapshot
  --against <snapshotId>  Diff the rendered prompt against a saved snapshot
  --snapshot-dir <dir>    Snapshot directory (default: ${SNAPSHOT_DIR})
  --no-color              Disable ANSI colors
  --json                  Output as JSON
  -h, --help              Show this help message

Exit codes:
  0 - Success (preview or diff with no differences)
  1 - Error (unknown stage, template or missing context)
  2 - Diff found differences
`;

function main(): number {
  const { values: args } = parseArgs({
    options: {
      stage: { type: "string" },
      topic: { type: "string" },
      draft: { type: "string" },
      config: { type: "string" },
      standards: { type: "string", default: "config/editorial-standards.json" },
      prompts: { type: "string", default: "prompts" },
      save: { type: "string" },
      against: { type: "string" },
      "snapshot-dir": { type: "string", default: SNAPSHOT_DIR },
      "no-color": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args["no-color"]) useColors = false;

  const stage = LlmStageName.safeParse(args.stage);
  if (!stage.success) {
    throw new ConfigError(
      `--stage must be one of: ${LlmStageName.options.join(", ")}` +
        (args.stage ? ` (got "${args.stage}")` : "")
    );
  }
  if (!args.topic) throw new ConfigError("--topic is required");

  const snapshotDir = args["snapshot-dir"] ?? SNAPSHOT_DIR;
  const preview = renderPreview({
    stage: stage.data,
    topic: args.topic,
    loader: new PromptTemplateLoader(args.prompts ?? "prompts"),
    config: args.config
      ? loadPipelineConfigFile(args.config)
      : loadPipelineConfig(DEFAULT_PIPELINE_CONFIG),
    standards: loadEditorialStandardsFromFile(args.standards ?? "config/editorial-standards.json"),
    ...(args.draft ? { draftText: readFileSync(resolve(args.draft), "utf-8") } : {}),
  });

  if (args.save) {
    const filePath = saveSnapshot(snapshotDir, args.save, preview.stage, preview.rendered);
    if (!args.json) console.error(c("green", `Snapshot saved: ${filePath}`));
  }

  if (args.against) {
    const diff = computeDiff(
      normalizeForDiff(loadSnapshot(snapshotDir, args.against, preview.stage)),
      normalizeForDiff(preview.rendered)
    );
    diff.snapshotId = args.against;

    if (args.json) {
      console.log(JSON.stringify({ mode: "diff", stage: preview.stage, ...diff }, null, 2));
    } else {
      printPreviewHeader(preview);
      console.log(formatDiff(diff));
      console.log("");
    }
    return diff.hasChanges ? 2 : 0;
  }

  if (args.json) {
    console.log(JSON.stringify({ mode: "preview", ...preview }, null, 2));
  } else {
    printPreviewHeader(preview);
    console.log(preview.rendered);
  }
  return 0;
}

// Only run when executed directly (not imported by tests)
if (isEntryPoint(process.argv[1], import.meta.url)) {
  try {
    process.exit(main());
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  }
}
