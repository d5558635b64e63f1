#!/usr/bin/env node
/**
 * Generate one article.
 *
 * Runs the full pipeline for a topic against the real providers and writes
 * the run's artifacts to `<output>/<date>-<slug>/`.
 *
 * Usage:
 *   npm run generate -- --topic "Private credit outlook 2026"
 *   npm run generate -- --topic "Infrastructure debt" --max-iterations 2 --skip-kb --json
 *
 * Options:
 *   --topic <text>            Article topic (required)
 *   --word-count <n>          Word count the writer aims for
 *   --min-words <n>           Minimum words for approval
 *   --min-sources <n>         Minimum distinct cited sources
 *   --max-iterations <n>      Revision budget
 *   --skip-kb                 Skip knowledge-base research
 *   --config <path>           Pipeline config JSON (default: built-in defaults)
 *   --standards <path>        Editorial standards JSON
 *   --prompts <dir>           Prompt template directory
 *   --output <dir>            Output root directory
 *   --json                    Print the run report as JSON
 *   -h, --help                Show help
 *
 * Exit codes:
 *   0 - Article approved
 *   1 - Error (bad arguments, configuration, credentials)
 *   2 - The run failed (exhausted, stage failure, cancelled)
 */

import { join } from "node:path";
import { parseArgs } from "node:util";

import OpenAI from "openai";

import {
  ConfigError,
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfigError,
  config,
  loadPipelineConfig,
  loadPipelineConfigFile,
  validateConfig,
  type RunOverrides,
} from "../config/index.js";
import { maybeEnv, requireEnv } from "../config/env.js";
import { createLogger, initRunId, isLogLevel } from "../logging/index.js";
import { PipelineOrchestrator, describeFailure, writeArtifacts } from "../pipeline/index.js";
import { PromptTemplateLoader } from "../prompts/index.js";
import {
  OpenAICompletionProvider,
  VectorStoreSearchProvider,
  WebSearchProvider,
} from "../providers/index.js";
import {
  StandardsValidationError,
  loadEditorialStandardsFromFile,
} from "../standards/index.js";
import { RunStatus, type RunReport } from "../types/index.js";
import { isEntryPoint } from "./entry.js";

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = `
Usage: generate --topic <text> [options]

Options:
  --topic <text>            Article topic (required)
  --word-count <n>          Word count the writer aims for
  --min-words <n>           Minimum words for approval
  --min-sources <n>         Minimum distinct cited sources
  --max-iterations <n>      Revision budget
  --skip-kb                 Skip knowledge-base research
  --config <path>           Pipeline config JSON (default: built-in defaults)
  --standards <path>        Editorial standards JSON (default: config/editorial-standards.json)
  --prompts <dir>           Prompt template directory (default: prompts/)
  --output <dir>            Output root directory (default: output/)
  --json                    Print the run report as JSON
  -h, --help                Show this help message

Exit codes:
  0 - Article approved
  1 - Error (bad arguments, configuration, credentials)
  2 - The run failed
`;

export interface GenerateArgs {
  help: boolean;
  topic: string;
  overrides: RunOverrides;
  configPath?: string;
  standardsPath: string;
  promptsDir: string;
  outputDir: string;
  json: boolean;
}

export interface PathDefaults {
  standardsPath: string;
  promptsDir: string;
  outputDir: string;
  configPath?: string;
}

function intOption(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`--${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Parse `generate` arguments.
 *
 * @throws ConfigError on a missing topic or a malformed number
 * @throws TypeError on an unknown option
 */
export function parseGenerateArgs(argv: string[], defaults: PathDefaults): GenerateArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      topic: { type: "string" },
      "word-count": { type: "string" },
      "min-words": { type: "string" },
      "min-sources": { type: "string" },
      "max-iterations": { type: "string" },
      "skip-kb": { type: "boolean", default: false },
      config: { type: "string" },
      standards: { type: "string" },
      prompts: { type: "string" },
      output: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const configPath = values.config ?? defaults.configPath;
  const paths = {
    standardsPath: values.standards ?? defaults.standardsPath,
    promptsDir: values.prompts ?? defaults.promptsDir,
    outputDir: values.output ?? defaults.outputDir,
    ...(configPath ? { configPath } : {}),
  };

  if (values.help) {
    return { help: true, topic: "", overrides: {}, json: values.json === true, ...paths };
  }

  const topic = values.topic?.trim() ?? "";
  if (topic === "") {
    throw new ConfigError("--topic is required");
  }

  const overrides: RunOverrides = {};
  const wordCountTarget = intOption("word-count", values["word-count"], 1);
  if (wordCountTarget !== undefined) overrides.wordCountTarget = wordCountTarget;
  const minWordCount = intOption("min-words", values["min-words"], 0);
  if (minWordCount !== undefined) overrides.minWordCount = minWordCount;
  const minSources = intOption("min-sources", values["min-sources"], 0);
  if (minSources !== undefined) overrides.minSources = minSources;
  const maxIterations = intOption("max-iterations", values["max-iterations"], 1);
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;
  if (values["skip-kb"]) overrides.skipKnowledgeBase = true;

  return { help: false, topic, overrides, json: values.json === true, ...paths };
}

// ============================================================
// Output Formatting
// ============================================================

/**
 * Human-readable run summary printed after a run.
 */
export function formatSummary(report: RunReport, paths: readonly string[]): string {
  const { run, usage } = report;
  const lines = [
    `Run ${run.id}: ${run.status}`,
    `  Topic:      ${run.topic}`,
    `  Iterations: ${run.iterationCount} of ${run.maxIterations}`,
    `  Tokens:     ${usage.inputTokens} in / ${usage.outputTokens} out`,
  ];
  if (report.finalVerdict) {
    const { wordCount, citationCount, distinctDomainCount } = report.finalVerdict.metrics;
    lines.push(
      `  Final draft: ${wordCount} words, ${citationCount} citations, ${distinctDomainCount} domains`
    );
  }
  if (run.failure) {
    lines.push(`  Reason:     ${describeFailure(run.failure)}`);
  }
  lines.push("", "Artifacts:", ...paths.map((p) => `  ${p}`));
  return lines.join("\n");
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<number> {
  const args = parseGenerateArgs(process.argv.slice(2), {
    standardsPath: config.standardsPath,
    promptsDir: config.promptsDir,
    outputDir: config.outputDir,
    configPath: config.pipelineConfigPath,
  });

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  initRunId();
  validateConfig({ requireCredentials: true });

  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    logDir: join(args.outputDir, "logs"),
    console: !args.json,
  });

  const pipelineConfig = args.configPath
    ? loadPipelineConfigFile(args.configPath)
    : loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
  const standards = loadEditorialStandardsFromFile(args.standardsPath);

  const client = new OpenAI({ apiKey: requireEnv("OPENAI_API_KEY"), maxRetries: 0 });
  const vectorStoreId = config.vectorStoreId;

  const overrides: RunOverrides = { ...args.overrides };
  if (maybeEnv("STAGE_TIMEOUT_MS") !== undefined) {
    overrides.stageTimeoutMs = config.stageTimeoutMs;
  }
  if (!vectorStoreId && !overrides.skipKnowledgeBase && !pipelineConfig.policy.skipKnowledgeBase) {
    logger.warn("VECTOR_STORE_ID is not set; skipping knowledge-base research");
    overrides.skipKnowledgeBase = true;
  }

  const orchestrator = new PipelineOrchestrator({
    completion: OpenAICompletionProvider.fromClient(client),
    search: {
      web: new WebSearchProvider({ apiKey: requireEnv("SERPER_API_KEY") }),
      ...(vectorStoreId
        ? { knowledge_base: VectorStoreSearchProvider.fromClient(client, vectorStoreId) }
        : {}),
    },
    standards,
    config: pipelineConfig,
    loader: new PromptTemplateLoader(args.promptsDir),
    logger,
  });

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("interrupted; cancelling run");
    controller.abort();
  });

  const report = await orchestrator.generate(args.topic, {
    ...overrides,
    signal: controller.signal,
  });
  const paths = writeArtifacts(report, args.outputDir);

  if (args.json) {
    console.log(JSON.stringify({ ...report, paths }, null, 2));
  } else {
    console.log(formatSummary(report, paths));
  }

  return report.run.status === RunStatus.Approved ? 0 : 2;
}

// Only run when executed directly (not imported by tests)
if (isEntryPoint(process.argv[1], import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      if (err instanceof PipelineConfigError || err instanceof StandardsValidationError) {
        console.error(err.format());
      } else {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      }
      process.exit(1);
    }
  );
}
