/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 *
 * Process-level settings (credentials, paths, log level) come from the
 * environment. Per-run policy lives in ./pipeline and is passed explicitly
 * into the orchestrator, never read from here by pipeline code.
 */

import {
  ConfigError,
  requireEnv,
  maybeEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";

export { ConfigError } from "./env.js";

// Re-export pipeline configuration module
export * from "./pipeline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** OpenAI API key; required only when a real provider is built */
  readonly openaiApiKey?: string;
  /** Vector store backing the knowledge-base research stage */
  readonly vectorStoreId?: string;
  /** Serper API key for web research */
  readonly serperApiKey?: string;
  /** Root directory for run output folders and logs */
  readonly outputDir: string;
  /** Directory holding the stage prompt templates */
  readonly promptsDir: string;
  /** Optional JSON file overriding the default pipeline config */
  readonly pipelineConfigPath?: string;
  /** Editorial standards JSON */
  readonly standardsPath: string;
  /** Per-call completion timeout */
  readonly stageTimeoutMs: number;
}

/**
 * Load and validate application configuration.
 * Fails fast on malformed values; missing credentials are checked by
 * `validateConfig({ requireCredentials: true })`.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "article-pipeline"),
    openaiApiKey: maybeEnv("OPENAI_API_KEY"),
    vectorStoreId: maybeEnv("VECTOR_STORE_ID"),
    serperApiKey: maybeEnv("SERPER_API_KEY"),
    outputDir: optionalEnv("OUTPUT_DIR", "output"),
    promptsDir: optionalEnv("PROMPTS_DIR", "prompts"),
    pipelineConfigPath: maybeEnv("PIPELINE_CONFIG"),
    standardsPath: optionalEnv("STANDARDS_PATH", "config/editorial-standards.json"),
    stageTimeoutMs: optionalEnvInt("STAGE_TIMEOUT_MS", 180_000, 1),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

export interface ValidateConfigOptions {
  /** Require provider credentials (set for real runs, not for previews) */
  requireCredentials?: boolean;
  /** Require the vector store id (knowledge-base research enabled) */
  requireVectorStore?: boolean;
}

/**
 * Validate that all required configuration is present.
 * Call this at application startup to fail fast.
 */
export function validateConfig(options: ValidateConfigOptions = {}): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (options.requireCredentials) {
    requireEnv("OPENAI_API_KEY");
    requireEnv("SERPER_API_KEY");
  }

  if (options.requireVectorStore) {
    requireEnv("VECTOR_STORE_ID");
  }
}
