/**
 * Stage requests and results.
 * A stage is one named unit of work: prompt assembly plus a single
 * completion call (optionally preceded by one retrieval search).
 */

import type {
  CompletionSettings,
  LlmStageName,
  SearchSource,
  StageName,
} from "../config/pipeline/index.js";
import type { PromptContext } from "../prompts/context.js";

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

/** A ranked passage returned by a search provider. */
export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  /** ISO date (YYYY-MM-DD) or the provider's free-form date string */
  readonly publishedDate?: string;
}

export interface RetrievalRequest {
  readonly source: SearchSource;
  readonly query: string;
  readonly maxResults: number;
}

/** Completion settings plus the per-call timeout for one invocation. */
export interface StageCompletionSettings extends CompletionSettings {
  readonly timeoutMs: number;
}

/**
 * Input to a stage runner. Frozen on construction; a revision re-run
 * builds a new request rather than editing the previous one.
 */
export interface StageRequest {
  readonly stageName: LlmStageName;
  /** Prompt template filename, relative to the prompts directory */
  readonly template: string;
  /** Prior stage name → that stage's latest output */
  readonly upstreamContext: Readonly<Partial<Record<LlmStageName, string>>>;
  /** Run-level template variables (`topic`, `policy.*`, `draft.*`, ...) */
  readonly variables: PromptContext;
  readonly settings: Readonly<StageCompletionSettings>;
  readonly retrieval?: Readonly<RetrievalRequest>;
}

/** Serializable provider failure captured into a StageResult. */
export interface StageError {
  readonly name: "ProviderError";
  readonly message: string;
  /** HTTP-equivalent status, when the provider reported one */
  readonly status?: number;
  /** The call was cut off by its timeout */
  readonly timedOut: boolean;
}

interface StageResultBase {
  readonly stageName: StageName;
  readonly usage: TokenUsage;
  readonly durationMs: number;
  /** Passages retrieved for this invocation (empty without retrieval) */
  readonly sources: readonly SearchResult[];
}

export interface StageSuccess extends StageResultBase {
  readonly success: true;
  readonly output: string;
}

export interface StageFailure extends StageResultBase {
  readonly success: false;
  readonly error: StageError;
}

export type StageResult = StageSuccess | StageFailure;

export const ZERO_USAGE: TokenUsage = Object.freeze({ inputTokens: 0, outputTokens: 0 });
