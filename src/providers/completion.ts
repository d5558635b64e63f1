/**
 * Completion provider boundary.
 *
 * One call in, one piece of text out. Implementations map every failure
 * (status, transport, timeout, malformed or empty response) to ProviderError.
 */

import type { ReasoningEffort, Verbosity } from "../config/pipeline/index.js";
import type { TokenUsage } from "../types/index.js";

export interface CompletionOptions {
  maxOutputTokens: number;
  reasoningEffort?: ReasoningEffort;
  verbosity?: Verbosity;
  /** Aborts the in-flight request (run cancellation or per-call timeout) */
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  usage: TokenUsage;
}

export interface CompletionProvider {
  /** Provider name for logs */
  readonly name: string;
  complete(prompt: string, model: string, options: CompletionOptions): Promise<Completion>;
}
