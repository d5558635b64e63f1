/**
 * Stage runner.
 *
 * Runs one completion-backed stage: load the template, optionally retrieve
 * passages, render the prompt against run variables and upstream outputs,
 * then make exactly one completion call.
 *
 * Provider failures (including timeouts) come back as a failed
 * StageResult so a parallel batch can carry on. MissingContextError and
 * template errors are thrown: they mean the pipeline is misassembled.
 * Nothing here retries.
 */

import { LlmStageName } from "../config/pipeline/index.js";
import { ConfigError } from "../config/env.js";
import type { Logger } from "../logging/index.js";
import { silentLogger } from "../logging/index.js";
import {
  formatPassages,
  renderPrompt,
  stageVariable,
  type PromptContext,
  type PromptTemplateLoader,
  type StageVariable,
} from "../prompts/index.js";
import type { CompletionProvider } from "../providers/completion.js";
import { ProviderError, errorMessage } from "../providers/errors.js";
import type { SearchProviders } from "../providers/search.js";
import {
  ZERO_USAGE,
  type SearchResult,
  type StageError,
  type StageRequest,
  type StageResult,
  type TokenUsage,
} from "../types/index.js";
import { abortable, createCallScope } from "./abort.js";
import { RunCancelledError } from "./errors.js";

export interface StageRunnerDeps {
  loader: PromptTemplateLoader;
  completion: CompletionProvider;
  search?: SearchProviders;
  logger?: Logger;
}

export interface StageRunOptions {
  /** The run's cancellation signal */
  signal?: AbortSignal;
}

/** Anything able to run a stage request; the parallel coordinator takes this. */
export interface StageExecutor {
  run(request: StageRequest, options?: StageRunOptions): Promise<StageResult>;
}

/**
 * Build the render context for a request: run variables, one
 * `stage.<name>` per upstream output, and retrieved passages.
 */
export function buildStageContext(
  request: StageRequest,
  sources: readonly SearchResult[] | undefined
): PromptContext {
  const upstream: Partial<Record<StageVariable, string>> = {};
  for (const stage of LlmStageName.options) {
    const output = request.upstreamContext[stage];
    if (output !== undefined) upstream[stageVariable(stage)] = output;
  }

  return {
    ...request.variables,
    ...upstream,
    ...(sources ? { "retrieval.passages": formatPassages(sources) } : {}),
  };
}

export class StageRunner implements StageExecutor {
  private readonly logger: Logger;

  constructor(private readonly deps: StageRunnerDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async run(request: StageRequest, options: StageRunOptions = {}): Promise<StageResult> {
    const { stageName, settings } = request;
    const log = this.logger.child({ stage: stageName });
    const started = Date.now();

    this.throwIfCancelled(options.signal, stageName);

    const template = this.deps.loader.load(request.template);

    let sources: SearchResult[] | undefined;
    if (request.retrieval) {
      const { source, query, maxResults } = request.retrieval;
      const provider = this.deps.search?.[source];
      if (!provider) {
        throw new ConfigError(`Stage "${stageName}" needs a ${source} search provider`);
      }

      const found = await this.call(
        `${stageName} ${source} search`,
        settings.timeoutMs,
        options.signal,
        (signal) => provider.search(query, maxResults, { signal })
      );
      if (!found.ok) {
        log.warn("retrieval failed", { source, error: found.error.message });
        return this.failure(request, found.error, ZERO_USAGE, started, []);
      }
      sources = found.value;
      log.debug("retrieved passages", { source, count: sources.length });
    }

    const prompt = renderPrompt(template, buildStageContext(request, sources), { stageName });

    log.debug("calling completion provider", {
      provider: this.deps.completion.name,
      model: settings.model,
      promptChars: prompt.length,
    });

    const completed = await this.call(
      `${stageName} completion`,
      settings.timeoutMs,
      options.signal,
      (signal) =>
        this.deps.completion.complete(prompt, settings.model, {
          maxOutputTokens: settings.maxOutputTokens,
          reasoningEffort: settings.reasoningEffort,
          verbosity: settings.verbosity,
          signal,
        })
    );

    if (!completed.ok) {
      log.warn("stage failed", {
        error: completed.error.message,
        status: completed.error.status,
        timedOut: completed.error.timedOut,
      });
      return this.failure(request, completed.error, ZERO_USAGE, started, sources ?? []);
    }

    const durationMs = Date.now() - started;
    log.info("stage completed", {
      durationMs,
      inputTokens: completed.value.usage.inputTokens,
      outputTokens: completed.value.usage.outputTokens,
    });

    return Object.freeze({
      success: true,
      stageName,
      output: completed.value.text,
      usage: completed.value.usage,
      durationMs,
      sources: Object.freeze(sources ?? []),
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Run one provider call under a per-call scope. ProviderErrors and
   * timeouts become `{ok: false}`; run cancellation throws.
   */
  private async call<T>(
    label: string,
    timeoutMs: number,
    runSignal: AbortSignal | undefined,
    fn: (signal: AbortSignal) => Promise<T>
  ): Promise<{ ok: true; value: T } | { ok: false; error: StageError }> {
    const scope = createCallScope(timeoutMs, runSignal);
    try {
      const value = await abortable(fn(scope.signal), scope.signal);
      return { ok: true, value };
    } catch (err) {
      if (runSignal?.aborted) {
        throw new RunCancelledError(`Run cancelled during ${label}`);
      }
      if (scope.timedOut()) {
        return {
          ok: false,
          error: new ProviderError(`${label} timed out after ${timeoutMs}ms`, {
            timedOut: true,
            cause: err,
          }).toStageError(),
        };
      }
      if (err instanceof ProviderError) {
        return { ok: false, error: err.toStageError() };
      }
      throw new Error(`${label}: ${errorMessage(err)}`, { cause: err });
    } finally {
      scope.dispose();
    }
  }

  private failure(
    request: StageRequest,
    error: StageError,
    usage: TokenUsage,
    started: number,
    sources: readonly SearchResult[]
  ): StageResult {
    return Object.freeze({
      success: false,
      stageName: request.stageName,
      error,
      usage,
      durationMs: Date.now() - started,
      sources: Object.freeze([...sources]),
    });
  }

  private throwIfCancelled(signal: AbortSignal | undefined, stageName: LlmStageName): void {
    if (signal?.aborted) {
      throw new RunCancelledError(`Run cancelled before stage "${stageName}"`);
    }
  }
}
