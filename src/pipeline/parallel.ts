/**
 * Parallel fan-out/fan-in.
 *
 * Dispatches a batch of independent stage requests together and joins on
 * all of them. The result list is index-aligned with the input, whatever
 * order the calls finish in. A failed item is a failed StageResult; it
 * never cancels its siblings.
 */

import { LlmStageName, type StageName } from "../config/pipeline/index.js";
import type { PromptTemplateLoader } from "../prompts/index.js";
import { referencedStages } from "../prompts/index.js";
import type { StageRequest, StageResult } from "../types/index.js";
import { BatchConfigurationError, RunCancelledError } from "./errors.js";
import type { StageExecutor, StageRunOptions } from "./stage-runner.js";

export interface ParallelOptions extends StageRunOptions {
  /**
   * When given, each request's template is also checked for references to
   * other stages in the batch.
   */
  loader?: PromptTemplateLoader;
}

/**
 * Reject a batch whose requests share a stage name or depend on one
 * another, through upstream context or template references.
 */
export function assertIndependent(
  requests: readonly StageRequest[],
  loader?: PromptTemplateLoader
): void {
  const names = requests.map((r) => r.stageName);
  const inBatch = new Set<StageName>(names);

  const duplicates = names.filter((name, i) => names.indexOf(name) !== i);
  if (duplicates.length > 0) {
    throw new BatchConfigurationError(
      `Parallel batch runs stage(s) more than once: ${[...new Set(duplicates)].join(", ")}`,
      names
    );
  }

  for (const request of requests) {
    const upstream = LlmStageName.options.filter(
      (name) => request.upstreamContext[name] !== undefined && inBatch.has(name)
    );
    const templated = loader
      ? referencedStages(loader.load(request.template)).filter((name) => inBatch.has(name))
      : [];
    const deps = [...new Set([...upstream, ...templated])];

    if (deps.length > 0) {
      throw new BatchConfigurationError(
        `Stage "${request.stageName}" depends on ${deps.join(", ")} in the same parallel batch`,
        names
      );
    }
  }
}

/**
 * Run a batch of independent requests concurrently.
 *
 * @throws BatchConfigurationError before dispatch if the batch is not independent
 * @throws RunCancelledError if the signal aborts; carries the results completed so far
 */
export async function runParallel(
  requests: readonly StageRequest[],
  runner: StageExecutor,
  options: ParallelOptions = {}
): Promise<StageResult[]> {
  assertIndependent(requests, options.loader);

  const { signal } = options;
  if (signal?.aborted) throw new RunCancelledError("Run cancelled before parallel batch");

  const completed: StageResult[] = [];
  const pending = requests.map(async (request) => {
    const result = await runner.run(request, { signal });
    completed.push(result);
    return result;
  });

  if (!signal) return Promise.all(pending);

  return new Promise<StageResult[]>((resolve, reject) => {
    const onAbort = (): void =>
      reject(new RunCancelledError("Run cancelled during parallel batch", [...completed]));
    signal.addEventListener("abort", onAbort, { once: true });

    Promise.all(pending).then(
      (results) => {
        signal.removeEventListener("abort", onAbort);
        resolve(results);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
