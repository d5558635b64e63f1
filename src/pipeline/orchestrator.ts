/**
 * Pipeline orchestrator.
 *
 * Sequences one article run:
 *
 *   setup → [kb_research ‖ web_research] → synthesis → writer
 *         → [metrics ‖ seo] → validate ⟲ revision (bounded)
 *         → [social ‖ summary] → metadata
 *
 * Every run gets its own PipelineRun, its own frozen config and its own
 * rule set, so concurrent `generate()` calls share nothing mutable. The
 * caller always gets a RunReport back; only pre-run argument errors and
 * genuine bugs are thrown.
 */

import {
  DEFAULT_PIPELINE_CONFIG,
  applyRunOverrides,
  loadPipelineConfig,
  type LlmStageName,
  type PipelineConfig,
  type RunOverrides,
} from "../config/pipeline/index.js";
import { ConfigError } from "../config/env.js";
import { generateRunId, silentLogger, type Logger } from "../logging/index.js";
import {
  ConditionalParseError,
  MissingContextError,
  PromptTemplateLoader,
  TemplateLoadError,
  TemplateParseError,
  buildDraftContext,
  buildRunContext,
  buildVerdictContext,
  type PromptContext,
} from "../prompts/index.js";
import type { CompletionProvider } from "../providers/completion.js";
import type { SearchProviders } from "../providers/search.js";
import type { EditorialStandards } from "../standards/index.js";
import {
  RunStatus,
  type Artifact,
  type Draft,
  type RunFailure,
  type RunReport,
  type RunSetup,
  type StageRequest,
  type StageResult,
  type ValidationVerdict,
} from "../types/index.js";
import { buildRuleSet, parseDraft } from "../validation/index.js";
import { approvedArtifacts, describeFailure, diagnosticArtifacts } from "./artifacts.js";
import { BatchConfigurationError, RunCancelledError, StageFailedError } from "./errors.js";
import { runParallel } from "./parallel.js";
import { RevisionLoopController, type RevisionRequest } from "./revision.js";
import { PipelineRun } from "./run.js";
import { deriveSetup, setupResult } from "./setup.js";
import { StageRunner } from "./stage-runner.js";
import {
  DISTRIBUTION_BATCH,
  ENHANCEMENT_BATCH,
  RESEARCH_BATCH,
  STAGE_CATALOG,
  retrievalFor,
  stageSettings,
} from "./stages.js";

export interface OrchestratorDeps {
  completion: CompletionProvider;
  search?: SearchProviders;
  standards: Readonly<EditorialStandards>;
  /** Defaults to DEFAULT_PIPELINE_CONFIG */
  config?: Readonly<PipelineConfig>;
  loader?: PromptTemplateLoader;
  logger?: Logger;
  /** Clock used for the run's creation time */
  now?: () => Date;
  newRunId?: (createdAt: Date) => string;
}

export interface GenerateOptions extends RunOverrides {
  /** Aborting cancels the run at the next stage boundary or in-flight call */
  signal?: AbortSignal;
}

/** Everything one run needs, threaded through the phases. */
interface RunScope {
  readonly run: PipelineRun;
  readonly config: Readonly<PipelineConfig>;
  readonly setup: RunSetup;
  readonly runner: StageRunner;
  readonly variables: PromptContext;
  readonly log: Logger;
  readonly signal?: AbortSignal;
}

/** What the run produced before it ended, however it ended. */
interface RunProgress {
  verdict?: ValidationVerdict;
  artifacts?: Artifact[];
}

export class PipelineOrchestrator {
  private readonly config: Readonly<PipelineConfig>;
  private readonly loader: PromptTemplateLoader;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly newRunId: (createdAt: Date) => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.config = deps.config ?? loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
    this.loader = deps.loader ?? new PromptTemplateLoader();
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.newRunId = deps.newRunId ?? generateRunId;
  }

  /**
   * Run the pipeline for one topic.
   *
   * @throws PipelineConfigError if the overrides are invalid
   * @throws ConfigError if the topic is empty
   */
  async generate(topic: string, options: GenerateOptions = {}): Promise<RunReport> {
    const { signal, ...overrides } = options;
    const config = applyRunOverrides(this.config, overrides);
    const createdAt = this.now();
    const setup = deriveSetup(topic, createdAt);

    const run = new PipelineRun({
      id: this.newRunId(createdAt),
      topic: setup.topic,
      createdAt,
      maxIterations: config.policy.maxIterations,
    });
    const log = this.logger.child({ topic: setup.topic }, run.id);

    const scope: RunScope = {
      run,
      config,
      setup,
      runner: new StageRunner({
        loader: this.loader,
        completion: this.deps.completion,
        search: this.deps.search,
        logger: log,
      }),
      variables: buildRunContext({
        topic: setup.topic,
        runId: run.id,
        date: setup.date,
        policy: config.policy,
        standards: this.deps.standards,
      }),
      log,
      signal,
    };

    log.info("run started", {
      folder: setup.folder,
      maxIterations: config.policy.maxIterations,
      skipKnowledgeBase: config.policy.skipKnowledgeBase,
    });
    run.record(setupResult(setup));

    const progress: RunProgress = {};
    try {
      await this.execute(scope, progress);
    } catch (err) {
      run.fail(this.toFailure(err));
    }

    const snapshot = run.snapshot();
    const usage = run.usage();

    if (run.status === RunStatus.Approved) {
      log.info("run approved", {
        iterations: run.iterationCount,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
      });
    } else if (run.failure) {
      log.error("run failed", {
        kind: run.failure.kind,
        reason: describeFailure(run.failure),
        iterations: run.iterationCount,
      });
    }

    return Object.freeze({
      run: snapshot,
      setup,
      artifacts: Object.freeze(
        run.status === RunStatus.Approved && progress.artifacts
          ? progress.artifacts
          : diagnosticArtifacts(setup, snapshot, progress.verdict)
      ),
      ...(progress.verdict ? { finalVerdict: progress.verdict } : {}),
      usage,
    });
  }

  // -------------------------------------------------------------------------
  // Phases
  // -------------------------------------------------------------------------

  private async execute(scope: RunScope, progress: RunProgress): Promise<void> {
    const { run, config } = scope;

    const research = config.policy.skipKnowledgeBase
      ? RESEARCH_BATCH.filter((stage) => stage !== "kb_research")
      : RESEARCH_BATCH;
    await this.runBatch(scope, research);

    await this.runRequired(scope, "synthesis");
    const draft = parseDraft(await this.runRequired(scope, "writer"));
    scope.log.info("draft written", {
      words: draft.wordCount,
      citations: draft.citations.length,
      sections: draft.sections.length,
    });

    await this.runBatch(scope, ENHANCEMENT_BATCH, buildDraftContext(draft));

    const loop = new RevisionLoopController({
      rules: buildRuleSet(config.policy, this.deps.standards, run.createdAt),
      maxIterations: config.policy.maxIterations,
      logger: scope.log,
      onTransition: (transition) => {
        if (transition.event === "REJECT") run.incrementIteration();
      },
      revise: (request) => this.revise(scope, request),
    });
    const outcome = await loop.run(draft);
    progress.verdict = outcome.verdict;

    if (outcome.state === "exhausted") {
      run.fail({ kind: "exhausted", verdict: outcome.verdict, iterations: outcome.iterations });
      return;
    }

    const finalDraft: Draft = outcome.draft;
    const draftVars = buildDraftContext(finalDraft);
    const [social, summary] = await this.runBatch(scope, DISTRIBUTION_BATCH, draftVars);
    const metadata = await this.runRequired(scope, "metadata", {
      ...draftVars,
      ...buildVerdictContext(outcome.verdict),
    });

    progress.artifacts = approvedArtifacts(
      scope.setup,
      { draft: finalDraft, metadata, social: outputOf(social), summary: outputOf(summary) },
      this.deps.standards
    );
    run.approve();
  }

  private async revise(scope: RunScope, request: RevisionRequest): Promise<StageResult> {
    const result = await scope.runner.run(
      this.request(scope, "revision", {
        ...buildDraftContext(request.draft),
        "fix.instructions": request.fixRequest,
        "iteration.number": String(request.iteration),
      }),
      { signal: scope.signal }
    );
    scope.run.record(result);
    return result;
  }

  // -------------------------------------------------------------------------
  // Stage dispatch
  // -------------------------------------------------------------------------

  /** Run a single mandatory stage and return its output. */
  private async runRequired(
    scope: RunScope,
    stage: LlmStageName,
    extra: PromptContext = {}
  ): Promise<string> {
    const result = await scope.runner.run(this.request(scope, stage, extra), {
      signal: scope.signal,
    });
    scope.run.record(result);
    if (!result.success) throw new StageFailedError(stage, result.error);
    return result.output;
  }

  /**
   * Run a parallel batch and record every result in batch order. The first
   * failed mandatory stage fails the run; optional failures are logged.
   */
  private async runBatch(
    scope: RunScope,
    stages: readonly LlmStageName[],
    extra: PromptContext = {}
  ): Promise<StageResult[]> {
    let results: StageResult[];
    try {
      results = await runParallel(
        stages.map((stage) => this.request(scope, stage, extra)),
        scope.runner,
        { signal: scope.signal, loader: this.loader }
      );
    } catch (err) {
      if (err instanceof RunCancelledError) scope.run.record(...err.completed);
      throw err;
    }

    scope.run.record(...results);

    for (const result of results) {
      if (result.success) continue;
      if (!STAGE_CATALOG[stageOf(result, stages)].mandatory) {
        scope.log.warn("optional stage failed; continuing", {
          stage: result.stageName,
          error: result.error.message,
        });
        continue;
      }
      throw new StageFailedError(result.stageName, result.error);
    }
    return results;
  }

  private request(scope: RunScope, stage: LlmStageName, extra: PromptContext): StageRequest {
    const definition = STAGE_CATALOG[stage];

    const upstreamContext: Partial<Record<LlmStageName, string>> = {};
    for (const name of definition.reads) {
      const output = scope.run.latestOutput(name);
      if (output !== undefined) upstreamContext[name] = output;
    }

    const retrieval = retrievalFor(definition, scope.config, scope.setup.topic, scope.setup.date);

    return Object.freeze({
      stageName: stage,
      template: definition.template,
      upstreamContext: Object.freeze(upstreamContext),
      variables: Object.freeze({ ...scope.variables, ...extra }),
      settings: stageSettings(scope.config, stage),
      ...(retrieval ? { retrieval } : {}),
    });
  }

  // -------------------------------------------------------------------------
  // Failure mapping
  // -------------------------------------------------------------------------

  private toFailure(err: unknown): RunFailure {
    if (err instanceof RunCancelledError) {
      return { kind: "cancelled", message: err.message };
    }
    if (err instanceof StageFailedError) {
      return { kind: "stage_failed", stageName: err.stageName, error: err.error };
    }
    if (err instanceof MissingContextError) {
      return {
        kind: "missing_context",
        ...(err.stageName ? { stageName: err.stageName } : {}),
        missing: [...err.missingVariables],
        message: err.message,
      };
    }
    if (
      err instanceof ConfigError ||
      err instanceof BatchConfigurationError ||
      err instanceof TemplateLoadError ||
      err instanceof TemplateParseError ||
      err instanceof ConditionalParseError
    ) {
      return { kind: "configuration", message: err.message };
    }
    throw err;
  }
}

function outputOf(result: StageResult | undefined): string {
  return result?.success ? result.output : "";
}

/** The batch stage a result belongs to. */
function stageOf(result: StageResult, stages: readonly LlmStageName[]): LlmStageName {
  const stage = stages.find((name) => name === result.stageName);
  if (!stage) throw new Error(`Result for "${result.stageName}" does not belong to the batch`);
  return stage;
}
