/**
 * Article pipeline.
 *
 * ```typescript
 * const orchestrator = new PipelineOrchestrator({ completion, search, standards, logger });
 * const report = await orchestrator.generate("Private credit outlook", { maxIterations: 2 });
 * writeArtifacts(report, "output");
 * ```
 */

export {
  PipelineOrchestrator,
  type OrchestratorDeps,
  type GenerateOptions,
} from "./orchestrator.js";

export {
  StageRunner,
  buildStageContext,
  type StageExecutor,
  type StageRunnerDeps,
  type StageRunOptions,
} from "./stage-runner.js";

export { runParallel, assertIndependent, type ParallelOptions } from "./parallel.js";

export {
  RevisionLoopController,
  getNextState,
  isTerminal,
  type RevisionEvent,
  type RevisionLoopOptions,
  type RevisionOutcome,
  type RevisionRequest,
  type RevisionState,
  type RevisionTransition,
} from "./revision.js";

export { buildFixRequest, fixInstruction } from "./fix-requests.js";

export { PipelineRun, type PipelineRunInit } from "./run.js";

export { deriveSetup, filePrefix, setupResult, slugify } from "./setup.js";

export {
  STAGE_CATALOG,
  RESEARCH_BATCH,
  ENHANCEMENT_BATCH,
  DISTRIBUTION_BATCH,
  retrievalFor,
  stageSettings,
  type StageDefinition,
} from "./stages.js";

export {
  approvedArtifacts,
  articleContent,
  describeFailure,
  diagnosticArtifacts,
  diagnosticContent,
  writeArtifacts,
  type ApprovedOutputs,
} from "./artifacts.js";

export {
  BatchConfigurationError,
  RunCancelledError,
  RunStateError,
  StageFailedError,
} from "./errors.js";
