/**
 * Pipeline errors.
 *
 * Validation rejection and provider failures are data (verdicts and failed
 * StageResults). These are the conditions that stop a run or indicate a
 * misassembled pipeline.
 */

import type { StageName } from "../config/pipeline/index.js";
import type { RunStatus, StageError, StageResult } from "../types/index.js";

/**
 * A parallel batch was assembled with stages that depend on each other or
 * share a name. Raised before anything is dispatched.
 */
export class BatchConfigurationError extends Error {
  constructor(
    message: string,
    public readonly stages: readonly StageName[]
  ) {
    super(message);
    this.name = "BatchConfigurationError";
  }
}

/**
 * The run's signal aborted. Carries the results that had completed before
 * cancellation, for diagnostics only.
 */
export class RunCancelledError extends Error {
  constructor(
    message = "Run was cancelled",
    public readonly completed: readonly StageResult[] = []
  ) {
    super(message);
    this.name = "RunCancelledError";
  }
}

/**
 * A run was modified after reaching a terminal status, or its iteration
 * count was pushed past the bound.
 */
export class RunStateError extends Error {
  constructor(
    message: string,
    public readonly status: RunStatus
  ) {
    super(message);
    this.name = "RunStateError";
  }
}

/**
 * A mandatory stage failed. Thrown inside the orchestrator and turned into
 * a `stage_failed` run failure.
 */
export class StageFailedError extends Error {
  constructor(
    public readonly stageName: StageName,
    public readonly error: StageError
  ) {
    super(`Mandatory stage "${stageName}" failed: ${error.message}`);
    this.name = "StageFailedError";
  }
}
