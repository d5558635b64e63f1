/**
 * Pipeline run state.
 *
 * A PipelineRun is owned by one orchestrator call. It holds the ordered
 * stage history, the iteration count and the terminal status. Once the
 * run is approved or failed it is archived: any further change throws
 * RunStateError.
 */

import type { StageName } from "../config/pipeline/index.js";
import {
  RunStatus,
  type RunFailure,
  type RunSnapshot,
  type StageResult,
  type TokenUsage,
} from "../types/index.js";
import { RunStateError } from "./errors.js";

export interface PipelineRunInit {
  id: string;
  topic: string;
  createdAt: Date;
  maxIterations: number;
}

export class PipelineRun {
  readonly id: string;
  readonly topic: string;
  readonly createdAt: Date;
  readonly maxIterations: number;

  private _status = RunStatus.Pending;
  private _iterationCount = 0;
  private _failure?: RunFailure;
  private readonly history: StageResult[] = [];

  constructor(init: PipelineRunInit) {
    this.id = init.id;
    this.topic = init.topic;
    this.createdAt = init.createdAt;
    this.maxIterations = init.maxIterations;
  }

  get status(): RunStatus {
    return this._status;
  }

  get iterationCount(): number {
    return this._iterationCount;
  }

  get failure(): RunFailure | undefined {
    return this._failure;
  }

  get isTerminal(): boolean {
    return this._status !== RunStatus.Pending;
  }

  // -------------------------------------------------------------------------
  // History
  // -------------------------------------------------------------------------

  /** Append results in order. */
  record(...results: StageResult[]): void {
    this.assertPending("record a stage result");
    this.history.push(...results);
  }

  /** The most recent result for a stage, successful or not. */
  latest(stageName: StageName): StageResult | undefined {
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].stageName === stageName) return this.history[i];
    }
    return undefined;
  }

  /** Output of the most recent successful result for a stage. */
  latestOutput(stageName: StageName): string | undefined {
    for (let i = this.history.length - 1; i >= 0; i--) {
      const result = this.history[i];
      if (result.stageName === stageName && result.success) return result.output;
    }
    return undefined;
  }

  results(): readonly StageResult[] {
    return [...this.history];
  }

  /** Token usage summed over the history. */
  usage(): TokenUsage {
    return this.history.reduce<TokenUsage>(
      (sum, r) => ({
        inputTokens: sum.inputTokens + r.usage.inputTokens,
        outputTokens: sum.outputTokens + r.usage.outputTokens,
      }),
      { inputTokens: 0, outputTokens: 0 }
    );
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Spend one revision iteration.
   * @returns the new iteration count
   */
  incrementIteration(): number {
    this.assertPending("start a revision");
    if (this._iterationCount >= this.maxIterations) {
      throw new RunStateError(
        `Run ${this.id} has already used all ${this.maxIterations} iteration(s)`,
        this._status
      );
    }
    return ++this._iterationCount;
  }

  approve(): void {
    this.assertPending("approve");
    this._status = RunStatus.Approved;
  }

  fail(failure: RunFailure): void {
    this.assertPending("fail");
    this._status = RunStatus.Failed;
    this._failure = failure;
  }

  snapshot(): RunSnapshot {
    return Object.freeze({
      id: this.id,
      topic: this.topic,
      createdAt: this.createdAt.toISOString(),
      status: this._status,
      iterationCount: this._iterationCount,
      maxIterations: this.maxIterations,
      ...(this._failure ? { failure: this._failure } : {}),
      history: Object.freeze([...this.history]),
    });
  }

  private assertPending(action: string): void {
    if (this.isTerminal) {
      throw new RunStateError(`Cannot ${action}: run ${this.id} is ${this._status}`, this._status);
    }
  }
}
