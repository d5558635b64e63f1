/**
 * Revision loop controller.
 *
 *   validating ──APPROVE──▶ approved
 *   validating ──REJECT───▶ revising ──REVISED──▶ validating
 *   validating ──EXHAUST──▶ exhausted      (iteration bound reached)
 *
 * The loop starts at `validating` on the writer's draft. Every
 * validating → revising transition spends one iteration of the run's
 * budget; the budget is checked before spending, so the count never
 * exceeds `maxIterations`.
 */

import type { Logger } from "../logging/index.js";
import { silentLogger } from "../logging/index.js";
import type { Draft, StageResult, ValidationVerdict } from "../types/index.js";
import { parseDraft } from "../validation/draft.js";
import { validate } from "../validation/gate.js";
import type { RuleSet } from "../validation/rules.js";
import { buildFixRequest } from "./fix-requests.js";

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export type RevisionState = "validating" | "revising" | "approved" | "exhausted";

export type RevisionEvent = "APPROVE" | "REJECT" | "EXHAUST" | "REVISED";

export interface RevisionTransition {
  readonly from: RevisionState;
  readonly to: RevisionState;
  readonly event: RevisionEvent;
  /** Iterations spent after this transition */
  readonly iteration: number;
}

const VALID_TRANSITIONS: ReadonlyArray<Omit<RevisionTransition, "iteration">> = [
  { from: "validating", to: "approved", event: "APPROVE" },
  { from: "validating", to: "revising", event: "REJECT" },
  { from: "validating", to: "exhausted", event: "EXHAUST" },
  { from: "revising", to: "validating", event: "REVISED" },
];

export function getNextState(current: RevisionState, event: RevisionEvent): RevisionState | null {
  const transition = VALID_TRANSITIONS.find((t) => t.from === current && t.event === event);
  return transition?.to ?? null;
}

export function isTerminal(state: RevisionState): boolean {
  return !VALID_TRANSITIONS.some((t) => t.from === state);
}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export interface RevisionRequest {
  readonly draft: Draft;
  readonly verdict: ValidationVerdict;
  readonly fixRequest: string;
  /** 1-based iteration this revision spends */
  readonly iteration: number;
}

export interface RevisionLoopOptions {
  rules: RuleSet;
  maxIterations: number;
  /** Runs the revision stage; returns its result */
  revise: (request: RevisionRequest) => Promise<StageResult>;
  /** Called after every transition, e.g. to advance the run's iteration count */
  onTransition?: (transition: RevisionTransition) => void;
  logger?: Logger;
}

export interface RevisionOutcome {
  readonly state: "approved" | "exhausted";
  /** The last validated draft */
  readonly draft: Draft;
  /** The last verdict */
  readonly verdict: ValidationVerdict;
  /** Every verdict, in order */
  readonly verdicts: readonly ValidationVerdict[];
  readonly iterations: number;
  readonly transitions: readonly RevisionTransition[];
}

export class RevisionLoopController {
  private readonly logger: Logger;

  constructor(private readonly options: RevisionLoopOptions) {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${options.maxIterations}`);
    }
    this.logger = options.logger ?? silentLogger;
  }

  async run(initialDraft: Draft): Promise<RevisionOutcome> {
    const { rules, maxIterations } = this.options;
    const verdicts: ValidationVerdict[] = [];
    const transitions: RevisionTransition[] = [];

    let state: RevisionState = "validating";
    let iteration = 0;
    let draft = initialDraft;

    const fire = (event: RevisionEvent): RevisionState => {
      const next = getNextState(state, event);
      if (next === null) {
        throw new Error(`Invalid revision transition: ${event} from ${state}`);
      }
      if (event === "REJECT") iteration++;
      const transition: RevisionTransition = { from: state, to: next, event, iteration };
      transitions.push(transition);
      this.options.onTransition?.(transition);
      state = next;
      return next;
    };

    for (;;) {
      const verdict = validate(draft, rules);
      verdicts.push(verdict);

      const blocking = verdict.issues.filter((i) => i.severity === "blocking").length;
      this.logger.info("draft validated", {
        iteration,
        approved: verdict.approved,
        blocking,
        warnings: verdict.issues.length - blocking,
        ...verdict.metrics,
      });

      if (verdict.approved) {
        fire("APPROVE");
        return this.outcome("approved", draft, verdicts, iteration, transitions);
      }

      if (iteration >= maxIterations) {
        fire("EXHAUST");
        this.logger.warn("revision budget exhausted", {
          iterations: iteration,
          issues: verdict.issues.map((i) => i.rule),
        });
        return this.outcome("exhausted", draft, verdicts, iteration, transitions);
      }

      fire("REJECT");
      const result = await this.options.revise({
        draft,
        verdict,
        fixRequest: buildFixRequest(verdict),
        iteration,
      });

      if (result.success) {
        draft = parseDraft(result.output);
      } else {
        this.logger.warn("revision stage failed; keeping the previous draft", {
          iteration,
          error: result.error.message,
        });
      }

      fire("REVISED");
    }
  }

  private outcome(
    state: RevisionOutcome["state"],
    draft: Draft,
    verdicts: ValidationVerdict[],
    iterations: number,
    transitions: RevisionTransition[]
  ): RevisionOutcome {
    const verdict = verdicts[verdicts.length - 1];
    return Object.freeze({
      state,
      draft,
      verdict,
      verdicts: Object.freeze(verdicts),
      iterations,
      transitions: Object.freeze(transitions),
    });
  }
}
