/**
 * Run lifecycle and report types.
 */

import type { StageName } from "../config/pipeline/index.js";
import type { StageError, StageResult, TokenUsage } from "./stage.js";
import type { ValidationVerdict } from "./verdict.js";

export enum RunStatus {
  Pending = "pending",
  Approved = "approved",
  Failed = "failed",
}

/** Why a run ended as failed. */
export type RunFailure =
  | {
      readonly kind: "exhausted";
      readonly verdict: ValidationVerdict;
      readonly iterations: number;
    }
  | {
      readonly kind: "stage_failed";
      readonly stageName: StageName;
      readonly error: StageError;
    }
  | {
      readonly kind: "missing_context";
      readonly stageName?: StageName;
      readonly missing: readonly string[];
      readonly message: string;
    }
  | {
      readonly kind: "cancelled";
      readonly message: string;
    }
  | {
      readonly kind: "configuration";
      readonly message: string;
    };

/** Run metadata derived from the topic by the setup stage. */
export interface RunSetup {
  readonly topic: string;
  /** URL-safe topic slug, at most 50 characters */
  readonly slug: string;
  /** Artifact filename prefix, at most 15 characters */
  readonly prefix: string;
  /** Run date, YYYY-MM-DD */
  readonly date: string;
  /** Output folder name: `<date>-<slug>` */
  readonly folder: string;
}

export interface RunSnapshot {
  readonly id: string;
  readonly topic: string;
  readonly createdAt: string;
  readonly status: RunStatus;
  readonly iterationCount: number;
  readonly maxIterations: number;
  readonly failure?: RunFailure;
  readonly history: readonly StageResult[];
}

export type ArtifactName = "article" | "metadata" | "social" | "summary" | "diagnostic";

export interface Artifact {
  readonly name: ArtifactName;
  /** `<prefix>-<name>.md` */
  readonly filename: string;
  readonly content: string;
}

export interface RunReport {
  readonly run: RunSnapshot;
  readonly setup: RunSetup;
  readonly artifacts: readonly Artifact[];
  readonly finalVerdict?: ValidationVerdict;
  readonly usage: TokenUsage;
}
