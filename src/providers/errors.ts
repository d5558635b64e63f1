/**
 * Provider failure.
 *
 * Raised by completion and search providers for any failed call: a non-2xx
 * status, a transport error, a timeout, or a response that does not have
 * the expected shape. The stage runner captures it into a StageResult; it
 * is never retried below the revision loop.
 */

import type { StageError } from "../types/index.js";

export interface ProviderErrorOptions {
  /** Provider that failed, e.g. "openai" or "serper" */
  provider?: string;
  /** HTTP-equivalent status, if the provider reported one */
  status?: number;
  /** The call was cut off by its per-call timeout */
  timedOut?: boolean;
  cause?: unknown;
}

export class ProviderError extends Error {
  public readonly provider: string;
  public readonly status?: number;
  public readonly timedOut: boolean;

  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.provider = options.provider ?? "unknown";
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }

  /**
   * Serializable form stored on a failed StageResult.
   */
  toStageError(): StageError {
    return {
      name: "ProviderError",
      message: this.message,
      ...(this.status !== undefined ? { status: this.status } : {}),
      timedOut: this.timedOut,
    };
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
