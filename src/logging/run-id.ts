/**
 * Run ID generation and management.
 *
 * Every pipeline run gets its own ID (stamped on its log entries, its
 * diagnostic artifact and its report). The process-level ID is only the
 * fallback for log lines written outside any run, e.g. CLI startup.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Process-level run ID */
let currentRunId: string | null = null;

/**
 * Initialize the process-level run ID.
 * Should be called once at CLI startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the process-level run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
