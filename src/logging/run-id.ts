/**
 * Run ID generation and management.
 * Every pipeline run is tagged with a short ID for tracing.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random hex suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Process-level run ID, set by entry points */
let currentRunId: string | null = null;

/**
 * Initialize the process-level run ID.
 * Entry points call this once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the process-level run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
