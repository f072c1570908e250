/**
 * Run ID generation and management.
 * Each execution gets a unique run ID that tags its log lines and reports.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution, adopting an existing one
 * (e.g. handed down by the process that produced the payloads) if given.
 */
export function initRunId(existing?: string): string {
  currentRunId = existing !== undefined && existing !== "" ? existing : generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
