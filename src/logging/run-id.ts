/**
 * Run ID generation and management.
 * Each review run gets a unique ID that prefixes its log lines.
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution, reusing `existing` when a
 * caller resumes an earlier run.
 */
export function initRunId(existing?: string): string {
  if (existing !== undefined && !isRunId(existing)) {
    throw new Error(`Invalid run ID "${existing}": expected YYYYMMDD-xxxxxx`);
  }
  currentRunId = existing ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId.
 */
export function getRunId(): string | null {
  return currentRunId;
}
