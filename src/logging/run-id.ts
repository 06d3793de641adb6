/**
 * Run ID generation and management.
 *
 * The process gets one run ID (for CLI invocations and log files); every
 * research session gets its own research ID from the same generator.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3d4e5f6")
 */
export function generateRunId(): string {
  const now = new Date();
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(6).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Current run ID for this process */
let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this process.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
