/**
 * Errors raised inside a research session.
 *
 * None of these escape `ResearchRun.result`; the runner turns them into
 * `failed` or `cancelled` outcomes.
 */

import type { ActiveStage } from "./types.js";

/**
 * A collaborator call threw or rejected.
 */
export class CollaboratorError extends Error {
  constructor(
    public readonly stage: ActiveStage,
    public readonly cause: unknown
  ) {
    super(`${stage} failed: ${describeError(cause)}`);
    this.name = "CollaboratorError";
  }
}

/**
 * The session was cancelled by the caller, an external signal or its deadline.
 */
export class SessionCancelledError extends Error {
  constructor(public readonly reason: string) {
    super(`Research session cancelled: ${reason}`);
    this.name = "SessionCancelledError";
  }
}

/**
 * Message text for an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
