/**
 * Errors raised by the plan model.
 */

import type { StepStatus } from "../config/research/enums.js";

/**
 * A step status change that breaks pending → running → completed|failed.
 * Always a programming error in the caller.
 */
export class StepTransitionError extends Error {
  constructor(
    public readonly stepTitle: string,
    public readonly from: StepStatus,
    public readonly to: StepStatus
  ) {
    super(`Illegal status change for step "${stepTitle}": ${from} -> ${to}`);
    this.name = "StepTransitionError";
  }
}

/**
 * A plan draft that does not satisfy the plan schema.
 */
export class PlanValidationError extends Error {
  constructor(
    public readonly issues: string[],
    message?: string
  ) {
    super(message ?? `Invalid plan:\n  - ${issues.join("\n  - ")}`);
    this.name = "PlanValidationError";
  }
}
