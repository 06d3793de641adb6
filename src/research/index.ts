/**
 * Research domain model: plans, steps, observations and resources.
 */

export {
  StepDraftSchema,
  PlanDraftSchema,
  StepSchema,
  PlanSchema,
  createPlan,
  restorePlan,
  startStep,
  completeStep,
  failStep,
  nextPendingStepIndex,
  countSteps,
  snapshotStep,
  snapshotPlan,
  type Step,
  type StepDraft,
  type Plan,
  type PlanDraft,
} from "./plan.js";

export {
  ObservationStore,
  ObservationSchema,
  ObservationOriginSchema,
  describeOrigin,
  type Observation,
  type ObservationOrigin,
} from "./observations.js";

export { ResourceSet, ResourceSchema, type Resource } from "./resources.js";

export {
  ClarificationSchema,
  formatClarifications,
  type Clarification,
} from "./clarifications.js";

export { StepTransitionError, PlanValidationError } from "./errors.js";
