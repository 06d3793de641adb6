/**
 * Research workflow orchestrator.
 */

export { ResearchOrchestrator, type OrchestratorOptions, type RunOptions } from "./orchestrator.js";

export {
  CHECKPOINT_VERSION,
  SessionCheckpointSchema,
  CheckpointError,
  parseCheckpoint,
  serializeCheckpoint,
  deserializeCheckpoint,
  isCheckpointVersionCompatible,
  getCheckpointFilename,
  saveCheckpoint,
  loadCheckpoint,
  type SessionCheckpoint,
} from "./checkpoint.js";

export { CollaboratorError, SessionCancelledError, describeError } from "./errors.js";

export { AsyncEventQueue } from "./event-queue.js";

export {
  initialState,
  afterClarification,
  afterBackgroundInvestigation,
  afterPlanning,
  afterPlanApproval,
  afterStep,
  afterReporting,
  isTerminal,
  type MachineState,
  type TerminalState,
  type ReportingReason,
  type StepOutcomeInput,
} from "./transitions.js";

export type {
  CallContext,
  ClarifyOutcome,
  ClarifyContext,
  Clarifier,
  BackgroundInvestigator,
  PlanContext,
  Planner,
  StepResult,
  StepContext,
  StepExecutor,
  Reporter,
  Collaborators,
  ActiveStage,
  TerminalStage,
  ResearchStage,
  ProgressEvent,
  FailureKind,
  FailureSummary,
  ResearchMetadata,
  DoneOutcome,
  NeedsClarificationOutcome,
  AwaitingApprovalOutcome,
  FailedOutcome,
  CancelledOutcome,
  ResearchOutcome,
  ResearchRun,
  SessionOptions,
  PlanDecision,
} from "./types.js";
