export {
  AgentStepExecutor,
  type StepAgent,
  type StepAgentInput,
  type StepAgentOutput,
  type StepAgents,
} from "./step-executor.js";
export { createScriptedCollaborators, type ScriptedOptions } from "./scripted.js";
