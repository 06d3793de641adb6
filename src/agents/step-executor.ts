/**
 * Step executor that dispatches each step to an agent by step type.
 *
 *   research    → researcher, with web search when the step sets needSearch
 *   processing  → processor (calculation, data transformation, code)
 */

import type { StepContext, StepExecutor, StepResult } from "../orchestrator/types.js";
import type { Step } from "../research/plan.js";
import type { Resource } from "../research/resources.js";

export interface StepAgentInput {
  step: Readonly<Step>;
  context: StepContext;
  /** Whether the agent may consult the web for this step. */
  webSearch: boolean;
}

export interface StepAgentOutput {
  summary: string;
  resources: readonly Resource[];
}

export interface StepAgent {
  run(input: StepAgentInput): Promise<StepAgentOutput>;
}

export interface StepAgents {
  researcher: StepAgent;
  processor: StepAgent;
}

export class AgentStepExecutor implements StepExecutor {
  constructor(private readonly agents: StepAgents) {}

  async execute(step: Readonly<Step>, context: StepContext): Promise<StepResult> {
    const processing = step.stepType === "processing";
    const agent = processing ? this.agents.processor : this.agents.researcher;

    const output = await agent.run({
      step,
      context,
      webSearch: !processing && step.needSearch,
    });

    const summary = output.summary.trim();
    if (summary === "") {
      return { status: "failed", error: "Agent returned an empty result" };
    }
    return { status: "completed", result: summary, resources: output.resources };
  }
}
