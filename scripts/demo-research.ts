/**
 * Offline demo: runs one research session against the canned collaborators
 * and prints progress as it happens.
 *
 * Usage:
 *   npm run demo
 *   npm run demo -- "How are grid batteries recycled?"
 */

import { createScriptedCollaborators } from "../src/agents/scripted.js";
import { createLogger, initRunId } from "../src/logging/index.js";
import { ResearchOrchestrator } from "../src/orchestrator/orchestrator.js";
import { formatResearchResponse } from "../src/report/format.js";

async function main(): Promise<void> {
  const query = process.argv.slice(2).join(" ").trim() || "How are grid batteries recycled?";

  initRunId();
  const orchestrator = new ResearchOrchestrator({
    collaborators: createScriptedCollaborators({ delayMs: 150 }),
    logger: createLogger({ level: "debug", console: false }),
  });

  const run = orchestrator.startSession(query, { reportStyle: "news" });
  console.log(`Research ${run.researchId}: ${query}\n`);

  for await (const event of run.events()) {
    const step =
      event.currentStepIndex !== null && event.totalSteps !== null
        ? ` (step ${event.currentStepIndex + 1}/${event.totalSteps})`
        : "";
    console.log(`  [${event.sequence}] ${event.stage}${step}: ${event.message}`);
  }

  const outcome = await run.result;
  console.log(`\n${formatResearchResponse(outcome)}`);
  console.log(`Finished in ${outcome.metadata.durationMs} ms`);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
