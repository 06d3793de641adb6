#!/usr/bin/env node
/**
 * CLI: run a research session from the terminal.
 *
 * Progress events stream to stderr as they happen; the final outcome goes to
 * stdout as Markdown (or JSON with --json), so the report can be piped.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Research a question:
 *   npm run research -- --query "How do heat pumps work?" --style news
 *
 * Review the plan before it runs, then approve or replace it:
 *   npm run research -- --query "EV adoption in Europe" --review-plan
 *   npm run research -- --resume output/checkpoints/checkpoint-<id>.json --accept
 *   npm run research -- --resume output/checkpoints/checkpoint-<id>.json --edit-plan plan.json
 *
 * Answer a clarification question by running again with the answer:
 *   npm run research -- --query "batteries" --clarify "Grid storage, 2020-2024"
 *
 * Exit codes:
 *   0 - Research complete
 *   1 - Error, or the session failed
 *   3 - Clarification needed
 *   4 - Plan awaiting approval (checkpoint written)
 *   5 - Cancelled (Ctrl-C or --timeout)
 */

import { existsSync, readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { createLlmCollaborators } from "../agents/llm/index.js";
import { createScriptedCollaborators } from "../agents/scripted.js";
import {
  QUICK_RESEARCH_CONFIG,
  MAX_TIMEOUT_MS,
  ResearchConfigError,
  config,
  validateConfig,
  type ResearchConfigInput,
  type ResearchDefaults,
} from "../config/index.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import { saveCheckpoint, loadCheckpoint, CheckpointError } from "../orchestrator/checkpoint.js";
import { ResearchOrchestrator } from "../orchestrator/orchestrator.js";
import type {
  Collaborators,
  PlanDecision,
  ProgressEvent,
  ResearchOutcome,
  ResearchRun,
  ResearchStage,
} from "../orchestrator/types.js";
import type { Clarification } from "../research/clarifications.js";
import { PlanValidationError } from "../research/errors.js";
import { PlanDraftSchema } from "../research/plan.js";
import { formatResearchResponse } from "../report/format.js";

// ============================================================
// Types
// ============================================================

export interface CliOptions {
  help: boolean;
  query?: string;
  config: ResearchConfigInput;
  clarifications: Clarification[];
  reviewPlan: boolean;
  resume?: string;
  accept: boolean;
  editPlan?: string;
  checkpointDir: string;
  offline: boolean;
  json: boolean;
  brief: boolean;
  color: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** Question recorded for a --clarify answer given without --asked. */
export const DEFAULT_CLARIFICATION_QUESTION = "Follow-up question";

export const DEFAULT_CHECKPOINT_DIR = "output/checkpoints";

const EXIT_CODES: Record<ResearchOutcome["status"], number> = {
  done: 0,
  failed: 1,
  needs_clarification: 3,
  awaiting_plan_approval: 4,
  cancelled: 5,
};

export function exitCodeFor(outcome: ResearchOutcome): number {
  return EXIT_CODES[outcome.status];
}

const HELP = `
Usage: research [options] [query...]

Session:
  -q, --query <text>            Research question (or pass it as positional words)
  --max-steps <n>               Maximum steps executed per plan (default 5)
  --max-plan-iterations <n>     Maximum plans per session (default 1)
  --style <style>               Report style: academic, news, social, investment
  --locale <locale>             Locale for plan and report (default en-US)
  --no-clarification            Skip the clarification turn
  --no-background               Skip the background web search
  --quick                       Two steps, no clarification, no background search
  --clarify <answer>            Answer to an earlier clarification question (repeatable)
  --asked <question>            Question the matching --clarify answers (repeatable)
  --timeout <ms>                Cancel the session after this many milliseconds

Plan review:
  --review-plan                 Stop after planning and write a checkpoint
  --checkpoint-dir <dir>        Where checkpoints are written (default ${DEFAULT_CHECKPOINT_DIR})
  --resume <file>               Continue from a checkpoint with its saved settings
                                (needs --accept or --edit-plan)
  --accept                      Execute the checkpoint's plan as is
  --edit-plan <file>            Execute the plan in this JSON file instead

Output:
  --json                        Print the outcome as JSON
  --brief                       Print only the header and the report
  --offline                     Use canned collaborators (no API keys needed)
  --no-color                    Disable ANSI colors
  -h, --help                    Show this help message

Exit codes:
  0 - Research complete
  1 - Error, or the session failed
  3 - Clarification needed
  4 - Plan awaiting approval
  5 - Cancelled
`;

// ============================================================
// CLI Parsing
// ============================================================

function parsePositiveInt(
  flag: string,
  value: string | undefined,
  max = Number.MAX_SAFE_INTEGER
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`--${flag} must be a positive integer, got: ${value}`);
  }
  if (parsed > max) {
    throw new CliUsageError(`--${flag} must be at most ${max}, got: ${value}`);
  }
  return parsed;
}

/** Flags that shape a new session; a resumed session keeps its checkpoint's settings. */
const SESSION_FLAGS = [
  "quick",
  "max-steps",
  "max-plan-iterations",
  "timeout",
  "style",
  "locale",
  "no-clarification",
  "no-background",
  "review-plan",
  "clarify",
  "asked",
] as const;

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws CliUsageError for missing or conflicting flags
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      query: { type: "string", short: "q" },
      "max-steps": { type: "string" },
      "max-plan-iterations": { type: "string" },
      style: { type: "string" },
      locale: { type: "string" },
      "no-clarification": { type: "boolean", default: false },
      "no-background": { type: "boolean", default: false },
      quick: { type: "boolean", default: false },
      clarify: { type: "string", multiple: true },
      asked: { type: "string", multiple: true },
      timeout: { type: "string" },
      "review-plan": { type: "boolean", default: false },
      "checkpoint-dir": { type: "string", default: DEFAULT_CHECKPOINT_DIR },
      resume: { type: "string" },
      accept: { type: "boolean", default: false },
      "edit-plan": { type: "string" },
      json: { type: "boolean", default: false },
      brief: { type: "boolean", default: false },
      offline: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const positionalQuery = positionals.join(" ").trim();
  const query = values.query ?? (positionalQuery !== "" ? positionalQuery : undefined);

  const researchConfig: ResearchConfigInput = values.quick ? { ...QUICK_RESEARCH_CONFIG } : {};
  const maxStepNum = parsePositiveInt("max-steps", values["max-steps"]);
  if (maxStepNum !== undefined) researchConfig.maxStepNum = maxStepNum;
  const maxPlanIterations = parsePositiveInt("max-plan-iterations", values["max-plan-iterations"]);
  if (maxPlanIterations !== undefined) researchConfig.maxPlanIterations = maxPlanIterations;
  const timeoutMs = parsePositiveInt("timeout", values.timeout, MAX_TIMEOUT_MS);
  if (timeoutMs !== undefined) researchConfig.timeoutMs = timeoutMs;
  if (values.style !== undefined) researchConfig.reportStyle = values.style;
  if (values.locale !== undefined) researchConfig.locale = values.locale;
  if (values["no-clarification"]) researchConfig.enableClarification = false;
  if (values["no-background"]) researchConfig.enableBackgroundInvestigation = false;
  if (values["review-plan"]) researchConfig.autoAcceptPlan = false;

  const answers = values.clarify ?? [];
  const asked = values.asked ?? [];
  if (asked.length > answers.length) {
    throw new CliUsageError("Every --asked needs a matching --clarify answer");
  }
  const clarifications = answers.map((answer, i) => ({
    question: asked[i] ?? DEFAULT_CLARIFICATION_QUESTION,
    answer,
  }));

  const options: CliOptions = {
    help: values.help === true,
    query,
    config: researchConfig,
    clarifications,
    reviewPlan: values["review-plan"] === true,
    resume: values.resume,
    accept: values.accept === true,
    editPlan: values["edit-plan"],
    checkpointDir: values["checkpoint-dir"] ?? DEFAULT_CHECKPOINT_DIR,
    offline: values.offline === true,
    json: values.json === true,
    brief: values.brief === true,
    color: values["no-color"] !== true,
  };

  if (!options.help) {
    const sessionFlags = SESSION_FLAGS.filter((flag) => {
      const value = values[flag];
      return value !== undefined && value !== false;
    });
    checkCombination(options, sessionFlags);
  }
  return options;
}

function checkCombination(options: CliOptions, sessionFlags: readonly string[]): void {
  if (options.resume !== undefined) {
    if (options.query !== undefined) {
      throw new CliUsageError("--resume continues an existing session; drop the query");
    }
    if (sessionFlags.length > 0) {
      const flags = sessionFlags.map((flag) => `--${flag}`).join(", ");
      throw new CliUsageError(`--resume keeps the checkpoint's settings; drop ${flags}`);
    }
    if (options.accept === (options.editPlan !== undefined)) {
      throw new CliUsageError("--resume needs exactly one of --accept or --edit-plan");
    }
    return;
  }

  if (options.accept || options.editPlan !== undefined) {
    throw new CliUsageError("--accept and --edit-plan only apply with --resume");
  }
  if (options.query === undefined) {
    throw new CliUsageError("A query is required (use --query or pass it as arguments)");
  }
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const STAGE_COLORS: Record<ResearchStage, keyof typeof COLORS> = {
  clarifying: "cyan",
  background_investigating: "cyan",
  planning: "cyan",
  executing_step: "bold",
  reporting: "cyan",
  done: "green",
  needs_clarification: "yellow",
  awaiting_plan_approval: "yellow",
  failed: "red",
  cancelled: "yellow",
};

function paint(color: keyof typeof COLORS, text: string, enabled: boolean): string {
  return enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/** One progress line: `[seq] stage: message`. */
export function formatProgress(event: ProgressEvent, color = false): string {
  const stage = paint(STAGE_COLORS[event.stage], event.stage, color);
  return `${paint("dim", `[${event.sequence}]`, color)} ${stage}: ${event.message}`;
}

// ============================================================
// Session
// ============================================================

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  collaborators: Collaborators;
  logger: Logger;
  defaults?: ResearchDefaults;
  /** Cancels the session (Ctrl-C). */
  signal?: AbortSignal;
}

function readPlanDecision(options: CliOptions): PlanDecision {
  if (options.editPlan === undefined) {
    return { type: "accept" };
  }
  if (!existsSync(options.editPlan)) {
    throw new CliUsageError(`Plan file not found: ${options.editPlan}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(options.editPlan, "utf-8"));
  } catch (err) {
    throw new CliUsageError(
      `Plan file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = PlanDraftSchema.safeParse(raw);
  if (!result.success) {
    throw new PlanValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return { type: "edit", plan: result.data };
}

function startRun(orchestrator: ResearchOrchestrator, options: CliOptions, signal?: AbortSignal): ResearchRun {
  if (options.resume !== undefined) {
    const checkpoint = loadCheckpoint(options.resume);
    return orchestrator.resumeSession(checkpoint, readPlanDecision(options), { signal });
  }
  return orchestrator.startSession(options.query ?? "", options.config, {
    clarifications: options.clarifications,
    signal,
  });
}

/**
 * Run one session to completion and print its outcome.
 *
 * @returns Process exit code
 */
export async function runResearch(options: CliOptions, deps: CliDeps, io: CliIo): Promise<number> {
  const orchestrator = new ResearchOrchestrator({
    collaborators: deps.collaborators,
    defaults: deps.defaults,
    logger: deps.logger,
  });

  const run = startRun(orchestrator, options, deps.signal);
  for await (const event of run.events()) {
    io.err(formatProgress(event, options.color));
  }
  const outcome = await run.result;

  if (outcome.status === "awaiting_plan_approval") {
    const path = saveCheckpoint(outcome.checkpoint, options.checkpointDir);
    io.err(`Checkpoint written to ${path}`);
    io.err(`Resume with: research --resume ${path} --accept`);
  }

  io.out(
    options.json
      ? JSON.stringify(outcome, null, 2)
      : formatResearchResponse(outcome, { detailed: !options.brief })
  );
  return exitCodeFor(outcome);
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(HELP);
    return 0;
  }

  validateConfig();
  initRunId();
  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    console: false,
  });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("interrupted")));

  const collaborators = options.offline
    ? createScriptedCollaborators()
    : createLlmCollaborators(config);

  return runResearch(
    options,
    { collaborators, logger, defaults: config.researchDefaults, signal: controller.signal },
    {
      out: (text) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
      err: (text) => process.stderr.write(`${text}\n`),
    }
  );
}

// Only run when executed directly (not imported by tests)
const isDirectExecution =
  process.argv[1] !== undefined && /(^|[\\/])research(\.(ts|js))?$/.test(process.argv[1]);

if (isDirectExecution) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      const known =
        err instanceof CliUsageError ||
        err instanceof ResearchConfigError ||
        err instanceof CheckpointError ||
        err instanceof PlanValidationError;
      const message =
        err instanceof ResearchConfigError
          ? err.format()
          : err instanceof Error
            ? err.message
            : String(err);
      console.error(`Error: ${message}`);
      if (!known && err instanceof Error && err.stack) {
        console.error(err.stack);
      }
      process.exitCode = 1;
    }
  );
}
