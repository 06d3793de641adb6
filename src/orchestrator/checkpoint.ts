/**
 * Session checkpoints for plan review.
 *
 * A session paused in `awaiting_plan_approval` hands back a checkpoint:
 * everything needed to continue the run later, possibly in another process.
 * Checkpoints serialize to versioned JSON. Loaders accept any checkpoint
 * whose major version matches CHECKPOINT_VERSION.
 *
 * File naming: checkpoint-{researchId}.json
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

import { ResearchConfigSchema } from "../config/research/schema.js";
import { deepFreeze } from "../config/research/loader.js";
import { ClarificationSchema } from "../research/clarifications.js";
import { ObservationSchema } from "../research/observations.js";
import { PlanSchema } from "../research/plan.js";
import { ResourceSchema } from "../research/resources.js";

export const CHECKPOINT_VERSION = "1.0.0";

export const SessionCheckpointSchema = z.object({
  checkpointVersion: z.string().regex(/^\d+\.\d+\.\d+$/, "Must be semver (x.y.z)"),
  researchId: z.string().min(1),
  createdAt: z.string().datetime(),
  originalQuery: z.string().trim().min(1),
  clarifiedQuery: z.string().trim().min(1),
  locale: z.string().min(2),
  clarifications: z.array(ClarificationSchema),
  config: ResearchConfigSchema,
  plan: PlanSchema,
  planIterationCount: z.number().int().min(1),
  stepsExecuted: z.number().int().min(0),
  observations: z.array(ObservationSchema),
  resources: z.array(ResourceSchema),
});

export type SessionCheckpoint = z.infer<typeof SessionCheckpointSchema>;

export class CheckpointError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "CheckpointError";
  }
}

/**
 * Whether a checkpoint version can be loaded (same major version).
 */
export function isCheckpointVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = CHECKPOINT_VERSION.split(".").map(Number);
  return major === currentMajor;
}

/**
 * Validate an in-memory checkpoint value.
 *
 * @returns Validated and frozen checkpoint
 * @throws CheckpointError on schema or version mismatch
 */
export function parseCheckpoint(value: unknown): Readonly<SessionCheckpoint> {
  const result = SessionCheckpointSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new CheckpointError(`Invalid checkpoint: ${issues.join("; ")}`, issues);
  }

  const checkpoint = result.data;
  if (!isCheckpointVersionCompatible(checkpoint.checkpointVersion)) {
    throw new CheckpointError(
      `Incompatible checkpoint version: ${checkpoint.checkpointVersion} ` +
        `(current: ${CHECKPOINT_VERSION})`
    );
  }

  return deepFreeze(checkpoint);
}

export function serializeCheckpoint(checkpoint: SessionCheckpoint, pretty = true): string {
  return JSON.stringify(checkpoint, null, pretty ? 2 : undefined);
}

/**
 * @throws CheckpointError if the JSON is malformed, invalid or incompatible
 */
export function deserializeCheckpoint(json: string): Readonly<SessionCheckpoint> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new CheckpointError(
      `Failed to parse checkpoint JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseCheckpoint(parsed);
}

export function getCheckpointFilename(researchId: string): string {
  return `checkpoint-${researchId}.json`;
}

/**
 * Write a checkpoint to disk.
 *
 * @returns Full path of the written file
 */
export function saveCheckpoint(
  checkpoint: SessionCheckpoint,
  directory: string,
  filename?: string
): string {
  const filePath = join(directory, filename ?? getCheckpointFilename(checkpoint.researchId));

  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(filePath, serializeCheckpoint(checkpoint), "utf-8");
  return filePath;
}

/**
 * @throws CheckpointError if the file is missing or its content is invalid
 */
export function loadCheckpoint(filePath: string): Readonly<SessionCheckpoint> {
  if (!existsSync(filePath)) {
    throw new CheckpointError(`Checkpoint file not found: ${filePath}`);
  }
  return deserializeCheckpoint(readFileSync(filePath, "utf-8"));
}
