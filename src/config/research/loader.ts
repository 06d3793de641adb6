/**
 * Research configuration loader and validator.
 *
 * Responsible for:
 * - Merging per-session overrides over process defaults
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import type { ZodIssue } from "zod";
import {
  ResearchConfigSchema,
  type ResearchConfig,
  type ResearchConfigInput,
  type ResearchDefaults,
} from "./schema.js";

/**
 * Structured validation error for research configuration and queries.
 * Raised before a session exists, so no partial state accompanies it.
 */
export class ResearchConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "ResearchConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Research configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "invalid_query" */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Validate and load research configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen ResearchConfig
 * @throws ResearchConfigError if validation fails
 */
export function loadResearchConfig(input: unknown): Readonly<ResearchConfig> {
  const result = ResearchConfigSchema.safeParse(input ?? {});

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ResearchConfigError(
      `Invalid research configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate research configuration without loading.
 */
export function validateResearchConfig(input: unknown): {
  success: boolean;
  config?: ResearchConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = ResearchConfigSchema.safeParse(input ?? {});

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Build a session config: a value given by the caller wins, else the
 * process default, else the schema default. `undefined` in the overrides
 * never masks a default.
 *
 * @throws ResearchConfigError if the merged config is invalid
 */
export function resolveResearchConfig(
  overrides: ResearchConfigInput = {},
  defaults: ResearchDefaults = {}
): Readonly<ResearchConfig> {
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return loadResearchConfig(merged);
}

/**
 * Reject empty or whitespace-only queries.
 *
 * @returns The trimmed query
 * @throws ResearchConfigError
 */
export function validateQuery(query: unknown): string {
  if (typeof query !== "string" || query.trim() === "") {
    throw new ResearchConfigError("Invalid research query", [
      {
        path: ["query"],
        message: "Query must be a non-empty string",
        code: "invalid_query",
      },
    ]);
  }
  return query.trim();
}
