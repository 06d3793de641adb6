/**
 * Clarification exchanges carried between sessions.
 *
 * A session that ends in `needs_clarification` asks one question; the caller
 * answers it and starts a new session passing every answer so far.
 */

import { z } from "zod";

export const ClarificationSchema = z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1),
});

export interface Clarification {
  readonly question: string;
  readonly answer: string;
}

/**
 * Render the exchange as prompt/report text, one Q/A pair per entry.
 */
export function formatClarifications(clarifications: readonly Clarification[]): string {
  return clarifications
    .map((c, i) => `${i + 1}. Q: ${c.question}\n   A: ${c.answer}`)
    .join("\n");
}
