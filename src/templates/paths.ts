/**
 * Locations of the bundled template directories.
 *
 * Resolved relative to this module so they work both from src/ (tsx) and
 * from dist/ after a build.
 */

import { fileURLToPath } from "node:url";

export const TEMPLATES_ROOT = fileURLToPath(new URL("../../templates", import.meta.url));

export const REPORT_TEMPLATES_DIR = fileURLToPath(
  new URL("../../templates/reports", import.meta.url)
);

export const PROMPT_TEMPLATES_DIR = fileURLToPath(
  new URL("../../templates/prompts", import.meta.url)
);
