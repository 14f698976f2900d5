// ─── Engine Configuration ──────────────────────────────────────────
// Options are validated once, when an engine is created.

import { formatIssues } from "@umbral/schema";
import { z } from "zod";
import { EngineError, EngineErrorCode } from "./errors.js";
import { LOG_LEVEL_NAMES } from "./logger.js";

export const EngineOptionsSchema = z.object({
  /** Seed for every shuffle and die roll. */
  seed: z
    .number()
    .int()
    .default(() => Date.now()),
  logLevel: z.enum(LOG_LEVEL_NAMES).default("warn"),
});

export type EngineConfig = z.infer<typeof EngineOptionsSchema>;

/**
 * Validates engine options, filling in defaults.
 * @throws {EngineError} INVALID_SETUP with the formatted issues.
 */
export function parseEngineOptions(raw: unknown): EngineConfig {
  const result = EngineOptionsSchema.safeParse(raw);
  if (result.success) return result.data;
  const issues = formatIssues(result.error);
  throw new EngineError(`Invalid engine options: ${issues.join("; ")}`, EngineErrorCode.INVALID_SETUP, {
    issues,
  });
}
