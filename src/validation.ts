import type { z } from "zod";

import type { ValidationResult } from "./types.ts";

/**
 * Run a zod schema and fold its outcome into the toolkit's ValidationResult union.
 * Each issue becomes one "field: message" line (just "message" for the root).
 */
export function validateWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): ValidationResult<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const errors = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
  return { ok: false, errors };
}
