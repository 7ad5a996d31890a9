import type { z } from "zod";
import { logBadGen } from "../doc/logBadGen";

/**
 * Shape-checks parsed model output against a contract. Returns null on any
 * mismatch so the caller can spend another attempt; never throws.
 */
export function validateResponse<S extends z.ZodTypeAny>(
  raw: unknown,
  schema: S,
  label: string
): z.output<S> | null {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.flatten();
    console.warn(`✗ ${label} failed validation`, issues.fieldErrors, issues.formErrors);
    logBadGen("schema-validation-failed", { label, raw, issues });
    return null;
  }
  return result.data;
}
