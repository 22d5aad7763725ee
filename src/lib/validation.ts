import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { createLogger } from "./logger";

const log = createLogger("validation");

/**
 * Extracts the first error per top-level field from a Zod error.
 * Issues without a path (object-level refinements) are keyed as `form`.
 */
export function extractZodFieldErrors(zodError: ZodError): Record<string, string> {
  const fieldErrors: Record<string, string> = {};
  for (const issue of zodError.issues) {
    const head = issue.path[0];
    const field = head === undefined ? "form" : String(head);
    if (!fieldErrors[field]) {
      fieldErrors[field] = issue.message;
    }
  }
  return fieldErrors;
}

/** Renders field errors as `field: message` lines, in issue order. */
export function describeFieldErrors(fieldErrors: Record<string, string>): string[] {
  return Object.entries(fieldErrors).map(([field, message]) => `${field}: ${message}`);
}

export type SchemaResult<T> =
  | { success: true; data: T }
  | { success: false; fieldErrors: Record<string, string> };

/**
 * Runs `schema.safeParse` and folds the outcome into a field-keyed result.
 * Failures are logged at DEBUG so `LOG_LEVEL=debug` shows every rejected value.
 */
export function validateWithSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  label: string
): SchemaResult<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }

  const fieldErrors = extractZodFieldErrors(result.error);
  log.debug(`${label} failed validation: ${JSON.stringify(fieldErrors)}`);
  return { success: false, fieldErrors };
}
