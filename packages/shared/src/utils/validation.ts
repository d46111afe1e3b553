/**
 * Zod validation helpers.
 */

import type { ZodType, ZodError, ZodTypeDef } from "zod";

export type ValidationResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Parse `input` with `schema`. Failures carry every issue, formatted on one
 * line for configuration and usage messages.
 */
export function validateInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): ValidationResult<T> {
  const result = schema.safeParse(input);
  return result.success
    ? { success: true, data: result.data }
    : { success: false, error: formatZodError(result.error) };
}

/** `path.to.field: message; other: message` */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
