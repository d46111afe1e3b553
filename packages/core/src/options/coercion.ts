/**
 * Keyed option value coercion.
 */

import type { OptionValue, OptionValueType } from "@argroute/sdk";
import { validateInput } from "@argroute/shared";
import { z, type ZodType, type ZodTypeDef } from "zod";

const VALUE_SCHEMAS: Record<OptionValueType, ZodType<OptionValue, ZodTypeDef, string>> = {
  string: z.string(),
  int: z
    .string()
    .regex(/^[-+]?\d+$/)
    .transform(Number)
    .refine(Number.isSafeInteger),
  float: z
    .string()
    .regex(/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/)
    .transform(Number)
    .refine(Number.isFinite),
  bool: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["true", "yes", "1", "false", "no", "0"]))
    .transform((value) => value === "true" || value === "yes" || value === "1"),
};

export type CoercionResult = { success: true; value: OptionValue } | { success: false };

/** Convert a raw token to the option's declared type. */
export function coerceOptionValue(valueType: OptionValueType, raw: string): CoercionResult {
  const result = validateInput(VALUE_SCHEMAS[valueType], raw);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false };
}
