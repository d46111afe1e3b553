/**
 * Parameter filler: greedy, order-preserving positional binding.
 */

import type { ParameterSignature, ParameterValue, ParameterValues } from "@argroute/sdk";
import { ParameterError } from "@argroute/sdk";
import { createLogger } from "@argroute/shared";

const logger = createLogger("ParameterFiller");

export type FillResult =
  | { success: true; values: ParameterValues }
  | { success: false; error: ParameterError };

/**
 * Bind tokens to slots: required slots first, then optional slots (missing
 * ones keep their default), then the variadic slot takes the rest.
 */
export function fillParameters(signature: ParameterSignature, tokens: readonly string[]): FillResult {
  const requiredCount = signature.required.length;
  const maxCount = requiredCount + signature.optional.length;

  if (tokens.length < requiredCount) {
    return { success: false, error: new ParameterError("notEnoughArguments", requiredCount, tokens.length) };
  }
  if (!signature.variadic && tokens.length > maxCount) {
    return { success: false, error: new ParameterError("tooManyArguments", maxCount, tokens.length) };
  }

  const values: Record<string, ParameterValue> = {};
  let cursor = 0;

  for (const slot of signature.required) {
    values[slot.name] = tokens[cursor++];
  }
  for (const slot of signature.optional) {
    values[slot.name] = cursor < tokens.length ? tokens[cursor++] : slot.defaultValue;
  }
  if (signature.variadic) {
    values[signature.variadic.name] = tokens.slice(cursor);
  }

  logger.debug("Filled parameters", { values });
  return { success: true, values };
}
