import type { ParameterValues } from "@argroute/sdk";
import { CliError, ErrorCode } from "@argroute/sdk";

/** Value of a required or optional slot. */
export function stringParam(values: ParameterValues, name: string): string | undefined {
  const value = values[name];
  return typeof value === "string" ? value : undefined;
}

/**
 * Value of a required slot, or of an optional slot with a default.
 *
 * @throws CliError when the slot has no single value
 */
export function requireParam(values: ParameterValues, name: string): string {
  const value = stringParam(values, name);
  if (value === undefined) {
    throw new CliError(`Parameter "${name}" has no value`, ErrorCode.PARAMETER_ERROR);
  }
  return value;
}

/** Tokens collected by a variadic slot; empty when the slot is absent. */
export function listParam(values: ParameterValues, name: string): readonly string[] {
  const value = values[name];
  return value === undefined || typeof value === "string" ? [] : value;
}
