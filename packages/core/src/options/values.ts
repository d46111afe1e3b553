import type { OptionValues } from "@argroute/sdk";

/** True only when the flag was given. */
export function flagValue(values: OptionValues, key: string): boolean {
  return values[key] === true;
}

/** Value of a `string` keyed option, if given. */
export function stringOption(values: OptionValues, key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" ? value : undefined;
}

/** Value of an `int` or `float` keyed option, if given. */
export function numberOption(values: OptionValues, key: string): number | undefined {
  const value = values[key];
  return typeof value === "number" ? value : undefined;
}
