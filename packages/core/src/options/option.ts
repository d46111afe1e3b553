import type { Flag, KeyedOption, Option, OptionGroup, OptionValueType } from "@argroute/sdk";

/** Declare a boolean flag, e.g. `flag(["-f", "--force"], "Overwrite files")`. */
export function flag(names: readonly string[], description = "", key?: string): Flag {
  return key === undefined ? { kind: "flag", names, description } : { kind: "flag", names, description, key };
}

/** Declare an option taking one value, e.g. `keyed(["-j", "--jobs"], "Worker count", "int")`. */
export function keyed(
  names: readonly string[],
  description = "",
  valueType: OptionValueType = "string",
  key?: string,
): KeyedOption {
  return key === undefined
    ? { kind: "keyed", names, description, valueType }
    : { kind: "keyed", names, description, valueType, key };
}

export function atMostOne(...options: Option[]): OptionGroup {
  return { options, restriction: "atMostOne" };
}

export function atLeastOne(...options: Option[]): OptionGroup {
  return { options, restriction: "atLeastOne" };
}

export function exactlyOne(...options: Option[]): OptionGroup {
  return { options, restriction: "exactlyOne" };
}

/** Key an option's value is bound under: explicit key, else longest spelling without dashes. */
export function optionKey(option: Option): string {
  if (option.key !== undefined) return option.key;
  const longest = option.names.reduce((best, name) => (name.length > best.length ? name : best), "");
  return longest.replace(/^-+/, "");
}
