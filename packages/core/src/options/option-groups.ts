import type { Option, OptionGroup, OptionValues } from "@argroute/sdk";
import { OptionError } from "@argroute/sdk";
import { optionKey } from "./option.js";

export type GroupValidationResult = { success: true } | { success: false; error: OptionError };

function wasGiven(option: Option, values: OptionValues): boolean {
  const value = values[optionKey(option)];
  return option.kind === "flag" ? value === true : value !== undefined;
}

/** Check each group's restriction against the recognized values, in declared order. */
export function validateOptionGroups(groups: readonly OptionGroup[], values: OptionValues): GroupValidationResult {
  for (const group of groups) {
    const count = group.options.filter((option) => wasGiven(option, values)).length;
    const satisfied =
      group.restriction === "atMostOne" ? count <= 1 : group.restriction === "atLeastOne" ? count >= 1 : count === 1;
    if (!satisfied) {
      return { success: false, error: new OptionError({ kind: "optionGroupMisuse", group }) };
    }
  }
  return { success: true };
}
