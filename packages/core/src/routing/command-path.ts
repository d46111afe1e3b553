import type { Command, CommandGroup, CommandPath, Option, ParameterSignature } from "@argroute/sdk";
import { EMPTY_SIGNATURE } from "../parameters/signature.js";

/**
 * Options visible to a command: its own, then each ancestor group's shared
 * options from innermost outwards, then the root's.
 */
export function visibleOptions(
  root: CommandGroup,
  groups: readonly CommandGroup[],
  command: Command,
): Option[] {
  const inherited = [...groups].reverse().flatMap((group) => group.sharedOptions ?? []);
  return [...(command.options ?? []), ...inherited, ...(root.sharedOptions ?? [])];
}

export function buildCommandPath(
  root: CommandGroup,
  groups: readonly CommandGroup[],
  command: Command,
): CommandPath {
  return {
    root,
    groups: [...groups],
    command,
    options: visibleOptions(root, groups, command),
  };
}

export function commandSignature(command: Command): ParameterSignature {
  return command.signature ?? EMPTY_SIGNATURE;
}

/** Names from the root down to the command, e.g. ["demo", "test", "unit"]. */
export function pathNames(path: CommandPath): string[] {
  return [path.root.name, ...path.groups.map((group) => group.name), path.command.name];
}
