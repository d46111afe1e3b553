/**
 * Command tree types.
 */

import type { Option, OptionGroup, OptionValues } from "./option.js";
import type { ParameterSignature, ParameterValues } from "./parameter.js";

/** Where commands and the CLI write their text. */
export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

/** Everything a command action receives when it runs. */
export interface CommandContext {
  params: ParameterValues;
  options: OptionValues;
  path: CommandPath;
  output: CliOutput;
}

/** Leaf unit of work. */
export interface Command {
  kind: "command";
  name: string;
  description: string;
  options?: readonly Option[];
  optionGroups?: readonly OptionGroup[];
  /** Positional parameters. Default: no parameters */
  signature?: ParameterSignature;
  execute(context: CommandContext): void | Promise<void>;
}

/** Non-leaf node; its shared options are inherited by every descendant. */
export interface CommandGroup {
  kind: "group";
  name: string;
  description: string;
  children: readonly Routable[];
  sharedOptions?: readonly Option[];
}

export type Routable = Command | CommandGroup;

/** Alternate invocation name → canonical name. */
export type AliasTable = Readonly<Record<string, string>>;

/** Result of a successful route. */
export interface CommandPath {
  root: CommandGroup;
  /** Groups traversed below the root, outermost first */
  groups: readonly CommandGroup[];
  command: Command;
  /** Own options, then each ancestor's shared options, innermost first */
  options: readonly Option[];
}

/** A command with its options and parameters bound, ready to execute. */
export interface BoundCommand {
  path: CommandPath;
  options: OptionValues;
  params: ParameterValues;
}
