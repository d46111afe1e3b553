/**
 * Help rendering contract.
 */

import type { CommandGroup, CommandPath } from "./command.js";
import type { OptionError } from "../errors/base.js";

/** The groups reached while routing, below the root. */
export interface GroupPath {
  root: CommandGroup;
  partialPath: readonly CommandGroup[];
}

export interface HelpMessageGenerator {
  /** List the children of the deepest group in the path. */
  renderCommandList(path: GroupPath): string;
  /** Usage statement for a resolved command. */
  renderUsage(path: CommandPath): string;
  /** Usage statement plus a description of what went wrong. */
  renderMisusedOptions(path: CommandPath, error: OptionError): string;
}
