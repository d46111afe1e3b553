import type { BoundCommand, CommandPath } from "./command.js";
import type { OptionError, ParameterError, RoutingError } from "../errors/base.js";

export type InterpretationError = RoutingError | OptionError | ParameterError;

export type InterpretationFailure =
  | { kind: "failure"; stage: "routing"; error: RoutingError }
  | { kind: "failure"; stage: "options"; error: OptionError; path: CommandPath }
  | { kind: "failure"; stage: "parameters"; error: ParameterError; path: CommandPath };

/**
 * What one run of the pipeline yields: a command ready to execute, a
 * request to print usage and stop with success, or a typed failure.
 */
export type Interpretation =
  | { kind: "bound"; command: BoundCommand }
  | { kind: "help"; path: CommandPath }
  | InterpretationFailure;
