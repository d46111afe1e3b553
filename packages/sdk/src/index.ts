// Types
export type {
  OptionValueType,
  OptionValue,
  Flag,
  KeyedOption,
  Option,
  OptionGroupRestriction,
  OptionGroup,
  OptionValues,
} from "./types/option.js";

export type {
  RequiredSlot,
  OptionalSlot,
  VariadicSlot,
  ParameterSlot,
  ParameterSignature,
  ParameterValue,
  ParameterValues,
} from "./types/parameter.js";

export type {
  CliOutput,
  CommandContext,
  Command,
  CommandGroup,
  Routable,
  AliasTable,
  CommandPath,
  BoundCommand,
} from "./types/command.js";

export type { GroupPath, HelpMessageGenerator } from "./types/help.js";
export type { Interpretation, InterpretationError, InterpretationFailure } from "./types/interpretation.js";

// Errors
export {
  CliError,
  ProcessError,
  ConfigurationError,
  RoutingError,
  OptionError,
  ParameterError,
  optionLabel,
} from "./errors/base.js";
export type { OptionErrorReason, ParameterErrorReason } from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
