// Token stream
export { TokenStream } from "./stream/token-stream.js";
export { isOptionToken } from "./stream/option-token.js";
export { createOptionSplitter, applyManipulators } from "./stream/manipulators.js";
export type { ArgumentManipulator } from "./stream/manipulators.js";

// Routing
export { createCommandRegistry } from "./routing/registry.js";
export type { CommandRegistry, CommandRegistryConfig } from "./routing/registry.js";
export { route } from "./routing/router.js";
export type { RouteResult } from "./routing/router.js";
export { buildCommandPath, visibleOptions, commandSignature, pathNames } from "./routing/command-path.js";

// Options
export { flag, keyed, atMostOne, atLeastOne, exactlyOne, optionKey } from "./options/option.js";
export { createOptionRegistry } from "./options/option-registry.js";
export type { OptionRegistry } from "./options/option-registry.js";
export { coerceOptionValue } from "./options/coercion.js";
export type { CoercionResult } from "./options/coercion.js";
export { recognizeOptions } from "./options/recognizer.js";
export type { RecognitionResult } from "./options/recognizer.js";
export { validateOptionGroups } from "./options/option-groups.js";
export type { GroupValidationResult } from "./options/option-groups.js";
export { flagValue, stringOption, numberOption } from "./options/values.js";

// Parameters
export { required, optional, variadic, createSignature, signatureUsage, EMPTY_SIGNATURE } from "./parameters/signature.js";
export { fillParameters } from "./parameters/filler.js";
export type { FillResult } from "./parameters/filler.js";
export { stringParam, listParam, requireParam } from "./parameters/values.js";

// Pipeline
export { interpret } from "./pipeline/interpret.js";
export type { PipelineDeps } from "./pipeline/interpret.js";

// Help
export { createHelpMessageGenerator } from "./help/help-generator.js";
export { usageLine } from "./help/usage.js";

// CLI
export { createCli, splitArgumentString } from "./cli/cli.js";
export type { Cli, CliConfig } from "./cli/cli.js";
export { DEFAULT_ALIASES, createHelpFlag, createHelpCommand, createVersionCommand } from "./cli/builtins.js";
