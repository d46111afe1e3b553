export { createLogger } from "./logger/index.js";
export type { Logger, LoggerOptions, LogLevel, LogFormat, LogContext } from "./logger/index.js";

export { generateInvocationId } from "./utils/invocation-id.js";
export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { CliConfigSchema, AliasTableSchema, OptionSpellingSchema } from "./utils/config-schema.js";
export type { ValidatedCliConfig } from "./utils/config-schema.js";
