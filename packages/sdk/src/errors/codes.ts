/**
 * Stable error codes carried by every CliError.
 */
export const ErrorCode = {
  CLI_ERROR: "CLI_ERROR",
  ROUTING_ERROR: "ROUTING_ERROR",
  OPTION_ERROR: "OPTION_ERROR",
  PARAMETER_ERROR: "PARAMETER_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  PROCESS_ERROR: "PROCESS_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
