/**
 * Error hierarchy for command-line interpretation.
 */

import type { CommandGroup } from "../types/command.js";
import type { Option, OptionGroup, OptionValueType } from "../types/option.js";
import { ErrorCode } from "./codes.js";

export class CliError extends Error {
  /** Process exit status to report. Default: 1 */
  public readonly exitStatus: number;

  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error; exitStatus?: number },
  ) {
    super(message, options);
    this.name = "CliError";
    this.exitStatus = options?.exitStatus ?? 1;
  }
}

/**
 * Thrown by command actions to stop with a status.
 * An empty message means nothing is printed.
 */
export class ProcessError extends CliError {
  constructor(message = "", exitStatus = 1, options?: { cause?: Error }) {
    super(message, ErrorCode.PROCESS_ERROR, { ...options, exitStatus });
    this.name = "ProcessError";
  }
}

/**
 * Integrator mistake found while building the command registry
 * (duplicate spellings, malformed signatures, chained aliases).
 */
export class ConfigurationError extends CliError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, ErrorCode.CONFIGURATION_ERROR, options);
    this.name = "ConfigurationError";
  }
}

/**
 * No command matched, or a group was reached with nothing after it.
 * `partialPath` holds the groups traversed below the root.
 */
export class RoutingError extends CliError {
  constructor(
    public readonly root: CommandGroup,
    public readonly partialPath: readonly CommandGroup[],
    public readonly unmatchedToken?: string,
  ) {
    super(
      unmatchedToken !== undefined
        ? `Command "${unmatchedToken}" not found`
        : `"${[root, ...partialPath].map(g => g.name).join(" ")}" requires a subcommand`,
      ErrorCode.ROUTING_ERROR,
    );
    this.name = "RoutingError";
  }

  /** The group routing stopped in. */
  get deepestGroup(): CommandGroup {
    return this.partialPath[this.partialPath.length - 1] ?? this.root;
  }
}

export type OptionErrorReason =
  | { kind: "unrecognizedOption"; name: string }
  | { kind: "expectedValue"; name: string }
  | { kind: "invalidValue"; name: string; expectedType: OptionValueType; received: string }
  | { kind: "optionGroupMisuse"; group: OptionGroup };

const TYPE_NAMES: Record<OptionValueType, string> = {
  string: "a string",
  int: "an integer",
  float: "a number",
  bool: "a boolean",
};

/** Longest spelling of an option, used when naming it in messages. */
export function optionLabel(option: Option): string {
  return option.names.reduce((longest, name) => (name.length > longest.length ? name : longest), "");
}

function describeOptionError(reason: OptionErrorReason): string {
  switch (reason.kind) {
    case "unrecognizedOption":
      return `Unrecognized option: ${reason.name}`;
    case "expectedValue":
      return `Expected a value to follow: ${reason.name}`;
    case "invalidValue":
      return `Invalid value for ${reason.name}: "${reason.received}" is not ${TYPE_NAMES[reason.expectedType]}`;
    case "optionGroupMisuse": {
      const labels = reason.group.options.map(optionLabel).join(", ");
      switch (reason.group.restriction) {
        case "atMostOne":
          return `Only one of the following options may be passed: ${labels}`;
        case "atLeastOne":
          return `At least one of the following options must be passed: ${labels}`;
        case "exactlyOne":
          return `Exactly one of the following options must be passed: ${labels}`;
      }
    }
  }
}

export class OptionError extends CliError {
  constructor(public readonly reason: OptionErrorReason) {
    super(describeOptionError(reason), ErrorCode.OPTION_ERROR);
    this.name = "OptionError";
  }
}

export type ParameterErrorReason = "notEnoughArguments" | "tooManyArguments";

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * Positional tokens did not fit the command's signature.
 * `expected` is the minimum for notEnoughArguments and the maximum for
 * tooManyArguments.
 */
export class ParameterError extends CliError {
  constructor(
    public readonly reason: ParameterErrorReason,
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(
      reason === "notEnoughArguments"
        ? `Expected at least ${plural(expected, "argument")}, got ${received}`
        : `Expected at most ${plural(expected, "argument")}, got ${received}`,
      ErrorCode.PARAMETER_ERROR,
    );
    this.name = "ParameterError";
  }
}
