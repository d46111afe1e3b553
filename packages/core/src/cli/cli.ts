/**
 * Cli: the interpretation pipeline wrapped with built-in commands, output
 * and exit statuses.
 *
 * Usage:
 *   const cli = createCli({ name: "demo", version: "1.0.0", commands });
 *   await cli.goAndExit();
 */

import type {
  AliasTable,
  BoundCommand,
  CliOutput,
  Command,
  HelpMessageGenerator,
  Interpretation,
  InterpretationFailure,
  Option,
  Routable,
} from "@argroute/sdk";
import { CliError, ConfigurationError, ErrorCode, ProcessError } from "@argroute/sdk";
import { CliConfigSchema, createLogger, generateInvocationId, validateInput, type Logger } from "@argroute/shared";
import { parse, type ParseEntry } from "shell-quote";
import { createOptionSplitter, type ArgumentManipulator } from "../stream/manipulators.js";
import { createCommandRegistry, type CommandRegistry } from "../routing/registry.js";
import { interpret } from "../pipeline/interpret.js";
import { createHelpMessageGenerator } from "../help/help-generator.js";
import { usageLine } from "../help/usage.js";
import { DEFAULT_ALIASES, createHelpCommand, createHelpFlag, createVersionCommand } from "./builtins.js";

export interface CliConfig {
  /** Executable name; used in usage statements */
  name: string;
  /** When set, a `version` command is registered */
  version?: string;
  description?: string;
  commands: readonly Routable[];
  /** Options every command inherits */
  globalOptions?: readonly Option[];
  /** Replaces the default `-h → help`, `-v → version` table; `{}` clears it */
  aliases?: AliasTable;
  /** Register `-h` / `--help` on every command. Default: true */
  helpFlag?: boolean;
  /** Register the `help` command. Default: true */
  helpCommand?: boolean;
  /** Default: [createOptionSplitter()] */
  manipulators?: readonly ArgumentManipulator[];
  helpMessageGenerator?: HelpMessageGenerator;
  /** Default: console.log / console.error */
  output?: CliOutput;
  logger?: Logger;
}

export interface Cli {
  readonly name: string;
  readonly version?: string;
  readonly registry: CommandRegistry;
  /** Run the pipeline only; nothing is printed or executed. */
  interpret(tokens: readonly string[]): Interpretation;
  /** Interpret and execute, returning the exit status. */
  go(tokens?: readonly string[]): Promise<number>;
  /** `go` with tokens split from one shell-style string. */
  debugGo(argumentString: string): Promise<number>;
  goAndExit(tokens?: readonly string[]): Promise<never>;
}

const consoleOutput: CliOutput = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

function entryToken(entry: ParseEntry, argumentString: string): string {
  if (typeof entry === "string") return entry;
  if ("comment" in entry) {
    throw new CliError(`Unquoted "#" in argument string: ${argumentString}`, ErrorCode.CLI_ERROR);
  }
  return entry.op === "glob" ? entry.pattern : entry.op;
}

/**
 * Split a shell-style argument string. `$VAR` references, globs and shell
 * operators are kept as literal tokens.
 *
 * @throws CliError when an unquoted `#` would start a shell comment
 */
export function splitArgumentString(argumentString: string): string[] {
  return parse(argumentString, (key) => `$${key}`).map((entry) => entryToken(entry, argumentString));
}

/**
 * Validate configuration, build the built-ins and the registry.
 *
 * @throws ConfigurationError when anything in the configuration is malformed
 */
export function createCli(config: CliConfig): Cli {
  const checked = validateInput(CliConfigSchema, config);
  if (!checked.success) {
    throw new ConfigurationError(`Invalid CLI configuration: ${checked.error}`);
  }

  const logger = config.logger ?? createLogger("Cli");
  const output = config.output ?? consoleOutput;
  const generator = config.helpMessageGenerator ?? createHelpMessageGenerator();
  const manipulators = config.manipulators ?? [createOptionSplitter()];
  const helpFlag = config.helpFlag === false ? undefined : createHelpFlag();

  const builtins: Command[] = [];
  let helpCommand: Command | undefined;
  if (config.helpCommand !== false) {
    helpCommand = createHelpCommand(() => registry, generator);
    builtins.push(helpCommand);
  }
  if (config.version !== undefined) {
    builtins.push(createVersionCommand(config.version));
  }

  const registry = createCommandRegistry({
    name: config.name,
    description: config.description,
    commands: [...config.commands, ...builtins],
    sharedOptions: [...(config.globalOptions ?? []), ...(helpFlag ? [helpFlag] : [])],
    aliases: config.aliases ?? DEFAULT_ALIASES,
  });

  const deps = {
    registry,
    manipulators,
    helpFlag,
    rawArgumentCommands: new Set(helpCommand ? [helpCommand] : []),
  };

  function reportFailure(failure: InterpretationFailure): number {
    switch (failure.stage) {
      case "routing": {
        const { error } = failure;
        if (error.unmatchedToken !== undefined) {
          output.err(error.message);
        }
        output.out(generator.renderCommandList(error));
        return error.exitStatus;
      }
      case "options":
        output.err(generator.renderMisusedOptions(failure.path, failure.error));
        return failure.error.exitStatus;
      case "parameters":
        output.err(failure.error.message);
        output.err(`Usage: ${usageLine(failure.path)}`);
        return failure.error.exitStatus;
    }
  }

  async function execute(bound: BoundCommand): Promise<number> {
    const { path, options, params } = bound;
    logger.setContext({ command: path.command.name });
    try {
      await path.command.execute({ params, options, path, output });
      return 0;
    } catch (err) {
      if (err instanceof ProcessError) {
        if (err.message) output.err(err.message);
        return err.exitStatus;
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.error("Command failed", { command: path.command.name, error: message });
      output.err(`An error occurred: ${message}`);
      return 1;
    }
  }

  async function run(interpretation: Interpretation): Promise<number> {
    switch (interpretation.kind) {
      case "help":
        output.out(generator.renderUsage(interpretation.path));
        return 0;
      case "failure":
        return reportFailure(interpretation);
      case "bound":
        return execute(interpretation.command);
    }
  }

  const cli: Cli = {
    name: config.name,
    version: config.version,
    registry,

    interpret(tokens: readonly string[]): Interpretation {
      return interpret(deps, tokens);
    },

    async go(tokens: readonly string[] = process.argv.slice(2)): Promise<number> {
      logger.setContext({ cli: config.name, invocationId: generateInvocationId(), command: undefined });
      const stop = logger.time("invocation");

      const status = await run(interpret(deps, tokens));

      stop();
      logger.debug("Invocation finished", { status });
      return status;
    },

    async debugGo(argumentString: string): Promise<number> {
      output.out("[Debug Mode]");
      return cli.go(splitArgumentString(argumentString));
    },

    async goAndExit(tokens?: readonly string[]): Promise<never> {
      const status = await cli.go(tokens);
      process.exit(status);
    },
  };

  return cli;
}
