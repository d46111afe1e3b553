/**
 * Built-in commands and options, created eagerly from CLI configuration.
 */

import type { AliasTable, Command, Flag, HelpMessageGenerator } from "@argroute/sdk";
import { ProcessError } from "@argroute/sdk";
import { flag } from "../options/option.js";
import { createSignature, variadic } from "../parameters/signature.js";
import { listParam } from "../parameters/values.js";
import { TokenStream } from "../stream/token-stream.js";
import type { CommandRegistry } from "../routing/registry.js";
import { route } from "../routing/router.js";

export const DEFAULT_ALIASES: AliasTable = {
  "-h": "help",
  "-v": "version",
};

export function createHelpFlag(): Flag {
  return flag(["-h", "--help"], "Show help information for this command");
}

/**
 * `help [<command>] ...`: usage of the named command, or the command list
 * of the deepest group the names reach.
 *
 * `registry` is read when the command runs, since the registry holding
 * this command is built after it.
 */
export function createHelpCommand(registry: () => CommandRegistry, generator: HelpMessageGenerator): Command {
  return {
    kind: "command",
    name: "help",
    description: "Prints help information",
    signature: createSignature([variadic("command", "Command to describe")]),
    execute({ params, output }): void {
      const routed = route(registry(), new TokenStream(listParam(params, "command")));
      if (routed.success) {
        output.out(generator.renderUsage(routed.path));
        return;
      }

      const { error } = routed;
      if (error.unmatchedToken !== undefined) {
        output.err(error.message);
        output.out(generator.renderCommandList(error));
        throw new ProcessError();
      }
      output.out(generator.renderCommandList(error));
    },
  };
}

export function createVersionCommand(version: string): Command {
  return {
    kind: "command",
    name: "version",
    description: "Prints the current version of this app",
    execute({ output }): void {
      output.out(`Version: ${version}`);
    },
  };
}
