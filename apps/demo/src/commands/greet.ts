/**
 * greet <name> [<greeting>] [--shout]
 */

import type { Command } from "@argroute/sdk";
import { createSignature, flag, flagValue, optional, requireParam, required } from "@argroute/core";

export function createGreetCommand(): Command {
  return {
    kind: "command",
    name: "greet",
    description: "Greet someone by name",
    options: [flag(["-s", "--shout"], "Print the greeting in upper case")],
    signature: createSignature([
      required("name", "Who to greet"),
      optional("greeting", "Hello", "Word to greet with"),
    ]),
    execute({ params, options, output }): void {
      const message = `${requireParam(params, "greeting")}, ${requireParam(params, "name")}!`;
      output.out(flagValue(options, "shout") ? message.toUpperCase() : message);
    },
  };
}
