import type { CommandPath } from "@argroute/sdk";
import { commandSignature, pathNames } from "../routing/command-path.js";
import { signatureUsage } from "../parameters/signature.js";

/** e.g. `demo greet <name> [<greeting>] [options]` */
export function usageLine(path: CommandPath): string {
  return [
    ...pathNames(path),
    signatureUsage(commandSignature(path.command)),
    path.options.length > 0 ? "[options]" : "",
  ]
    .filter((part) => part !== "")
    .join(" ");
}
