/**
 * Router: walks the command tree, consuming one token per level.
 *
 * Matching is exact and case-sensitive, after a single alias substitution.
 * There is no prefix matching and no backtracking.
 */

import type { CommandGroup, CommandPath } from "@argroute/sdk";
import { RoutingError } from "@argroute/sdk";
import { createLogger } from "@argroute/shared";
import type { TokenStream } from "../stream/token-stream.js";
import type { CommandRegistry } from "./registry.js";
import { buildCommandPath } from "./command-path.js";

const logger = createLogger("Router");

export type RouteResult =
  | { success: true; path: CommandPath }
  | { success: false; error: RoutingError };

export function route(registry: CommandRegistry, stream: TokenStream): RouteResult {
  const { root } = registry;
  const partialPath: CommandGroup[] = [];
  let group = root;

  for (;;) {
    const token = stream.peek();
    if (token === undefined) {
      logger.debug("Ran out of tokens", { group: group.name });
      return { success: false, error: new RoutingError(root, partialPath) };
    }

    const name = registry.resolveAlias(token);
    const match = group.children.find((child) => child.name === name);
    if (!match) {
      logger.debug("No match", { group: group.name, token });
      return { success: false, error: new RoutingError(root, partialPath, token) };
    }

    stream.next();
    switch (match.kind) {
      case "group":
        partialPath.push(match);
        group = match;
        break;
      case "command": {
        const path = buildCommandPath(root, partialPath, match);
        logger.debug("Routed", { command: [...partialPath.map((g) => g.name), match.name].join(" ") });
        return { success: true, path };
      }
    }
  }
}
