/**
 * Interpretation pipeline: manipulators → router → option recognizer →
 * help short-circuit → option groups → parameter filler.
 *
 * Synchronous and side-effect free apart from logging; every call works on
 * a fresh TokenStream.
 */

import type { Command, Flag, Interpretation } from "@argroute/sdk";
import { createLogger } from "@argroute/shared";
import { TokenStream } from "../stream/token-stream.js";
import { applyManipulators, type ArgumentManipulator } from "../stream/manipulators.js";
import type { CommandRegistry } from "../routing/registry.js";
import { route } from "../routing/router.js";
import { createOptionRegistry } from "../options/option-registry.js";
import { recognizeOptions } from "../options/recognizer.js";
import { validateOptionGroups } from "../options/option-groups.js";
import { optionKey } from "../options/option.js";
import { fillParameters } from "../parameters/filler.js";

const logger = createLogger("Pipeline");

export interface PipelineDeps {
  registry: CommandRegistry;
  manipulators: readonly ArgumentManipulator[];
  /** When set and given, the pipeline stops after recognition with a help request */
  helpFlag?: Flag;
  /**
   * Commands that take every remaining token as a parameter, with no option
   * recognition (the built-in help command).
   */
  rawArgumentCommands?: ReadonlySet<Command>;
}

export function interpret(deps: PipelineDeps, tokens: readonly string[]): Interpretation {
  const stream = new TokenStream(tokens);
  applyManipulators(deps.manipulators, stream);

  const routed = route(deps.registry, stream);
  if (!routed.success) {
    return { kind: "failure", stage: "routing", error: routed.error };
  }
  const { path } = routed;
  const signature = deps.registry.signatureOf(path.command);

  if (deps.rawArgumentCommands?.has(path.command)) {
    const filled = fillParameters(signature, stream.drain());
    if (!filled.success) {
      return { kind: "failure", stage: "parameters", error: filled.error, path };
    }
    return { kind: "bound", command: { path, options: {}, params: filled.values } };
  }

  const recognized = recognizeOptions(createOptionRegistry(path.options), stream);
  if (!recognized.success) {
    return { kind: "failure", stage: "options", error: recognized.error, path };
  }

  if (deps.helpFlag && recognized.values[optionKey(deps.helpFlag)] === true) {
    logger.debug("Help requested", { command: path.command.name });
    return { kind: "help", path };
  }

  const grouped = validateOptionGroups(path.command.optionGroups ?? [], recognized.values);
  if (!grouped.success) {
    return { kind: "failure", stage: "options", error: grouped.error, path };
  }

  const filled = fillParameters(signature, stream.drain());
  if (!filled.success) {
    return { kind: "failure", stage: "parameters", error: filled.error, path };
  }

  return { kind: "bound", command: { path, options: recognized.values, params: filled.values } };
}
