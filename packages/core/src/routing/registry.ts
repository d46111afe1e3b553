/**
 * CommandRegistry: the command tree and alias table of one CLI.
 *
 * Everything an integrator can get wrong is checked here, before any token
 * is read: duplicate child names, chained aliases, duplicate option
 * spellings visible to a command, malformed signatures, and option groups
 * naming options the command cannot see.
 */

import type { AliasTable, Command, CommandGroup, Option, ParameterSignature, Routable } from "@argroute/sdk";
import { ConfigurationError } from "@argroute/sdk";
import { createLogger } from "@argroute/shared";
import { createOptionRegistry } from "../options/option-registry.js";
import { EMPTY_SIGNATURE, createSignature } from "../parameters/signature.js";
import { buildCommandPath } from "./command-path.js";

const logger = createLogger("CommandRegistry");

export interface CommandRegistry {
  readonly root: CommandGroup;
  /** A copy; changing it does not change routing. */
  readonly aliases: ReadonlyMap<string, string>;
  /** Substitute an alias once; other tokens come back unchanged. */
  resolveAlias(token: string): string;
  /** The command's signature, rebuilt from its slots when it was registered. */
  signatureOf(command: Command): ParameterSignature;
}

export interface CommandRegistryConfig {
  name: string;
  description?: string;
  commands: readonly Routable[];
  /** Options every command inherits (global options, help flag) */
  sharedOptions?: readonly Option[];
  aliases?: AliasTable;
}

function validateAliases(aliases: ReadonlyMap<string, string>): void {
  for (const [alias, target] of aliases) {
    if (aliases.has(target)) {
      throw new ConfigurationError(
        `Alias "${alias}" points to "${target}", which is itself an alias; aliases are substituted once`,
      );
    }
  }
}

type SignatureTable = Map<Command, ParameterSignature>;

function validateCommand(
  root: CommandGroup,
  groups: readonly CommandGroup[],
  command: Command,
  signatures: SignatureTable,
): void {
  const path = buildCommandPath(root, groups, command);
  const where = [root.name, ...groups.map((group) => group.name), command.name].join(" ");

  try {
    createOptionRegistry(path.options);
    signatures.set(command, command.signature ? createSignature(command.signature.slots) : EMPTY_SIGNATURE);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(`Command "${where}": ${err.message}`, { cause: err });
    }
    throw err;
  }

  const visible = new Set(path.options);
  for (const group of command.optionGroups ?? []) {
    for (const option of group.options) {
      if (!visible.has(option)) {
        throw new ConfigurationError(
          `Command "${where}": option group names ${option.names.join(", ")}, which the command does not declare or inherit`,
        );
      }
    }
  }
}

function validateGroup(
  root: CommandGroup,
  group: CommandGroup,
  groups: readonly CommandGroup[],
  signatures: SignatureTable,
): void {
  const names = new Set<string>();
  for (const child of group.children) {
    if (child.name.trim() === "" || /\s/.test(child.name)) {
      throw new ConfigurationError(`Invalid command name "${child.name}" in "${group.name}"`);
    }
    if (names.has(child.name)) {
      throw new ConfigurationError(`Command "${child.name}" is declared more than once in "${group.name}"`);
    }
    names.add(child.name);

    switch (child.kind) {
      case "group":
        validateGroup(root, child, [...groups, child], signatures);
        break;
      case "command":
        validateCommand(root, groups, child, signatures);
        break;
    }
  }
}

/**
 * Build and validate the registry. The root group and its option and
 * child lists are frozen; command objects are held by reference.
 *
 * @throws ConfigurationError
 */
export function createCommandRegistry(config: CommandRegistryConfig): CommandRegistry {
  const group: CommandGroup = {
    kind: "group",
    name: config.name,
    description: config.description ?? "",
    children: Object.freeze([...config.commands]),
    sharedOptions: Object.freeze([...(config.sharedOptions ?? [])]),
  };
  const root = Object.freeze(group);
  const aliases = new Map(Object.entries(config.aliases ?? {}));
  const signatures: SignatureTable = new Map();

  validateAliases(aliases);
  validateGroup(root, root, [], signatures);

  logger.debug(`Registered ${root.children.length} top-level routables`, {
    commands: root.children.map((child) => child.name),
    aliases: Object.fromEntries(aliases),
  });

  return Object.freeze({
    root,
    aliases: new Map(aliases),
    resolveAlias(token: string): string {
      return aliases.get(token) ?? token;
    },
    signatureOf(command: Command): ParameterSignature {
      return signatures.get(command) ?? EMPTY_SIGNATURE;
    },
  });
}
