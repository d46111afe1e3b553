/**
 * Default help message generator.
 */

import type { CommandPath, GroupPath, HelpMessageGenerator, Option, OptionError, Routable } from "@argroute/sdk";
import { usageLine } from "./usage.js";

const INDENT = "  ";

function optionFlags(option: Option): string {
  const names = option.names.join(", ");
  return option.kind === "keyed" ? `${names} <value>` : names;
}

/** Two-column rows, labels padded to the widest label. */
function formatRows(rows: readonly (readonly [string, string])[]): string[] {
  const width = Math.max(0, ...rows.map(([label]) => label.length));
  return rows.map(([label, description]) => `${INDENT}${label.padEnd(width + 2)}${description}`.trimEnd());
}

function childRows(children: readonly Routable[]): Array<[string, string]> {
  return children.map((child) => [child.name, child.description]);
}

export function createHelpMessageGenerator(): HelpMessageGenerator {
  function renderUsage(path: CommandPath): string {
    const lines = [`Usage: ${usageLine(path)}`];

    if (path.command.description) {
      lines.push("", path.command.description);
    }

    if (path.options.length > 0) {
      lines.push("", "Options:", ...formatRows(path.options.map((option) => [optionFlags(option), option.description])));
    }

    return lines.join("\n");
  }

  return {
    renderCommandList({ root, partialPath }: GroupPath): string {
      const group = partialPath[partialPath.length - 1] ?? root;
      const prefix = [root, ...partialPath].map((g) => g.name).join(" ");
      const lines = [`Usage: ${prefix} <command> [options]`];

      if (group.description) {
        lines.push("", group.description);
      }

      const groups = group.children.filter((child) => child.kind === "group");
      const commands = group.children.filter((child) => child.kind === "command");
      const rows = formatRows(childRows([...groups, ...commands]));

      if (groups.length > 0) {
        lines.push("", "Groups:", ...rows.slice(0, groups.length));
      }
      if (commands.length > 0) {
        lines.push("", "Commands:", ...rows.slice(groups.length));
      }

      return lines.join("\n");
    },

    renderUsage,

    renderMisusedOptions(path: CommandPath, error: OptionError): string {
      return `${renderUsage(path)}\n\n${error.message}`;
    },
  };
}
