/**
 * test unit [<files>] ...
 * test e2e [--browser <name>]
 *
 * Both inherit the group's --verbose flag.
 */

import type { Command, CommandGroup } from "@argroute/sdk";
import { createSignature, flag, flagValue, keyed, listParam, stringOption, variadic } from "@argroute/core";

const DEFAULT_BROWSER = "chromium";

function createUnitCommand(): Command {
  return {
    kind: "command",
    name: "unit",
    description: "Run unit tests",
    signature: createSignature([variadic("files", "Test files to run")]),
    execute({ params, options, output }): void {
      const files = listParam(params, "files");
      if (files.length === 0) {
        output.out("Running all unit tests");
        return;
      }

      output.out(`Running ${files.length} unit test file${files.length === 1 ? "" : "s"}`);
      if (flagValue(options, "verbose")) {
        for (const file of files) output.out(`  ${file}`);
      }
    },
  };
}

function createE2eCommand(): Command {
  return {
    kind: "command",
    name: "e2e",
    description: "Run end-to-end tests",
    options: [keyed(["-b", "--browser"], `Browser to drive (default: ${DEFAULT_BROWSER})`)],
    execute({ options, output }): void {
      output.out(`Running end-to-end tests in ${stringOption(options, "browser") ?? DEFAULT_BROWSER}`);
      if (flagValue(options, "verbose")) output.out("Verbose output enabled");
    },
  };
}

export function createTestGroup(): CommandGroup {
  return {
    kind: "group",
    name: "test",
    description: "Run the test suites",
    sharedOptions: [flag(["--verbose"], "Print each test file as it runs")],
    children: [createUnitCommand(), createE2eCommand()],
  };
}
