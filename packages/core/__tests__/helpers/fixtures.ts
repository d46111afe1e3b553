/**
 * Shared command tree for routing, pipeline and CLI tests.
 *
 *   demo greet <name> [<greeting>]   (-s/--shout)
 *   demo build [<targets>] ...       (-r/--release, -d/--debug, -j/--jobs <int>)
 *   demo test unit [<files>] ...     (--verbose, shared)
 *   demo test e2e                    (--browser <value>, --verbose)
 */

import type { BoundCommand, Command, CommandGroup, CommandContext, Routable } from "@argroute/sdk";
import {
  atMostOne,
  createSignature,
  flag,
  keyed,
  optional,
  required,
  variadic,
} from "../../src/index.js";

export interface Fixture {
  commands: Routable[];
  greet: Command;
  build: Command;
  test: CommandGroup;
  unit: Command;
  e2e: Command;
  /** Context of every execute() call, in order */
  calls: CommandContext[];
}

export function createFixture(): Fixture {
  const calls: CommandContext[] = [];
  const record = (ctx: CommandContext): void => {
    calls.push(ctx);
  };

  const greet: Command = {
    kind: "command",
    name: "greet",
    description: "Greet someone",
    options: [flag(["-s", "--shout"], "Print in upper case")],
    signature: createSignature([required("name"), optional("greeting", "Hello")]),
    execute: record,
  };

  const release = flag(["-r", "--release"], "Optimized build");
  const debug = flag(["-d", "--debug"], "Debug build");
  const build: Command = {
    kind: "command",
    name: "build",
    description: "Build targets",
    options: [release, debug, keyed(["-j", "--jobs"], "Worker count", "int")],
    optionGroups: [atMostOne(release, debug)],
    signature: createSignature([variadic("targets")]),
    execute: record,
  };

  const unit: Command = {
    kind: "command",
    name: "unit",
    description: "Run unit tests",
    signature: createSignature([variadic("files")]),
    execute: record,
  };

  const e2e: Command = {
    kind: "command",
    name: "e2e",
    description: "Run end-to-end tests",
    options: [keyed(["--browser"], "Browser to use")],
    execute: record,
  };

  const test: CommandGroup = {
    kind: "group",
    name: "test",
    description: "Run tests",
    sharedOptions: [flag(["--verbose"], "Verbose output")],
    children: [unit, e2e],
  };

  return { commands: [greet, build, test], greet, build, test, unit, e2e, calls };
}

export function commandNames(bound: BoundCommand): string[] {
  return [...bound.path.groups.map((group) => group.name), bound.path.command.name];
}
