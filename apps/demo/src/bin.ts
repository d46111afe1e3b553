#!/usr/bin/env node

/**
 * Demo entry point.
 *
 *   argroute-demo greet <name> [<greeting>] [--shout]
 *   argroute-demo build [--release | --debug] [-j <n>] [-t <platform>] [<targets>] ...
 *   argroute-demo test unit [<files>] ... [--verbose]
 *   argroute-demo test e2e [--browser <name>] [--verbose]
 *   argroute-demo help [<command>] ...
 *   argroute-demo version
 */

import { createDemoCli } from "./cli.js";

createDemoCli()
  .goAndExit()
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
