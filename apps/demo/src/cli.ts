/**
 * Demo CLI wiring.
 */

import type { CliOutput } from "@argroute/sdk";
import { createCli, type Cli } from "@argroute/core";
import { createBuildCommand } from "./commands/build.js";
import { createGreetCommand } from "./commands/greet.js";
import { createTestGroup } from "./commands/test.js";
import { readPackageInfo } from "./utils/package-info.js";

export interface DemoCliOptions {
  /** Default: read from this package's package.json */
  version?: string;
  output?: CliOutput;
}

export function createDemoCli(options: DemoCliOptions = {}): Cli {
  return createCli({
    name: "argroute-demo",
    version: options.version ?? readPackageInfo().version,
    description: "Example commands routed by argroute",
    commands: [createGreetCommand(), createBuildCommand(), createTestGroup()],
    output: options.output,
  });
}
