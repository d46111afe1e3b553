/**
 * build [--release | --debug] [-j <n>] [-t <platform>] [<targets>] ...
 */

import type { Command } from "@argroute/sdk";
import { ProcessError } from "@argroute/sdk";
import {
  atMostOne,
  createSignature,
  flag,
  flagValue,
  keyed,
  listParam,
  numberOption,
  stringOption,
  variadic,
} from "@argroute/core";

export function createBuildCommand(): Command {
  const release = flag(["-r", "--release"], "Build with optimizations");
  const debug = flag(["-d", "--debug"], "Build with debug information (default)");

  return {
    kind: "command",
    name: "build",
    description: "Build one or more targets",
    options: [
      release,
      debug,
      keyed(["-j", "--jobs"], "Number of parallel jobs", "int"),
      keyed(["-t", "--target"], "Platform to build for"),
    ],
    optionGroups: [atMostOne(release, debug)],
    signature: createSignature([variadic("targets", "Targets to build")]),
    execute({ params, options, output }): void {
      const jobs = numberOption(options, "jobs") ?? 1;
      if (jobs < 1) {
        throw new ProcessError(`Invalid job count: ${jobs}`, 2);
      }

      const targets = listParam(params, "targets");
      const mode = flagValue(options, "release") ? "release" : "debug";
      const platform = stringOption(options, "target") ?? "host";

      output.out(
        `Building ${targets.length > 0 ? targets.join(", ") : "all targets"} ` +
          `(${mode}, ${platform}, ${jobs} ${jobs === 1 ? "job" : "jobs"})`,
      );
    },
  };
}
