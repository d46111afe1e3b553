/**
 * OutputCapture - in-memory CliOutput for command and CLI tests.
 *
 * @example
 * ```typescript
 * import { createOutputCapture } from "@argroute/sdk/testing";
 *
 * const capture = createOutputCapture();
 * const cli = createCli({ name: "demo", commands, output: capture.output });
 * await cli.go(["greet", "Alice"]);
 * expect(capture.stdout).toEqual(["Hello, Alice!"]);
 * ```
 */

import type { CliOutput } from "../index.js";

export class OutputCapture {
  readonly stdout: string[] = [];
  readonly stderr: string[] = [];

  readonly output: CliOutput = {
    out: (text) => {
      this.stdout.push(text);
    },
    err: (text) => {
      this.stderr.push(text);
    },
  };

  /** Everything written to stdout, one entry per line. */
  get stdoutText(): string {
    return this.stdout.join("\n");
  }

  get stderrText(): string {
    return this.stderr.join("\n");
  }

  clear(): void {
    this.stdout.length = 0;
    this.stderr.length = 0;
  }
}

export function createOutputCapture(): OutputCapture {
  return new OutputCapture();
}
