import { describe, it, expect } from "vitest";
import { OptionError } from "@argroute/sdk";
import { TokenStream } from "../stream/token-stream.js";
import { createOptionSplitter } from "../stream/manipulators.js";
import { createOptionRegistry } from "./option-registry.js";
import { recognizeOptions } from "./recognizer.js";
import { flag, keyed } from "./option.js";

const all = flag(["-a", "--all"]);
const brief = flag(["-b"]);
const color = flag(["-c", "--color"]);
const name = keyed(["-n", "--name"], "", "string");
const jobs = keyed(["-j", "--jobs"], "", "int");

function recognize(tokens: string[], split = false) {
  const stream = new TokenStream(tokens);
  if (split) createOptionSplitter().manipulate(stream);
  const result = recognizeOptions(createOptionRegistry([all, brief, color, name, jobs]), stream);
  return { result, stream };
}

function errorOf(tokens: string[]): OptionError {
  const { result } = recognize(tokens);
  if (result.success) throw new Error("expected recognition to fail");
  return result.error;
}

describe("recognizeOptions", () => {
  it("binds flags anywhere and leaves positionals", () => {
    const { result, stream } = recognize(["one", "--all", "two", "-c"]);
    expect(result).toEqual({
      success: true,
      values: { all: true, b: false, color: true },
    });
    expect(stream.remaining()).toEqual(["one", "two"]);
  });

  it("reports flags not given as false and keyed options not given as absent", () => {
    const { result } = recognize([]);
    expect(result.success && result.values).toEqual({ all: false, b: false, color: false });
  });

  it("consumes a keyed option with its value and coerces it", () => {
    const { result, stream } = recognize(["-j", "4", "file"]);
    expect(result.success && result.values.jobs).toBe(4);
    expect(stream.remaining()).toEqual(["file"]);
  });

  it("keeps the last value of a repeated keyed option", () => {
    const { result } = recognize(["--name", "Ann", "--name", "Bob"]);
    expect(result.success && result.values.name).toBe("Bob");
  });

  it("accepts a negative number as a value", () => {
    const { result } = recognize(["--jobs", "-2"]);
    expect(result.success && result.values.jobs).toBe(-2);
  });

  it("sets every flag of a split cluster from one original token", () => {
    const { result, stream } = recognize(["-abc"], true);
    expect(result.success && result.values).toEqual({ all: true, b: true, color: true });
    expect(stream.remaining()).toEqual([]);
  });

  it("binds a keyed option the same whether it comes before or after a positional", () => {
    const before = recognize(["--name", "Bob", "build"]);
    const after = recognize(["build", "--name", "Bob"]);

    expect(before.result).toEqual(after.result);
    expect(before.result.success && before.result.values.name).toBe("Bob");
    expect(before.stream.remaining()).toEqual(["build"]);
    expect(after.stream.remaining()).toEqual(["build"]);
  });

  it("fails on an unknown spelling", () => {
    expect(errorOf(["--nope"]).reason).toEqual({ kind: "unrecognizedOption", name: "--nope" });
  });

  it("fails on an unknown letter from a split cluster", () => {
    const { result } = recognize(["-abz"], true);
    expect(!result.success && result.error.reason).toEqual({ kind: "unrecognizedOption", name: "-z" });
  });

  it("fails when a keyed option is last", () => {
    expect(errorOf(["file", "--name"]).reason).toEqual({ kind: "expectedValue", name: "--name" });
  });

  it("fails when a keyed option is followed by another option", () => {
    expect(errorOf(["-n", "--all"]).reason).toEqual({ kind: "expectedValue", name: "-n" });
  });

  it("fails when a value cannot be coerced", () => {
    expect(errorOf(["-j", "many"]).reason).toEqual({
      kind: "invalidValue",
      name: "-j",
      expectedType: "int",
      received: "many",
    });
  });

  it("does not read tokens consumed by an earlier stage", () => {
    const stream = new TokenStream(["--ghost", "--all"]);
    stream.consume(0);
    const result = recognizeOptions(createOptionRegistry([all]), stream);
    expect(result).toEqual({ success: true, values: { all: true } });
  });

  it("takes the next unconsumed token as a keyed value", () => {
    const stream = new TokenStream(["--name", "build", "Bob"]);
    stream.consume(1);
    const result = recognizeOptions(createOptionRegistry([name]), stream);
    expect(result).toEqual({ success: true, values: { name: "Bob" } });
  });
});
