import { describe, it, expect } from "vitest";
import { fillParameters } from "./filler.js";
import { createSignature, optional, required, variadic } from "./signature.js";

const greet = createSignature([required("name"), optional("greeting", "Hello")]);

describe("fillParameters", () => {
  it("applies the default for a missing optional", () => {
    expect(fillParameters(greet, ["Alice"])).toEqual({
      success: true,
      values: { name: "Alice", greeting: "Hello" },
    });
  });

  it("fills the optional slot when a token is there", () => {
    expect(fillParameters(greet, ["Alice", "Hi"])).toEqual({
      success: true,
      values: { name: "Alice", greeting: "Hi" },
    });
  });

  it("fails with notEnoughArguments below the required count", () => {
    const result = fillParameters(greet, []);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe("notEnoughArguments");
      expect(result.error.message).toBe("Expected at least 1 argument, got 0");
    }
  });

  it("fails with tooManyArguments past the last slot", () => {
    const result = fillParameters(greet, ["Alice", "Hi", "extra"]);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe("tooManyArguments");
      expect(result.error.message).toBe("Expected at most 2 arguments, got 3");
    }
  });

  it("leaves an optional without default undefined", () => {
    const signature = createSignature([optional("path")]);
    expect(fillParameters(signature, [])).toEqual({ success: true, values: { path: undefined } });
  });

  it("collects the rest into the variadic slot in order", () => {
    const signature = createSignature([required("cmd"), optional("mode", "fast"), variadic("files")]);
    expect(fillParameters(signature, ["run", "slow", "a", "b", "c"])).toEqual({
      success: true,
      values: { cmd: "run", mode: "slow", files: ["a", "b", "c"] },
    });
  });

  it("accepts an empty variadic slot", () => {
    const signature = createSignature([required("cmd"), variadic("files")]);
    expect(fillParameters(signature, ["run"])).toEqual({
      success: true,
      values: { cmd: "run", files: [] },
    });
  });

  it("rejects any token for an empty signature", () => {
    const result = fillParameters(createSignature([]), ["stray"]);
    expect(!result.success && result.error.message).toBe("Expected at most 0 arguments, got 1");
  });
});
