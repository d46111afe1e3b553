import { describe, it, expect } from "vitest";
import {
  CliError,
  ProcessError,
  ConfigurationError,
  RoutingError,
  OptionError,
  ParameterError,
  optionLabel,
} from "./base.js";
import { ErrorCode } from "./codes.js";
import type { CommandGroup } from "../types/command.js";
import type { Flag, KeyedOption } from "../types/option.js";

const root: CommandGroup = { kind: "group", name: "demo", description: "", children: [] };
const testGroup: CommandGroup = { kind: "group", name: "test", description: "", children: [] };

const release: Flag = { kind: "flag", names: ["-r", "--release"], description: "" };
const debug: Flag = { kind: "flag", names: ["--debug"], description: "" };
const jobs: KeyedOption = { kind: "keyed", names: ["-j", "--jobs"], description: "", valueType: "int" };

describe("Error System", () => {
  describe("CliError", () => {
    it("should preserve cause when provided", () => {
      const rootCause = new Error("root cause");
      const err = new CliError("test error", "TEST_CODE", { cause: rootCause });
      expect(err.cause).toBe(rootCause);
      expect(err.code).toBe("TEST_CODE");
      expect(err.message).toBe("test error");
    });

    it("should default exit status to 1", () => {
      const err = new CliError("test error", "TEST_CODE");
      expect(err.exitStatus).toBe(1);
      expect(err.cause).toBeUndefined();
    });
  });

  describe("ProcessError", () => {
    it("should carry message and exit status", () => {
      const err = new ProcessError("disk full", 3);
      expect(err.name).toBe("ProcessError");
      expect(err.code).toBe("PROCESS_ERROR");
      expect(err.message).toBe("disk full");
      expect(err.exitStatus).toBe(3);
    });

    it("should allow an empty message", () => {
      const err = new ProcessError();
      expect(err.message).toBe("");
      expect(err.exitStatus).toBe(1);
      expect(err).toBeInstanceOf(CliError);
    });
  });

  describe("ConfigurationError", () => {
    it("should have correct name and code", () => {
      const err = new ConfigurationError("duplicate option");
      expect(err.name).toBe("ConfigurationError");
      expect(err.code).toBe("CONFIGURATION_ERROR");
      expect(err.message).toBe("duplicate option");
    });
  });

  describe("RoutingError", () => {
    it("should name the unmatched token", () => {
      const err = new RoutingError(root, [testGroup], "bogus");
      expect(err.message).toBe('Command "bogus" not found');
      expect(err.unmatchedToken).toBe("bogus");
      expect(err.deepestGroup).toBe(testGroup);
    });

    it("should report a missing subcommand with the path reached", () => {
      const err = new RoutingError(root, [testGroup]);
      expect(err.message).toBe('"demo test" requires a subcommand');
      expect(err.unmatchedToken).toBeUndefined();
    });

    it("should fall back to the root as deepest group", () => {
      const err = new RoutingError(root, []);
      expect(err.deepestGroup).toBe(root);
      expect(err.message).toBe('"demo" requires a subcommand');
    });
  });

  describe("OptionError", () => {
    it("should describe an unrecognized option", () => {
      const err = new OptionError({ kind: "unrecognizedOption", name: "-x" });
      expect(err.message).toBe("Unrecognized option: -x");
      expect(err.code).toBe("OPTION_ERROR");
    });

    it("should describe a missing value", () => {
      const err = new OptionError({ kind: "expectedValue", name: "--jobs" });
      expect(err.message).toBe("Expected a value to follow: --jobs");
    });

    it("should describe an invalid value with the expected type", () => {
      const err = new OptionError({ kind: "invalidValue", name: "-j", expectedType: "int", received: "many" });
      expect(err.message).toBe('Invalid value for -j: "many" is not an integer');
    });

    it("should describe each option group restriction", () => {
      const options = [release, debug];
      expect(new OptionError({ kind: "optionGroupMisuse", group: { options, restriction: "atMostOne" } }).message)
        .toBe("Only one of the following options may be passed: --release, --debug");
      expect(new OptionError({ kind: "optionGroupMisuse", group: { options, restriction: "atLeastOne" } }).message)
        .toBe("At least one of the following options must be passed: --release, --debug");
      expect(new OptionError({ kind: "optionGroupMisuse", group: { options, restriction: "exactlyOne" } }).message)
        .toBe("Exactly one of the following options must be passed: --release, --debug");
    });
  });

  describe("ParameterError", () => {
    it("should describe too few arguments", () => {
      const err = new ParameterError("notEnoughArguments", 1, 0);
      expect(err.message).toBe("Expected at least 1 argument, got 0");
      expect(err.reason).toBe("notEnoughArguments");
    });

    it("should describe too many arguments", () => {
      const err = new ParameterError("tooManyArguments", 2, 3);
      expect(err.message).toBe("Expected at most 2 arguments, got 3");
    });
  });

  describe("optionLabel", () => {
    it("should pick the longest spelling", () => {
      expect(optionLabel(jobs)).toBe("--jobs");
      expect(optionLabel(debug)).toBe("--debug");
    });
  });

  describe("ErrorCode constants", () => {
    it("should have correct string values", () => {
      expect(ErrorCode.ROUTING_ERROR).toBe("ROUTING_ERROR");
      expect(ErrorCode.OPTION_ERROR).toBe("OPTION_ERROR");
      expect(ErrorCode.PARAMETER_ERROR).toBe("PARAMETER_ERROR");
      expect(ErrorCode.CONFIGURATION_ERROR).toBe("CONFIGURATION_ERROR");
      expect(ErrorCode.PROCESS_ERROR).toBe("PROCESS_ERROR");
    });
  });
});
