/**
 * Error to exit code mapping tests
 */

import { describe, it, expect } from "vitest";
import {
  GradingConfigurationError,
  ScenarioTimeoutError,
  SuiteConstructionError,
} from "@tracegrade/core";
import { EXIT_CODES, toCliError, usageError } from "../src/errors.js";

describe("toCliError", () => {
  it("should keep a CliError as it is", () => {
    const error = usageError("bad flag");

    expect(toCliError(error)).toBe(error);
  });

  it("should map suite errors to the validation exit code", () => {
    const mapped = toCliError(new SuiteConstructionError("Suite name must be a non-empty string"));

    expect(mapped.exitCode).toBe(EXIT_CODES.VALIDATION_ERROR);
    expect(mapped.code).toBe("VALIDATION_ERROR");
  });

  it("should map grading errors to the config exit code", () => {
    expect(toCliError(new GradingConfigurationError("weights")).exitCode).toBe(
      EXIT_CODES.CONFIG_ERROR
    );
  });

  it("should keep the engine code of other evaluation errors", () => {
    const mapped = toCliError(new ScenarioTimeoutError("slow", 20));

    expect(mapped.code).toBe("SCENARIO_TIMEOUT");
    expect(mapped.exitCode).toBe(EXIT_CODES.GENERAL_ERROR);
  });

  it("should wrap anything else as an unknown error", () => {
    expect(toCliError("boom")).toMatchObject({
      code: "UNKNOWN_ERROR",
      exitCode: EXIT_CODES.GENERAL_ERROR,
    });
  });
});
