/**
 * Option parsing and suite loading shared by run and compare
 */
import { InvalidArgumentError, Option } from "commander";
import type { EvalSuite } from "@tracegrade/core";
import { loadSuiteFile } from "../services/suite-loader.js";
import { GRADER_NAMES, type GraderName } from "../utils/config.js";
import { validateError } from "../errors.js";

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function toGraderName(value: unknown): GraderName | undefined {
  return GRADER_NAMES.find((name) => name === value);
}

export function concurrencyOption(): Option {
  return new Option("--concurrency <n>", "Scenarios in flight per executor").argParser(
    parsePositiveInteger
  );
}

export function graderOption(): Option {
  return new Option("--grader <grader>", "Grading strategy").choices(GRADER_NAMES);
}

/**
 * Load a suite for evaluation; an invalid suite is a validation error
 */
export async function loadValidSuite(suitePath: string, cwd: string): Promise<EvalSuite> {
  const loaded = await loadSuiteFile(suitePath, { cwd });
  const [first] = loaded.errors;
  if (first || !loaded.suite) {
    const detail = first ? `: ${first.message}` : "";
    throw validateError(
      `Suite ${suitePath} is invalid${detail}`,
      `Run "tracegrade validate ${suitePath}" for the full list of problems.`
    );
  }
  return loaded.suite;
}
