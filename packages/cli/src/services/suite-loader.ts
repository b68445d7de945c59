/**
 * Suite file loading and structural validation
 *
 * Reads a YAML or JSON suite document, reports every structural problem it finds,
 * and builds the frozen EvalSuite when there are none.
 */
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import YAML from "yaml";
import {
  SuiteConstructionError,
  createEvalSuite,
  isRecord,
  type EvalSuite,
  type ScenarioInit,
} from "@tracegrade/core";

export type SuiteIssueCode =
  | "FILE_NOT_FOUND"
  | "PARSE_ERROR"
  | "INVALID_FIELD"
  | "MISSING_FIELD"
  | "DUPLICATE_SCENARIO"
  | "NO_SCENARIOS";

export interface SuiteIssue {
  code: SuiteIssueCode;
  message: string;
  level: "error" | "warning";
  path?: string;
  suggestion?: string;
}

export interface SuiteLoadResult {
  valid: boolean;
  source: string;
  suite?: EvalSuite;
  errors: SuiteIssue[];
  warnings: SuiteIssue[];
}

/**
 * Collects issues while walking a document
 */
class IssueCollector {
  readonly errors: SuiteIssue[] = [];
  readonly warnings: SuiteIssue[] = [];

  error(code: SuiteIssueCode, message: string, path?: string, suggestion?: string): void {
    this.errors.push({ code, message, level: "error", path, suggestion });
  }

  warning(code: SuiteIssueCode, message: string, path?: string): void {
    this.warnings.push({ code, message, level: "warning", path });
  }
}

/**
 * Read a field by its camelCase name, falling back to snake_case
 */
function field(
  record: Record<string, unknown>,
  camel: string,
  snake?: string
): { key: string; value: unknown } {
  if (record[camel] !== undefined || snake === undefined) {
    return { key: camel, value: record[camel] };
  }
  return { key: snake, value: record[snake] };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function readString(
  record: Record<string, unknown>,
  key: string,
  path: string,
  issues: IssueCollector
): string | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    issues.error("INVALID_FIELD", `"${key}" must be a string`, `${path}${key}`);
    return undefined;
  }
  return value;
}

function readTags(
  record: Record<string, unknown>,
  path: string,
  issues: IssueCollector
): string[] | undefined {
  const value = record["tags"];
  if (value === undefined) return undefined;
  if (!isStringArray(value)) {
    issues.error("INVALID_FIELD", '"tags" must be a list of strings', `${path}tags`);
    return undefined;
  }
  return value;
}

function readRecord(
  record: Record<string, unknown>,
  names: { camel: string; snake?: string },
  path: string,
  issues: IssueCollector
): Record<string, unknown> | undefined {
  const { key, value } = field(record, names.camel, names.snake);
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    issues.error("INVALID_FIELD", `"${key}" must be a mapping`, `${path}${key}`);
    return undefined;
  }
  return value;
}

function parseScenario(
  value: unknown,
  path: string,
  issues: IssueCollector
): ScenarioInit | undefined {
  if (!isRecord(value)) {
    issues.error("INVALID_FIELD", "Scenario must be a mapping", path);
    return undefined;
  }

  const before = issues.errors.length;
  const prefix = `${path}.`;

  const name = value["name"];
  if (name === undefined) {
    issues.error("MISSING_FIELD", "Scenario is missing a name", `${prefix}name`);
  } else if (typeof name !== "string" || name.trim().length === 0) {
    issues.error("INVALID_FIELD", "Scenario name must be a non-empty string", `${prefix}name`);
  }

  const description = readString(value, "description", prefix, issues);
  const inputData = readRecord(value, { camel: "inputData", snake: "input_data" }, prefix, issues);
  const metadata = readRecord(value, { camel: "metadata" }, prefix, issues);
  const tags = readTags(value, prefix, issues);
  const expectedOutput = field(value, "expectedOutput", "expected_output").value;

  const toolCalls = field(value, "expectedToolCalls", "expected_tool_calls");
  let expectedToolCalls: string[] | undefined;
  if (toolCalls.value !== undefined) {
    if (
      isStringArray(toolCalls.value) &&
      toolCalls.value.every((tool) => tool.length > 0)
    ) {
      expectedToolCalls = toolCalls.value;
    } else {
      issues.error(
        "INVALID_FIELD",
        `"${toolCalls.key}" must be a list of non-empty tool names`,
        `${prefix}${toolCalls.key}`
      );
    }
  }

  const timeout = field(value, "timeoutMs", "timeout_ms");
  let timeoutMs: number | undefined;
  if (timeout.value !== undefined) {
    if (typeof timeout.value === "number" && Number.isFinite(timeout.value) && timeout.value > 0) {
      timeoutMs = timeout.value;
    } else {
      issues.error(
        "INVALID_FIELD",
        `"${timeout.key}" must be a positive number of milliseconds`,
        `${prefix}${timeout.key}`
      );
    }
  }

  if (issues.errors.length > before || typeof name !== "string") {
    return undefined;
  }

  return {
    name,
    description,
    inputData,
    expectedOutput,
    expectedToolCalls,
    tags,
    timeoutMs,
    metadata,
  };
}

/**
 * Validate a parsed suite document and build the suite when it is valid
 */
export function parseSuiteDocument(document: unknown, source: string): SuiteLoadResult {
  const issues = new IssueCollector();
  const finish = (suite?: EvalSuite): SuiteLoadResult => ({
    valid: issues.errors.length === 0,
    source,
    ...(suite ? { suite } : {}),
    errors: issues.errors,
    warnings: issues.warnings,
  });

  if (!isRecord(document)) {
    issues.error("INVALID_FIELD", "Suite document must be a mapping");
    return finish();
  }

  const name = document["name"];
  if (name === undefined) {
    issues.error("MISSING_FIELD", "Suite is missing a name", "name", "Add a top-level name field.");
  } else if (typeof name !== "string" || name.trim().length === 0) {
    issues.error("INVALID_FIELD", "Suite name must be a non-empty string", "name");
  }

  const description = readString(document, "description", "", issues);
  const tags = readTags(document, "", issues);
  const metadata = readRecord(document, { camel: "metadata" }, "", issues);

  const scenarios: ScenarioInit[] = [];
  const rawScenarios = document["scenarios"];
  if (rawScenarios === undefined || (Array.isArray(rawScenarios) && rawScenarios.length === 0)) {
    issues.warning("NO_SCENARIOS", "Suite has no scenarios", "scenarios");
  } else if (!Array.isArray(rawScenarios)) {
    issues.error("INVALID_FIELD", '"scenarios" must be a list', "scenarios");
  } else {
    const firstSeen = new Map<string, number>();
    rawScenarios.forEach((raw: unknown, index) => {
      const path = `scenarios[${index}]`;
      const scenario = parseScenario(raw, path, issues);
      if (!scenario) return;

      const previous = firstSeen.get(scenario.name);
      if (previous !== undefined) {
        issues.error(
          "DUPLICATE_SCENARIO",
          `Duplicate scenario name "${scenario.name}" (first used at scenarios[${previous}])`,
          `${path}.name`,
          "Scenario names must be unique within a suite."
        );
        return;
      }
      firstSeen.set(scenario.name, index);
      scenarios.push(scenario);
    });
  }

  if (issues.errors.length > 0 || typeof name !== "string") {
    return finish();
  }

  try {
    return finish(createEvalSuite({ name, description, tags, metadata, scenarios }));
  } catch (err) {
    if (err instanceof SuiteConstructionError) {
      issues.error("INVALID_FIELD", err.message, err.path, err.suggestion);
      return finish();
    }
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err["code"] === "ENOENT";
}

/**
 * Load a suite file (.yaml, .yml or .json)
 */
export async function loadSuiteFile(
  filePath: string,
  options: { cwd?: string } = {}
): Promise<SuiteLoadResult> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), filePath);
  const failure = (issue: SuiteIssue): SuiteLoadResult => ({
    valid: false,
    source: absolutePath,
    errors: [issue],
    warnings: [],
  });

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return failure({
        code: "FILE_NOT_FOUND",
        message: `Suite file not found: ${absolutePath}`,
        level: "error",
      });
    }
    throw err;
  }

  let document: unknown;
  try {
    document = YAML.parse(content);
  } catch (err) {
    return failure({
      code: "PARSE_ERROR",
      message: `Could not parse ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`,
      level: "error",
    });
  }

  return parseSuiteDocument(document, absolutePath);
}
