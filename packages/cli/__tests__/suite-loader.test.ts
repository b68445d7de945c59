/**
 * Suite file loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { loadSuiteFile, parseSuiteDocument } from "../src/services/suite-loader.js";

describe("parseSuiteDocument", () => {
  it("should build a suite from snake_case fields", () => {
    const result = parseSuiteDocument(
      {
        name: "math",
        scenarios: [
          {
            name: "add",
            input_data: { a: 1, b: 2 },
            expected_output: { sum: 3 },
            expected_tool_calls: ["calc"],
            timeout_ms: 500,
          },
        ],
      },
      "suite.yaml"
    );

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    const scenario = result.suite?.scenarios[0];
    expect(scenario?.inputData).toEqual({ a: 1, b: 2 });
    expect(scenario?.expectedOutput).toEqual({ sum: 3 });
    expect(scenario?.expectedToolCalls).toEqual(["calc"]);
    expect(scenario?.timeoutMs).toBe(500);
  });

  it("should accept camelCase fields", () => {
    const result = parseSuiteDocument(
      {
        name: "math",
        scenarios: [{ name: "add", inputData: { a: 1 }, expectedToolCalls: ["calc"], timeoutMs: 250 }],
      },
      "suite.yaml"
    );

    expect(result.valid).toBe(true);
    expect(result.suite?.scenarios[0]?.timeoutMs).toBe(250);
    expect(result.suite?.scenarios[0]?.expectedToolCalls).toEqual(["calc"]);
  });

  it("should report a missing suite name", () => {
    const result = parseSuiteDocument({ scenarios: [{ name: "a" }] }, "suite.yaml");

    expect(result.valid).toBe(false);
    expect(result.suite).toBeUndefined();
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.code).toBe("MISSING_FIELD");
    expect(result.errors[0]?.path).toBe("name");
  });

  it("should report duplicate scenario names", () => {
    const result = parseSuiteDocument(
      { name: "dupes", scenarios: [{ name: "a" }, { name: "b" }, { name: "a" }] },
      "suite.yaml"
    );

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.code).toBe("DUPLICATE_SCENARIO");
    expect(result.errors[0]?.path).toBe("scenarios[2].name");
    expect(result.errors[0]?.message).toBe(
      'Duplicate scenario name "a" (first used at scenarios[0])'
    );
  });

  it("should report every invalid field of a scenario", () => {
    const result = parseSuiteDocument(
      { name: "bad", scenarios: [{ name: "x", expected_tool_calls: "calc", timeout_ms: -5 }] },
      "suite.yaml"
    );

    expect(result.errors.map((issue) => issue.code)).toEqual(["INVALID_FIELD", "INVALID_FIELD"]);
    expect(result.errors.map((issue) => issue.path)).toEqual([
      "scenarios[0].expected_tool_calls",
      "scenarios[0].timeout_ms",
    ]);
  });

  it("should report a scenario without a name", () => {
    const result = parseSuiteDocument(
      { name: "s", scenarios: [{ input_data: {} }] },
      "suite.yaml"
    );

    expect(result.errors).toEqual([
      {
        code: "MISSING_FIELD",
        message: "Scenario is missing a name",
        level: "error",
        path: "scenarios[0].name",
        suggestion: undefined,
      },
    ]);
  });

  it("should warn about a suite without scenarios", () => {
    const result = parseSuiteDocument({ name: "empty" }, "suite.yaml");

    expect(result.valid).toBe(true);
    expect(result.suite?.scenarios).toHaveLength(0);
    expect(result.warnings.map((issue) => issue.code)).toEqual(["NO_SCENARIOS"]);
  });

  it("should reject a document that is not a mapping", () => {
    const result = parseSuiteDocument([1, 2], "suite.yaml");

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toBe("Suite document must be a mapping");
  });
});

describe("loadSuiteFile", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tracegrade-suite-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should load a YAML suite relative to cwd", async () => {
    fs.writeFileSync(
      path.join(tempDir, "suite.yaml"),
      `name: greetings
scenarios:
  - name: hello
    input_data:
      text: hi
    expected_output: hello
`
    );

    const result = await loadSuiteFile("suite.yaml", { cwd: tempDir });

    expect(result.valid).toBe(true);
    expect(result.source).toBe(path.join(tempDir, "suite.yaml"));
    expect(result.suite?.name).toBe("greetings");
    expect(result.suite?.scenarios[0]?.expectedOutput).toBe("hello");
  });

  it("should load a JSON suite", async () => {
    const suitePath = path.join(tempDir, "suite.json");
    fs.writeFileSync(
      suitePath,
      JSON.stringify({ name: "json-suite", scenarios: [{ name: "one" }, { name: "two" }] })
    );

    const result = await loadSuiteFile(suitePath);

    expect(result.valid).toBe(true);
    expect(result.suite?.scenarios.map((scenario) => scenario.name)).toEqual(["one", "two"]);
  });

  it("should report a missing file", async () => {
    const result = await loadSuiteFile("missing.yaml", { cwd: tempDir });

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.code).toBe("FILE_NOT_FOUND");
    expect(result.errors[0]?.message).toBe(
      `Suite file not found: ${path.join(tempDir, "missing.yaml")}`
    );
  });

  it("should report a parse error", async () => {
    fs.writeFileSync(path.join(tempDir, "broken.yaml"), "name: [1, 2\n");

    const result = await loadSuiteFile("broken.yaml", { cwd: tempDir });

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.code).toBe("PARSE_ERROR");
  });
});
