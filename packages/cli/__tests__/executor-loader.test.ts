/**
 * Executor module loading tests
 */

import { describe, it, expect, vi } from "vitest";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { createScenario, type ExecutionTrace } from "@tracegrade/core";
import { loadExecutor, toTraceResult } from "../src/services/executor-loader.js";
import { EXIT_CODES } from "../src/errors.js";

const cwd = path.join(path.sep, "work");
const scenario = createScenario({ name: "sum", inputData: { a: 1, b: 2 } });

describe("loadExecutor", () => {
  it("should import the module by file URL relative to cwd", async () => {
    const importModule = vi.fn(async () => ({ default: { execute: vi.fn() } }));

    await loadExecutor("./exec.js", { cwd, importModule });

    expect(importModule).toHaveBeenCalledWith(pathToFileURL(path.join(cwd, "exec.js")).href);
  });

  it("should use an exported executor object as it is", async () => {
    const executor = {
      execute: async (): Promise<ExecutionTrace> => ({ output: 1, success: true, toolCalls: [] }),
    };

    const loaded = await loadExecutor("exec.js", {
      cwd,
      importModule: async () => ({ default: executor }),
    });

    expect(loaded).toBe(executor);
  });

  it("should wrap an exported function and build its trace", async () => {
    const loaded = await loadExecutor("exec.js", {
      cwd,
      importModule: async () => ({
        executor: async () => ({
          output: 3,
          toolCalls: [{ toolName: "calc", costUsd: 0.01 }],
          totalLatencyMs: 5,
        }),
      }),
    });

    const trace = await loaded.execute(scenario);

    expect(trace.output).toBe(3);
    expect(trace.success).toBe(true);
    expect(trace.toolCalls[0]?.position).toBe(0);
    expect(trace.cost?.totalUsd).toBe(0.01);
    expect(trace.latency?.totalMs).toBe(5);
  });

  it("should reject a function that resolves to something other than a trace", async () => {
    const loaded = await loadExecutor("exec.js", {
      cwd,
      importModule: async () => ({ default: async () => 42 }),
    });

    await expect(loaded.execute(scenario)).rejects.toThrow(
      "Executor function must resolve to a trace object"
    );
  });

  it("should fail with a usage error when nothing is exported", async () => {
    await expect(
      loadExecutor("exec.js", { cwd, importModule: async () => ({ helper: 1 }) })
    ).rejects.toMatchObject({
      message: `${path.join(cwd, "exec.js")} does not export an executor`,
      exitCode: EXIT_CODES.INVALID_ARGUMENT,
    });
  });

  it("should fail with a usage error when the import throws", async () => {
    await expect(
      loadExecutor("exec.js", {
        cwd,
        importModule: async () => {
          throw new Error("Cannot find module");
        },
      })
    ).rejects.toMatchObject({
      message: `Could not load executor module ${path.join(cwd, "exec.js")}: Cannot find module`,
      exitCode: EXIT_CODES.INVALID_ARGUMENT,
    });
  });
});

describe("toTraceResult", () => {
  it("should keep a complete trace", () => {
    const trace: ExecutionTrace = {
      output: "ok",
      success: true,
      toolCalls: [
        {
          toolName: "search",
          position: 0,
          arguments: {},
          success: true,
          durationMs: 1,
          costUsd: 0,
          tokenCount: 0,
        },
      ],
    };

    expect(toTraceResult(trace)).toBe(trace);
  });

  it("should name the tool call that is malformed", () => {
    expect(() => toTraceResult({ toolCalls: [{ name: "search" }] })).toThrow(
      "toolCalls[0] must have a string toolName"
    );
  });

  it("should reject a non-numeric latency", () => {
    expect(() => toTraceResult({ totalLatencyMs: "fast" })).toThrow(
      "totalLatencyMs must be a number"
    );
  });
});
