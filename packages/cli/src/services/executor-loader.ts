/**
 * Executor module loading
 *
 * A module exports its executor as `default` or as `executor`: either an object
 * with execute(scenario), or a function that resolves to a trace or a trace init.
 */
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import {
  createExecutor,
  isExecutionTrace,
  isPipelineExecutor,
  isRecord,
  type ExecutionTrace,
  type ExecutionTraceInit,
  type ModelChargeInit,
  type PipelineExecutor,
  type ToolCallInit,
} from "@tracegrade/core";
import { usageError } from "../errors.js";

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface LoadExecutorOptions {
  cwd?: string;
  /** Replaces dynamic import (tests) */
  importModule?: ModuleImporter;
}

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

function optionalNumber(value: unknown, label: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new TypeError(`${label} must be a number`);
  }
  return value;
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new TypeError(`${label} must be a string`);
  }
  return value;
}

function toToolCallInit(value: unknown, index: number): ToolCallInit {
  const label = `toolCalls[${index}]`;
  if (!isRecord(value) || typeof value["toolName"] !== "string") {
    throw new TypeError(`${label} must have a string toolName`);
  }
  const args = value["arguments"];
  const success = value["success"];
  return {
    toolName: value["toolName"],
    agentId: optionalString(value["agentId"], `${label}.agentId`),
    arguments: isRecord(args) ? args : undefined,
    result: value["result"],
    success: typeof success === "boolean" ? success : undefined,
    error: optionalString(value["error"], `${label}.error`),
    durationMs: optionalNumber(value["durationMs"], `${label}.durationMs`),
    costUsd: optionalNumber(value["costUsd"], `${label}.costUsd`),
    tokenCount: optionalNumber(value["tokenCount"], `${label}.tokenCount`),
  };
}

function toModelChargeInit(value: unknown, index: number): ModelChargeInit {
  const label = `modelCharges[${index}]`;
  if (
    !isRecord(value) ||
    typeof value["agentId"] !== "string" ||
    typeof value["costUsd"] !== "number"
  ) {
    throw new TypeError(`${label} must have a string agentId and a numeric costUsd`);
  }
  return {
    agentId: value["agentId"],
    costUsd: value["costUsd"],
    inputTokens: optionalNumber(value["inputTokens"], `${label}.inputTokens`),
    outputTokens: optionalNumber(value["outputTokens"], `${label}.outputTokens`),
  };
}

function toAgentLatency(value: unknown): Record<string, number> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new TypeError("agentLatencyMs must be a mapping of agent to milliseconds");
  }
  const latency: Record<string, number> = {};
  for (const [agent, ms] of Object.entries(value)) {
    if (typeof ms !== "number") {
      throw new TypeError(`agentLatencyMs.${agent} must be a number`);
    }
    latency[agent] = ms;
  }
  return latency;
}

function toList<T>(value: unknown, label: string, convert: (item: unknown, index: number) => T): T[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new TypeError(`${label} must be a list`);
  }
  return value.map((item: unknown, index) => convert(item, index));
}

/**
 * Check what an executor function resolved to
 */
export function toTraceResult(value: unknown): ExecutionTrace | ExecutionTraceInit {
  if (isExecutionTrace(value)) {
    return value;
  }
  if (!isRecord(value)) {
    throw new TypeError("Executor function must resolve to a trace object");
  }

  const success = value["success"];
  return {
    output: value["output"],
    success: typeof success === "boolean" ? success : undefined,
    error: optionalString(value["error"], "error"),
    toolCalls: toList(value["toolCalls"], "toolCalls", toToolCallInit),
    modelCharges: toList(value["modelCharges"], "modelCharges", toModelChargeInit),
    totalLatencyMs: optionalNumber(value["totalLatencyMs"], "totalLatencyMs"),
    agentLatencyMs: toAgentLatency(value["agentLatencyMs"]),
  };
}

/**
 * Turn a module export into a PipelineExecutor
 */
export function toPipelineExecutor(exported: unknown, source: string): PipelineExecutor {
  if (isPipelineExecutor(exported)) {
    return exported;
  }
  if (typeof exported === "function") {
    const fn = exported;
    return createExecutor(async (scenario, options) => {
      const produced: unknown = await fn(scenario, options);
      return toTraceResult(produced);
    });
  }
  throw usageError(
    `${source} does not export an executor`,
    "Export a function or an object with execute(scenario) as default or as `executor`."
  );
}

/**
 * Import an executor module relative to cwd
 */
export async function loadExecutor(
  modulePath: string,
  options: LoadExecutorOptions = {}
): Promise<PipelineExecutor> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), modulePath);
  const importModule = options.importModule ?? defaultImporter;

  let loaded: unknown;
  try {
    loaded = await importModule(pathToFileURL(absolutePath).href);
  } catch (err) {
    throw usageError(
      `Could not load executor module ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`,
      "Check the path and make sure the module builds to JavaScript."
    );
  }

  if (!isRecord(loaded)) {
    throw usageError(`${absolutePath} did not load as a module`);
  }
  const exported = loaded["default"] ?? loaded["executor"];
  return toPipelineExecutor(exported, absolutePath);
}
