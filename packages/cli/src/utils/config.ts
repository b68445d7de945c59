/**
 * Configuration management for CLI
 *
 * Loads ~/.tracegraderc and the nearest project .tracegraderc
 */
import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import YAML from "yaml";
import { isRecord } from "@tracegrade/core";
import { configError } from "../errors.js";

export type GraderName = "weighted" | "threshold";

export const GRADER_NAMES: readonly GraderName[] = ["weighted", "threshold"];

export interface WeightedMetricConfig {
  enabled?: boolean;
  weight?: number;
}

export interface LatencyMetricConfig extends WeightedMetricConfig {
  targetMs?: number;
}

export interface CostMetricConfig extends WeightedMetricConfig {
  budgetUsd?: number;
}

export interface MetricsConfig {
  accuracy?: WeightedMetricConfig;
  toolCorrectness?: WeightedMetricConfig;
  latency?: LatencyMetricConfig;
  costEfficiency?: CostMetricConfig;
}

/**
 * tracegrade CLI configuration
 */
export interface TracegradeConfig {
  /** Scenarios in flight per executor (default: all at once) */
  concurrency?: number;
  grader?: GraderName;
  /** Overall score a scenario needs under the weighted grader */
  passThreshold?: number;
  /** Per-metric minimums under the threshold grader */
  thresholds?: Record<string, number>;
  /** Threshold grader minimum for metrics not listed in thresholds */
  defaultThreshold?: number;
  metrics?: MetricsConfig;
  /** Suite pass rate below which `run` exits with code 5 */
  minPassRate?: number;
  color?: boolean;
}

export const DEFAULT_CONFIG: Readonly<TracegradeConfig> = {
  grader: "weighted",
  minPassRate: 0,
  color: true,
};

export const CONFIG_FILE_NAME = ".tracegraderc";

export function getGlobalConfigPath(homeDir: string = homedir()): string {
  return join(homeDir, CONFIG_FILE_NAME);
}

/**
 * Search from startDir upward for .tracegraderc
 */
export function getProjectConfigPath(startDir: string = process.cwd()): string | undefined {
  let currentDir = resolve(startDir);

  for (;;) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

function fail(source: string, message: string): never {
  throw configError(`${source}: ${message}`, `Fix ${CONFIG_FILE_NAME} and try again.`);
}

function readNumber(
  record: Record<string, unknown>,
  key: string,
  source: string,
  range: { min: number; max?: number; integer?: boolean; exclusiveMin?: boolean }
): number | undefined {
  const value = record[key];
  if (value === undefined) return undefined;

  const belowMin = range.exclusiveMin ? (n: number) => n <= range.min : (n: number) => n < range.min;
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    belowMin(value) ||
    (range.max !== undefined && value > range.max) ||
    (range.integer === true && !Number.isInteger(value))
  ) {
    fail(source, `"${key}" has an invalid value: ${JSON.stringify(value)}`);
  }
  return value;
}

function readBoolean(
  record: Record<string, unknown>,
  key: string,
  source: string
): boolean | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    fail(source, `"${key}" must be true or false`);
  }
  return value;
}

function readSection(
  record: Record<string, unknown>,
  key: string,
  source: string
): Record<string, unknown> | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    fail(source, `"${key}" must be a mapping`);
  }
  return value;
}

function parseWeighted(section: Record<string, unknown>, path: string): WeightedMetricConfig {
  const config: WeightedMetricConfig = {};
  const enabled = readBoolean(section, "enabled", path);
  const weight = readNumber(section, "weight", path, { min: 0, exclusiveMin: true });
  if (enabled !== undefined) config.enabled = enabled;
  if (weight !== undefined) config.weight = weight;
  return config;
}

function parseMetrics(section: Record<string, unknown>, source: string): MetricsConfig {
  const metrics: MetricsConfig = {};

  const accuracy = readSection(section, "accuracy", source);
  if (accuracy) metrics.accuracy = parseWeighted(accuracy, `${source} metrics.accuracy`);

  const toolCorrectness = readSection(section, "toolCorrectness", source);
  if (toolCorrectness) {
    metrics.toolCorrectness = parseWeighted(toolCorrectness, `${source} metrics.toolCorrectness`);
  }

  const latency = readSection(section, "latency", source);
  if (latency) {
    const path = `${source} metrics.latency`;
    const targetMs = readNumber(latency, "targetMs", path, { min: 0, exclusiveMin: true });
    metrics.latency = {
      ...parseWeighted(latency, path),
      ...(targetMs !== undefined ? { targetMs } : {}),
    };
  }

  const cost = readSection(section, "costEfficiency", source);
  if (cost) {
    const path = `${source} metrics.costEfficiency`;
    const budgetUsd = readNumber(cost, "budgetUsd", path, { min: 0, exclusiveMin: true });
    metrics.costEfficiency = {
      ...parseWeighted(cost, path),
      ...(budgetUsd !== undefined ? { budgetUsd } : {}),
    };
  }

  return metrics;
}

/**
 * Parse config file content (YAML or JSON)
 */
export function parseConfigContent(content: string, source = CONFIG_FILE_NAME): TracegradeConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    fail(source, err instanceof Error ? err.message : String(err));
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    fail(source, "configuration must be a mapping");
  }

  const config: TracegradeConfig = {};

  const concurrency = readNumber(parsed, "concurrency", source, { min: 1, integer: true });
  if (concurrency !== undefined) config.concurrency = concurrency;

  const grader = parsed["grader"];
  if (grader !== undefined) {
    const known = GRADER_NAMES.find((name) => name === grader);
    if (!known) {
      fail(source, `"grader" must be one of ${GRADER_NAMES.join(", ")}`);
    }
    config.grader = known;
  }

  const passThreshold = readNumber(parsed, "passThreshold", source, { min: 0, max: 1 });
  if (passThreshold !== undefined) config.passThreshold = passThreshold;

  const defaultThreshold = readNumber(parsed, "defaultThreshold", source, { min: 0, max: 1 });
  if (defaultThreshold !== undefined) config.defaultThreshold = defaultThreshold;

  const thresholds = readSection(parsed, "thresholds", source);
  if (thresholds) {
    config.thresholds = {};
    for (const metric of Object.keys(thresholds)) {
      const value = readNumber(thresholds, metric, `${source} thresholds`, { min: 0, max: 1 });
      if (value !== undefined) config.thresholds[metric] = value;
    }
  }

  const metrics = readSection(parsed, "metrics", source);
  if (metrics) config.metrics = parseMetrics(metrics, source);

  const minPassRate = readNumber(parsed, "minPassRate", source, { min: 0, max: 1 });
  if (minPassRate !== undefined) config.minPassRate = minPassRate;

  const color = readBoolean(parsed, "color", source);
  if (color !== undefined) config.color = color;

  return config;
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err["code"] === "ENOENT";
}

/**
 * Load configuration from a file. A missing file yields undefined unless required.
 */
export async function loadConfigFile(
  filePath: string,
  options: { required?: boolean } = {}
): Promise<TracegradeConfig | undefined> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err) && options.required !== true) {
      return undefined;
    }
    if (isNotFound(err)) {
      throw configError(`Configuration file not found: ${filePath}`);
    }
    throw err;
  }
  return parseConfigContent(content, filePath);
}

/**
 * Merge multiple configs with priority (later configs override earlier)
 */
export function mergeConfigs(...configs: (TracegradeConfig | undefined)[]): TracegradeConfig {
  const result: TracegradeConfig = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }

    if (config.concurrency !== undefined) result.concurrency = config.concurrency;
    if (config.grader !== undefined) result.grader = config.grader;
    if (config.passThreshold !== undefined) result.passThreshold = config.passThreshold;
    if (config.defaultThreshold !== undefined) result.defaultThreshold = config.defaultThreshold;
    if (config.minPassRate !== undefined) result.minPassRate = config.minPassRate;
    if (config.color !== undefined) result.color = config.color;

    if (config.thresholds) {
      result.thresholds = { ...result.thresholds, ...config.thresholds };
    }

    // one level deeper: per-metric settings merge field by field
    if (config.metrics) {
      const merged: MetricsConfig = { ...result.metrics };
      const previous = result.metrics ?? {};
      if (config.metrics.accuracy) {
        merged.accuracy = { ...previous.accuracy, ...config.metrics.accuracy };
      }
      if (config.metrics.toolCorrectness) {
        merged.toolCorrectness = { ...previous.toolCorrectness, ...config.metrics.toolCorrectness };
      }
      if (config.metrics.latency) {
        merged.latency = { ...previous.latency, ...config.metrics.latency };
      }
      if (config.metrics.costEfficiency) {
        merged.costEfficiency = { ...previous.costEfficiency, ...config.metrics.costEfficiency };
      }
      result.metrics = merged;
    }
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file; replaces the project search */
  configPath?: string;
  /** Directory the project search starts from */
  cwd?: string;
  /** Directory holding the global config */
  homeDir?: string;
  env?: {
    NO_COLOR?: string;
  };
}

/**
 * Load and merge all configuration sources
 *
 * Priority (highest to lowest):
 * 1. Environment (NO_COLOR)
 * 2. --config file, or the nearest project .tracegraderc
 * 3. Global config (~/.tracegraderc)
 * 4. Defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<TracegradeConfig> {
  const cwd = options.cwd ?? process.cwd();
  const globalConfig = await loadConfigFile(getGlobalConfigPath(options.homeDir));

  const projectConfig = options.configPath
    ? await loadConfigFile(resolve(cwd, options.configPath), { required: true })
    : await loadProjectConfig(cwd);

  const env = options.env ?? process.env;
  const envConfig: TracegradeConfig = {};
  if (env.NO_COLOR) {
    envConfig.color = false;
  }

  return mergeConfigs(DEFAULT_CONFIG, globalConfig, projectConfig, envConfig);
}

async function loadProjectConfig(cwd: string): Promise<TracegradeConfig | undefined> {
  const projectConfigPath = getProjectConfigPath(cwd);
  return projectConfigPath ? loadConfigFile(projectConfigPath) : undefined;
}
