// src/core/config/config.ts
// Configuration system for the marl runtime

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { type LogLevel, isLogLevel } from "../log/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type ProducerErrorPolicy = "absorb" | "log";

export type RuntimeLimits = {
  /** Scope frames walked when capturing a stack trace */
  maxStackTraceDepth: number;
  /** Entries a dispatch cache holds before it is cleared */
  dispatchCacheSize: number;
  /** Parent-chain hops after which a lookup is reported as a cycle */
  scopeDepthLimit: number;
};

export type FlowConfig = {
  /** What a flow producer does with an error other than "no longer collected" */
  producerErrorPolicy: ProducerErrorPolicy;
};

export type LogConfig = {
  level: LogLevel;
};

export type MarlConfig = {
  runtime: RuntimeLimits;
  flow: FlowConfig;
  log: LogConfig;
};

export type PartialMarlConfig = {
  runtime?: Partial<RuntimeLimits>;
  flow?: Partial<FlowConfig>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_RUNTIME_LIMITS: RuntimeLimits = {
  maxStackTraceDepth: 256,
  dispatchCacheSize: 1024,
  scopeDepthLimit: 4096,
};

export const DEFAULT_FLOW_CONFIG: FlowConfig = {
  producerErrorPolicy: "absorb",
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: MarlConfig = {
  runtime: DEFAULT_RUNTIME_LIMITS,
  flow: DEFAULT_FLOW_CONFIG,
  log: DEFAULT_LOG_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["marl.config.json", "marl.config.yaml", "marl.config.yml"];

// =========================================================================
// Value readers
// =========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

/** First of the given keys holding an integer (numbers or numeric strings). */
function intField(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "number" && Number.isInteger(value)) return value;
    if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return parseInt(value, 10);
  }
  return undefined;
}

function isProducerErrorPolicy(value: unknown): value is ProducerErrorPolicy {
  return value === "absorb" || value === "log";
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || !/^-?\d+$/.test(raw.trim())) return undefined;
  return parseInt(raw, 10);
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "MARL"): MarlConfig {
  const policy = process.env[`${prefix}_FLOW_PRODUCER_ERRORS`];
  const level = process.env[`${prefix}_LOG_LEVEL`];

  return {
    runtime: {
      maxStackTraceDepth: envInt(`${prefix}_MAX_STACK_TRACE_DEPTH`) ?? DEFAULT_RUNTIME_LIMITS.maxStackTraceDepth,
      dispatchCacheSize: envInt(`${prefix}_DISPATCH_CACHE_SIZE`) ?? DEFAULT_RUNTIME_LIMITS.dispatchCacheSize,
      scopeDepthLimit: envInt(`${prefix}_SCOPE_DEPTH_LIMIT`) ?? DEFAULT_RUNTIME_LIMITS.scopeDepthLimit,
    },
    flow: {
      producerErrorPolicy: isProducerErrorPolicy(policy) ? policy : DEFAULT_FLOW_CONFIG.producerErrorPolicy,
    },
    log: {
      level: isLogLevel(level) ? level : DEFAULT_LOG_CONFIG.level,
    },
  };
}

/**
 * Load the settings a JSON or YAML file gives.
 */
export function configFromFile(filePath: string): PartialMarlConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  return partialConfigFromObject(isRecord(data) ? data : {});
}

/**
 * Read the settings present in a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys; missing or mistyped values are
 * left out.
 */
export function partialConfigFromObject(data: Record<string, unknown>): PartialMarlConfig {
  const runtimeData = section(data, "runtime");
  const flowData = section(data, "flow");
  const logData = section(data, "log");

  const runtime: Partial<RuntimeLimits> = {};
  const maxStackTraceDepth = intField(runtimeData, "maxStackTraceDepth", "max_stack_trace_depth");
  if (maxStackTraceDepth !== undefined) runtime.maxStackTraceDepth = maxStackTraceDepth;
  const dispatchCacheSize = intField(runtimeData, "dispatchCacheSize", "dispatch_cache_size");
  if (dispatchCacheSize !== undefined) runtime.dispatchCacheSize = dispatchCacheSize;
  const scopeDepthLimit = intField(runtimeData, "scopeDepthLimit", "scope_depth_limit");
  if (scopeDepthLimit !== undefined) runtime.scopeDepthLimit = scopeDepthLimit;

  const policy = flowData.producerErrorPolicy ?? flowData.producer_error_policy;
  const level = logData.level;

  return {
    runtime,
    flow: isProducerErrorPolicy(policy) ? { producerErrorPolicy: policy } : {},
    log: isLogLevel(level) ? { level } : {},
  };
}

/**
 * Create configuration from a plain object; anything missing or mistyped
 * falls back to the default.
 */
export function configFromObject(data: Record<string, unknown>): MarlConfig {
  return mergeConfigs(partialConfigFromObject(data));
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialMarlConfig[]): MarlConfig {
  const result: MarlConfig = {
    runtime: { ...DEFAULT_CONFIG.runtime },
    flow: { ...DEFAULT_CONFIG.flow },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const cfg of configs) {
    if (cfg.runtime) {
      result.runtime = { ...result.runtime, ...cfg.runtime };
    }
    if (cfg.flow) {
      result.flow = { ...result.flow, ...cfg.flow };
    }
    if (cfg.log) {
      result.log = { ...result.log, ...cfg.log };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialMarlConfig;
  cwd?: string;
}): MarlConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: MarlConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.runtime.maxStackTraceDepth < 1) {
    errors.push("maxStackTraceDepth must be at least 1");
  } else if (config.runtime.maxStackTraceDepth < 8) {
    warnings.push("maxStackTraceDepth is very low, stack traces will be truncated");
  }
  if (config.runtime.dispatchCacheSize < 1) {
    errors.push("dispatchCacheSize must be at least 1");
  }
  if (config.runtime.scopeDepthLimit < 1) {
    errors.push("scopeDepthLimit must be at least 1");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
