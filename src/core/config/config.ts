// src/core/config/config.ts
// Configuration system for dispatch domains

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { DEFAULT_RESERVED_NAMES } from "../dispatch/reserved";

// =========================================================================
// Configuration Types
// =========================================================================

export type DispatchConfig = {
  /** Maximum chain of nested unresolved calls before RecursiveFallback */
  maxDepth: number;
  /** How long a caller waits on another caller's generation (unbounded if unset) */
  generationTimeoutMs?: number;
  /** Names that bypass the fallback resolver */
  reservedNames: string[];
  /** Events kept in each domain's ledger */
  eventLogSize: number;
  /** pino level for the domain logger */
  logLevel: string;
};

export class ConfigError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = "ConfigError";
  }
}

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_DISPATCH_CONFIG: DispatchConfig = {
  maxDepth: 100,
  reservedNames: [...DEFAULT_RESERVED_NAMES],
  eventLogSize: 1000,
  logLevel: "warn",
};

// =========================================================================
// Configuration Loading
// =========================================================================

function envInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : undefined;
}

function envList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(",").map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Read the settings present in environment variables.
 * Unset or unparsable variables are left out.
 */
export function partialConfigFromEnv(prefix = "DISPATCH", env: NodeJS.ProcessEnv = process.env): Partial<DispatchConfig> {
  const partial: Partial<DispatchConfig> = {};

  const maxDepth = envInt(env[`${prefix}_MAX_DEPTH`]);
  if (maxDepth !== undefined) partial.maxDepth = maxDepth;
  const timeout = envInt(env[`${prefix}_GENERATION_TIMEOUT_MS`]);
  if (timeout !== undefined) partial.generationTimeoutMs = timeout;
  const reserved = envList(env[`${prefix}_RESERVED_NAMES`]);
  if (reserved !== undefined) partial.reservedNames = reserved;
  const eventLogSize = envInt(env[`${prefix}_EVENT_LOG_SIZE`]);
  if (eventLogSize !== undefined) partial.eventLogSize = eventLogSize;
  const logLevel = env[`${prefix}_LOG_LEVEL`];
  if (logLevel) partial.logLevel = logLevel;

  return partial;
}

/**
 * Load configuration from environment variables over the defaults.
 */
export function configFromEnv(prefix = "DISPATCH", env: NodeJS.ProcessEnv = process.env): DispatchConfig {
  return mergeConfigs(partialConfigFromEnv(prefix, env));
}

/**
 * Read the settings present in a JSON or YAML file.
 */
export function readConfigFile(filePath: string): Partial<DispatchConfig> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseYaml(content);
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}`, filePath);
  }

  if (!isRecord(data)) {
    throw new ConfigError("Config file must contain an object", filePath);
  }
  return partialConfigFromObject(data, filePath);
}

/**
 * Load configuration from a JSON or YAML file over the defaults.
 */
export function configFromFile(filePath: string): DispatchConfig {
  return mergeConfigs(readConfigFile(filePath));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(n => typeof n === "string");
}

function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return data[camel] ?? data[snake];
}

function integerField(value: unknown, field: string, source?: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ConfigError(`${field} must be an integer`, source);
  }
  return value;
}

/**
 * Read the settings present in a plain object (e.g. parsed JSON/YAML).
 * Accepts camelCase and snake_case keys, optionally nested under `dispatch`.
 */
export function partialConfigFromObject(raw: Record<string, unknown>, source?: string): Partial<DispatchConfig> {
  const data = isRecord(raw.dispatch) ? raw.dispatch : raw;
  const partial: Partial<DispatchConfig> = {};

  const maxDepth = integerField(pick(data, "maxDepth", "max_depth"), "maxDepth", source);
  if (maxDepth !== undefined) partial.maxDepth = maxDepth;

  const timeout = integerField(pick(data, "generationTimeoutMs", "generation_timeout_ms"), "generationTimeoutMs", source);
  if (timeout !== undefined) partial.generationTimeoutMs = timeout;

  const eventLogSize = integerField(pick(data, "eventLogSize", "event_log_size"), "eventLogSize", source);
  if (eventLogSize !== undefined) partial.eventLogSize = eventLogSize;

  const reserved = pick(data, "reservedNames", "reserved_names");
  if (reserved !== undefined) {
    if (!isStringList(reserved)) {
      throw new ConfigError("reservedNames must be a list of strings", source);
    }
    partial.reservedNames = reserved;
  }

  const logLevel = pick(data, "logLevel", "log_level");
  if (logLevel !== undefined) {
    if (typeof logLevel !== "string") {
      throw new ConfigError("logLevel must be a string", source);
    }
    partial.logLevel = logLevel;
  }

  return partial;
}

/**
 * Create configuration from a plain object over the defaults.
 */
export function configFromObject(raw: Record<string, unknown>, source?: string): DispatchConfig {
  return mergeConfigs(partialConfigFromObject(raw, source));
}

/**
 * Merge configs over the defaults, later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<DispatchConfig>[]): DispatchConfig {
  let result: DispatchConfig = { ...DEFAULT_DISPATCH_CONFIG, reservedNames: [...DEFAULT_DISPATCH_CONFIG.reservedNames] };

  for (const cfg of configs) {
    result = {
      maxDepth: cfg.maxDepth ?? result.maxDepth,
      generationTimeoutMs: cfg.generationTimeoutMs ?? result.generationTimeoutMs,
      reservedNames: cfg.reservedNames ? [...cfg.reservedNames] : result.reservedNames,
      eventLogSize: cfg.eventLogSize ?? result.eventLogSize,
      logLevel: cfg.logLevel ?? result.logLevel,
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<DispatchConfig>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): DispatchConfig {
  const layers: Partial<DispatchConfig>[] = [partialConfigFromEnv("DISPATCH", options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(readConfigFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const defaultPaths = ["dispatch.config.json", "dispatch.config.yaml", "dispatch.config.yml"];
    for (const p of defaultPaths) {
      const candidate = path.join(cwd, p);
      if (fs.existsSync(candidate)) {
        layers.push(readConfigFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: DispatchConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
    errors.push("maxDepth must be a non-negative integer");
  }
  if (config.generationTimeoutMs !== undefined && config.generationTimeoutMs <= 0) {
    errors.push("generationTimeoutMs must be positive");
  }
  if (config.eventLogSize < 0) {
    errors.push("eventLogSize must not be negative");
  }
  if (config.reservedNames.some(n => n.length === 0)) {
    errors.push("reservedNames must not contain empty names");
  }
  if (config.maxDepth > 1000) {
    warnings.push("maxDepth is very high, runaway fallback chains may exhaust the stack first");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
