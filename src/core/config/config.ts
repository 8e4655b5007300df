// src/core/config/config.ts
// Configuration system for memoseq sequences

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type SequenceConfig = {
  /** Record seed/hit/grow/compute events on each sequence */
  logging: boolean;
  /** Maximum number of retained events (oldest are dropped first) */
  maxEvents: number;
  /** Detect reads through views invalidated by reallocation or reset */
  checkViews: boolean;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SEQUENCE_CONFIG: SequenceConfig = {
  logging: false,
  maxEvents: 10_000,
  checkViews: true,
};

export const DEFAULT_CONFIG_FILES = ["memoseq.config.json", ".memoseqrc.json"];

/**
 * Create a config from defaults plus partial overrides.
 */
export function createSequenceConfig(overrides: Partial<SequenceConfig> = {}): SequenceConfig {
  return { ...DEFAULT_SEQUENCE_CONFIG, ...overrides };
}

// =========================================================================
// Configuration Loading
// =========================================================================

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "MEMOSEQ"): SequenceConfig {
  const logging = parseBool(process.env[`${prefix}_LOGGING`]) ?? DEFAULT_SEQUENCE_CONFIG.logging;
  const maxEvents = parseInt(process.env[`${prefix}_MAX_EVENTS`] || "", 10) || DEFAULT_SEQUENCE_CONFIG.maxEvents;
  const checkViews = parseBool(process.env[`${prefix}_CHECK_VIEWS`]) ?? DEFAULT_SEQUENCE_CONFIG.checkViews;

  return { logging, maxEvents, checkViews };
}

function pickBool(data: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const v = data[key];
    if (typeof v === "boolean") return v;
  }
  return undefined;
}

function pickNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const v = data[key];
    if (typeof v === "number" && Number.isFinite(v)) return v;
  }
  return undefined;
}

/**
 * Only the keys present (and well-typed) in a plain object.
 * Accepts camelCase and snake_case keys.
 */
export function partialConfigFromObject(data: Record<string, unknown>): Partial<SequenceConfig> {
  const partial: Partial<SequenceConfig> = {};

  const logging = pickBool(data, "logging");
  if (logging !== undefined) partial.logging = logging;

  const maxEvents = pickNumber(data, "maxEvents", "max_events");
  if (maxEvents !== undefined) partial.maxEvents = maxEvents;

  const checkViews = pickBool(data, "checkViews", "check_views");
  if (checkViews !== undefined) partial.checkViews = checkViews;

  return partial;
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 */
export function configFromObject(data: Record<string, unknown>): SequenceConfig {
  return createSequenceConfig(partialConfigFromObject(data));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readConfigFile(filePath: string): Partial<SequenceConfig> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return partialConfigFromObject(data);
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): SequenceConfig {
  return createSequenceConfig(readConfigFile(filePath));
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<SequenceConfig>[]): SequenceConfig {
  let result = { ...DEFAULT_SEQUENCE_CONFIG };
  for (const cfg of configs) {
    result = { ...result, ...cfg };
  }
  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<SequenceConfig>;
  cwd?: string;
}): SequenceConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, readConfigFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, readConfigFile(p));
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

export function validateConfig(config: SequenceConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.maxEvents) || config.maxEvents < 1) {
    errors.push("maxEvents must be a positive integer");
  }
  if (config.logging && config.maxEvents < 100) {
    warnings.push("maxEvents is very low, the event log will drop most entries");
  }
  if (!config.checkViews) {
    warnings.push("checkViews is off, reads through stale views will not be detected");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
