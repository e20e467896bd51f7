// src/core/config/config.ts
// Configuration system for the execution engine

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type TierConfig = {
  /** When false every call site stays interpreted */
  enabled: boolean;
  /** Interpreted calls at a site before promotion is attempted */
  promotionThreshold: number;
  /** Distinct argument shapes a site may see before it is treated as megamorphic */
  maxShapesPerSite: number;
  /** Entry-guard failures tolerated before a compiled entry is discarded */
  deoptAfterGuardFailures: number;
};

export type ReactiveConfig = {
  /** Observer runs allowed in a single propagation pass */
  maxObserverInvocations: number;
};

export type ConcurrencyConfig = {
  /** Background tasks that may be in flight at once */
  maxWorkers: number;
  /** Upper bound on scheduler steps in a single run */
  maxSchedulerSteps: number;
};

export type EngineConfig = {
  tier: TierConfig;
  reactive: ReactiveConfig;
  concurrency: ConcurrencyConfig;
  log: { level: LogLevel };
};

export type PartialEngineConfig = {
  tier?: Partial<TierConfig>;
  reactive?: Partial<ReactiveConfig>;
  concurrency?: Partial<ConcurrencyConfig>;
  log?: { level?: LogLevel };
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_TIER_CONFIG: TierConfig = {
  enabled: true,
  promotionThreshold: 100,
  maxShapesPerSite: 4,
  deoptAfterGuardFailures: 8,
};

export const DEFAULT_REACTIVE_CONFIG: ReactiveConfig = {
  maxObserverInvocations: 1000,
};

export const DEFAULT_CONCURRENCY_CONFIG: ConcurrencyConfig = {
  maxWorkers: 4,
  maxSchedulerSteps: 1_000_000,
};

export const DEFAULT_CONFIG: EngineConfig = {
  tier: DEFAULT_TIER_CONFIG,
  reactive: DEFAULT_REACTIVE_CONFIG,
  concurrency: DEFAULT_CONCURRENCY_CONFIG,
  log: { level: "warn" },
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

// =========================================================================
// Value Coercion
// =========================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && LOG_LEVELS.some((level) => level === v);
}

/** Positive integer from a config field, or undefined when absent/invalid. */
function positiveInt(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isInteger(v) && v > 0) return v;
  if (typeof v === "string" && /^\d+$/.test(v.trim())) {
    const n = parseInt(v, 10);
    return n > 0 ? n : undefined;
  }
  return undefined;
}

function bool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return undefined;
}

/** Read a camelCase key, falling back to its snake_case spelling. */
function field(data: Record<string, unknown>, camel: string): unknown {
  if (camel in data) return data[camel];
  const snake = camel.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
  return data[snake];
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "PLOTLINE", env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const level = env[`${prefix}_LOG_LEVEL`];
  return {
    tier: {
      enabled: bool(env[`${prefix}_TIER_ENABLED`]) ?? DEFAULT_TIER_CONFIG.enabled,
      promotionThreshold: positiveInt(env[`${prefix}_PROMOTION_THRESHOLD`]) ?? DEFAULT_TIER_CONFIG.promotionThreshold,
      maxShapesPerSite: positiveInt(env[`${prefix}_MAX_SHAPES_PER_SITE`]) ?? DEFAULT_TIER_CONFIG.maxShapesPerSite,
      deoptAfterGuardFailures:
        positiveInt(env[`${prefix}_DEOPT_AFTER_GUARD_FAILURES`]) ?? DEFAULT_TIER_CONFIG.deoptAfterGuardFailures,
    },
    reactive: {
      maxObserverInvocations:
        positiveInt(env[`${prefix}_MAX_OBSERVER_INVOCATIONS`]) ?? DEFAULT_REACTIVE_CONFIG.maxObserverInvocations,
    },
    concurrency: {
      maxWorkers: positiveInt(env[`${prefix}_MAX_WORKERS`]) ?? DEFAULT_CONCURRENCY_CONFIG.maxWorkers,
      maxSchedulerSteps: positiveInt(env[`${prefix}_MAX_SCHEDULER_STEPS`]) ?? DEFAULT_CONCURRENCY_CONFIG.maxSchedulerSteps,
    },
    log: { level: isLogLevel(level) ? level : DEFAULT_CONFIG.log.level },
  };
}

function readConfigFile(filePath: string): Record<string, unknown> {
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
  return data;
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): EngineConfig {
  return configFromObject(readConfigFile(filePath));
}

/**
 * Settings present in a plain object (e.g., parsed JSON). Unknown keys and
 * invalid values are left out, so merging it only touches what was given.
 */
export function partialConfigFromObject(data: Record<string, unknown>): PartialEngineConfig {
  const tier: Record<string, unknown> = isRecord(data.tier) ? data.tier : {};
  const reactive: Record<string, unknown> = isRecord(data.reactive) ? data.reactive : {};
  const concurrency: Record<string, unknown> = isRecord(data.concurrency) ? data.concurrency : {};
  const log: Record<string, unknown> = isRecord(data.log) ? data.log : {};

  return {
    tier: {
      enabled: bool(field(tier, "enabled")),
      promotionThreshold: positiveInt(field(tier, "promotionThreshold")),
      maxShapesPerSite: positiveInt(field(tier, "maxShapesPerSite")),
      deoptAfterGuardFailures: positiveInt(field(tier, "deoptAfterGuardFailures")),
    },
    reactive: {
      maxObserverInvocations: positiveInt(field(reactive, "maxObserverInvocations")),
    },
    concurrency: {
      maxWorkers: positiveInt(field(concurrency, "maxWorkers")),
      maxSchedulerSteps: positiveInt(field(concurrency, "maxSchedulerSteps")),
    },
    log: { level: isLogLevel(log.level) ? log.level : undefined },
  };
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 * Unknown keys are ignored; invalid values fall back to defaults.
 */
export function configFromObject(data: Record<string, unknown>): EngineConfig {
  return mergeConfigs(partialConfigFromObject(data));
}

/**
 * Merge configs with later ones overriding earlier ones. Absent and
 * undefined settings keep the earlier value.
 */
export function mergeConfigs(...configs: PartialEngineConfig[]): EngineConfig {
  const result: EngineConfig = {
    tier: { ...DEFAULT_CONFIG.tier },
    reactive: { ...DEFAULT_CONFIG.reactive },
    concurrency: { ...DEFAULT_CONFIG.concurrency },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const cfg of configs) {
    const { tier, reactive, concurrency } = result;
    result.tier = {
      enabled: cfg.tier?.enabled ?? tier.enabled,
      promotionThreshold: cfg.tier?.promotionThreshold ?? tier.promotionThreshold,
      maxShapesPerSite: cfg.tier?.maxShapesPerSite ?? tier.maxShapesPerSite,
      deoptAfterGuardFailures: cfg.tier?.deoptAfterGuardFailures ?? tier.deoptAfterGuardFailures,
    };
    result.reactive = {
      maxObserverInvocations: cfg.reactive?.maxObserverInvocations ?? reactive.maxObserverInvocations,
    };
    result.concurrency = {
      maxWorkers: cfg.concurrency?.maxWorkers ?? concurrency.maxWorkers,
      maxSchedulerSteps: cfg.concurrency?.maxSchedulerSteps ?? concurrency.maxSchedulerSteps,
    };
    result.log = { level: cfg.log?.level ?? result.log.level };
  }

  return result;
}

export type LoadConfigOptions = {
  /** JSON config file; `plotline.config.json` in the working directory is used when present */
  configFile?: string;
  /** Environment to read `PLOTLINE_*` settings from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  overrides?: PartialEngineConfig;
};

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  let config = configFromEnv("PLOTLINE", options.env ?? process.env);

  if (options.configFile) {
    config = mergeConfigs(config, partialConfigFromObject(readConfigFile(options.configFile)));
  } else if (fs.existsSync("plotline.config.json")) {
    config = mergeConfigs(config, partialConfigFromObject(readConfigFile("plotline.config.json")));
  }

  if (options.overrides) {
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

export function validateConfig(config: EngineConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.tier.promotionThreshold < 1) {
    errors.push("tier.promotionThreshold must be at least 1");
  }
  if (config.tier.maxShapesPerSite < 1) {
    errors.push("tier.maxShapesPerSite must be at least 1");
  }
  if (config.tier.deoptAfterGuardFailures < 1) {
    errors.push("tier.deoptAfterGuardFailures must be at least 1");
  }
  if (config.reactive.maxObserverInvocations < 1) {
    errors.push("reactive.maxObserverInvocations must be at least 1");
  }
  if (config.concurrency.maxWorkers < 1) {
    errors.push("concurrency.maxWorkers must be at least 1");
  }
  if (config.concurrency.maxSchedulerSteps < 1) {
    errors.push("concurrency.maxSchedulerSteps must be at least 1");
  }
  if (config.tier.maxShapesPerSite === 1) {
    warnings.push("tier.maxShapesPerSite = 1 treats any second shape as megamorphic");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Throw when `config` has validation errors; otherwise return its warnings.
 */
export function assertValidConfig(config: EngineConfig): string[] {
  const { valid, errors, warnings } = validateConfig(config);
  if (!valid) {
    throw new Error(`Invalid config: ${errors.join("; ")}`);
  }
  return warnings;
}
