// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  assertValidConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";
import { Runtime } from "../../../src/runtime";
import { createLogger } from "../../../src/core/log/logger";
import { memorySink } from "../../helpers/engine";

function withConfigFile(contents: unknown, fn: (file: string) => void): void {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "plotline-config-"));
  const file = path.join(dir, "plotline.config.json");
  fs.writeFileSync(file, JSON.stringify(contents));
  try {
    fn(file);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    delete process.env.PLOTLINE_PROMOTION_THRESHOLD;
    delete process.env.PLOTLINE_TIER_ENABLED;
    delete process.env.PLOTLINE_LOG_LEVEL;

    const config = configFromEnv();
    expect(config.tier.promotionThreshold).toBe(DEFAULT_CONFIG.tier.promotionThreshold);
    expect(config.tier.enabled).toBe(true);
    expect(config.log.level).toBe("warn");
  });

  it("reads tier settings", () => {
    process.env.PLOTLINE_PROMOTION_THRESHOLD = "25";
    process.env.PLOTLINE_TIER_ENABLED = "false";
    const config = configFromEnv();
    expect(config.tier.promotionThreshold).toBe(25);
    expect(config.tier.enabled).toBe(false);
  });

  it("reads reactive and concurrency limits", () => {
    process.env.PLOTLINE_MAX_OBSERVER_INVOCATIONS = "50";
    process.env.PLOTLINE_MAX_WORKERS = "2";
    const config = configFromEnv();
    expect(config.reactive.maxObserverInvocations).toBe(50);
    expect(config.concurrency.maxWorkers).toBe(2);
  });

  it("ignores invalid values", () => {
    process.env.PLOTLINE_MAX_WORKERS = "many";
    process.env.PLOTLINE_LOG_LEVEL = "loud";
    const config = configFromEnv();
    expect(config.concurrency.maxWorkers).toBe(DEFAULT_CONFIG.concurrency.maxWorkers);
    expect(config.log.level).toBe("warn");
  });

  it("honours a custom prefix", () => {
    const config = configFromEnv("ENGINE", { ENGINE_PROMOTION_THRESHOLD: "7" });
    expect(config.tier.promotionThreshold).toBe(7);
  });
});

describe("configFromObject", () => {
  it("parses basic config object", () => {
    const config = configFromObject({
      tier: { promotionThreshold: 10, maxShapesPerSite: 2 },
      reactive: { maxObserverInvocations: 64 },
      log: { level: "debug" },
    });

    expect(config.tier.promotionThreshold).toBe(10);
    expect(config.tier.maxShapesPerSite).toBe(2);
    expect(config.reactive.maxObserverInvocations).toBe(64);
    expect(config.log.level).toBe("debug");
  });

  it("handles snake_case keys", () => {
    const config = configFromObject({
      tier: { promotion_threshold: 3, deopt_after_guard_failures: 2 },
      concurrency: { max_workers: 1, max_scheduler_steps: 5000 },
    });

    expect(config.tier.promotionThreshold).toBe(3);
    expect(config.tier.deoptAfterGuardFailures).toBe(2);
    expect(config.concurrency.maxWorkers).toBe(1);
    expect(config.concurrency.maxSchedulerSteps).toBe(5000);
  });

  it("uses defaults for missing fields", () => {
    const config = configFromObject({});
    expect(config.tier).toEqual(DEFAULT_CONFIG.tier);
    expect(config.reactive).toEqual(DEFAULT_CONFIG.reactive);
  });

  it("falls back on non-positive numbers", () => {
    const config = configFromObject({ tier: { promotionThreshold: 0 } });
    expect(config.tier.promotionThreshold).toBe(DEFAULT_CONFIG.tier.promotionThreshold);
  });
});

describe("configFromFile", () => {
  it("loads a JSON file", () => {
    withConfigFile({ tier: { enabled: false } }, (file) => {
      expect(configFromFile(file).tier.enabled).toBe(false);
    });
  });

  it("rejects a missing file", () => {
    expect(() => configFromFile("/nonexistent/plotline.config.json")).toThrow(/Config file not found/);
  });
});

describe("mergeConfigs", () => {
  it("merges tier config", () => {
    const merged = mergeConfigs({ tier: { promotionThreshold: 5 } }, { tier: { enabled: false } });

    expect(merged.tier.promotionThreshold).toBe(5);
    expect(merged.tier.enabled).toBe(false);
    expect(merged.tier.maxShapesPerSite).toBe(DEFAULT_CONFIG.tier.maxShapesPerSite);
  });

  it("later configs override earlier ones", () => {
    const merged = mergeConfigs(
      { reactive: { maxObserverInvocations: 1 } },
      { reactive: { maxObserverInvocations: 2 } },
      { reactive: { maxObserverInvocations: 3 } },
    );

    expect(merged.reactive.maxObserverInvocations).toBe(3);
  });

  it("keeps the earlier value for undefined settings", () => {
    const merged = mergeConfigs({ tier: { promotionThreshold: 5 } }, { tier: { promotionThreshold: undefined } });
    expect(merged.tier.promotionThreshold).toBe(5);
  });

  it("does not mutate the defaults", () => {
    mergeConfigs({ tier: { promotionThreshold: 1 } });
    expect(DEFAULT_CONFIG.tier.promotionThreshold).toBe(100);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    const result = validateConfig(DEFAULT_CONFIG);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it("errors on a zero worker pool", () => {
    const config = { ...DEFAULT_CONFIG, concurrency: { ...DEFAULT_CONFIG.concurrency, maxWorkers: 0 } };
    const result = validateConfig(config);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("concurrency.maxWorkers must be at least 1");
  });

  it("warns about a single shape per site", () => {
    const config = { ...DEFAULT_CONFIG, tier: { ...DEFAULT_CONFIG.tier, maxShapesPerSite: 1 } };
    expect(validateConfig(config).warnings).toHaveLength(1);
  });
});

describe("loadConfig", () => {
  it("layers overrides over the file over the environment", () => {
    const env = {
      PLOTLINE_PROMOTION_THRESHOLD: "10",
      PLOTLINE_MAX_WORKERS: "2",
      PLOTLINE_MAX_OBSERVER_INVOCATIONS: "50",
    };
    withConfigFile({ tier: { promotionThreshold: 20 }, concurrency: { maxWorkers: 3 } }, (configFile) => {
      const config = loadConfig({ env, configFile, overrides: { concurrency: { maxWorkers: 1 } } });

      expect(config.tier.promotionThreshold).toBe(20);
      expect(config.reactive.maxObserverInvocations).toBe(50);
      expect(config.concurrency.maxWorkers).toBe(1);
      expect(config.tier.deoptAfterGuardFailures).toBe(DEFAULT_CONFIG.tier.deoptAfterGuardFailures);
    });
  });

  it("reads the environment when nothing else is given", () => {
    expect(loadConfig({ env: { PLOTLINE_LOG_LEVEL: "debug" } }).log.level).toBe("debug");
  });
});

describe("Runtime configuration", () => {
  const quiet = () => createLogger("test", "silent", memorySink());

  it("rejects an empty worker pool", () => {
    expect(() => new Runtime({ env: {}, config: { concurrency: { maxWorkers: 0 } }, logger: quiet() })).toThrow(
      "Invalid config: concurrency.maxWorkers must be at least 1",
    );
  });

  it("reports every invalid setting at once", () => {
    const config = { reactive: { maxObserverInvocations: 0 }, concurrency: { maxWorkers: 0 } };
    expect(() => new Runtime({ env: {}, config, logger: quiet() })).toThrow(
      "Invalid config: reactive.maxObserverInvocations must be at least 1; concurrency.maxWorkers must be at least 1",
    );
  });

  it("rejects a zero deoptimization threshold", () => {
    expect(() => new Runtime({ env: {}, config: { tier: { deoptAfterGuardFailures: 0 } }, logger: quiet() })).toThrow(
      "Invalid config: tier.deoptAfterGuardFailures must be at least 1",
    );
  });

  it("logs validation warnings", () => {
    const sink = memorySink();
    new Runtime({ env: {}, config: { tier: { maxShapesPerSite: 1 } }, logger: createLogger("test", "debug", sink) });
    expect(sink.lines).toEqual([
      "[test] config warning=tier.maxShapesPerSite = 1 treats any second shape as megamorphic",
    ]);
  });

  it("loads the config file and environment", () => {
    withConfigFile({ tier: { enabled: false } }, (configFile) => {
      const rt = new Runtime({ env: { PLOTLINE_MAX_WORKERS: "2" }, configFile, logger: quiet() });
      expect(rt.config.tier.enabled).toBe(false);
      expect(rt.config.concurrency.maxWorkers).toBe(2);
    });
  });

  it("assertValidConfig returns the warnings of a valid config", () => {
    expect(assertValidConfig(DEFAULT_CONFIG)).toEqual([]);
  });
});
