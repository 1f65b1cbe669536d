import { describe, expect, it } from "vitest";
import { configure, defaults, getConfig, resetConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("config", () => {
  it("starts from the defaults", () => {
    expect(getConfig()).toEqual(defaults);
    expect(getConfig().executor.strategy).toBe("serial");
    expect(getConfig().retry.maxRetries).toBe(1);
    expect(getConfig().planner.unresolvedDependencies).toBe("reject");
    expect(getConfig().storage.dbPath.endsWith("workflows.db")).toBe(true);
  });

  it("merges overrides deeply", () => {
    configure({ executor: { strategy: "pool", maxConcurrency: 8 } });
    expect(getConfig().executor).toEqual({
      strategy: "pool",
      maxConcurrency: 8,
      artifactPreviewLength: 100,
      handlerTimeoutMs: 120_000,
    });
    expect(getConfig().retry).toEqual(defaults.retry);
  });

  it("rejects invalid values and keeps the previous config", () => {
    expect(() => configure({ executor: { maxConcurrency: 0 } })).toThrow(ConfigError);
    expect(() => configure({ retry: { minConfidence: 2 } })).toThrow(/^Invalid configuration: retry\.minConfidence/);
    expect(getConfig()).toEqual(defaults);
  });

  it("resets to the defaults", () => {
    configure({ cli: { descriptionWidth: 10 } });
    resetConfig();
    expect(getConfig().cli.descriptionWidth).toBe(60);
  });
});
