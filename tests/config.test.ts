import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { ConfigurationError } from "../src/errors/ConfigurationError.js";
import { buildEngines } from "../src/session/context.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      dataFile: "./data/quizdeck.json",
      logLevel: "info",
      production: false,
      scheduler: {
        min_ease_factor: undefined,
        max_ease_factor: undefined,
        initial_ease_factor: undefined,
        ease_bonus: undefined,
        ease_penalty: undefined,
        min_interval: undefined,
        max_interval: undefined,
      },
      rating: { k_factor: undefined, initial_rating: undefined },
      session: { sessionSize: 20, targetSuccessRate: 0.7, ratingSpread: 200 },
    });
  });

  it("reads overrides and ignores blank values", () => {
    const config = loadConfig({
      QUIZDECK_DATA_FILE: "/tmp/bank.json",
      LOG_LEVEL: "DEBUG",
      NODE_ENV: "production",
      QUIZDECK_K_FACTOR: "24",
      QUIZDECK_MAX_INTERVAL: "90",
      QUIZDECK_SESSION_SIZE: "5",
      QUIZDECK_MIN_EASE: "  ",
    });
    expect(config.dataFile).toBe("/tmp/bank.json");
    expect(config.logLevel).toBe("debug");
    expect(config.production).toBe(true);
    expect(config.rating.k_factor).toBe(24);
    expect(config.scheduler.max_interval).toBe(90);
    expect(config.scheduler.min_ease_factor).toBeUndefined();
    expect(config.session.sessionSize).toBe(5);
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ QUIZDECK_SESSION_SIZE: "0" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ QUIZDECK_TARGET_SUCCESS: "1.5" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ QUIZDECK_K_FACTOR: "lots" })).toThrow(ConfigurationError);
  });

  it("feeds engine settings through to the engines", () => {
    const engines = buildEngines(loadConfig({ QUIZDECK_K_FACTOR: "16", QUIZDECK_MIN_INTERVAL: "2" }));
    expect(engines.rating.config.k_factor).toBe(16);
    expect(engines.scheduler.config.min_interval).toBe(2);
    expect(engines.scheduler.config.max_interval).toBe(365);
  });

  it("leaves cross-field checks to the engines", () => {
    const config = loadConfig({ QUIZDECK_MIN_EASE: "3", QUIZDECK_MAX_EASE: "2" });
    expect(() => buildEngines(config)).toThrow(ConfigurationError);
  });
});
