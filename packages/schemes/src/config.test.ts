/**
 * Tests for the configuration store
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { config } from "./config.js";
import { ConfigError } from "./errors.js";

const ENV_KEYS = ["REFOLD_DEBUG", "REFOLD_LAWS_ITERATIONS"] as const;

// ============================================================================
// Defaults and set
// ============================================================================

describe("config.get and config.set", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("should return default values", () => {
    expect(config.get("debug")).toBe(false);
    expect(config.get("laws.iterations")).toBe(100);
  });

  it("should set simple values", () => {
    config.set({ debug: true });
    expect(config.get("debug")).toBe(true);
  });

  it("should set nested values", () => {
    config.set({ laws: { iterations: 7 } });
    expect(config.get("laws.iterations")).toBe(7);
  });

  it("should keep earlier values when setting others", () => {
    config.set({ debug: true });
    config.set({ laws: { iterations: 7 } });
    expect(config.get("debug")).toBe(true);
  });

  it("should reject a non-positive iteration count", () => {
    expect(() => config.set({ laws: { iterations: 0 } })).toThrow(ConfigError);
    expect(() => config.set({ laws: { iterations: 0 } })).toThrow(
      '"laws.iterations" must be a positive integer, got 0 (from config.set)',
    );
  });

  it("reset should drop programmatic values", () => {
    config.set({ debug: true });
    config.reset();
    expect(config.get("debug")).toBe(false);
  });
});

// ============================================================================
// has / getAll
// ============================================================================

describe("config.has and config.getAll", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("has should report truthy values", () => {
    expect(config.has("debug")).toBe(false);
    expect(config.has("laws.iterations")).toBe(true);
    config.set({ debug: true });
    expect(config.has("debug")).toBe(true);
  });

  it("getAll should return the nested form", () => {
    config.set({ laws: { iterations: 12 } });
    expect(config.getAll()).toEqual({ debug: false, laws: { iterations: 12 } });
  });
});

// ============================================================================
// Environment variables
// ============================================================================

describe("environment variables", () => {
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    config.reset();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    config.reset();
  });

  it("REFOLD_DEBUG accepts 1 and true", () => {
    process.env.REFOLD_DEBUG = "1";
    expect(config.get("debug")).toBe(true);

    config.reset();
    process.env.REFOLD_DEBUG = "true";
    expect(config.get("debug")).toBe(true);

    config.reset();
    process.env.REFOLD_DEBUG = "yes";
    expect(config.get("debug")).toBe(false);
  });

  it("REFOLD_LAWS_ITERATIONS sets the iteration count", () => {
    process.env.REFOLD_LAWS_ITERATIONS = "250";
    expect(config.get("laws.iterations")).toBe(250);
  });

  it("environment variables override programmatic values", () => {
    process.env.REFOLD_LAWS_ITERATIONS = "250";
    config.set({ laws: { iterations: 3 } });
    expect(config.get("laws.iterations")).toBe(250);
  });

  it("programmatic values still apply to keys the environment leaves unset", () => {
    process.env.REFOLD_LAWS_ITERATIONS = "250";
    config.set({ debug: true, laws: { iterations: 3 } });
    expect(config.getAll()).toEqual({ debug: true, laws: { iterations: 250 } });
  });

  it("rejects an iteration count that is not a positive integer", () => {
    process.env.REFOLD_LAWS_ITERATIONS = "abc";
    expect(() => config.get("laws.iterations")).toThrow(
      '"laws.iterations" must be a positive integer, got abc (from REFOLD_LAWS_ITERATIONS)',
    );

    config.reset();
    process.env.REFOLD_LAWS_ITERATIONS = "0";
    expect(() => config.get("laws.iterations")).toThrow(ConfigError);
  });

  it("ignores an empty iteration count", () => {
    process.env.REFOLD_LAWS_ITERATIONS = "";
    expect(config.get("laws.iterations")).toBe(100);
  });
});
