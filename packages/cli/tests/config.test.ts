/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ LOG_LEVEL: "error", NODE_ENV: "production" });
  });

  it("reads explicit values", () => {
    expect(loadConfig({ LOG_LEVEL: "debug", NODE_ENV: "development" })).toEqual({
      LOG_LEVEL: "debug",
      NODE_ENV: "development",
    });
  });

  it("accepts silent as a level", () => {
    expect(loadConfig({ LOG_LEVEL: "silent" }).LOG_LEVEL).toBe("silent");
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/home/test", LOG_LEVEL: "warn" })).toEqual({
      LOG_LEVEL: "warn",
      NODE_ENV: "production",
    });
  });

  it("throws on an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });

  it("throws on an unknown NODE_ENV", () => {
    expect(() => loadConfig({ NODE_ENV: "staging" })).toThrow(ZodError);
  });
});
