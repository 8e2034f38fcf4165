/**
 * Tests for the configuration loader
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { config, envKeyToPath } from "@sublex/core";

const ENV_KEYS = ["SUBLEX_DEBUG", "SUBLEX_LEX__MAX_IDLE_STEPS", "SUBLEX_LEX__THROW_ON_ERROR"];

describe("config", () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) delete process.env[key];
    config.reset();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) delete process.env[key];
    config.reset();
  });

  describe("defaults", () => {
    it("should disable debug by default", () => {
      expect(config.getBoolean("debug")).toBe(false);
    });

    it("should provide lexer defaults", () => {
      expect(config.getBoolean("lex.throwOnError")).toBe(true);
      expect(config.getNumber("lex.maxIdleSteps")).toBe(1000);
    });

    it("should return undefined for unknown paths", () => {
      expect(config.get("nope.missing")).toBeUndefined();
      expect(config.has("nope")).toBe(false);
    });
  });

  describe("environment variables", () => {
    it("should read SUBLEX_DEBUG as a boolean", () => {
      process.env.SUBLEX_DEBUG = "1";
      expect(config.getBoolean("debug")).toBe(true);
    });

    it("should map double underscores to nesting and parse numbers", () => {
      process.env.SUBLEX_LEX__MAX_IDLE_STEPS = "50";
      process.env.SUBLEX_LEX__THROW_ON_ERROR = "false";
      expect(config.getNumber("lex.maxIdleSteps")).toBe(50);
      expect(config.getBoolean("lex.throwOnError")).toBe(false);
    });

    it("should keep 1 and 0 usable as numbers and booleans", () => {
      process.env.SUBLEX_LEX__MAX_IDLE_STEPS = "1";
      process.env.SUBLEX_DEBUG = "0";
      expect(config.getNumber("lex.maxIdleSteps")).toBe(1);
      expect(config.getBoolean("debug")).toBe(false);
      config.reset();
      process.env.SUBLEX_LEX__MAX_IDLE_STEPS = "0";
      process.env.SUBLEX_DEBUG = "1";
      expect(config.getNumber("lex.maxIdleSteps")).toBe(0);
      expect(config.getBoolean("debug")).toBe(true);
    });

    it("should only be read once until reset", () => {
      expect(config.getBoolean("debug")).toBe(false);
      process.env.SUBLEX_DEBUG = "true";
      expect(config.getBoolean("debug")).toBe(false);
      config.reset();
      expect(config.getBoolean("debug")).toBe(true);
    });
  });

  describe("set", () => {
    it("should deep-merge programmatic values", () => {
      config.set({ lex: { maxIdleSteps: 7 } });
      expect(config.getNumber("lex.maxIdleSteps")).toBe(7);
      expect(config.getBoolean("lex.throwOnError")).toBe(true);
    });

    it("should take precedence over the environment", () => {
      process.env.SUBLEX_DEBUG = "1";
      config.set({ debug: false });
      expect(config.getBoolean("debug")).toBe(false);
    });

    it("should report keys set to false or 0 as present", () => {
      config.set({ debug: false, lex: { maxIdleSteps: 0 } });
      expect(config.has("debug")).toBe(true);
      expect(config.has("lex.maxIdleSteps")).toBe(true);
      expect(config.has("lex.missing")).toBe(false);
    });

    it("should ignore values of the wrong type in typed readers", () => {
      config.set({ debug: "yes" });
      expect(config.get("debug")).toBe("yes");
      expect(config.getBoolean("debug")).toBeUndefined();
      expect(config.getNumber("debug")).toBeUndefined();
    });
  });

  describe("envKeyToPath", () => {
    it("should convert keys to dotted camel-case paths", () => {
      expect(envKeyToPath("DEBUG")).toBe("debug");
      expect(envKeyToPath("LEX__THROW_ON_ERROR")).toBe("lex.throwOnError");
      expect(envKeyToPath("A__B__C_D")).toBe("a.b.cD");
    });
  });
});
