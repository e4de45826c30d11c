import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createRedisConfig,
  createServiceConfig,
  parseEnvArray,
  parseEnvFlag,
  parseEnvNumber,
  parseOptionalEnvNumber,
} from "../src/config";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("createServiceConfig", () => {
    it("should read mode, log level and port", () => {
      vi.stubEnv("MODE", "production");
      vi.stubEnv("LOG_LEVEL", "warn");
      vi.stubEnv("PORT", "9090");

      expect(createServiceConfig("api-gateway", 8080)).toEqual({
        name: "api-gateway",
        mode: "production",
        logLevel: "warn",
        port: 9090,
      });
    });

    it("should leave the port unset without a default", () => {
      expect(createServiceConfig("evaluator").port).toBeUndefined();
    });
  });

  describe("createRedisConfig", () => {
    it("should be null without REDIS_URL", () => {
      vi.stubEnv("REDIS_URL", "");
      expect(createRedisConfig()).toBeNull();
    });

    it("should parse host and port", () => {
      vi.stubEnv("REDIS_URL", "redis://cache.internal:6380");
      expect(createRedisConfig()).toEqual({
        url: "redis://cache.internal:6380",
        host: "cache.internal",
        port: 6380,
      });
    });

    it("should default the port", () => {
      vi.stubEnv("REDIS_URL", "redis://localhost");
      expect(createRedisConfig()?.port).toBe(6379);
    });

    it("should reject a malformed URL", () => {
      vi.stubEnv("REDIS_URL", "not a url");
      expect(() => createRedisConfig()).toThrow("Invalid REDIS_URL: not a url");
    });
  });

  describe("parseEnvNumber", () => {
    it("should fall back when unset or blank", () => {
      vi.stubEnv("AREA_TIMEOUT_MS", " ");
      expect(parseEnvNumber("AREA_TIMEOUT_MS", 8000)).toBe(8000);
    });

    it("should parse decimals", () => {
      vi.stubEnv("SDLT_SURCHARGE_RATE", "0.03");
      expect(parseEnvNumber("SDLT_SURCHARGE_RATE", 0.05)).toBe(0.03);
    });

    it("should reject non-numeric values", () => {
      vi.stubEnv("PORT", "eighty");
      expect(() => parseEnvNumber("PORT", 8080)).toThrow("Invalid number in PORT: eighty");
    });

    it("should leave optional numbers undefined", () => {
      vi.stubEnv("ANNUAL_INSURANCE", "");
      expect(parseOptionalEnvNumber("ANNUAL_INSURANCE")).toBeUndefined();
      vi.stubEnv("ANNUAL_INSURANCE", "600");
      expect(parseOptionalEnvNumber("ANNUAL_INSURANCE")).toBe(600);
    });
  });

  describe("parseEnvFlag", () => {
    it.each<[string, boolean]>([
      ["false", false],
      ["0", false],
      ["NO", false],
      ["true", true],
      ["1", true],
    ])("should read %s as %s", (raw, expected) => {
      vi.stubEnv("ENABLE_RATE_LIMIT", raw);
      expect(parseEnvFlag("ENABLE_RATE_LIMIT", !expected)).toBe(expected);
    });
  });

  describe("parseEnvArray", () => {
    it("should split and trim", () => {
      vi.stubEnv("CORS_ORIGINS", "http://localhost:3000, https://deals.test ,");
      expect(parseEnvArray("CORS_ORIGINS")).toEqual([
        "http://localhost:3000",
        "https://deals.test",
      ]);
    });

    it("should use the default when empty", () => {
      vi.stubEnv("CORS_ORIGINS", "");
      expect(parseEnvArray("CORS_ORIGINS", ["*"])).toEqual(["*"]);
    });
  });
});
