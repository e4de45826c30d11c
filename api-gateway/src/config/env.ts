/**
 * Environment Configuration for API Gateway
 */

import {
  createRedisConfig,
  createServiceConfig,
  parseEnvArray,
  parseEnvFlag,
  parseEnvNumber,
  parseOptionalEnvNumber,
  RedisConfig,
} from "@dealcheck/shared-utils";
import { PolicyOverrides } from "@dealcheck/evaluator";
import dotenv from "dotenv";

dotenv.config();

export interface RateLimitRule {
  requests: number;
  windowMs: number;
}

export interface UpstreamConfig {
  landRegistryUrl: string;
  tflUrl: string;
  tflAppKey?: string;
  policeUrl: string;
  postcodesUrl: string;
  timeoutMs: number;
}

export interface GatewayConfig {
  serviceName: string;
  version: string;
  port: number;
  isDevelopment: boolean;
  logLevel: string;
  corsOrigins: string[];
  apiVersion: string;
  bodyLimit: string;

  enableRateLimit: boolean;
  rateLimits: {
    analyze: RateLimitRule;
    area: RateLimitRule;
  };

  // Seconds
  cacheTTL: {
    soldPrices: number;
    priceTrend: number;
    transport: number;
    crime: number;
    geocode: number;
  };

  useMockAreaData: boolean;
  upstream: UpstreamConfig;
  policy: PolicyOverrides;
}

const serviceCfg = createServiceConfig("api-gateway", 8080);

export const redisCfg: RedisConfig | null = createRedisConfig();

export const apiCfg: GatewayConfig = {
  serviceName: serviceCfg.name,
  version: "1.0.0",
  port: serviceCfg.port ?? 8080,
  isDevelopment: serviceCfg.mode === "development",
  logLevel: serviceCfg.logLevel,
  corsOrigins: parseEnvArray("CORS_ORIGINS", ["http://localhost:3000"]),
  apiVersion: process.env.API_VERSION || "v1",
  bodyLimit: "10kb",

  enableRateLimit: parseEnvFlag("ENABLE_RATE_LIMIT", true),
  rateLimits: {
    analyze: {
      requests: parseEnvNumber("RATE_LIMIT_ANALYZE", 10),
      windowMs: 60_000, // 1 minute
    },
    area: {
      requests: parseEnvNumber("RATE_LIMIT_AREA", 50),
      windowMs: 3_600_000, // 1 hour
    },
  },

  cacheTTL: {
    soldPrices: parseEnvNumber("CACHE_TTL_SOLD_PRICES", 86400), // 1 day
    priceTrend: parseEnvNumber("CACHE_TTL_PRICE_TREND", 86400),
    transport: parseEnvNumber("CACHE_TTL_TRANSPORT", 604800), // 1 week
    crime: parseEnvNumber("CACHE_TTL_CRIME", 86400),
    geocode: parseEnvNumber("CACHE_TTL_GEOCODE", 2592000), // 30 days
  },

  useMockAreaData: parseEnvFlag("USE_MOCK_AREA_DATA", false),
  upstream: {
    landRegistryUrl:
      process.env.LAND_REGISTRY_URL ||
      "http://landregistry.data.gov.uk/landregistry/query",
    tflUrl: process.env.TFL_URL || "https://api.tfl.gov.uk",
    tflAppKey: process.env.TFL_APP_KEY || undefined,
    policeUrl: process.env.POLICE_API_URL || "https://data.police.uk/api",
    postcodesUrl: process.env.POSTCODES_URL || "https://api.postcodes.io",
    timeoutMs: parseEnvNumber("AREA_TIMEOUT_MS", 5000),
  },

  policy: {
    surchargeRate: parseOptionalEnvNumber("SDLT_SURCHARGE_RATE"),
    annualInsurance: parseOptionalEnvNumber("ANNUAL_INSURANCE"),
  },
};
