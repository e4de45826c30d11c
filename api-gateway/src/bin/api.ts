#!/usr/bin/env node

/**
 * API Gateway HTTP Server
 *
 * Wires configuration, cache, rate limiter and area adapters into the
 * Express app and starts listening.
 */

import { createPolicy } from "@dealcheck/evaluator";
import { CachePort, createLogger, MemoryCache } from "@dealcheck/shared-utils";
import { PoliceCrimeAPI } from "../adapters/crime.api";
import { RedisCacheAdapter } from "../adapters/cache.redis";
import { TflJourneyAPI } from "../adapters/journey.api";
import { LandRegistryAPI } from "../adapters/land-registry.api";
import { TemplateNarrativeAdapter } from "../adapters/narrative.template";
import { PostcodesIoAPI } from "../adapters/postcode.api";
import { FileStationDirectory } from "../adapters/rail-stations.file";
import { MemoryRateLimiter } from "../adapters/rate-limit.memory";
import { TflStopPointAPI } from "../adapters/transport.api";
import { createApp } from "../app";
import { apiCfg, redisCfg } from "../config/env";
import { OrchestrationService } from "../core/orchestration";
import { RateLimitPort } from "../core/ports";

async function startServer(): Promise<void> {
  const logger = createLogger(apiCfg.serviceName, apiCfg.logLevel);

  logger.info("Starting API Gateway HTTP Server...");

  const policy = createPolicy(apiCfg.policy);

  let cache: CachePort;
  let rateLimiter: RateLimitPort;
  let redis: RedisCacheAdapter | undefined;

  if (redisCfg) {
    logger.info(`Connecting to Redis at ${redisCfg.host}:${redisCfg.port}...`);
    redis = RedisCacheAdapter.fromUrl(redisCfg.url, logger.child("redis"));
    if (await redis.isHealthy()) {
      logger.info("Redis connected");
    } else {
      logger.warn("Redis unreachable, cache and rate limits will fail open");
    }
    cache = redis;
    rateLimiter = redis;
  } else {
    logger.info("REDIS_URL not set, using in-memory cache and rate limits");
    cache = new MemoryCache();
    rateLimiter = new MemoryRateLimiter();
  }

  const { upstream, useMockAreaData } = apiCfg;
  if (useMockAreaData) {
    logger.warn("Area data sources running in mock mode");
  }

  const orchestration = new OrchestrationService(
    {
      soldPrices: new LandRegistryAPI({
        endpoint: upstream.landRegistryUrl,
        timeoutMs: upstream.timeoutMs,
        mockMode: useMockAreaData,
      }),
      transport: new TflStopPointAPI({
        baseUrl: upstream.tflUrl,
        appKey: upstream.tflAppKey,
        timeoutMs: upstream.timeoutMs,
        mockMode: useMockAreaData,
      }),
      crime: new PoliceCrimeAPI({
        baseUrl: upstream.policeUrl,
        timeoutMs: upstream.timeoutMs,
        mockMode: useMockAreaData,
      }),
      rail: new FileStationDirectory(),
      geocoder: new PostcodesIoAPI({
        baseUrl: upstream.postcodesUrl,
        timeoutMs: upstream.timeoutMs,
        mockMode: useMockAreaData,
      }),
      journeys: new TflJourneyAPI({
        baseUrl: upstream.tflUrl,
        appKey: upstream.tflAppKey,
        timeoutMs: upstream.timeoutMs,
        mockMode: useMockAreaData,
      }),
    },
    new TemplateNarrativeAdapter(),
    cache,
    logger.child("orchestration"),
    {
      policy,
      cacheTTL: apiCfg.cacheTTL,
      timeoutMs: upstream.timeoutMs,
    }
  );

  const app = createApp({
    config: apiCfg,
    orchestration,
    rateLimiter,
    logger: logger.child("http"),
  });

  const server = app.listen(apiCfg.port, () => {
    logger.info(`API Gateway listening on port ${apiCfg.port}`);
    logger.info(
      `API Base URL: http://localhost:${apiCfg.port}/api/${apiCfg.apiVersion}`
    );
    if (!apiCfg.enableRateLimit) {
      logger.warn("Rate limiting disabled");
    }
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      const closeRedis = redis ? redis.close() : Promise.resolve();
      closeRedis
        .then(() => {
          logger.info("Server shut down successfully");
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error("Error during shutdown:", error);
          process.exit(1);
        });
    });

    // Force shutdown after timeout
    setTimeout(() => {
      logger.error("Forced shutdown after timeout");
      process.exit(1);
    }, 30000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

if (require.main === module) {
  startServer().catch((error) => {
    console.error("API Gateway HTTP Server crashed:", error);
    process.exit(1);
  });
}
