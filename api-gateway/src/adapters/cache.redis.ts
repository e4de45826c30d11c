/**
 * Redis Cache Adapter for API Gateway
 *
 * Area data caching and fixed-window rate limiting shared across
 * gateway instances.
 */

import { Logger } from "@dealcheck/shared-utils";
import Redis from "ioredis";
import { CachePort, RateLimitPort, RateLimitResult } from "../core/ports";

export class RedisCacheAdapter implements CachePort, RateLimitPort {
  constructor(private redis: Redis, private logger: Logger) {}

  static fromUrl(url: string, logger: Logger): RedisCacheAdapter {
    return new RedisCacheAdapter(
      new Redis(url, { maxRetriesPerRequest: 3 }),
      logger
    );
  }

  // ===== Cache Methods =====

  async get<T>(key: string): Promise<T | null> {
    try {
      const value = await this.redis.get(key);
      return value ? JSON.parse(value) : null;
    } catch (error) {
      this.logger.error(`Cache GET error for key ${key}:`, error);
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    try {
      await this.redis.setex(key, ttlSeconds, JSON.stringify(value));
    } catch (error) {
      this.logger.error(`Cache SET error for key ${key}:`, error);
    }
  }

  // ===== Rate Limiting Methods =====

  async isAllowed(
    identifier: string,
    limit: number,
    windowMs: number
  ): Promise<RateLimitResult> {
    const now = Date.now();
    const windowStart = Math.floor(now / windowMs) * windowMs;
    const resetTime = windowStart + windowMs;

    try {
      const key = `rate_limit:${identifier}:${windowStart}`;
      const results = await this.redis
        .multi()
        .incr(key)
        .pexpire(key, windowMs)
        .exec();

      const count = results?.[0]?.[1];
      if (typeof count !== "number") {
        throw new Error("Redis rate limit transaction failed");
      }

      return {
        allowed: count <= limit,
        remaining: Math.max(0, limit - count),
        resetTime,
      };
    } catch (error) {
      this.logger.error(`Rate limit check error for ${identifier}:`, error);
      // Fail open - allow the request if Redis is down
      return { allowed: true, remaining: limit - 1, resetTime };
    }
  }

  // ===== Health Check =====

  async isHealthy(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch (error) {
      this.logger.error("Redis health check failed:", error);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
