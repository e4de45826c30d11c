/**
 * Generic in-memory cache with TTL support
 *
 * Methods align with service CachePort contracts:
 * - get<T>(key)
 * - set(key, val, ttlSec)
 * Plus helpful test/dev utilities:
 * - clear(), size(), has(key)
 */

export interface CachePort {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, val: T, ttlSec: number): Promise<void>;
}

type CacheEntry = {
  value: unknown;
  expiresAt: number; // epoch ms
};

export class MemoryCache implements CachePort {
  private store = new Map<string, CacheEntry>();

  constructor(private now: () => number = Date.now) {}

  async get<T>(key: string): Promise<T | null> {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (this.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    // Values only enter through set<T> under the same key
    return entry.value as T;
  }

  async set<T>(key: string, val: T, ttlSec: number): Promise<void> {
    const expiresAt = this.now() + ttlSec * 1000;
    this.store.set(key, { value: val, expiresAt });
  }

  // Utilities for tests/dev
  clear(): void {
    this.store.clear();
  }

  size(): number {
    // Sweep expired entries before reporting size
    const now = this.now();
    for (const [key, entry] of this.store.entries()) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
      }
    }
    return this.store.size;
  }

  has(key: string): boolean {
    const entry = this.store.get(key);
    if (!entry) return false;
    if (this.now() > entry.expiresAt) {
      this.store.delete(key);
      return false;
    }
    return true;
  }
}

/**
 * Read-through helper: return the cached value or compute, store and return it
 */
export async function cached<T>(
  cache: CachePort,
  key: string,
  ttlSec: number,
  load: () => Promise<T>
): Promise<T> {
  const hit = await cache.get<T>(key);
  if (hit !== null) return hit;

  const value = await load();
  await cache.set(key, value, ttlSec);
  return value;
}
