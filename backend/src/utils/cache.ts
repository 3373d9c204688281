import type { RedisClient } from '../config/redis.js';

/**
 * Cache TTLs in seconds
 */
export const CACHE_TTL = {
  PARK_TAGS: 600,         // 10 minutes
} as const;

export const getCacheKey = {
  parkTags: (parkId: string): string => {
    return `tags:${parkId}`;
  },
};

export interface Cache {
  get<T>(key: string): Promise<T | null>;
  set(key: string, data: unknown, ttl?: number): Promise<void>;
  del(key: string): Promise<void>;
}

/**
 * Redis-backed cache. Failures are logged and treated as misses so the store
 * stays the source of truth.
 */
export class RedisCache implements Cache {
  constructor(private readonly client: RedisClient) {}

  async get<T>(key: string): Promise<T | null> {
    try {
      const cached = await this.client.get(key);
      if (!cached) return null;
      return JSON.parse(cached) as T;
    } catch (error) {
      console.warn('Cache get error:', error);
      return null;
    }
  }

  async set(key: string, data: unknown, ttl: number = CACHE_TTL.PARK_TAGS): Promise<void> {
    try {
      await this.client.setEx(key, ttl, JSON.stringify(data));
    } catch (error) {
      console.warn('Cache set error:', error);
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.client.del(key);
    } catch (error) {
      console.warn('Cache invalidation error:', error);
    }
  }
}

/** Used when no Redis URL is configured. */
export class NoopCache implements Cache {
  async get<T>(_key: string): Promise<T | null> {
    return null;
  }

  async set(_key: string, _data: unknown, _ttl?: number): Promise<void> {}

  async del(_key: string): Promise<void> {}
}
