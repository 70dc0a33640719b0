import { Redis } from 'ioredis';
import type { Logger } from '@/logging/index.js';

/**
 * Minimal cache surface the service depends on
 */
export interface CacheClient {
  ping(): Promise<string>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  close(): Promise<void>;
}

export interface RedisClientOptions {
  url: string;
  connectTimeoutMs: number;
  logger?: Logger;
}

/**
 * Redis client backed by ioredis
 *
 * The offline queue is disabled: while disconnected, commands fail at once
 * instead of waiting for a reconnect.
 */
export class RedisCacheClient implements CacheClient {
  constructor(private readonly redis: Redis) {}

  static create(options: RedisClientOptions): RedisCacheClient {
    const redis = new Redis(options.url, {
      connectTimeout: options.connectTimeoutMs,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      retryStrategy: (times: number) => Math.min(times * 200, 2000)
    });

    redis.on('error', (error: Error) => {
      options.logger?.error('Cache connection error', { error });
    });
    redis.on('ready', () => {
      options.logger?.info('Cache connection ready');
    });

    return new RedisCacheClient(redis);
  }

  async ping(): Promise<string> {
    return this.redis.ping();
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.redis.set(key, value, 'PX', ttlMs);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async del(key: string): Promise<number> {
    return this.redis.del(key);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
