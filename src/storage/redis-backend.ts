/**
 * @file src/storage/redis-backend.ts
 * @description `KeyValueBackend` over ioredis for multi-node deployments. Every
 * command failure is wrapped in `BackendUnavailableError` so callers never depend on
 * driver error shapes.
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import { logger } from '../logger.js';
import { BackendUnavailableError, toError } from '../types.js';
import type { KeyValueBackend } from '../types.js';

/** Escapes glob metacharacters so a prefix is matched literally by `KEYS`. */
function escapeGlob(prefix: string): string {
  return prefix.replace(/[*?[\]\\]/g, '\\$&');
}

export class RedisBackend implements KeyValueBackend {
  constructor(private readonly redis: Redis) {}

  /**
   * Opens a client with reconnect handling and a bounded per-command retry count,
   * so commands issued while Redis is down reject instead of queueing forever.
   */
  static connect(redisUrl: string): RedisBackend {
    const options: RedisOptions = {
      retryStrategy: (times: number) => Math.min(times * 50, 2000),
      reconnectOnError: (err: Error) => err.message.includes('READONLY'),
      maxRetriesPerRequest: 2,
      lazyConnect: false,
    };

    const redis = new Redis(redisUrl, options);

    redis.on('error', (err: Error) => {
      logger.error('Redis Client Error:', err.message);
    });
    redis.on('connect', () => {
      logger.info('Redis Client Connected');
    });
    redis.on('reconnecting', () => {
      logger.warn('Redis Client Reconnecting...');
    });
    redis.on('close', () => {
      logger.info('Redis Client Connection Closed');
    });

    return new RedisBackend(redis);
  }

  get status(): string {
    return this.redis.status;
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
    await this.run('SETEX', () => this.redis.setex(key, ttlSeconds, value));
  }

  async get(key: string): Promise<string | null> {
    return this.run('GET', () => this.redis.get(key));
  }

  async del(key: string): Promise<number> {
    return this.run('DEL', () => this.redis.del(key));
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const updated = await this.run('EXPIRE', () => this.redis.expire(key, ttlSeconds));
    return updated === 1;
  }

  async sadd(key: string, member: string): Promise<number> {
    return this.run('SADD', () => this.redis.sadd(key, member));
  }

  async srem(key: string, member: string): Promise<number> {
    return this.run('SREM', () => this.redis.srem(key, member));
  }

  async smembers(key: string): Promise<string[]> {
    return this.run('SMEMBERS', () => this.redis.smembers(key));
  }

  async keys(prefix: string): Promise<string[]> {
    // TODO: switch to SCAN with a cursor once session volume makes KEYS blocking noticeable
    return this.run('KEYS', () => this.redis.keys(`${escapeGlob(prefix)}*`));
  }

  async ping(): Promise<void> {
    await this.run('PING', () => this.redis.ping());
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      throw new BackendUnavailableError(operation, toError(error));
    }
  }
}
