// src/modules/cache/redis-cache.client.ts
import { createClient } from 'redis';

/**
 * 缓存服务实际用到的最小客户端能力
 */
export interface CacheClient {
  connect(): Promise<void>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  ping(): Promise<void>;
  quit(): Promise<void>;
  onError(listener: (error: Error) => void): void;
}

export interface CacheClientOptions {
  readonly url: string;
  readonly connectTimeoutMs: number;
}

export type CacheClientFactory = (options: CacheClientOptions) => CacheClient;

/**
 * 基于 redis 的客户端
 * - 关闭自动重连与离线队列：断线时命令立即失败，由 CacheService 统一降级
 */
export const createRedisCacheClient: CacheClientFactory = (options) => {
  const client = createClient({
    url: options.url,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: options.connectTimeoutMs,
      reconnectStrategy: false,
    },
  });

  return {
    connect: async () => {
      await client.connect();
    },
    get: async (key) => {
      const raw = await client.get(key);
      return raw ?? null;
    },
    set: async (key, value, ttlSeconds) => {
      await client.set(key, value, { EX: ttlSeconds });
    },
    del: async (key) => {
      await client.del(key);
    },
    ping: async () => {
      await client.ping();
    },
    quit: async () => {
      if (client.isOpen) await client.quit();
    },
    onError: (listener) => {
      client.on('error', listener);
    },
  };
};
