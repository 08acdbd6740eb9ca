// src/core/config/cache.config.ts
import { registerAs } from '@nestjs/config';

export default registerAs('cache', () => ({
  enabled: process.env.CACHE_ENABLED !== 'false',
  url: process.env.CACHE_REDIS_URL || 'redis://localhost:6379/0',
  connectTimeoutMs: parseInt(process.env.CACHE_CONNECT_TIMEOUT_MS || '2000', 10),
  // 连接失败后，在冷却期内直接视为未命中，不再反复建连
  reconnectCooldownMs: parseInt(process.env.CACHE_RECONNECT_COOLDOWN_MS || '5000', 10),
  messageTtlSeconds: parseInt(process.env.CACHE_MESSAGE_TTL_SECONDS || '300', 10),
}));
