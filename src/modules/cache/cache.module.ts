// src/modules/cache/cache.module.ts
import { Module } from '@nestjs/common';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { CacheService } from './cache.service';
import { createRedisCacheClient } from './redis-cache.client';

/**
 * 缓存模块：redis 客户端工厂 + 降级缓存服务
 */
@Module({
  providers: [
    { provide: MAIL_OUTBOX_TOKENS.CACHE_CLIENT_FACTORY, useValue: createRedisCacheClient },
    CacheService,
    { provide: MAIL_OUTBOX_TOKENS.CACHE, useExisting: CacheService },
  ],
  exports: [CacheService, MAIL_OUTBOX_TOKENS.CACHE],
})
export class CacheModule {}
