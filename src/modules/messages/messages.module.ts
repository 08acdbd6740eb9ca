// src/modules/messages/messages.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '@modules/cache/cache.module';
import { MessageEntity } from './message.entity';
import { MessageService } from './message.service';

/**
 * 站内消息模块（最小实现：作为 Outbox 的同事务写入方，并提供带缓存的查询）
 */
@Module({
  imports: [TypeOrmModule.forFeature([MessageEntity]), CacheModule],
  providers: [MessageService],
  exports: [TypeOrmModule, MessageService],
})
export class MessagesModule {}
