// src/modules/mail-outbox/mail-outbox.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EmailOutboxEntity } from './email-outbox.entity';
import { EmailOutboxService } from './email-outbox.service';

/**
 * 邮件 Outbox 存储模块
 */
@Module({
  imports: [TypeOrmModule.forFeature([EmailOutboxEntity])],
  providers: [EmailOutboxService],
  exports: [EmailOutboxService],
})
export class MailOutboxModule {}
