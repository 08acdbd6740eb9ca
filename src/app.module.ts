// src/app.module.ts

import { Module } from '@nestjs/common';
import { RelayAdapterModule } from './adapters/relay/relay-adapter.module';
import { AppConfigModule } from './core/config/config.module';
import { DatabaseModule } from './core/database/database.module';
import { LoggerModule } from './core/logger/logger.module';
import { MailOutboxUsecasesModule } from './usecases/mail-outbox/mail-outbox-usecases.module';

/**
 * 中继进程根模块
 */
@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    DatabaseModule,
    MailOutboxUsecasesModule,
    // 邮件中继（消费 email.send 队列）
    RelayAdapterModule,
  ],
})
export class AppModule {}
