// src/replay.module.ts

import { Module } from '@nestjs/common';
import { AppConfigModule } from './core/config/config.module';
import { DatabaseModule } from './core/database/database.module';
import { LoggerModule } from './core/logger/logger.module';
import { HealthUsecasesModule } from './usecases/health/health-usecases.module';
import { MailOutboxUsecasesModule } from './usecases/mail-outbox/mail-outbox-usecases.module';

/**
 * 运维命令根模块（不启动中继）
 */
@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    DatabaseModule,
    MailOutboxUsecasesModule,
    HealthUsecasesModule,
  ],
})
export class ReplayModule {}
