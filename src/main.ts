import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';

/**
 * 中继进程启动函数
 * 无 HTTP 监听，仅创建应用上下文并开启停机钩子（SIGTERM / SIGINT 时优雅退出）
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });

  const logger = app.get(Logger);
  app.useLogger(logger);
  app.enableShutdownHooks();

  const configService = app.get<ConfigService>(ConfigService);
  const name = configService.get<string>('server.name', 'outbox-mail-relay');
  const nodeEnv = configService.get<string>('server.env', 'development');

  logger.log(`📮 ${name} 邮件中继以 ${nodeEnv} 模式启动成功`);
}

void bootstrap();
