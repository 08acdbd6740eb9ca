// src/core/logger/logger.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';

@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        return {
          pinoHttp: {
            level: configService.get<string>('logger.level', 'info'),
            transport: configService.get('logger.transport'),
            redact: configService.get<string[]>('logger.redactFields', []),
            // 中继与重放进程不处理 HTTP 请求，关闭请求自动日志
            autoLogging: false,
          },
        };
      },
    }),
  ],
})
export class LoggerModule {}
