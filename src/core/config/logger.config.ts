// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';

const loggerConfig: ConfigFactory = () => {
  const isDev = process.env.NODE_ENV !== 'production';
  const logPath = isDev ? './logs' : '/var/log/mail-outbox';

  return {
    logger: {
      level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
      // 邮件正文与 SMTP 凭据不落日志
      redactFields: ['body', 'mail.body', 'auth.pass'],
      // 动态生成 transport 配置
      transport: isDev
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:dd HH:MM:ss',
              messageFormat: '{time} - [{context}] - {msg}',
              ignore: 'hostname,pid,context',
            },
          }
        : {
            targets: [
              {
                target: 'pino/file',
                options: {
                  destination: `${logPath}/app.log`,
                  mkdir: true,
                },
                level: 'info',
              },
              {
                target: 'pino/file',
                options: {
                  destination: `${logPath}/error.log`,
                  mkdir: true,
                },
                level: 'error',
              },
            ],
          },
    },
  };
};

export default loggerConfig;
