// src/core/config/server.config.ts
import { ConfigFactory } from '@nestjs/config';

const serverConfig: ConfigFactory = () => ({
  server: {
    // 进程角色名，仅用于日志区分 relay / replay 等进程
    name: process.env.APP_NAME || 'outbox-mail-relay',
    env: process.env.NODE_ENV || 'development',
  },
});

export default serverConfig;
