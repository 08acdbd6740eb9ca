// src/core/config/mail.config.ts
import { registerAs } from '@nestjs/config';

export default registerAs('mail', () => {
  const port = parseInt(process.env.MAIL_SMTP_PORT || '587', 10);
  return {
    host: process.env.MAIL_SMTP_HOST || 'localhost',
    port,
    // 465 默认走隐式 TLS，其余端口走 STARTTLS
    secure: process.env.MAIL_SMTP_SECURE ? process.env.MAIL_SMTP_SECURE === 'true' : port === 465,
    user: process.env.MAIL_SMTP_USER || '',
    pass: process.env.MAIL_SMTP_PASSWORD || '',
    from: process.env.MAIL_FROM || 'noreply@example.local',
    // 连接 / 问候 / 读写超时（毫秒）
    connectionTimeoutMs: parseInt(process.env.MAIL_SMTP_CONNECTION_TIMEOUT_MS || '10000', 10),
    socketTimeoutMs: parseInt(process.env.MAIL_SMTP_SOCKET_TIMEOUT_MS || '30000', 10),
  };
});
