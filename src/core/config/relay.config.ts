// src/core/config/relay.config.ts
import { registerAs } from '@nestjs/config';

export default registerAs('relay', () => ({
  enabled: process.env.MAIL_RELAY_ENABLED !== 'false',

  // 单次消费内的最大发送尝试次数
  maxAttempts: parseInt(process.env.MAIL_RELAY_MAX_ATTEMPTS || '3', 10),
  baseDelayMs: parseInt(process.env.MAIL_RELAY_BASE_DELAY_MS || '1000', 10),
  maxDelayMs: parseInt(process.env.MAIL_RELAY_MAX_DELAY_MS || '30000', 10),

  prefetch: parseInt(process.env.MAIL_RELAY_PREFETCH || '1', 10),

  // 优雅停机：等待在途消息处理完成的上限
  shutdownTimeoutMs: parseInt(process.env.MAIL_RELAY_SHUTDOWN_TIMEOUT_MS || '10000', 10),

  // 基础设施故障时 nack 前的等待，避免 broker 立即重投形成热循环
  requeueDelayMs: parseInt(process.env.MAIL_RELAY_REQUEUE_DELAY_MS || '1000', 10),

  // backfill：pending 超过该时长仍未投递视为需要补发
  backfillStaleAfterMs: parseInt(process.env.MAIL_RELAY_BACKFILL_STALE_AFTER_MS || '300000', 10),
  batchLimit: parseInt(process.env.MAIL_RELAY_BATCH_LIMIT || '100', 10),
}));
