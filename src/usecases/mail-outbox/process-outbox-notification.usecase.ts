// src/usecases/mail-outbox/process-outbox-notification.usecase.ts

import { describeError, isTransportError } from '@core/common/errors/domain-error';
import { RetryPolicy, retryWithBackoff, type Sleeper } from '@core/common/retry/retry.policy';
import { decodeNotification } from '@core/mail-outbox/notification.codec';
import { isDelivered } from '@core/mail-outbox/outbox-state';
import type { IMailTransportPort } from '@core/mail-outbox/outbox.ports';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmailOutboxEntity } from '@modules/mail-outbox/email-outbox.entity';
import { EmailOutboxService } from '@modules/mail-outbox/email-outbox.service';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { PinoLogger } from 'nestjs-pino';

/**
 * 单条通知的处理结果（均意味着消息可以 ack）
 */
export type ProcessNotificationOutcome =
  | 'sent'
  | 'failed'
  | 'skipped_malformed'
  | 'skipped_missing'
  | 'skipped_already_sent';

export interface ProcessNotificationResult {
  readonly outcome: ProcessNotificationOutcome;
  readonly outboxId: string | null;
  /** 本次消费内实际发起的发送次数 */
  readonly attempts: number;
}

/**
 * 处理一条 Outbox 通知
 *
 * 流程：
 * 1. 解码失败 → 跳过（ack）
 * 2. 记录不存在 → 跳过（ack）
 * 3. 已 sent → 跳过，不重复发送
 * 4. 有界重试发送；成功 → sent，耗尽 → failed（retries +1）
 *
 * 存储层等非发送类错误直接抛出，由中继 nack 并交还 broker 重投
 *
 * 同一进程内同一 outboxId 的通知串行处理（prefetch > 1 时可能并发收到重复通知）
 */
@Injectable()
export class ProcessOutboxNotificationUsecase {
  private readonly policy: RetryPolicy;
  /** outboxId → 该记录当前处理链的尾部 */
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(
    private readonly outboxService: EmailOutboxService,
    @Inject(MAIL_OUTBOX_TOKENS.MAIL_TRANSPORT)
    private readonly transport: IMailTransportPort,
    @Inject(MAIL_OUTBOX_TOKENS.SLEEPER)
    private readonly sleeper: Sleeper,
    config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(ProcessOutboxNotificationUsecase.name);
    this.policy = new RetryPolicy(
      config.get<number>('relay.maxAttempts', 3),
      config.get<number>('relay.baseDelayMs', 1000),
      config.get<number>('relay.maxDelayMs', 30000),
    );
  }

  /**
   * 执行处理
   * @param payload 队列消息体
   */
  async execute(payload: Buffer | string): Promise<ProcessNotificationResult> {
    const decoded = decodeNotification(payload);
    if (!decoded.ok) {
      this.logger.warn({ reason: decoded.reason }, '丢弃无法解析的通知');
      return { outcome: 'skipped_malformed', outboxId: null, attempts: 0 };
    }

    const { outboxId } = decoded.notification;
    return await this.exclusive(outboxId, () => this.processEntry(outboxId));
  }

  /**
   * 按 key 串行执行：前一个任务结束（无论成败）后才开始下一个
   */
  private async exclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.inFlight.get(key) ?? Promise.resolve();
    const current = previous.then(work);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.inFlight.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.inFlight.get(key) === tail) this.inFlight.delete(key);
    }
  }

  private async processEntry(outboxId: string): Promise<ProcessNotificationResult> {
    const entry = await this.outboxService.findById(outboxId);
    if (!entry) {
      this.logger.warn({ outboxId }, '通知引用的 Outbox 记录不存在，已丢弃');
      return { outcome: 'skipped_missing', outboxId, attempts: 0 };
    }
    if (isDelivered(entry)) {
      this.logger.info({ outboxId }, 'Outbox 记录已投递，跳过重复通知');
      return { outcome: 'skipped_already_sent', outboxId, attempts: 0 };
    }

    return await this.deliver(entry);
  }

  private async deliver(entry: EmailOutboxEntity): Promise<ProcessNotificationResult> {
    let attempts = 0;
    try {
      await retryWithBackoff(
        async (attempt) => {
          attempts = attempt;
          await this.transport.send({
            recipients: entry.recipients,
            subject: entry.subject,
            body: entry.body,
          });
        },
        {
          policy: this.policy,
          sleeper: this.sleeper,
          shouldRetry: (error) => isTransportError(error),
          onRetry: ({ error, attempt, delayMs }) => {
            this.logger.warn(
              { outboxId: entry.id, attempt, delayMs, error: describeError(error) },
              '邮件发送失败，稍后重试',
            );
          },
        },
      );
    } catch (error) {
      // 非发送类错误不在此消化
      if (!isTransportError(error)) throw error;

      const lastError = describeError(error);
      await this.outboxService.markFailed(entry.id, lastError);
      this.logger.error(
        { outboxId: entry.id, attempts, kind: error.kind, error: lastError },
        '邮件发送重试耗尽，已标记为 failed',
      );
      return { outcome: 'failed', outboxId: entry.id, attempts };
    }

    const updated = await this.outboxService.markSent(entry.id, new Date());
    if (!updated) {
      // 并发消费者已先一步写入 sent
      this.logger.info({ outboxId: entry.id }, 'Outbox 记录已被标记为 sent');
    } else {
      this.logger.info({ outboxId: entry.id, attempts }, '邮件发送成功');
    }
    return { outcome: 'sent', outboxId: entry.id, attempts };
  }
}
