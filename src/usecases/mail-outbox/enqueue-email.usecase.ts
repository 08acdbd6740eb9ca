// src/usecases/mail-outbox/enqueue-email.usecase.ts

import { CreateEmailOutboxParams } from '@app-types/models/email-outbox.types';
import { DomainError, OUTBOX_ERROR, describeError } from '@core/common/errors/domain-error';
import { encodeNotification } from '@core/mail-outbox/notification.codec';
import type { IBrokerChannelPort } from '@core/mail-outbox/outbox.ports';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmailOutboxEntity } from '@modules/mail-outbox/email-outbox.entity';
import { EmailOutboxService } from '@modules/mail-outbox/email-outbox.service';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { validateSync } from 'class-validator';
import { PinoLogger } from 'nestjs-pino';
import { EntityManager } from 'typeorm';
import { EnqueueEmailInput } from './dto/enqueue-email.input';

/**
 * 邮件入箱用例
 *
 * 两段式：
 * - record：在调用方事务内写入 pending 记录（不发布）
 * - dispatch：事务提交后发布 {"outbox_id"} 通知，只发布一次，不重试
 *
 * 调用方自带事务时先 record、提交后再 dispatch；否则直接调用 execute
 */
@Injectable()
export class EnqueueEmailUsecase {
  private readonly queue: string;

  constructor(
    private readonly outboxService: EmailOutboxService,
    @Inject(MAIL_OUTBOX_TOKENS.BROKER_CHANNEL)
    private readonly broker: IBrokerChannelPort,
    config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(EnqueueEmailUsecase.name);
    this.queue = config.get<string>('broker.emailQueue', 'email.send');
  }

  /**
   * 入箱并发布通知
   * 发布失败时记录保留为 pending，抛出 OUTBOX_ERROR.DISPATCH_UNAVAILABLE
   * @param params 来源消息 ID、收件人与内容快照
   * @returns 已提交的 Outbox 记录
   */
  async execute(params: CreateEmailOutboxParams): Promise<EmailOutboxEntity> {
    const entry = await this.record(params);
    await this.dispatch(entry);
    return entry;
  }

  /**
   * 校验并写入 pending 记录
   * @param params 入箱参数
   * @param manager 调用方事务（可选）
   */
  async record(params: CreateEmailOutboxParams, manager?: EntityManager): Promise<EmailOutboxEntity> {
    const input = this.validate(params);
    const entry = await this.outboxService.create(
      {
        messageId: input.messageId,
        recipients: input.recipients,
        subject: input.subject,
        body: input.body,
      },
      manager,
    );
    this.logger.debug(
      { outboxId: entry.id, messageId: entry.messageId, recipients: entry.recipients.length },
      '邮件已入箱',
    );
    return entry;
  }

  /**
   * 发布 Outbox 通知（必须在记录所在事务提交之后调用）
   * @param entry 已提交的 Outbox 记录
   */
  async dispatch(entry: Pick<EmailOutboxEntity, 'id'>): Promise<void> {
    try {
      await this.broker.publish(this.queue, encodeNotification(entry.id), { persistent: true });
    } catch (error) {
      this.logger.warn(
        { outboxId: entry.id, queue: this.queue, error: describeError(error) },
        '通知发布失败，记录保留为 pending',
      );
      throw new DomainError(
        OUTBOX_ERROR.DISPATCH_UNAVAILABLE,
        '邮件已记录，但通知暂时无法发布',
        { outboxId: entry.id, error: describeError(error) },
        error,
      );
    }
  }

  private validate(params: CreateEmailOutboxParams): EnqueueEmailInput {
    const input = Object.assign(new EnqueueEmailInput(), {
      messageId: params.messageId,
      recipients: params.recipients.map((address) => address.trim()),
      subject: params.subject,
      body: params.body,
    });
    const errors = validateSync(input);
    if (errors.length === 0) return input;

    const recipientError = errors.find((e) => e.property === 'recipients');
    if (recipientError) {
      throw new DomainError(
        OUTBOX_ERROR.INVALID_RECIPIENTS,
        Object.values(recipientError.constraints ?? {})[0] ?? '收件人不合法',
        { recipients: params.recipients },
      );
    }
    throw new DomainError(OUTBOX_ERROR.INVALID_PARAMS, '入箱参数不合法', {
      fields: errors.map((e) => e.property),
    });
  }
}
