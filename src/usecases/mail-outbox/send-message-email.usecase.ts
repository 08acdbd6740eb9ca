// src/usecases/mail-outbox/send-message-email.usecase.ts

import { DomainError, OUTBOX_ERROR } from '@core/common/errors/domain-error';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { EmailOutboxEntity } from '@modules/mail-outbox/email-outbox.entity';
import { MessageEntity } from '@modules/messages/message.entity';
import { MessageService } from '@modules/messages/message.service';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { EnqueueEmailUsecase } from './enqueue-email.usecase';

/**
 * 发送消息邮件的输入参数
 */
export interface SendMessageEmailParams {
  /** 发送者 ID */
  senderId: string;
  subject: string;
  body: string;
  /** 收件人地址列表（非空） */
  recipients: ReadonlyArray<string>;
}

/**
 * 发送消息邮件的结果
 */
export interface SendMessageEmailResult {
  message: MessageEntity;
  outbox: EmailOutboxEntity;
  /** 通知是否已发布；false 表示记录已落库，等待 backfill 补发 */
  dispatched: boolean;
}

/**
 * 发送消息邮件用例
 *
 * 规则：
 * - 消息与 Outbox 记录在同一事务内写入，二者同时存在或同时不存在
 * - 事务提交后写入消息缓存，再发布通知
 * - 通知发布失败不回滚：返回 dispatched=false，由 backfill 补发
 */
@Injectable()
export class SendMessageEmailUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly messageService: MessageService,
    private readonly enqueueEmailUsecase: EnqueueEmailUsecase,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(SendMessageEmailUsecase.name);
  }

  /**
   * 执行发送
   * @param params 消息内容与收件人
   */
  async execute(params: SendMessageEmailParams): Promise<SendMessageEmailResult> {
    // 事务内：写消息 + 写 Outbox
    const { message, outbox } = await this.dataSource.transaction(async (manager) => {
      const created = await this.messageService.create(
        { senderId: params.senderId, subject: params.subject, body: params.body },
        manager,
      );
      const entry = await this.enqueueEmailUsecase.record(
        {
          messageId: created.id,
          recipients: params.recipients,
          subject: created.subject,
          body: created.body,
        },
        manager,
      );
      return { message: created, outbox: entry };
    });

    // 已提交：缓存写穿（失败只降级，不影响主流程）
    await this.messageService.cacheMessage(message);

    try {
      await this.enqueueEmailUsecase.dispatch(outbox);
    } catch (error) {
      if (error instanceof DomainError && error.code === OUTBOX_ERROR.DISPATCH_UNAVAILABLE) {
        this.logger.warn({ outboxId: outbox.id, messageId: message.id }, '消息已保存，邮件待补发');
        return { message, outbox, dispatched: false };
      }
      throw error;
    }
    return { message, outbox, dispatched: true };
  }
}
