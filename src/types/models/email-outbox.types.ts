// src/types/models/email-outbox.types.ts

/**
 * 邮件 Outbox 投递状态
 * - PENDING：已记录，等待中继投递
 * - SENT：投递成功（终态）
 * - FAILED：本轮重试耗尽，等待重放或人工介入
 */
export enum EmailOutboxStatus {
  PENDING = 'pending',
  SENT = 'sent',
  FAILED = 'failed',
}

/**
 * 创建 Outbox 记录的参数
 */
export interface CreateEmailOutboxParams {
  readonly messageId: string;
  readonly recipients: ReadonlyArray<string>;
  readonly subject: string;
  readonly body: string;
}

/**
 * 按状态查询 Outbox 记录的参数
 */
export interface FindEmailOutboxByStatusParams {
  readonly status: EmailOutboxStatus;
  readonly ids?: ReadonlyArray<string>;
  readonly createdBefore?: Date;
  readonly limit: number;
}
