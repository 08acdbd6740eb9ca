// src/modules/mail-outbox/email-outbox.entity.ts

import { EmailOutboxStatus } from '@app-types/models/email-outbox.types';
import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

/**
 * 邮件 Outbox 实体
 * 对应数据库表：email_outbox
 * 记录只增不删（审计用）；创建后仅 status / retries / last_error / sent_at 会被中继修改
 */
@Entity('email_outbox')
@Index('idx_status_created', ['status', 'createdAt'])
@Index('idx_message', ['messageId'])
export class EmailOutboxEntity {
  /**
   * Outbox 记录 ID（UUID，创建时分配）
   */
  @PrimaryColumn({ type: 'char', length: 36, comment: 'Outbox 记录主键 UUID' })
  id!: string;

  /**
   * 来源消息 ID，仅用于审计 / 关联
   */
  @Column({ name: 'message_id', type: 'char', length: 36, comment: '来源消息 ID' })
  messageId!: string;

  /**
   * 收件人列表（有序、非空，创建后不变）
   */
  @Column({ type: 'json', comment: '收件人地址列表' })
  recipients!: string[];

  /**
   * 主题快照
   */
  @Column({ type: 'varchar', length: 255, comment: '邮件主题快照' })
  subject!: string;

  /**
   * 正文快照（与来源消息解耦，后续编辑消息不影响投递）
   */
  @Column({ type: 'text', comment: '邮件正文快照' })
  body!: string;

  @Column({
    type: 'enum',
    enum: EmailOutboxStatus,
    default: EmailOutboxStatus.PENDING,
    comment: '投递状态：pending / sent / failed',
  })
  status!: EmailOutboxStatus;

  /**
   * 已耗尽的投递轮次数（只增不减）
   */
  @Column({ type: 'int', unsigned: true, default: 0, comment: '重试耗尽轮次计数' })
  retries!: number;

  @Column({ name: 'last_error', type: 'text', nullable: true, comment: '最近一次失败原因' })
  lastError!: string | null;

  @Column({ name: 'created_at', type: 'datetime', precision: 3, comment: '创建时间' })
  createdAt!: Date;

  /**
   * 投递成功时间；当且仅当 status = sent 时非空
   */
  @Column({ name: 'sent_at', type: 'datetime', precision: 3, nullable: true, comment: '投递成功时间' })
  sentAt!: Date | null;
}
