// src/modules/messages/message.entity.ts

import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

/**
 * 站内消息实体（仅保留邮件投递所需的最小字段）
 * 对应数据库表：messages
 */
@Entity('messages')
@Index('idx_sender', ['senderId'])
export class MessageEntity {
  @PrimaryColumn({ type: 'char', length: 36, comment: '消息主键 UUID' })
  id!: string;

  @Column({ name: 'sender_id', type: 'char', length: 36, comment: '发送人账号 ID' })
  senderId!: string;

  @Column({ type: 'varchar', length: 255, comment: '消息主题' })
  subject!: string;

  @Column({ type: 'text', comment: '消息正文' })
  body!: string;

  @Column({ name: 'created_at', type: 'datetime', precision: 3, comment: '创建时间' })
  createdAt!: Date;
}
