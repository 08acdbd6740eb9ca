// src/types/models/message.types.ts

/**
 * 站内消息的只读视图（可序列化，用于缓存）
 */
export interface MessageView {
  readonly id: string;
  readonly senderId: string;
  readonly subject: string;
  readonly body: string;
  readonly createdAt: string;
}

export interface CreateMessageParams {
  readonly senderId: string;
  readonly subject: string;
  readonly body: string;
}
