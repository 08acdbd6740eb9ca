// src/modules/broker/amqp.session.ts
import { connect } from 'amqplib';
import type { ConsumeMessage } from 'amqplib';

/**
 * 收到的一条 AMQP 消息（ack / nack 绑定到所属 channel）
 */
export interface AmqpIncoming {
  readonly content: Buffer;
  readonly redelivered: boolean;
  ack(): void;
  nack(requeue: boolean): void;
}

/**
 * 一次 AMQP 会话：一条连接 + 一个 confirm channel
 * 会话断开后即作废，由上层丢弃并重建
 */
export interface AmqpSession {
  assertQueue(queue: string): Promise<void>;
  /** 等待 broker 确认后才 resolve */
  publish(queue: string, content: Buffer, persistent: boolean): Promise<void>;
  consume(
    queue: string,
    prefetch: number,
    onMessage: (message: AmqpIncoming) => void,
  ): Promise<string>;
  cancel(consumerTag: string): Promise<void>;
  /** 连接或 channel 任一关闭 / 出错时触发（只触发一次） */
  onClose(listener: (error?: Error) => void): void;
  close(): Promise<void>;
}

export type AmqpSessionFactory = (url: string) => Promise<AmqpSession>;

/**
 * 基于 amqplib 的会话工厂
 */
export const openAmqpSession: AmqpSessionFactory = async (url) => {
  const connection = await connect(url);
  let channel: Awaited<ReturnType<typeof connection.createConfirmChannel>>;
  try {
    channel = await connection.createConfirmChannel();
  } catch (error) {
    // 以建 channel 的原始错误为准，连接关闭结果不再关心
    await Promise.allSettled([connection.close()]);
    throw error;
  }

  const closeListeners: Array<(error?: Error) => void> = [];
  let closed = false;
  const notifyClosed = (error?: Error) => {
    if (closed) return;
    closed = true;
    for (const listener of closeListeners) listener(error);
  };
  connection.on('error', (error: Error) => notifyClosed(error));
  connection.on('close', (error?: Error) => notifyClosed(error));
  channel.on('error', (error: Error) => notifyClosed(error));
  channel.on('close', () => notifyClosed());

  const wrap = (message: ConsumeMessage): AmqpIncoming => ({
    content: message.content,
    redelivered: message.fields.redelivered,
    ack: () => channel.ack(message),
    nack: (requeue) => channel.nack(message, false, requeue),
  });

  return {
    assertQueue: async (queue) => {
      await channel.assertQueue(queue, { durable: true });
    },
    publish: (queue, content, persistent) =>
      new Promise<void>((resolve, reject) => {
        channel.sendToQueue(
          queue,
          content,
          { persistent, contentType: 'application/json' },
          (error: unknown) => {
            if (error) {
              reject(error instanceof Error ? error : new Error(String(error)));
            } else {
              resolve();
            }
          },
        );
      }),
    consume: async (queue, prefetch, onMessage) => {
      await channel.prefetch(prefetch);
      const reply = await channel.consume(
        queue,
        (message) => {
          // null 表示消费者被 broker 取消
          if (message) onMessage(wrap(message));
        },
        { noAck: false },
      );
      return reply.consumerTag;
    },
    cancel: async (consumerTag) => {
      await channel.cancel(consumerTag);
    },
    onClose: (listener) => {
      closeListeners.push(listener);
    },
    close: async () => {
      closed = true;
      try {
        await channel.close();
      } finally {
        await connection.close();
      }
    },
  };
};
