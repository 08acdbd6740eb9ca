// src/modules/broker/memory-broker.channel.ts
import { BROKER_ERROR, DomainError } from '@core/common/errors/domain-error';
import type {
  BrokerDeliveryHandler,
  ConsumeOptions,
  ConsumerHandle,
  IBrokerChannelPort,
  PublishOptions,
} from '@core/mail-outbox/outbox.ports';
import { Injectable, OnApplicationShutdown } from '@nestjs/common';

type QueuedMessage = {
  readonly payload: Buffer;
  redelivered: boolean;
};

type MemoryConsumer = {
  readonly id: number;
  readonly handler: BrokerDeliveryHandler;
  readonly prefetch: number;
  readonly unacked: Set<QueuedMessage>;
  active: boolean;
};

type MemoryQueue = {
  readonly ready: QueuedMessage[];
  /** 仍在接收新消息的消费者 */
  readonly consumers: MemoryConsumer[];
  /** 持有未确认消息的全部消费者（含已取消的） */
  readonly holders: Set<MemoryConsumer>;
  cursor: number;
  scheduled: boolean;
};

export interface MemoryBrokerSnapshot {
  readonly queued: number;
  readonly unacked: number;
}

/**
 * 内存版 broker（单进程开发 / 测试用）
 * - 语义对齐 AMQP：prefetch 限流、nack 重投
 * - 取消消费者只停止新投递，在途消息仍可确认；关闭时未确认消息重新入队
 * - 投递经 setImmediate 异步进行，避免在 ack / nack 调用栈内重入
 */
@Injectable()
export class MemoryBrokerChannel implements IBrokerChannelPort, OnApplicationShutdown {
  private readonly queues = new Map<string, MemoryQueue>();
  private nextConsumerId = 1;
  private closed = false;

  async ensureConnected(): Promise<void> {
    await Promise.resolve();
    this.assertOpen();
  }

  /**
   * 发布消息（入队即视为已确认）
   */
  async publish(queue: string, payload: Buffer, _options: PublishOptions): Promise<void> {
    await Promise.resolve();
    this.assertOpen();
    const target = this.getQueue(queue);
    target.ready.push({ payload: Buffer.from(payload), redelivered: false });
    this.schedule(queue, target);
  }

  /**
   * 注册消费者（多个消费者之间轮询分发）
   */
  async consume(
    queue: string,
    handler: BrokerDeliveryHandler,
    options: ConsumeOptions,
  ): Promise<ConsumerHandle> {
    await Promise.resolve();
    this.assertOpen();
    const target = this.getQueue(queue);
    const consumer: MemoryConsumer = {
      id: this.nextConsumerId++,
      handler,
      prefetch: Math.max(1, options.prefetch),
      unacked: new Set(),
      active: true,
    };
    target.consumers.push(consumer);
    this.schedule(queue, target);
    return {
      queue,
      cancel: async () => {
        await Promise.resolve();
        this.detach(target, consumer);
      },
    };
  }

  async checkConnection(): Promise<boolean> {
    await Promise.resolve();
    return !this.closed;
  }

  /**
   * 关闭：全部消费者下线，未确认消息按原顺序回到队首
   */
  async close(): Promise<void> {
    await Promise.resolve();
    if (this.closed) return;
    this.closed = true;
    for (const queue of this.queues.values()) {
      const pending: QueuedMessage[] = [];
      for (const consumer of queue.consumers) consumer.active = false;
      for (const holder of queue.holders) {
        pending.push(...holder.unacked);
        holder.unacked.clear();
      }
      queue.consumers.length = 0;
      queue.holders.clear();
      for (const message of pending) message.redelivered = true;
      queue.ready.unshift(...pending);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.close();
  }

  /**
   * 队列指标快照
   * @param queue 指定队列；缺省时汇总全部队列
   */
  snapshot(queue?: string): MemoryBrokerSnapshot {
    const targets = queue
      ? [this.queues.get(queue)].filter((q): q is MemoryQueue => q !== undefined)
      : [...this.queues.values()];
    let queued = 0;
    let unacked = 0;
    for (const target of targets) {
      queued += target.ready.length;
      for (const holder of target.holders) unacked += holder.unacked.size;
    }
    return { queued, unacked };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new DomainError(BROKER_ERROR.CLOSED, '内存 broker 已关闭');
    }
  }

  private getQueue(name: string): MemoryQueue {
    let queue = this.queues.get(name);
    if (!queue) {
      queue = { ready: [], consumers: [], holders: new Set(), cursor: 0, scheduled: false };
      this.queues.set(name, queue);
    }
    return queue;
  }

  private detach(queue: MemoryQueue, consumer: MemoryConsumer): void {
    if (!consumer.active) return;
    consumer.active = false;
    const idx = queue.consumers.indexOf(consumer);
    if (idx >= 0) queue.consumers.splice(idx, 1);
    if (consumer.unacked.size === 0) queue.holders.delete(consumer);
  }

  private schedule(name: string, queue: MemoryQueue): void {
    if (queue.scheduled || this.closed) return;
    queue.scheduled = true;
    setImmediate(() => {
      queue.scheduled = false;
      this.drain(name, queue);
    });
  }

  private drain(name: string, queue: MemoryQueue): void {
    if (this.closed) return;
    while (queue.ready.length > 0) {
      const consumer = this.pickConsumer(queue);
      if (!consumer) return;
      const message = queue.ready.shift();
      if (!message) return;
      this.deliver(name, queue, consumer, message);
    }
  }

  private pickConsumer(queue: MemoryQueue): MemoryConsumer | null {
    const count = queue.consumers.length;
    for (let i = 0; i < count; i++) {
      const consumer = queue.consumers[(queue.cursor + i) % count];
      if (consumer.unacked.size < consumer.prefetch) {
        queue.cursor = (queue.cursor + i + 1) % count;
        return consumer;
      }
    }
    return null;
  }

  private deliver(
    name: string,
    queue: MemoryQueue,
    consumer: MemoryConsumer,
    message: QueuedMessage,
  ): void {
    consumer.unacked.add(message);
    queue.holders.add(consumer);
    let settled = false;
    const settle = (requeue: boolean) => {
      // 重复确认或 broker 已关闭（消息已回队）时忽略
      if (settled || !consumer.unacked.has(message)) return;
      settled = true;
      consumer.unacked.delete(message);
      if (!consumer.active && consumer.unacked.size === 0) queue.holders.delete(consumer);
      if (requeue) {
        message.redelivered = true;
        queue.ready.push(message);
      }
      this.schedule(name, queue);
    };
    consumer.handler({
      payload: message.payload,
      redelivered: message.redelivered,
      ack: () => settle(false),
      nack: ({ requeue }) => settle(requeue),
    });
  }
}
