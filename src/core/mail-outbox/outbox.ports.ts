// src/core/mail-outbox/outbox.ports.ts

/**
 * 队列投递句柄
 * - ack：确认并永久移出队列
 * - nack({ requeue: true })：不确认，交由 broker 重投
 */
export interface BrokerDelivery {
  readonly payload: Buffer;
  readonly redelivered: boolean;
  ack(): void;
  nack(options: { readonly requeue: boolean }): void;
}

export type BrokerDeliveryHandler = (delivery: BrokerDelivery) => void;

export interface PublishOptions {
  readonly persistent: boolean;
}

export interface ConsumeOptions {
  /** 单消费者最多持有的未确认消息数 */
  readonly prefetch: number;
}

export interface ConsumerHandle {
  readonly queue: string;
  /** 停止接收新消息；已投递未确认的消息由 broker 负责重投 */
  cancel(): Promise<void>;
}

/**
 * Broker 通道端口（连接由实现自行持有与重建）
 */
export interface IBrokerChannelPort {
  /** 确保连接可用；启动期有界重试，失败即抛错 */
  ensureConnected(): Promise<void>;
  publish(queue: string, payload: Buffer, options: PublishOptions): Promise<void>;
  consume(
    queue: string,
    handler: BrokerDeliveryHandler,
    options: ConsumeOptions,
  ): Promise<ConsumerHandle>;
  /** 连通性检查：无可用会话时只尝试建连一次，不抛错 */
  checkConnection(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * 待发送邮件（不可变快照）
 */
export interface OutgoingMail {
  readonly recipients: ReadonlyArray<string>;
  readonly subject: string;
  readonly body: string;
}

export interface MailSendReceipt {
  readonly messageId: string;
  readonly rejected: ReadonlyArray<string>;
}

/**
 * 邮件发送通道端口
 * 失败时抛出 TransportError（见 domain-error.ts）
 */
export interface IMailTransportPort {
  send(mail: OutgoingMail): Promise<MailSendReceipt>;
  close(): Promise<void>;
}

/**
 * 非权威缓存端口
 * 任何连接故障都视为未命中 / 空操作，不向调用方抛错
 */
export interface ICachePort {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** read-through：未命中时调用 loader，结果非空则回填 */
  getOrLoad<T>(key: string, ttlSeconds: number, loader: () => Promise<T | null>): Promise<T | null>;
}
