/* eslint-disable max-lines-per-function */
// src/modules/broker/amqp-broker.channel.spec.ts
import { BROKER_ERROR } from '@core/common/errors/domain-error';
import type { BrokerDelivery } from '@core/mail-outbox/outbox.ports';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { PinoLoggerMock, createLoggerProvider, createPinoLoggerMock } from '@src/utils/test/logger-mock';
import { RecordingSleeper, flushAsync } from '@src/utils/test/mail-outbox.fakes';
import { AmqpBrokerChannel } from './amqp-broker.channel';
import type { AmqpIncoming, AmqpSession } from './amqp.session';

type Registered = {
  readonly queue: string;
  readonly prefetch: number;
  readonly onMessage: (message: AmqpIncoming) => void;
};

/**
 * 进程内的 AMQP 会话替身
 */
class FakeAmqpSession implements AmqpSession {
  readonly asserted: string[] = [];
  readonly published: Array<{ queue: string; body: string; persistent: boolean }> = [];
  readonly consumers = new Map<string, Registered>();
  publishError: Error | null = null;
  consumeError: Error | null = null;
  closed = false;
  private readonly closeListeners: Array<(error?: Error) => void> = [];
  private tagSeq = 0;

  async assertQueue(queue: string): Promise<void> {
    await Promise.resolve();
    this.asserted.push(queue);
  }

  async publish(queue: string, content: Buffer, persistent: boolean): Promise<void> {
    await Promise.resolve();
    if (this.publishError) throw this.publishError;
    this.published.push({ queue, body: content.toString(), persistent });
  }

  async consume(
    queue: string,
    prefetch: number,
    onMessage: (message: AmqpIncoming) => void,
  ): Promise<string> {
    await Promise.resolve();
    if (this.consumeError) throw this.consumeError;
    this.tagSeq += 1;
    const tag = `ctag-${this.tagSeq}`;
    this.consumers.set(tag, { queue, prefetch, onMessage });
    return tag;
  }

  async cancel(consumerTag: string): Promise<void> {
    await Promise.resolve();
    this.consumers.delete(consumerTag);
  }

  onClose(listener: (error?: Error) => void): void {
    this.closeListeners.push(listener);
  }

  async close(): Promise<void> {
    await Promise.resolve();
    this.closed = true;
  }

  /** 模拟连接被 broker 断开 */
  drop(error: Error): void {
    this.closed = true;
    for (const listener of this.closeListeners) listener(error);
  }

  /** 向全部消费者推送一条消息 */
  deliver(body: string, overrides: Partial<AmqpIncoming> = {}): void {
    for (const consumer of this.consumers.values()) {
      consumer.onMessage({
        content: Buffer.from(body),
        redelivered: false,
        ack: jest.fn(),
        nack: jest.fn(),
        ...overrides,
      });
    }
  }
}

describe('AmqpBrokerChannel', () => {
  const queue = 'email.send';
  let channel: AmqpBrokerChannel;
  let outcomes: Array<FakeAmqpSession | Error>;
  let factory: jest.Mock;
  let sleeper: RecordingSleeper;
  let logger: PinoLoggerMock;

  beforeEach(async () => {
    outcomes = [];
    factory = jest.fn(async (url: string) => {
      await Promise.resolve();
      expect(url).toBe('amqp://test-broker');
      const next = outcomes.shift();
      if (!next) throw new Error('ECONNREFUSED');
      if (next instanceof Error) throw next;
      return next;
    });
    sleeper = new RecordingSleeper();
    logger = createPinoLoggerMock();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AmqpBrokerChannel,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            broker: {
              url: 'amqp://test-broker',
              connectMaxAttempts: 3,
              reconnectBaseDelayMs: 100,
              reconnectMaxDelayMs: 1000,
            },
          }),
        },
        { provide: MAIL_OUTBOX_TOKENS.AMQP_SESSION_FACTORY, useValue: factory },
        { provide: MAIL_OUTBOX_TOKENS.SLEEPER, useValue: sleeper },
        createLoggerProvider(logger),
      ],
    }).compile();

    channel = module.get(AmqpBrokerChannel);
  });

  afterEach(async () => {
    await channel.close();
  });

  describe('ensureConnected - 启动期有界重试', () => {
    it('连续失败达到上限后抛出 CONNECT_FAILED', async () => {
      await expect(channel.ensureConnected()).rejects.toMatchObject({
        code: BROKER_ERROR.CONNECT_FAILED,
        details: { attempts: 3, error: 'ECONNREFUSED' },
      });
      expect(factory).toHaveBeenCalledTimes(3);
      expect(sleeper.delays).toEqual([100, 200]);
      expect(channel.isConnected).toBe(false);
    });

    it('重试期间恢复则连接成功', async () => {
      outcomes.push(new Error('ECONNREFUSED'), new FakeAmqpSession());

      await channel.ensureConnected();

      expect(factory).toHaveBeenCalledTimes(2);
      expect(sleeper.delays).toEqual([100]);
      expect(channel.isConnected).toBe(true);
    });

    it('并发调用共享同一次建连', async () => {
      outcomes.push(new FakeAmqpSession());

      await Promise.all([channel.ensureConnected(), channel.ensureConnected()]);

      expect(factory).toHaveBeenCalledTimes(1);
    });
  });

  describe('publish - 发布', () => {
    it('以持久化方式发布，同一会话内队列只声明一次', async () => {
      const session = new FakeAmqpSession();
      outcomes.push(session);

      await channel.publish(queue, Buffer.from('{"outbox_id":"a"}'), { persistent: true });
      await channel.publish(queue, Buffer.from('{"outbox_id":"b"}'), { persistent: true });

      expect(session.asserted).toEqual([queue]);
      expect(session.published).toEqual([
        { queue, body: '{"outbox_id":"a"}', persistent: true },
        { queue, body: '{"outbox_id":"b"}', persistent: true },
      ]);
    });

    it('未连接且建连失败时只尝试一次即抛出 CONNECT_FAILED', async () => {
      await expect(
        channel.publish(queue, Buffer.from('x'), { persistent: true }),
      ).rejects.toMatchObject({ code: BROKER_ERROR.CONNECT_FAILED });
      expect(factory).toHaveBeenCalledTimes(1);
      expect(sleeper.delays).toEqual([]);
    });

    it('发布失败时丢弃会话并抛出 PUBLISH_FAILED，下次发布重新建连', async () => {
      const broken = new FakeAmqpSession();
      broken.publishError = new Error('channel closed');
      const fresh = new FakeAmqpSession();
      outcomes.push(broken, fresh);

      await expect(
        channel.publish(queue, Buffer.from('first'), { persistent: true }),
      ).rejects.toMatchObject({
        code: BROKER_ERROR.PUBLISH_FAILED,
        details: { queue, error: 'channel closed' },
      });
      expect(broken.closed).toBe(true);
      expect(channel.isConnected).toBe(false);

      await channel.publish(queue, Buffer.from('second'), { persistent: true });

      expect(factory).toHaveBeenCalledTimes(2);
      expect(fresh.published).toEqual([{ queue, body: 'second', persistent: true }]);
    });
  });

  describe('consume - 消费与断线重连', () => {
    it('消息经投递句柄交给处理器', async () => {
      const session = new FakeAmqpSession();
      outcomes.push(session);
      const received: string[] = [];

      await channel.consume(queue, (d) => received.push(d.payload.toString()), { prefetch: 4 });
      session.deliver('hello');

      expect(received).toEqual(['hello']);
      expect([...session.consumers.values()].map((c) => c.prefetch)).toEqual([4]);
    });

    it('挂载失败时抛出 CONSUME_FAILED，且不参与之后的重连', async () => {
      const session = new FakeAmqpSession();
      session.consumeError = new Error('ACCESS_REFUSED');
      outcomes.push(session);

      await expect(
        channel.consume(queue, () => undefined, { prefetch: 1 }),
      ).rejects.toMatchObject({ code: BROKER_ERROR.CONSUME_FAILED });

      session.drop(new Error('heartbeat timeout'));
      await flushAsync();
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('连接丢失后后台重连并重新挂载消费者', async () => {
      const first = new FakeAmqpSession();
      const second = new FakeAmqpSession();
      outcomes.push(first, new Error('ECONNREFUSED'), new Error('ECONNREFUSED'), second);
      const received: string[] = [];
      await channel.consume(queue, (d) => received.push(d.payload.toString()), { prefetch: 1 });

      first.drop(new Error('heartbeat timeout'));
      await flushAsync();

      expect(factory).toHaveBeenCalledTimes(4);
      expect(sleeper.delays).toEqual([100, 200]);
      expect(channel.isConnected).toBe(true);
      expect(second.asserted).toEqual([queue]);
      expect(second.consumers.size).toBe(1);

      second.deliver('after-reconnect');
      expect(received).toEqual(['after-reconnect']);
    });

    it('发布失败丢弃共用会话后，消费者在新会话上重新挂载', async () => {
      const first = new FakeAmqpSession();
      const second = new FakeAmqpSession();
      outcomes.push(first, second);
      const received: string[] = [];
      await channel.consume(queue, (d) => received.push(d.payload.toString()), { prefetch: 1 });
      first.publishError = new Error('nack from broker');

      await expect(
        channel.publish(queue, Buffer.from('x'), { persistent: true }),
      ).rejects.toMatchObject({ code: BROKER_ERROR.PUBLISH_FAILED });
      await flushAsync();

      expect(first.closed).toBe(true);
      expect(factory).toHaveBeenCalledTimes(2);
      expect(second.consumers.size).toBe(1);
      second.deliver('after-publish-failure');
      expect(received).toEqual(['after-publish-failure']);

      await channel.publish(queue, Buffer.from('y'), { persistent: true });
      expect(second.published).toEqual([{ queue, body: 'y', persistent: true }]);
      expect(factory).toHaveBeenCalledTimes(2);
    });

    it('消费者已取消时连接丢失不会触发重连', async () => {
      const session = new FakeAmqpSession();
      outcomes.push(session);
      const handle = await channel.consume(queue, () => undefined, { prefetch: 1 });

      await handle.cancel();
      session.drop(new Error('connection reset'));
      await flushAsync();

      expect(session.consumers.size).toBe(0);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('ack 失败只记录日志，不向处理器抛出', async () => {
      const session = new FakeAmqpSession();
      outcomes.push(session);
      const handler = jest.fn((delivery: BrokerDelivery) => delivery.ack());
      await channel.consume(queue, handler, { prefetch: 1 });

      session.deliver('x', {
        ack: () => {
          throw new Error('Channel closed');
        },
      });

      expect(handler).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { queue, action: 'ack', error: 'Channel closed' },
        '消息确认失败',
      );
    });
  });

  describe('checkConnection - 连通性检查', () => {
    it('已有会话时直接返回 true，不再建连', async () => {
      outcomes.push(new FakeAmqpSession());
      await channel.ensureConnected();

      await expect(channel.checkConnection()).resolves.toBe(true);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('无会话时只尝试一次建连，失败返回 false', async () => {
      await expect(channel.checkConnection()).resolves.toBe(false);

      expect(factory).toHaveBeenCalledTimes(1);
      expect(sleeper.delays).toEqual([]);
      expect(channel.isConnected).toBe(false);
    });

    it('关闭后返回 false', async () => {
      await channel.close();

      await expect(channel.checkConnection()).resolves.toBe(false);
      expect(factory).not.toHaveBeenCalled();
    });
  });

  describe('close - 关闭', () => {
    it('关闭会话且幂等，之后的调用抛出 CLOSED', async () => {
      const session = new FakeAmqpSession();
      outcomes.push(session);
      await channel.ensureConnected();

      await channel.close();
      await channel.close();

      expect(session.closed).toBe(true);
      await expect(
        channel.publish(queue, Buffer.from('late'), { persistent: true }),
      ).rejects.toMatchObject({ code: BROKER_ERROR.CLOSED });
    });

    it('关闭后连接丢失事件不再触发重连', async () => {
      const session = new FakeAmqpSession();
      outcomes.push(session);
      await channel.consume(queue, () => undefined, { prefetch: 1 });

      await channel.close();
      session.drop(new Error('closed by peer'));
      await flushAsync();

      expect(factory).toHaveBeenCalledTimes(1);
    });
  });
});
