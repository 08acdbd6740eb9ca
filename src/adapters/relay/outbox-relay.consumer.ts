// src/adapters/relay/outbox-relay.consumer.ts
import { describeError } from '@core/common/errors/domain-error';
import type { Sleeper } from '@core/common/retry/retry.policy';
import type {
  BrokerDelivery,
  ConsumerHandle,
  IBrokerChannelPort,
} from '@core/mail-outbox/outbox.ports';
import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { ProcessOutboxNotificationUsecase } from '@usecases/mail-outbox/process-outbox-notification.usecase';
import { PinoLogger } from 'nestjs-pino';

/**
 * 邮件中继：消费 Outbox 通知并驱动投递
 *
 * - 处理完成（含跳过、重试耗尽）即 ack
 * - 处理抛错（存储不可用等）则等待 requeueDelayMs 后 nack 重投
 * - 停机：先取消消费者停止接收，再在超时内等待在途消息完成；
 *   未完成的消息不 ack，由 broker 在连接关闭后重投
 */
@Injectable()
export class OutboxRelayConsumer implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private consumer: ConsumerHandle | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly enabled: boolean;
  private readonly queue: string;
  private readonly prefetch: number;
  private readonly shutdownTimeoutMs: number;
  private readonly requeueDelayMs: number;

  constructor(
    config: ConfigService,
    @Inject(MAIL_OUTBOX_TOKENS.BROKER_CHANNEL)
    private readonly broker: IBrokerChannelPort,
    private readonly processNotification: ProcessOutboxNotificationUsecase,
    @Inject(MAIL_OUTBOX_TOKENS.SLEEPER)
    private readonly sleeper: Sleeper,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(OutboxRelayConsumer.name);
    this.enabled = config.get<boolean>('relay.enabled', true);
    this.queue = config.get<string>('broker.emailQueue', 'email.send');
    this.prefetch = Math.max(1, config.get<number>('relay.prefetch', 1));
    this.shutdownTimeoutMs = config.get<number>('relay.shutdownTimeoutMs', 10000);
    this.requeueDelayMs = config.get<number>('relay.requeueDelayMs', 1000);
  }

  /**
   * 应用启动：按配置开始消费
   */
  async onApplicationBootstrap(): Promise<void> {
    if (!this.enabled) {
      this.logger.info('邮件中继未启用');
      return;
    }
    await this.start();
  }

  /**
   * 应用停机前：停止接收并等待在途消息
   */
  async beforeApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  /**
   * 开始消费（幂等）
   */
  async start(): Promise<void> {
    if (this.consumer) return;
    await this.broker.ensureConnected();
    this.consumer = await this.broker.consume(this.queue, (delivery) => this.track(delivery), {
      prefetch: this.prefetch,
    });
    this.logger.info({ queue: this.queue, prefetch: this.prefetch }, '邮件中继已启动');
  }

  /**
   * 停止消费（幂等）
   * @returns 在途消息是否在超时前全部完成
   */
  async stop(): Promise<boolean> {
    const consumer = this.consumer;
    this.consumer = null;
    if (consumer) {
      try {
        await consumer.cancel();
      } catch (error) {
        this.logger.warn({ error: describeError(error) }, '取消消费者失败');
      }
    }
    const drained = await this.drain(this.shutdownTimeoutMs);
    if (!drained) {
      this.logger.warn(
        { inFlight: this.inFlight.size, timeoutMs: this.shutdownTimeoutMs },
        '停机等待超时，未完成的通知将由 broker 重投',
      );
    } else if (consumer) {
      this.logger.info('邮件中继已停止');
    }
    return drained;
  }

  /** 正在处理的通知数 */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private track(delivery: BrokerDelivery): void {
    const task = this.handle(delivery)
      .catch((error: unknown) => {
        this.logger.error({ error: describeError(error) }, '通知确认流程异常');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async handle(delivery: BrokerDelivery): Promise<void> {
    try {
      const result = await this.processNotification.execute(delivery.payload);
      delivery.ack();
      this.logger.debug(
        { outboxId: result.outboxId, outcome: result.outcome, attempts: result.attempts },
        '通知处理完成',
      );
    } catch (error) {
      this.logger.error(
        { redelivered: delivery.redelivered, error: describeError(error) },
        '通知处理失败，交还 broker 重投',
      );
      await this.sleeper.sleep(this.requeueDelayMs);
      delivery.nack({ requeue: true });
    }
  }

  private async drain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return true;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.allSettled([...this.inFlight]).then(() => true);
    try {
      return await Promise.race([settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
