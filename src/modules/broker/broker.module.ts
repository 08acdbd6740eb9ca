// src/modules/broker/broker.module.ts
import type { BrokerDriver } from '@core/config/broker.config';
import type { IBrokerChannelPort } from '@core/mail-outbox/outbox.ports';
import { timerSleeper } from '@core/common/retry/retry.policy';
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { AmqpBrokerChannel } from './amqp-broker.channel';
import { openAmqpSession } from './amqp.session';
import { MemoryBrokerChannel } from './memory-broker.channel';

/**
 * Broker 模块：按 broker.driver 选择通道实现
 * 两个实现均为惰性连接，未被选中的一方不会建立任何连接
 */
@Module({
  imports: [ConfigModule],
  providers: [
    { provide: MAIL_OUTBOX_TOKENS.AMQP_SESSION_FACTORY, useValue: openAmqpSession },
    { provide: MAIL_OUTBOX_TOKENS.SLEEPER, useValue: timerSleeper },
    AmqpBrokerChannel,
    MemoryBrokerChannel,
    {
      provide: MAIL_OUTBOX_TOKENS.BROKER_CHANNEL,
      useFactory: (
        config: ConfigService,
        amqp: AmqpBrokerChannel,
        memory: MemoryBrokerChannel,
      ): IBrokerChannelPort =>
        config.get<BrokerDriver>('broker.driver', 'amqp') === 'memory' ? memory : amqp,
      inject: [ConfigService, AmqpBrokerChannel, MemoryBrokerChannel],
    },
  ],
  exports: [MAIL_OUTBOX_TOKENS.BROKER_CHANNEL, MAIL_OUTBOX_TOKENS.SLEEPER],
})
export class BrokerModule {}
