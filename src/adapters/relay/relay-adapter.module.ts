// src/adapters/relay/relay-adapter.module.ts
import { Module } from '@nestjs/common';
import { BrokerModule } from '@modules/broker/broker.module';
import { MailOutboxUsecasesModule } from '@usecases/mail-outbox/mail-outbox-usecases.module';
import { OutboxRelayConsumer } from './outbox-relay.consumer';

@Module({
  imports: [BrokerModule, MailOutboxUsecasesModule],
  providers: [OutboxRelayConsumer],
  exports: [OutboxRelayConsumer],
})
export class RelayAdapterModule {}
