// src/usecases/mail-outbox/mail-outbox-usecases.module.ts
import { Module } from '@nestjs/common';
import { BrokerModule } from '@modules/broker/broker.module';
import { MailOutboxModule } from '@modules/mail-outbox/mail-outbox.module';
import { MailTransportModule } from '@modules/mail-transport/mail-transport.module';
import { MessagesModule } from '@modules/messages/messages.module';
import { EnqueueEmailUsecase } from './enqueue-email.usecase';
import { ProcessOutboxNotificationUsecase } from './process-outbox-notification.usecase';
import { ReplayOutboxUsecase } from './replay-outbox.usecase';
import { SendMessageEmailUsecase } from './send-message-email.usecase';

@Module({
  imports: [MailOutboxModule, MessagesModule, BrokerModule, MailTransportModule],
  providers: [
    EnqueueEmailUsecase,
    SendMessageEmailUsecase,
    ProcessOutboxNotificationUsecase,
    ReplayOutboxUsecase,
  ],
  exports: [
    EnqueueEmailUsecase,
    SendMessageEmailUsecase,
    ProcessOutboxNotificationUsecase,
    ReplayOutboxUsecase,
  ],
})
export class MailOutboxUsecasesModule {}
