// src/modules/mail-transport/mail-transport.module.ts
import { Module } from '@nestjs/common';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { SmtpMailTransport, createNodemailerTransporter } from './smtp-mail.transport';

/**
 * 邮件发送通道模块
 */
@Module({
  providers: [
    { provide: MAIL_OUTBOX_TOKENS.MAIL_TRANSPORTER_FACTORY, useValue: createNodemailerTransporter },
    SmtpMailTransport,
    { provide: MAIL_OUTBOX_TOKENS.MAIL_TRANSPORT, useExisting: SmtpMailTransport },
  ],
  exports: [MAIL_OUTBOX_TOKENS.MAIL_TRANSPORT],
})
export class MailTransportModule {}
