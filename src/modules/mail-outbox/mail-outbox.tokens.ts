// src/modules/mail-outbox/mail-outbox.tokens.ts
export const MAIL_OUTBOX_TOKENS = {
  BROKER_CHANNEL: Symbol('MAIL_OUTBOX.BROKER_CHANNEL'),
  AMQP_SESSION_FACTORY: Symbol('MAIL_OUTBOX.AMQP_SESSION_FACTORY'),
  MAIL_TRANSPORT: Symbol('MAIL_OUTBOX.MAIL_TRANSPORT'),
  MAIL_TRANSPORTER_FACTORY: Symbol('MAIL_OUTBOX.MAIL_TRANSPORTER_FACTORY'),
  CACHE: Symbol('MAIL_OUTBOX.CACHE'),
  CACHE_CLIENT_FACTORY: Symbol('MAIL_OUTBOX.CACHE_CLIENT_FACTORY'),
  SLEEPER: Symbol('MAIL_OUTBOX.SLEEPER'),
} as const;
