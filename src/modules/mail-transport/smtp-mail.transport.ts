// src/modules/mail-transport/smtp-mail.transport.ts
import {
  TransportError,
  describeError,
  isTransportError,
  type TransportErrorKind,
} from '@core/common/errors/domain-error';
import type {
  IMailTransportPort,
  MailSendReceipt,
  OutgoingMail,
} from '@core/mail-outbox/outbox.ports';
import { Inject, Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { PinoLogger } from 'nestjs-pino';
import { createTransport } from 'nodemailer';

export interface SmtpTransportOptions {
  readonly host: string;
  readonly port: number;
  readonly secure: boolean;
  readonly user: string;
  readonly pass: string;
  readonly connectionTimeoutMs: number;
  readonly socketTimeoutMs: number;
}

export interface TransporterMail {
  readonly from: string;
  readonly to: string[];
  readonly subject: string;
  readonly text: string;
}

/**
 * 发送器的最小接口（nodemailer Transporter 的子集）
 */
export interface MailTransporterLike {
  sendMail(mail: TransporterMail): Promise<MailSendReceipt>;
  close(): void;
}

export type MailTransporterFactory = (options: SmtpTransportOptions) => MailTransporterLike;

/**
 * 基于 nodemailer 的 SMTP 发送器
 */
export const createNodemailerTransporter: MailTransporterFactory = (options) => {
  const transporter = createTransport({
    host: options.host,
    port: options.port,
    secure: options.secure,
    auth: options.user ? { user: options.user, pass: options.pass } : undefined,
    connectionTimeout: options.connectionTimeoutMs,
    greetingTimeout: options.connectionTimeoutMs,
    socketTimeout: options.socketTimeoutMs,
  });
  return {
    sendMail: async (mail) => {
      const info = await transporter.sendMail(mail);
      return {
        messageId: info.messageId,
        rejected: info.rejected.map((entry) => (typeof entry === 'string' ? entry : entry.address)),
      };
    },
    close: () => transporter.close(),
  };
};

const CODE_TO_KIND = new Map<string, TransportErrorKind>([
  ['EAUTH', 'auth'],
  ['ENOAUTH', 'auth'],
  ['EOAUTH2', 'auth'],
  ['EENVELOPE', 'recipients_refused'],
  ['EMESSAGE', 'data'],
  ['EPROTOCOL', 'data'],
  ['ESTREAM', 'data'],
  ['ETIMEDOUT', 'timeout'],
  ['ECONNECTION', 'connect'],
  ['EDNS', 'connect'],
  ['ETLS', 'connect'],
  ['ECONNREFUSED', 'connect'],
  ['ESOCKET', 'disconnected'],
  ['ECONNRESET', 'disconnected'],
  ['EPIPE', 'disconnected'],
]);

const RESET_KINDS: ReadonlySet<TransportErrorKind> = new Set<TransportErrorKind>([
  'connect',
  'timeout',
  'disconnected',
]);

const readProperty = (error: unknown, key: 'code' | 'responseCode'): unknown => {
  if (typeof error !== 'object' || error === null || !(key in error)) return undefined;
  return Reflect.get(error, key);
};

/**
 * 将 SMTP 客户端错误归类为 TransportError
 * 优先看错误码，其次看 SMTP 响应码（550-553 为收件人被拒），其余视为数据阶段失败
 */
export function classifySmtpError(error: unknown): TransportError {
  if (isTransportError(error)) return error;
  const message = describeError(error);
  const code = readProperty(error, 'code');
  const kind = typeof code === 'string' ? CODE_TO_KIND.get(code) : undefined;
  if (kind) {
    return new TransportError(kind, message, error);
  }
  const responseCode = readProperty(error, 'responseCode');
  if (typeof responseCode === 'number' && responseCode >= 550 && responseCode <= 553) {
    return new TransportError('recipients_refused', message, error);
  }
  return new TransportError('data', message, error);
}

/**
 * SMTP 发送通道
 * - 每次 send 为一次完整的 SMTP 事务，失败统一抛出 TransportError
 * - 部分收件人被拒视为成功，仅记录日志
 */
@Injectable()
export class SmtpMailTransport implements IMailTransportPort, OnApplicationShutdown {
  private transporter: MailTransporterLike | null = null;
  private readonly options: SmtpTransportOptions;
  private readonly from: string;

  constructor(
    config: ConfigService,
    @Inject(MAIL_OUTBOX_TOKENS.MAIL_TRANSPORTER_FACTORY)
    private readonly transporterFactory: MailTransporterFactory,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(SmtpMailTransport.name);
    this.options = {
      host: config.get<string>('mail.host', 'localhost'),
      port: config.get<number>('mail.port', 587),
      secure: config.get<boolean>('mail.secure', false),
      user: config.get<string>('mail.user', ''),
      pass: config.get<string>('mail.pass', ''),
      connectionTimeoutMs: config.get<number>('mail.connectionTimeoutMs', 10000),
      socketTimeoutMs: config.get<number>('mail.socketTimeoutMs', 30000),
    };
    this.from = config.get<string>('mail.from', 'noreply@example.local');
  }

  /**
   * 发送一封邮件
   * @param mail 收件人与内容
   */
  async send(mail: OutgoingMail): Promise<MailSendReceipt> {
    if (mail.recipients.length === 0) {
      throw new TransportError('recipients_refused', '收件人列表为空');
    }
    let receipt: MailSendReceipt;
    try {
      receipt = await this.getTransporter().sendMail({
        from: this.from,
        to: [...mail.recipients],
        subject: mail.subject,
        text: mail.body,
      });
    } catch (error) {
      const transportError = classifySmtpError(error);
      if (RESET_KINDS.has(transportError.kind)) {
        // 连接类故障后丢弃发送器，下次发送重新建连
        this.resetTransporter();
      }
      throw transportError;
    }
    if (receipt.rejected.length >= mail.recipients.length) {
      throw new TransportError('recipients_refused', '所有收件人均被拒收');
    }
    if (receipt.rejected.length > 0) {
      this.logger.warn(
        { messageId: receipt.messageId, rejected: receipt.rejected },
        '部分收件人被拒收',
      );
    }
    return receipt;
  }

  async close(): Promise<void> {
    await Promise.resolve();
    this.resetTransporter();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.close();
  }

  private resetTransporter(): void {
    if (!this.transporter) return;
    this.transporter.close();
    this.transporter = null;
  }

  private getTransporter(): MailTransporterLike {
    if (!this.transporter) {
      this.transporter = this.transporterFactory(this.options);
    }
    return this.transporter;
  }
}
