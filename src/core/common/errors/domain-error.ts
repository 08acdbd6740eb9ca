// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Service、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 邮件 Outbox 相关错误码
export const OUTBOX_ERROR = {
  // 记录已落库，但通知未能发布到队列（调用方可视为"已受理、延迟投递"）
  DISPATCH_UNAVAILABLE: 'OUTBOX_DISPATCH_UNAVAILABLE',
  INVALID_RECIPIENTS: 'OUTBOX_INVALID_RECIPIENTS',
  INVALID_PARAMS: 'OUTBOX_INVALID_PARAMS',
  INVALID_TRANSITION: 'OUTBOX_INVALID_TRANSITION',
  // 存储层不可用：必须向外传播，由 broker 重投
  QUERY_FAILED: 'OUTBOX_QUERY_FAILED',
} as const;
Object.freeze(OUTBOX_ERROR);

// 站内消息错误码
export const MESSAGE_ERROR = {
  MESSAGE_NOT_FOUND: 'MESSAGE_NOT_FOUND',
  INVALID_PARAMS: 'MESSAGE_INVALID_PARAMS',
  QUERY_FAILED: 'MESSAGE_QUERY_FAILED',
} as const;
Object.freeze(MESSAGE_ERROR);

// 消息队列（broker）错误码
export const BROKER_ERROR = {
  CONNECT_FAILED: 'BROKER_CONNECT_FAILED',
  PUBLISH_FAILED: 'BROKER_PUBLISH_FAILED',
  CONSUME_FAILED: 'BROKER_CONSUME_FAILED',
  CLOSED: 'BROKER_CLOSED',
} as const;
Object.freeze(BROKER_ERROR);

// 邮件发送通道错误码（与 TransportErrorKind 一一对应）
export const MAIL_TRANSPORT_ERROR = {
  CONNECT: 'MAIL_TRANSPORT_CONNECT',
  AUTH: 'MAIL_TRANSPORT_AUTH',
  RECIPIENTS_REFUSED: 'MAIL_TRANSPORT_RECIPIENTS_REFUSED',
  DATA: 'MAIL_TRANSPORT_DATA',
  TIMEOUT: 'MAIL_TRANSPORT_TIMEOUT',
  DISCONNECTED: 'MAIL_TRANSPORT_DISCONNECTED',
} as const;
Object.freeze(MAIL_TRANSPORT_ERROR);

// 类型辅助
export type OutboxErrorCode = (typeof OUTBOX_ERROR)[keyof typeof OUTBOX_ERROR];
export type MessageErrorCode = (typeof MESSAGE_ERROR)[keyof typeof MESSAGE_ERROR];
export type BrokerErrorCode = (typeof BROKER_ERROR)[keyof typeof BROKER_ERROR];
export type MailTransportErrorCode =
  (typeof MAIL_TRANSPORT_ERROR)[keyof typeof MAIL_TRANSPORT_ERROR];

export type TransportErrorKind =
  | 'connect'
  | 'auth'
  | 'recipients_refused'
  | 'data'
  | 'timeout'
  | 'disconnected';

const TRANSPORT_KIND_TO_CODE: Readonly<Record<TransportErrorKind, MailTransportErrorCode>> = {
  connect: MAIL_TRANSPORT_ERROR.CONNECT,
  auth: MAIL_TRANSPORT_ERROR.AUTH,
  recipients_refused: MAIL_TRANSPORT_ERROR.RECIPIENTS_REFUSED,
  data: MAIL_TRANSPORT_ERROR.DATA,
  timeout: MAIL_TRANSPORT_ERROR.TIMEOUT,
  disconnected: MAIL_TRANSPORT_ERROR.DISCONNECTED,
};

/**
 * 邮件发送失败
 * 仅由发送通道抛出；中继在重试耗尽后将其降级为 failed 状态，不向外传播
 */
export class TransportError extends DomainError {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, cause?: unknown) {
    super(TRANSPORT_KIND_TO_CODE[kind], message, { kind }, cause);
    this.name = 'TransportError';
    this.kind = kind;
  }
}

export const isTransportError = (error: unknown): error is TransportError =>
  error instanceof TransportError;

/**
 * 提取可读的错误文本（用于 last_error 与日志）
 * @param error 任意错误对象
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }
  if (typeof error === 'string' && error.trim()) return error.trim();
  return '未知错误';
};
