// src/core/mail-outbox/outbox-state.ts
import { EmailOutboxStatus } from '@app-types/models/email-outbox.types';
import { DomainError, OUTBOX_ERROR } from '@core/common/errors/domain-error';

/**
 * Outbox 状态机（纯函数）
 *
 * pending -> sent | failed
 * failed  -> sent | failed（重放后再次耗尽时 retries 再 +1）
 * sent    -> 无出边
 */
const TRANSITIONS: Readonly<Record<EmailOutboxStatus, ReadonlyArray<EmailOutboxStatus>>> = {
  [EmailOutboxStatus.PENDING]: [EmailOutboxStatus.SENT, EmailOutboxStatus.FAILED],
  [EmailOutboxStatus.FAILED]: [EmailOutboxStatus.SENT, EmailOutboxStatus.FAILED],
  [EmailOutboxStatus.SENT]: [],
};

/**
 * 状态机关心的字段
 */
export interface OutboxStateFields {
  readonly status: EmailOutboxStatus;
  readonly retries: number;
  readonly lastError: string | null;
  readonly sentAt: Date | null;
}

export function canTransition(from: EmailOutboxStatus, to: EmailOutboxStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isDelivered(state: Pick<OutboxStateFields, 'status'>): boolean {
  return state.status === EmailOutboxStatus.SENT;
}

function assertTransition(from: EmailOutboxStatus, to: EmailOutboxStatus): void {
  if (!canTransition(from, to)) {
    throw new DomainError(OUTBOX_ERROR.INVALID_TRANSITION, `不允许的状态流转：${from} -> ${to}`, {
      from,
      to,
    });
  }
}

/**
 * 能流转到 to 的来源状态（条件更新的 status IN (...) 由此得出）
 */
export function sourcesOf(to: EmailOutboxStatus): EmailOutboxStatus[] {
  return Object.values(EmailOutboxStatus).filter((from) => canTransition(from, to));
}

/**
 * 完成一轮投递时写入的列（retries 由调用方处理）
 */
export type OutboxCompletionChanges = Pick<OutboxStateFields, 'status' | 'lastError' | 'sentAt'>;

export function sentChanges(sentAt: Date): OutboxCompletionChanges {
  return { status: EmailOutboxStatus.SENT, lastError: null, sentAt };
}

export function failedChanges(lastError: string): OutboxCompletionChanges {
  const text = lastError.trim();
  return { status: EmailOutboxStatus.FAILED, lastError: text || '未知错误', sentAt: null };
}

/**
 * 投递成功：写入 sent_at，清空 last_error，retries 保持不变
 */
export function applySent(state: OutboxStateFields, sentAt: Date): OutboxStateFields {
  assertTransition(state.status, EmailOutboxStatus.SENT);
  return { ...sentChanges(sentAt), retries: state.retries };
}

/**
 * 一轮重试耗尽：retries 只 +1（按轮次计数，而非按尝试次数）
 */
export function applyFailed(state: OutboxStateFields, lastError: string): OutboxStateFields {
  assertTransition(state.status, EmailOutboxStatus.FAILED);
  return { ...failedChanges(lastError), retries: state.retries + 1 };
}
