// src/core/mail-outbox/outbox-state.spec.ts
import { EmailOutboxStatus } from '@app-types/models/email-outbox.types';
import { DomainError, OUTBOX_ERROR } from '@core/common/errors/domain-error';
import {
  OutboxStateFields,
  applyFailed,
  applySent,
  canTransition,
  failedChanges,
  isDelivered,
  sentChanges,
  sourcesOf,
} from './outbox-state';

describe('outbox-state', () => {
  const pending: OutboxStateFields = {
    status: EmailOutboxStatus.PENDING,
    retries: 0,
    lastError: null,
    sentAt: null,
  };

  it('允许的流转：pending/failed -> sent|failed，sent 无出边', () => {
    expect(canTransition(EmailOutboxStatus.PENDING, EmailOutboxStatus.SENT)).toBe(true);
    expect(canTransition(EmailOutboxStatus.PENDING, EmailOutboxStatus.FAILED)).toBe(true);
    expect(canTransition(EmailOutboxStatus.FAILED, EmailOutboxStatus.SENT)).toBe(true);
    expect(canTransition(EmailOutboxStatus.FAILED, EmailOutboxStatus.FAILED)).toBe(true);
    expect(canTransition(EmailOutboxStatus.SENT, EmailOutboxStatus.FAILED)).toBe(false);
    expect(canTransition(EmailOutboxStatus.SENT, EmailOutboxStatus.PENDING)).toBe(false);
    expect(canTransition(EmailOutboxStatus.FAILED, EmailOutboxStatus.PENDING)).toBe(false);
  });

  it('applySent 写入 sentAt、清空 lastError，retries 不变', () => {
    const sentAt = new Date('2026-03-01T08:00:00.000Z');
    const failed: OutboxStateFields = {
      ...pending,
      status: EmailOutboxStatus.FAILED,
      retries: 2,
      lastError: 'timeout',
    };

    expect(applySent(failed, sentAt)).toEqual({
      status: EmailOutboxStatus.SENT,
      retries: 2,
      lastError: null,
      sentAt,
    });
  });

  it('applyFailed 每轮只把 retries +1，并记录修剪后的错误文本', () => {
    const once = applyFailed(pending, '  550 mailbox unavailable  ');
    const twice = applyFailed(once, 'connection reset');

    expect(once).toEqual({
      status: EmailOutboxStatus.FAILED,
      retries: 1,
      lastError: '550 mailbox unavailable',
      sentAt: null,
    });
    expect(twice.retries).toBe(2);
    expect(twice.lastError).toBe('connection reset');
  });

  it('空错误文本回退为默认描述', () => {
    expect(applyFailed(pending, '   ').lastError).toBe('未知错误');
  });

  it('离开 sent 状态抛出 INVALID_TRANSITION', () => {
    const sent = applySent(pending, new Date());

    expect(isDelivered(sent)).toBe(true);
    expect(() => applyFailed(sent, 'x')).toThrow(DomainError);
    try {
      applySent(sent, new Date());
      throw new Error('应当抛出');
    } catch (error) {
      expect(error).toBeInstanceOf(DomainError);
      expect(error).toMatchObject({
        code: OUTBOX_ERROR.INVALID_TRANSITION,
        message: '不允许的状态流转：sent -> sent',
      });
    }
  });

  it('sourcesOf 由流转表得出条件更新允许的来源状态', () => {
    expect(sourcesOf(EmailOutboxStatus.SENT)).toEqual([
      EmailOutboxStatus.PENDING,
      EmailOutboxStatus.FAILED,
    ]);
    expect(sourcesOf(EmailOutboxStatus.FAILED)).toEqual([
      EmailOutboxStatus.PENDING,
      EmailOutboxStatus.FAILED,
    ]);
    expect(sourcesOf(EmailOutboxStatus.PENDING)).toEqual([]);
  });

  it('sentChanges / failedChanges 给出写库的列值', () => {
    const sentAt = new Date('2026-03-01T08:00:00.000Z');

    expect(sentChanges(sentAt)).toEqual({ status: EmailOutboxStatus.SENT, lastError: null, sentAt });
    expect(failedChanges(' 421 busy ')).toEqual({
      status: EmailOutboxStatus.FAILED,
      lastError: '421 busy',
      sentAt: null,
    });
  });
});
