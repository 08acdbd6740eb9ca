// src/core/mail-outbox/notification.codec.ts
import { isUUID } from 'class-validator';

/**
 * 队列通知：只携带 Outbox 记录的引用
 * 线上格式固定为 {"outbox_id": "<uuid>"}，消费方必须忽略未知字段
 */
export interface OutboxNotification {
  readonly outboxId: string;
}

export type DecodeNotificationResult =
  | { readonly ok: true; readonly notification: OutboxNotification }
  | { readonly ok: false; readonly reason: string };

/**
 * 编码通知载荷
 * @param outboxId Outbox 记录 ID
 */
export function encodeNotification(outboxId: string): Buffer {
  // eslint-disable-next-line @typescript-eslint/naming-convention
  return Buffer.from(JSON.stringify({ outbox_id: outboxId }), 'utf8');
}

/**
 * 解码通知载荷（纯函数，不抛错）
 * @param raw 队列消息体
 */
export function decodeNotification(raw: Buffer | string): DecodeNotificationResult {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, reason: '载荷不是合法 JSON' };
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { ok: false, reason: '载荷不是 JSON 对象' };
  }
  const outboxId: unknown = 'outbox_id' in parsed ? parsed.outbox_id : undefined;
  if (typeof outboxId !== 'string' || !isUUID(outboxId)) {
    return { ok: false, reason: '缺少合法的 outbox_id' };
  }
  return { ok: true, notification: { outboxId: outboxId.toLowerCase() } };
}
