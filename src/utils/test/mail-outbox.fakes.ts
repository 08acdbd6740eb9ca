// src/utils/test/mail-outbox.fakes.ts
import {
  CreateEmailOutboxParams,
  EmailOutboxStatus,
  FindEmailOutboxByStatusParams,
} from '@app-types/models/email-outbox.types';
import { DomainError, OUTBOX_ERROR } from '@core/common/errors/domain-error';
import type { Sleeper } from '@core/common/retry/retry.policy';
import { applyFailed, applySent, isDelivered } from '@core/mail-outbox/outbox-state';
import type {
  ICachePort,
  IMailTransportPort,
  MailSendReceipt,
  OutgoingMail,
} from '@core/mail-outbox/outbox.ports';
import { EmailOutboxEntity } from '@modules/mail-outbox/email-outbox.entity';
import { randomUUID } from 'crypto';

/**
 * 记录等待时长、不真正等待的 Sleeper
 */
export class RecordingSleeper implements Sleeper {
  readonly delays: number[] = [];

  async sleep(ms: number): Promise<void> {
    this.delays.push(ms);
    await Promise.resolve();
  }
}

type StoreMethod = 'create' | 'findById' | 'markSent' | 'markFailed' | 'findByStatus';

const storeUnavailable = (method: StoreMethod) =>
  new DomainError(OUTBOX_ERROR.QUERY_FAILED, `存储不可用：${method}`, { method });

/**
 * 内存版 Outbox 存储（与 EmailOutboxService 的公开方法同形）
 * 读出的实体均为副本，模拟数据库行与内存对象相互独立
 */
export class InMemoryEmailOutboxStore {
  private readonly rows = new Map<string, EmailOutboxEntity>();
  private readonly outages = new Map<StoreMethod, number>();
  private clock = Date.parse('2026-01-01T00:00:00.000Z');

  /**
   * 让指定方法接下来的 times 次调用抛出 QUERY_FAILED
   */
  failNext(method: StoreMethod, times = 1): void {
    this.outages.set(method, (this.outages.get(method) ?? 0) + times);
  }

  async create(params: CreateEmailOutboxParams): Promise<EmailOutboxEntity> {
    await this.checkOutage('create');
    const entity = Object.assign(new EmailOutboxEntity(), {
      id: randomUUID(),
      messageId: params.messageId,
      recipients: [...params.recipients],
      subject: params.subject,
      body: params.body,
      status: EmailOutboxStatus.PENDING,
      retries: 0,
      lastError: null,
      // 单调递增，保证按创建时间排序稳定
      createdAt: new Date(this.clock++),
      sentAt: null,
    });
    this.rows.set(entity.id, entity);
    return this.copy(entity);
  }

  async findById(id: string): Promise<EmailOutboxEntity | null> {
    await this.checkOutage('findById');
    const row = this.rows.get(id);
    return row ? this.copy(row) : null;
  }

  async markSent(id: string, sentAt: Date): Promise<boolean> {
    await this.checkOutage('markSent');
    const row = this.rows.get(id);
    if (!row || isDelivered(row)) return false;
    Object.assign(row, applySent(row, sentAt));
    return true;
  }

  async markFailed(id: string, lastError: string): Promise<boolean> {
    await this.checkOutage('markFailed');
    const row = this.rows.get(id);
    if (!row || isDelivered(row)) return false;
    Object.assign(row, applyFailed(row, lastError));
    return true;
  }

  async findByStatus(params: FindEmailOutboxByStatusParams): Promise<EmailOutboxEntity[]> {
    await this.checkOutage('findByStatus');
    const ids = params.ids ? new Set(params.ids) : null;
    return [...this.rows.values()]
      .filter((row) => row.status === params.status)
      .filter((row) => !ids || ids.has(row.id))
      .filter((row) => !params.createdBefore || row.createdAt < params.createdBefore)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, params.limit)
      .map((row) => this.copy(row));
  }

  /** 直接读取行（不受故障注入影响） */
  peek(id: string): EmailOutboxEntity | undefined {
    const row = this.rows.get(id);
    return row ? this.copy(row) : undefined;
  }

  /** 修改行的创建时间（用于 backfill 场景） */
  backdate(id: string, createdAt: Date): void {
    const row = this.rows.get(id);
    if (row) row.createdAt = createdAt;
  }

  get size(): number {
    return this.rows.size;
  }

  private async checkOutage(method: StoreMethod): Promise<void> {
    await Promise.resolve();
    const remaining = this.outages.get(method) ?? 0;
    if (remaining > 0) {
      this.outages.set(method, remaining - 1);
      throw storeUnavailable(method);
    }
  }

  private copy(row: EmailOutboxEntity): EmailOutboxEntity {
    return Object.assign(new EmailOutboxEntity(), {
      ...row,
      recipients: [...row.recipients],
      createdAt: new Date(row.createdAt.getTime()),
      sentAt: row.sentAt ? new Date(row.sentAt.getTime()) : null,
    });
  }
}

/**
 * 可编排结果的发送通道
 * script 中每一项对应一次 send：Error 则抛出，null 则成功；耗尽后默认成功
 */
export class ScriptedMailTransport implements IMailTransportPort {
  readonly sent: OutgoingMail[] = [];
  readonly attempts: OutgoingMail[] = [];
  private readonly script: Array<Error | null> = [];
  closed = false;

  enqueue(...outcomes: Array<Error | null>): this {
    this.script.push(...outcomes);
    return this;
  }

  async send(mail: OutgoingMail): Promise<MailSendReceipt> {
    await Promise.resolve();
    const snapshot: OutgoingMail = {
      recipients: [...mail.recipients],
      subject: mail.subject,
      body: mail.body,
    };
    this.attempts.push(snapshot);
    const outcome = this.script.shift() ?? null;
    if (outcome) throw outcome;
    this.sent.push(snapshot);
    return { messageId: `<fake-${this.sent.length}@test.local>`, rejected: [] };
  }

  async close(): Promise<void> {
    await Promise.resolve();
    this.closed = true;
  }
}

/**
 * 进程内缓存（忽略 TTL，只记录）
 */
export class InMemoryCache implements ICachePort {
  readonly entries = new Map<string, { value: string; ttlSeconds: number }>();

  async get<T>(key: string): Promise<T | null> {
    await Promise.resolve();
    const entry = this.entries.get(key);
    if (!entry) return null;
    const value: T = JSON.parse(entry.value);
    return value;
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    await Promise.resolve();
    this.entries.set(key, { value: JSON.stringify(value), ttlSeconds });
  }

  async delete(key: string): Promise<void> {
    await Promise.resolve();
    this.entries.delete(key);
  }

  async getOrLoad<T>(
    key: string,
    ttlSeconds: number,
    loader: () => Promise<T | null>,
  ): Promise<T | null> {
    const cached = await this.get<T>(key);
    if (cached !== null) return cached;
    const loaded = await loader();
    if (loaded !== null) await this.set(key, loaded, ttlSeconds);
    return loaded;
  }
}

/**
 * 等待所有 setImmediate / 微任务排空
 * @param rounds 轮数（重投链路越长需要越多轮）
 */
export async function flushAsync(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
