// src/usecases/mail-outbox/replay-outbox.usecase.ts

import { EmailOutboxStatus } from '@app-types/models/email-outbox.types';
import { describeError } from '@core/common/errors/domain-error';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmailOutboxEntity } from '@modules/mail-outbox/email-outbox.entity';
import { EmailOutboxService } from '@modules/mail-outbox/email-outbox.service';
import { PinoLogger } from 'nestjs-pino';
import { EnqueueEmailUsecase } from './enqueue-email.usecase';

export interface ReplayFailedParams {
  /** 指定记录；缺省时按创建时间取最早的 limit 条 */
  ids?: ReadonlyArray<string>;
  limit?: number;
}

export interface BackfillPendingParams {
  /** 创建时间早于 now - olderThanMs 的 pending 记录才会补发 */
  olderThanMs?: number;
  limit?: number;
}

export interface ReplayOutboxResult {
  published: string[];
  /** 指定了但不存在或已不在目标状态的记录 */
  skipped: string[];
  failed: string[];
}

/**
 * Outbox 重放 / 补发用例（运维入口）
 *
 * - replayFailed：重新发布 failed 记录的通知，中继会开启新一轮投递
 * - backfillPending：补发长时间停留在 pending 的记录（入箱时发布失败）
 *
 * 单条发布失败只记入结果，不中断批次
 */
@Injectable()
export class ReplayOutboxUsecase {
  private readonly defaultLimit: number;
  private readonly staleAfterMs: number;

  constructor(
    private readonly outboxService: EmailOutboxService,
    private readonly enqueueEmailUsecase: EnqueueEmailUsecase,
    config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(ReplayOutboxUsecase.name);
    this.defaultLimit = config.get<number>('relay.batchLimit', 100);
    this.staleAfterMs = config.get<number>('relay.backfillStaleAfterMs', 300000);
  }

  async replayFailed(params: ReplayFailedParams = {}): Promise<ReplayOutboxResult> {
    const ids = params.ids
      ? [...new Set(params.ids.map((id) => id.trim().toLowerCase()).filter(Boolean))]
      : undefined;
    if (ids && ids.length === 0) return { published: [], skipped: [], failed: [] };
    const entries = await this.outboxService.findByStatus({
      status: EmailOutboxStatus.FAILED,
      ids,
      limit: ids ? ids.length : this.resolveLimit(params.limit),
    });
    const found = new Set(entries.map((e) => e.id));
    const skipped = ids ? ids.filter((id) => !found.has(id)) : [];
    if (skipped.length > 0) {
      this.logger.warn({ skipped }, '部分记录不存在或不处于 failed 状态，已跳过');
    }
    return await this.publishAll(entries, skipped, 'failed');
  }

  async backfillPending(params: BackfillPendingParams = {}): Promise<ReplayOutboxResult> {
    const olderThanMs = params.olderThanMs ?? this.staleAfterMs;
    const entries = await this.outboxService.findByStatus({
      status: EmailOutboxStatus.PENDING,
      createdBefore: new Date(Date.now() - olderThanMs),
      limit: this.resolveLimit(params.limit),
    });
    return await this.publishAll(entries, [], 'pending');
  }

  private async publishAll(
    entries: ReadonlyArray<EmailOutboxEntity>,
    skipped: string[],
    source: 'failed' | 'pending',
  ): Promise<ReplayOutboxResult> {
    const result: ReplayOutboxResult = { published: [], skipped, failed: [] };
    // 逐条顺序发布，保持创建时间顺序
    for (const entry of entries) {
      try {
        await this.enqueueEmailUsecase.dispatch(entry);
        result.published.push(entry.id);
      } catch (error) {
        this.logger.warn({ outboxId: entry.id, error: describeError(error) }, '重新发布通知失败');
        result.failed.push(entry.id);
      }
    }
    this.logger.info(
      {
        source,
        published: result.published.length,
        skipped: result.skipped.length,
        failed: result.failed.length,
      },
      'Outbox 重新发布完成',
    );
    return result;
  }

  private resolveLimit(limit: number | undefined): number {
    if (limit === undefined || !Number.isInteger(limit) || limit < 1) return this.defaultLimit;
    return limit;
  }
}
