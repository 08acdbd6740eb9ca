// src/modules/mail-outbox/email-outbox.service.ts

import {
  CreateEmailOutboxParams,
  EmailOutboxStatus,
  FindEmailOutboxByStatusParams,
} from '@app-types/models/email-outbox.types';
import { DomainError, OUTBOX_ERROR, describeError } from '@core/common/errors/domain-error';
import { failedChanges, sentChanges, sourcesOf } from '@core/mail-outbox/outbox-state';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { randomUUID } from 'crypto';
import { EntityManager, FindOptionsWhere, In, LessThan, Repository } from 'typeorm';
import { EmailOutboxEntity } from './email-outbox.entity';

/**
 * 邮件 Outbox 服务
 * 提供 Outbox 记录的基础数据库操作
 *
 * 职责范围：
 * - 创建 pending 记录（可加入调用方事务）
 * - 按 ID / 状态查询
 * - 单行条件更新完成状态流转（已 sent 的记录不会再被修改）
 *
 * 存储层故障统一包装为 OUTBOX_ERROR.QUERY_FAILED 并向上抛出
 */
@Injectable()
export class EmailOutboxService {
  constructor(
    @InjectRepository(EmailOutboxEntity)
    private readonly outboxRepository: Repository<EmailOutboxEntity>,
  ) {}

  /**
   * 创建 pending 记录
   * @param params 收件人与内容快照
   * @param manager 可选的事务管理器（与调用方的其它写操作同事务提交）
   */
  async create(
    params: CreateEmailOutboxParams,
    manager?: EntityManager,
  ): Promise<EmailOutboxEntity> {
    const repo = this.getRepository(manager);
    const entity = repo.create({
      id: randomUUID(),
      messageId: params.messageId,
      recipients: [...params.recipients],
      subject: params.subject,
      body: params.body,
      status: EmailOutboxStatus.PENDING,
      retries: 0,
      lastError: null,
      createdAt: new Date(),
      sentAt: null,
    });
    try {
      return await repo.save(entity);
    } catch (error) {
      throw this.queryFailed('写入邮件 Outbox 失败', { messageId: params.messageId }, error);
    }
  }

  /**
   * 根据 ID 查找记录
   * @param id Outbox 记录 ID
   * @returns 记录或 null
   */
  async findById(id: string): Promise<EmailOutboxEntity | null> {
    try {
      return await this.outboxRepository.findOne({ where: { id } });
    } catch (error) {
      throw this.queryFailed('查询邮件 Outbox 失败', { id }, error);
    }
  }

  /**
   * 标记投递成功（pending / failed -> sent）
   * @param id Outbox 记录 ID
   * @param sentAt 成功时间
   * @returns 是否有记录被更新；false 表示记录不存在或已为 sent
   */
  async markSent(id: string, sentAt: Date): Promise<boolean> {
    try {
      const result = await this.outboxRepository
        .createQueryBuilder()
        .update(EmailOutboxEntity)
        .set(sentChanges(sentAt))
        .where('id = :id', { id })
        .andWhere('status IN (:...from)', { from: sourcesOf(EmailOutboxStatus.SENT) })
        .execute();
      return (result.affected ?? 0) > 0;
    } catch (error) {
      throw this.queryFailed('更新邮件 Outbox 为 sent 失败', { id }, error);
    }
  }

  /**
   * 标记本轮投递失败（pending / failed -> failed），retries 原子 +1
   * @param id Outbox 记录 ID
   * @param lastError 最后一次失败原因
   * @returns 是否有记录被更新；false 表示记录不存在或已为 sent
   */
  async markFailed(id: string, lastError: string): Promise<boolean> {
    try {
      const result = await this.outboxRepository
        .createQueryBuilder()
        .update(EmailOutboxEntity)
        .set({ ...failedChanges(lastError), retries: () => 'retries + 1' })
        .where('id = :id', { id })
        .andWhere('status IN (:...from)', { from: sourcesOf(EmailOutboxStatus.FAILED) })
        .execute();
      return (result.affected ?? 0) > 0;
    } catch (error) {
      throw this.queryFailed('更新邮件 Outbox 为 failed 失败', { id }, error);
    }
  }

  /**
   * 按状态查询记录（按创建时间升序）
   * 供重放 / 补发使用
   */
  async findByStatus(params: FindEmailOutboxByStatusParams): Promise<EmailOutboxEntity[]> {
    const where: FindOptionsWhere<EmailOutboxEntity> = { status: params.status };
    if (params.ids) where.id = In([...params.ids]);
    if (params.createdBefore) where.createdAt = LessThan(params.createdBefore);
    try {
      return await this.outboxRepository.find({
        where,
        order: { createdAt: 'ASC' },
        take: params.limit,
      });
    } catch (error) {
      throw this.queryFailed('按状态查询邮件 Outbox 失败', { status: params.status }, error);
    }
  }

  /**
   * 获取 Repository 实例
   * @param manager 可选的事务管理器
   */
  getRepository(manager?: EntityManager): Repository<EmailOutboxEntity> {
    return manager ? manager.getRepository(EmailOutboxEntity) : this.outboxRepository;
  }

  private queryFailed(message: string, details: Record<string, unknown>, cause: unknown) {
    return new DomainError(
      OUTBOX_ERROR.QUERY_FAILED,
      message,
      { ...details, error: describeError(cause) },
      cause,
    );
  }
}
