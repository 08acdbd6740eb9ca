// src/modules/messages/message.service.ts

import { CreateMessageParams, MessageView } from '@app-types/models/message.types';
import { DomainError, MESSAGE_ERROR, describeError } from '@core/common/errors/domain-error';
import type { ICachePort } from '@core/mail-outbox/outbox.ports';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { randomUUID } from 'crypto';
import { EntityManager, Repository } from 'typeorm';
import { MessageEntity } from './message.entity';

/**
 * 将实体整形为可缓存的只读视图
 */
export const toMessageView = (entity: MessageEntity): MessageView => ({
  id: entity.id,
  senderId: entity.senderId,
  subject: entity.subject,
  body: entity.body,
  createdAt: entity.createdAt.toISOString(),
});

export const messageCacheKey = (id: string): string => `message:${id}`;

/**
 * 站内消息服务
 * - 读：read-through 缓存
 * - 写：提交后 write-through 缓存（由调用方在事务提交后调用 cacheMessage）
 */
@Injectable()
export class MessageService {
  private readonly ttlSeconds: number;

  constructor(
    @InjectRepository(MessageEntity)
    private readonly messageRepository: Repository<MessageEntity>,
    @Inject(MAIL_OUTBOX_TOKENS.CACHE)
    private readonly cache: ICachePort,
    config: ConfigService,
  ) {
    this.ttlSeconds = config.get<number>('cache.messageTtlSeconds', 300);
  }

  /**
   * 创建消息
   * @param params 消息内容
   * @param manager 可选的事务管理器
   */
  async create(params: CreateMessageParams, manager?: EntityManager): Promise<MessageEntity> {
    const subject = params.subject.trim();
    if (!subject) {
      throw new DomainError(MESSAGE_ERROR.INVALID_PARAMS, '消息主题不能为空');
    }
    const repo = manager ? manager.getRepository(MessageEntity) : this.messageRepository;
    const entity = repo.create({
      id: randomUUID(),
      senderId: params.senderId,
      subject,
      body: params.body,
      createdAt: new Date(),
    });
    try {
      return await repo.save(entity);
    } catch (error) {
      throw new DomainError(
        MESSAGE_ERROR.QUERY_FAILED,
        '写入消息失败',
        { error: describeError(error) },
        error,
      );
    }
  }

  /**
   * 根据 ID 查找消息（read-through 缓存）
   * @param id 消息 ID
   */
  async findById(id: string): Promise<MessageView | null> {
    return await this.cache.getOrLoad<MessageView>(messageCacheKey(id), this.ttlSeconds, async () => {
      let entity: MessageEntity | null;
      try {
        entity = await this.messageRepository.findOne({ where: { id } });
      } catch (error) {
        throw new DomainError(
          MESSAGE_ERROR.QUERY_FAILED,
          '查询消息失败',
          { id, error: describeError(error) },
          error,
        );
      }
      return entity ? toMessageView(entity) : null;
    });
  }

  /**
   * 编辑消息内容并失效缓存
   * 已入箱的邮件使用的是创建时的快照，不受影响
   */
  async update(id: string, params: Pick<CreateMessageParams, 'subject' | 'body'>): Promise<void> {
    let affected: number | undefined;
    try {
      const result = await this.messageRepository.update(
        { id },
        { subject: params.subject.trim(), body: params.body },
      );
      affected = result.affected;
    } catch (error) {
      throw new DomainError(
        MESSAGE_ERROR.QUERY_FAILED,
        '更新消息失败',
        { id, error: describeError(error) },
        error,
      );
    }
    if (!affected) {
      throw new DomainError(MESSAGE_ERROR.MESSAGE_NOT_FOUND, '消息不存在', { id });
    }
    await this.evict(id);
  }

  /**
   * 写入缓存（事务提交后调用）
   */
  async cacheMessage(entity: MessageEntity): Promise<void> {
    await this.cache.set(messageCacheKey(entity.id), toMessageView(entity), this.ttlSeconds);
  }

  /**
   * 失效缓存（消息被编辑后调用）
   */
  async evict(id: string): Promise<void> {
    await this.cache.delete(messageCacheKey(id));
  }
}
