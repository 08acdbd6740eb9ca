/* eslint-disable max-lines-per-function */
// src/usecases/mail-outbox/send-message-email.usecase.spec.ts
import { EmailOutboxStatus } from '@app-types/models/email-outbox.types';
import { BROKER_ERROR, DomainError, OUTBOX_ERROR } from '@core/common/errors/domain-error';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken } from '@nestjs/typeorm';
import { EmailOutboxService } from '@modules/mail-outbox/email-outbox.service';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { MessageEntity } from '@modules/messages/message.entity';
import { MessageService } from '@modules/messages/message.service';
import { createLoggerProvider } from '@src/utils/test/logger-mock';
import { InMemoryEmailOutboxStore } from '@src/utils/test/mail-outbox.fakes';
import { EntityManager } from 'typeorm';
import { EnqueueEmailUsecase } from './enqueue-email.usecase';
import { SendMessageEmailUsecase } from './send-message-email.usecase';

describe('SendMessageEmailUsecase', () => {
  let usecase: SendMessageEmailUsecase;
  let store: InMemoryEmailOutboxStore;
  let manager: EntityManager;
  let events: string[];
  let dataSource: { transaction: jest.Mock };
  let messageService: { create: jest.Mock; cacheMessage: jest.Mock };
  let broker: { ensureConnected: jest.Mock; publish: jest.Mock; consume: jest.Mock; close: jest.Mock };

  const message = Object.assign(new MessageEntity(), {
    id: '9a7c2e4b-1f3d-4c5e-8a6b-2d4f6e8a0c1b',
    senderId: 'user-1',
    subject: 'Weekly digest',
    body: 'Hello there',
    createdAt: new Date('2026-01-05T10:00:00.000Z'),
  });

  beforeEach(async () => {
    events = [];
    store = new InMemoryEmailOutboxStore();
    manager = Object.create(EntityManager.prototype);
    dataSource = {
      transaction: jest.fn(async (work: (m: EntityManager) => Promise<unknown>) => {
        events.push('begin');
        const result = await work(manager);
        events.push('commit');
        return result;
      }),
    };
    messageService = {
      create: jest.fn(async () => {
        events.push('message');
        return message;
      }),
      cacheMessage: jest.fn(async () => {
        events.push('cache');
      }),
    };
    broker = {
      ensureConnected: jest.fn(async () => undefined),
      publish: jest.fn(async () => {
        events.push('publish');
      }),
      consume: jest.fn(),
      close: jest.fn(async () => undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SendMessageEmailUsecase,
        EnqueueEmailUsecase,
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: MessageService, useValue: messageService },
        { provide: EmailOutboxService, useValue: store },
        { provide: MAIL_OUTBOX_TOKENS.BROKER_CHANNEL, useValue: broker },
        { provide: ConfigService, useValue: new ConfigService({}) },
        createLoggerProvider(),
      ],
    }).compile();

    usecase = module.get(SendMessageEmailUsecase);
  });

  it('同事务写消息与 Outbox，提交后写缓存再发布', async () => {
    const createSpy = jest.spyOn(store, 'create');

    const result = await usecase.execute({
      senderId: 'user-1',
      subject: 'Weekly digest',
      body: 'Hello there',
      recipients: ['a@x.com', 'b@x.com'],
    });

    expect(events).toEqual(['begin', 'message', 'commit', 'cache', 'publish']);
    expect(messageService.create).toHaveBeenCalledWith(
      { senderId: 'user-1', subject: 'Weekly digest', body: 'Hello there' },
      manager,
    );
    expect(createSpy).toHaveBeenCalledWith(
      {
        messageId: message.id,
        recipients: ['a@x.com', 'b@x.com'],
        subject: 'Weekly digest',
        body: 'Hello there',
      },
      manager,
    );
    expect(result.dispatched).toBe(true);
    expect(result.message).toBe(message);
    expect(store.peek(result.outbox.id)?.status).toBe(EmailOutboxStatus.PENDING);
    expect(messageService.cacheMessage).toHaveBeenCalledWith(message);
  });

  it('收件人非法时事务失败，不写缓存也不发布', async () => {
    const error = await usecase
      .execute({ senderId: 'user-1', subject: 's', body: 'b', recipients: [] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DomainError);
    expect(error).toMatchObject({ code: OUTBOX_ERROR.INVALID_RECIPIENTS });
    expect(events).toEqual(['begin', 'message']);
    expect(messageService.cacheMessage).not.toHaveBeenCalled();
    expect(broker.publish).not.toHaveBeenCalled();
  });

  it('发布失败不回滚：返回 dispatched=false，记录保留为 pending', async () => {
    broker.publish.mockRejectedValue(new DomainError(BROKER_ERROR.PUBLISH_FAILED, '消息发布失败'));

    const result = await usecase.execute({
      senderId: 'user-1',
      subject: 'Weekly digest',
      body: 'Hello there',
      recipients: ['a@x.com'],
    });

    expect(result.dispatched).toBe(false);
    expect(store.peek(result.outbox.id)?.status).toBe(EmailOutboxStatus.PENDING);
  });
});
