// src/modules/cache/cache.service.ts
import { describeError } from '@core/common/errors/domain-error';
import type { ICachePort } from '@core/mail-outbox/outbox.ports';
import { Inject, Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { PinoLogger } from 'nestjs-pino';
import type { CacheClient, CacheClientFactory } from './redis-cache.client';

/**
 * 非权威缓存服务（read-through / write-through）
 *
 * 任何连接或命令失败都只记录日志：
 * - get 视为未命中
 * - set / delete 视为空操作
 * 连接失败后进入冷却期，冷却期内直接降级，不再反复建连
 */
@Injectable()
export class CacheService implements ICachePort, OnApplicationShutdown {
  private client: CacheClient | null = null;
  private connecting: Promise<CacheClient | null> | null = null;
  private unavailableUntil = 0;
  private readonly enabled: boolean;
  private readonly url: string;
  private readonly connectTimeoutMs: number;
  private readonly cooldownMs: number;

  constructor(
    config: ConfigService,
    @Inject(MAIL_OUTBOX_TOKENS.CACHE_CLIENT_FACTORY)
    private readonly clientFactory: CacheClientFactory,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CacheService.name);
    this.enabled = config.get<boolean>('cache.enabled', true);
    this.url = config.get<string>('cache.url', 'redis://localhost:6379/0');
    this.connectTimeoutMs = config.get<number>('cache.connectTimeoutMs', 2000);
    this.cooldownMs = config.get<number>('cache.reconnectCooldownMs', 5000);
  }

  async get<T>(key: string): Promise<T | null> {
    const client = await this.acquire();
    if (!client) return null;
    try {
      const raw = await client.get(key);
      return raw === null ? null : this.parse<T>(key, raw);
    } catch (error) {
      this.degrade('get', key, error);
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    const client = await this.acquire();
    if (!client) return;
    try {
      await client.set(key, JSON.stringify(value), ttlSeconds);
    } catch (error) {
      this.degrade('set', key, error);
    }
  }

  async delete(key: string): Promise<void> {
    const client = await this.acquire();
    if (!client) return;
    try {
      await client.del(key);
    } catch (error) {
      this.degrade('delete', key, error);
    }
  }

  /**
   * 连通性检查；未启用、冷却期内或 PING 失败均返回 false
   */
  async ping(): Promise<boolean> {
    const client = await this.acquire();
    if (!client) return false;
    try {
      await client.ping();
      return true;
    } catch (error) {
      this.degrade('ping', null, error);
      return false;
    }
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * read-through：未命中时调用 loader，并在结果非空时回填缓存
   */
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

  async onApplicationShutdown(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) return;
    try {
      await client.quit();
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, '关闭缓存连接失败');
    }
  }

  private parse<T>(key: string, raw: string): T | null {
    try {
      // 值均由 set 写入，形状与 T 一致
      const value: T = JSON.parse(raw);
      return value;
    } catch (error) {
      this.logger.warn({ key, error: describeError(error) }, '缓存值无法解析，按未命中处理');
      return null;
    }
  }

  private async acquire(): Promise<CacheClient | null> {
    if (!this.enabled) return null;
    if (this.client) return this.client;
    if (Date.now() < this.unavailableUntil) return null;
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<CacheClient | null> {
    const client = this.clientFactory({ url: this.url, connectTimeoutMs: this.connectTimeoutMs });
    client.onError((error) => {
      // 连接断开后丢弃当前客户端，下次调用时重建
      if (this.client === client) this.client = null;
      this.logger.warn({ error: error.message }, '缓存连接异常');
    });
    try {
      await client.connect();
      this.client = client;
      this.logger.info({ url: this.url }, '缓存已连接');
      return client;
    } catch (error) {
      this.unavailableUntil = Date.now() + this.cooldownMs;
      this.logger.warn(
        { error: describeError(error), cooldownMs: this.cooldownMs },
        '缓存不可用，降级为直接读库',
      );
      return null;
    }
  }

  private degrade(op: 'get' | 'set' | 'delete' | 'ping', key: string | null, error: unknown): void {
    this.logger.warn({ op, key, error: describeError(error) }, '缓存操作失败，已降级');
    const client = this.client;
    this.client = null;
    this.unavailableUntil = Date.now() + this.cooldownMs;
    if (client) {
      client.quit().catch((quitError: unknown) => {
        this.logger.debug({ error: describeError(quitError) }, '丢弃缓存连接时关闭失败');
      });
    }
  }
}
