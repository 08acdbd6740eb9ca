// src/usecases/health/check-health.usecase.ts

import { describeError } from '@core/common/errors/domain-error';
import type { IBrokerChannelPort } from '@core/mail-outbox/outbox.ports';
import { Inject, Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { CacheService } from '@modules/cache/cache.service';
import { MAIL_OUTBOX_TOKENS } from '@modules/mail-outbox/mail-outbox.tokens';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';

export type DependencyHealth = 'up' | 'down' | 'disabled';

export interface HealthReport {
  /** 任一已启用的依赖不可用即为 degraded */
  readonly status: 'ok' | 'degraded';
  readonly database: DependencyHealth;
  readonly cache: DependencyHealth;
  readonly broker: DependencyHealth;
}

/**
 * 依赖健康检查：数据库、缓存、消息队列
 * 各项检查互不影响，失败只反映在报告中，不抛错
 */
@Injectable()
export class CheckHealthUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly cacheService: CacheService,
    @Inject(MAIL_OUTBOX_TOKENS.BROKER_CHANNEL)
    private readonly broker: IBrokerChannelPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CheckHealthUsecase.name);
  }

  async execute(): Promise<HealthReport> {
    const [database, cache, broker] = await Promise.all([
      this.checkDatabase(),
      this.checkCache(),
      this.checkBroker(),
    ]);
    const degraded = [database, cache, broker].includes('down');
    const report: HealthReport = {
      status: degraded ? 'degraded' : 'ok',
      database,
      cache,
      broker,
    };
    if (degraded) {
      this.logger.warn(report, '依赖检查未全部通过');
    } else {
      this.logger.debug(report, '依赖检查通过');
    }
    return report;
  }

  private async checkDatabase(): Promise<DependencyHealth> {
    try {
      await this.dataSource.query('SELECT 1');
      return 'up';
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, '数据库不可达');
      return 'down';
    }
  }

  private async checkCache(): Promise<DependencyHealth> {
    if (!this.cacheService.isEnabled) return 'disabled';
    return (await this.cacheService.ping()) ? 'up' : 'down';
  }

  private async checkBroker(): Promise<DependencyHealth> {
    return (await this.broker.checkConnection()) ? 'up' : 'down';
  }
}
