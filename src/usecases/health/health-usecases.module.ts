// src/usecases/health/health-usecases.module.ts
import { Module } from '@nestjs/common';
import { BrokerModule } from '@modules/broker/broker.module';
import { CacheModule } from '@modules/cache/cache.module';
import { CheckHealthUsecase } from './check-health.usecase';

@Module({
  imports: [CacheModule, BrokerModule],
  providers: [CheckHealthUsecase],
  exports: [CheckHealthUsecase],
})
export class HealthUsecasesModule {}
