import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { createReplayProgram, type OperatorRunner } from './cli/replay.command';
import { ReplayModule } from './replay.module';
import { CheckHealthUsecase } from './usecases/health/check-health.usecase';
import { ReplayOutboxUsecase } from './usecases/mail-outbox/replay-outbox.usecase';

/**
 * 运维命令入口
 * 用法：npm run replay -- failed --id <id> | npm run replay -- pending --older-than-ms 600000
 *      npm run replay -- health
 */
async function bootstrap() {
  const program = createReplayProgram(
    async () => {
      const app = await NestFactory.createApplicationContext(ReplayModule, { bufferLogs: true });
      app.useLogger(app.get(Logger));
      const replay = app.get(ReplayOutboxUsecase);
      const health = app.get(CheckHealthUsecase);
      const runner: OperatorRunner = {
        replayFailed: (params) => replay.replayFailed(params),
        backfillPending: (params) => replay.backfillPending(params),
        checkHealth: () => health.execute(),
      };
      return { runner, close: () => app.close() };
    },
    (line) => process.stdout.write(`${line}\n`),
  );
  await program.parseAsync(process.argv);
}

bootstrap().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
