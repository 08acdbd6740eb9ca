// src/cli/replay.command.ts

import type { HealthReport } from '@usecases/health/check-health.usecase';
import type {
  BackfillPendingParams,
  ReplayFailedParams,
  ReplayOutboxResult,
} from '@usecases/mail-outbox/replay-outbox.usecase';
import { Command, InvalidArgumentError } from 'commander';

/**
 * 运维命令所需的能力
 */
export interface OperatorRunner {
  replayFailed(params: ReplayFailedParams): Promise<ReplayOutboxResult>;
  backfillPending(params: BackfillPendingParams): Promise<ReplayOutboxResult>;
  checkHealth(): Promise<HealthReport>;
}

/**
 * 打开一次运行上下文；close 在命令结束后调用
 */
export type OperatorRunnerFactory = () => Promise<{
  readonly runner: OperatorRunner;
  close(): Promise<void>;
}>;

interface FailedCommandOptions {
  id?: string[];
  limit?: number;
}

interface PendingCommandOptions {
  olderThanMs?: number;
  limit?: number;
}

const parsePositiveInt = (value: string): number => {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('必须是正整数');
  }
  return n;
};

const parseNonNegativeInt = (value: string): number => {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('必须是非负整数');
  }
  return n;
};

/**
 * 构建运维命令
 *
 *   replay failed [--id <id...>] [--limit <n>]
 *   replay pending [--older-than-ms <ms>] [--limit <n>]
 *   replay health
 *
 * 结果以单行 JSON 输出，便于脚本处理；有发布失败或依赖不可用时退出码为 1
 */
export function createReplayProgram(
  openRunner: OperatorRunnerFactory,
  write: (line: string) => void,
): Command {
  const program = new Command();
  program.name('replay').description('邮件 Outbox 运维：重新发布通知、检查依赖');

  const run = async <T>(
    task: (runner: OperatorRunner) => Promise<T>,
    isFailure: (result: T) => boolean,
  ): Promise<void> => {
    const { runner, close } = await openRunner();
    try {
      const result = await task(runner);
      write(JSON.stringify(result));
      if (isFailure(result)) process.exitCode = 1;
    } finally {
      await close();
    }
  };
  const hasFailed = (result: ReplayOutboxResult) => result.failed.length > 0;

  program
    .command('failed')
    .description('重新发布 failed 记录，开启新一轮投递')
    .option('--id <ids...>', '指定记录 ID（可多个）')
    .option('--limit <n>', '最多处理的记录数', parsePositiveInt)
    .action(async (options: FailedCommandOptions) => {
      await run(
        (runner) => runner.replayFailed({ ids: options.id, limit: options.limit }),
        hasFailed,
      );
    });

  program
    .command('pending')
    .description('补发长时间未投递的 pending 记录')
    .option('--older-than-ms <ms>', '只处理创建早于该时长的记录', parseNonNegativeInt)
    .option('--limit <n>', '最多处理的记录数', parsePositiveInt)
    .action(async (options: PendingCommandOptions) => {
      await run(
        (runner) =>
          runner.backfillPending({ olderThanMs: options.olderThanMs, limit: options.limit }),
        hasFailed,
      );
    });

  program
    .command('health')
    .description('检查数据库、缓存与消息队列的连通性')
    .action(async () => {
      await run(
        (runner) => runner.checkHealth(),
        (report) => report.status === 'degraded',
      );
    });

  return program;
}
