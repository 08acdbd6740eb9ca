// src/core/common/retry/retry.policy.ts

/**
 * 休眠端口（测试中注入即时实现，避免真实等待）
 */
export interface Sleeper {
  sleep(ms: number): Promise<void>;
}

export const timerSleeper: Sleeper = {
  sleep: (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, Math.max(0, ms))),
};

/**
 * 有界重试策略（纯值对象）
 * - attempt 从 1 开始计数
 * - backoff(attempt) 为第 attempt 次失败后、下一次尝试前的等待毫秒数：base * 2^(attempt-1)，不超过 maxDelayMs
 * - maxAttempts 为 Infinity 时表示无限重试（仅用于运行期重连）
 */
export class RetryPolicy {
  constructor(
    readonly maxAttempts: number,
    readonly baseDelayMs: number,
    readonly maxDelayMs: number = Number.POSITIVE_INFINITY,
  ) {
    if (!(maxAttempts >= 1)) {
      throw new RangeError(`maxAttempts 必须 >= 1，实际为 ${maxAttempts}`);
    }
    if (!(baseDelayMs >= 0) || !(maxDelayMs >= 0)) {
      throw new RangeError('退避时长不能为负数');
    }
  }

  static unbounded(baseDelayMs: number, maxDelayMs: number): RetryPolicy {
    return new RetryPolicy(Number.POSITIVE_INFINITY, baseDelayMs, maxDelayMs);
  }

  backoff(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(this.baseDelayMs * 2 ** exponent, this.maxDelayMs);
  }

  hasNext(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }
}

export interface RetryOptions {
  readonly policy: RetryPolicy;
  readonly sleeper: Sleeper;
  /** 返回 false 时立即放弃并抛出该错误 */
  readonly shouldRetry?: (error: unknown, attempt: number) => boolean;
  readonly onRetry?: (info: { error: unknown; attempt: number; delayMs: number }) => void;
}

/**
 * 按策略重试异步操作
 * 耗尽或 shouldRetry 拒绝时抛出最后一次的错误
 * @param operation 接收当前尝试序号（从 1 开始）
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error, attempt) : true;
      if (!retryable || !options.policy.hasNext(attempt)) {
        throw error;
      }
      const delayMs = options.policy.backoff(attempt);
      options.onRetry?.({ error, attempt, delayMs });
      await options.sleeper.sleep(delayMs);
      attempt += 1;
    }
  }
}
