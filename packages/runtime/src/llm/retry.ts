import { CancelledError, TransientProviderError } from "../errors/index.js";

export interface RetryPolicy {
  /** 总尝试次数（含第一次） */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface RetryOptions {
  signal?: AbortSignal;
  /** 日志前缀，例如 "[PlanningEngine]" */
  label?: string;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 4_000,
  maxDelayMs: 10_000,
  multiplier: 2,
};

export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * 仅对 TransientProviderError 做指数退避重试；其余错误原样抛出。
 * 重试耗尽后抛出最后一次的 TransientProviderError。
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? abortableSleep;
  const label = options.label ?? "[Retry]";
  let attempt = 1;

  for (;;) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof TransientProviderError) || attempt >= policy.maxAttempts) {
        throw error;
      }
      const delay = computeBackoffDelay(policy, attempt);
      console.warn(
        `${label} Transient failure on attempt ${attempt}/${policy.maxAttempts}, retrying in ${delay}ms`,
        error.message
      );
      await sleep(delay, options.signal);
      attempt += 1;
    }
  }
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
