/**
 * Resilience Executor
 *
 * Transport 호출을 재시도/백오프/서킷 브레이커로 감싸는 실행기
 *
 * - 시도 횟수는 호출자가 넘긴 카운터(CrawlJob.attemptCount)에 누적
 *   → Job이 연기되었다가 다시 실행되어도 상한이 초기화되지 않음
 * - 매 시도 전에 서킷 확인, open 이면 operation 호출 없이 CircuitOpenError
 * - 모든 상태는 호스트 단위
 * - 캐시 응답(fromCache)은 호스트에 요청하지 않았으므로 서킷 집계에서 제외
 */

import { CircuitOpenError, TransportError } from "@/core/errors";
import { logger } from "@/config/logger";
import { sleep as defaultSleep } from "@/utils/sleep";
import { BackoffPolicy } from "./BackoffPolicy";
import { CircuitBreaker } from "./CircuitBreaker";
import { classifyError } from "./ErrorClassifier";

function isCacheHit(value: unknown): boolean {
  return typeof value === "object" && value !== null && "fromCache" in value && value.fromCache === true;
}

export interface AttemptCounter {
  attemptCount: number;
}

export interface RetryInfo {
  host: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface ExecuteOptions {
  attempts: AttemptCounter;
  signal?: AbortSignal;
  onRetry?: (info: RetryInfo) => void;
}

export interface ResilienceExecutorOptions {
  maxAttempts: number;
  backoff: BackoffPolicy;
  circuitBreaker: CircuitBreaker;
  /** 테스트용 sleep 주입 */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class ResilienceExecutor {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: ResilienceExecutorOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer: ${options.maxAttempts}`);
    }
    this.sleep = options.sleep ?? defaultSleep;
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /**
   * @throws 재시도 소진/영구 에러 시 마지막 에러, 서킷 open 시 CircuitOpenError
   */
  async execute<T>(
    host: string,
    operation: () => Promise<T>,
    { attempts, signal, onRetry }: ExecuteOptions,
  ): Promise<T> {
    const { maxAttempts, backoff, circuitBreaker } = this.options;

    for (;;) {
      if (signal?.aborted) {
        throw new TransportError("cancelled", host, { message: `Cancelled before request to ${host}` });
      }
      if (attempts.attemptCount >= maxAttempts) {
        throw new Error(`Attempt ceiling already reached (${attempts.attemptCount}/${maxAttempts})`);
      }

      const gate = circuitBreaker.tryAcquire(host);
      if (!gate.allowed) {
        throw new CircuitOpenError(host, gate.retryAfterMs);
      }

      attempts.attemptCount++;
      let failure: unknown;
      try {
        const result = await operation();
        if (isCacheHit(result)) {
          circuitBreaker.recordNeutral(host);
        } else {
          circuitBreaker.recordSuccess(host);
        }
        return result;
      } catch (error) {
        failure = error;
      }

      const classification = classifyError(failure);
      if (classification.hostHealth === "failure") {
        circuitBreaker.recordFailure(host);
      } else if (classification.hostHealth === "success") {
        circuitBreaker.recordSuccess(host);
      } else {
        circuitBreaker.recordNeutral(host);
      }

      if (classification.kind === "permanent" || attempts.attemptCount >= maxAttempts) {
        throw failure;
      }

      const delayMs =
        classification.delayMs !== undefined
          ? backoff.clamp(classification.delayMs)
          : backoff.delayFor(attempts.attemptCount);

      logger.debug(
        { host, attempt: attempts.attemptCount, maxAttempts, delayMs },
        "일시적 에러 - 재시도 대기",
      );
      onRetry?.({
        host,
        attempt: attempts.attemptCount,
        maxAttempts,
        delayMs,
        error: failure,
      });

      try {
        await this.sleep(delayMs, signal);
      } catch {
        throw new TransportError("cancelled", host, { message: `Cancelled during backoff for ${host}` });
      }
    }
  }
}
