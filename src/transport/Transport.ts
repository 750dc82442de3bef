/**
 * Transport
 *
 * HTTP / 브라우저 렌더링 전략을 하나의 fetch 인터페이스로 통합
 *
 * 처리 순서:
 * 1. 캐시 조회 (read-through, 히트 시 네트워크 요청 없음)
 * 2. 호스트별 동시성 슬롯 대기
 * 3. 슬롯 획득 시점부터 wall-clock 타임아웃 시작
 * 4. 성공 응답은 캐시에 비동기 저장 (실패해도 fetch 결과에 영향 없음)
 *
 * 실행 취소 신호(signal)가 오면 진행 중인 요청은 즉시 cancelled 로 실패
 */

import type { ITransportStrategy } from "@/core/interfaces/ITransportStrategy";
import type { ICacheStore } from "@/core/interfaces/ICacheStore";
import type { FetchRequest, FetchResult } from "@/core/domain/FetchResult";
import { TransportError } from "@/core/errors";
import { createRequestKey } from "@/cache/RequestKey";
import { getHost } from "@/utils/url";
import { logger } from "@/config/logger";
import { HostConcurrencyLimiter } from "./HostConcurrencyLimiter";

export interface TransportOptions {
  http: ITransportStrategy;
  /** 미지정 시 render=true 요청은 render_failed */
  browser?: ITransportStrategy;
  cache?: ICacheStore;
  cacheTtlMs: number;
  limiter: HostConcurrencyLimiter;
  timeoutMs: number;
}

export interface TransportFetchOptions {
  signal?: AbortSignal;
}

export class Transport {
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(private readonly options: TransportOptions) {}

  async fetch(
    request: FetchRequest,
    fetchOptions: TransportFetchOptions = {},
  ): Promise<FetchResult> {
    const { signal } = fetchOptions;
    if (signal?.aborted) {
      throw new TransportError("cancelled", request.url);
    }

    const key = createRequestKey(request);
    const cached = await this.readCache(key);
    if (cached) {
      logger.debug({ url: request.url }, "캐시 히트");
      return cached;
    }

    const result = await this.options.limiter.run(getHost(request.url), () => {
      // 대기열에 있는 동안 취소된 경우
      if (signal?.aborted) {
        return Promise.reject(new TransportError("cancelled", request.url));
      }
      return this.fetchWithTimeout(request, signal);
    });

    this.writeCache(key, result);
    return result;
  }

  /**
   * 캐시만 조회 (네트워크 요청 없음)
   *
   * 서킷/재시도 계층을 거치기 전에 캐시 응답을 확인할 때 사용
   */
  async lookup(request: FetchRequest): Promise<FetchResult | undefined> {
    return this.readCache(createRequestKey(request));
  }

  /**
   * 진행 중인 캐시 쓰기 완료 대기 (종료 직전 호출)
   */
  async drain(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  private async fetchWithTimeout(
    request: FetchRequest,
    parentSignal: AbortSignal | undefined,
  ): Promise<FetchResult> {
    const strategy = this.selectStrategy(request);
    const controller = new AbortController();
    const { timeoutMs } = this.options;

    const timer = setTimeout(() => {
      controller.abort(
        new TransportError("timeout", request.url, {
          message: `Request timeout after ${timeoutMs}ms: ${request.url}`,
        }),
      );
    }, timeoutMs);
    const onParentAbort = () => {
      controller.abort(new TransportError("cancelled", request.url));
    };
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });

    // 전략이 신호를 무시하더라도 타임아웃/취소 시점에 바로 실패
    let rejectOnAbort: (reason: unknown) => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      rejectOnAbort = reject;
    });
    const onAbort = () => rejectOnAbort(controller.signal.reason);
    controller.signal.addEventListener("abort", onAbort, { once: true });

    const pending = strategy.fetch(request, controller.signal);
    pending.catch((error: unknown) => {
      if (controller.signal.aborted) {
        logger.debug(
          { url: request.url, error: String(error) },
          "중단된 요청의 후속 에러",
        );
      }
    });

    try {
      return await Promise.race([pending, aborted]);
    } catch (error) {
      if (controller.signal.aborted && controller.signal.reason instanceof TransportError) {
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener("abort", onParentAbort);
      controller.signal.removeEventListener("abort", onAbort);
    }
  }

  private selectStrategy(request: FetchRequest): ITransportStrategy {
    if (!request.render) {
      return this.options.http;
    }
    if (!this.options.browser) {
      throw new TransportError("render_failed", request.url, {
        message: `Browser rendering is not configured: ${request.url}`,
      });
    }
    return this.options.browser;
  }

  /**
   * 캐시 조회 실패는 miss 로 취급
   */
  private async readCache(key: string): Promise<FetchResult | undefined> {
    if (!this.options.cache) return undefined;
    try {
      return await this.options.cache.get(key);
    } catch (error) {
      logger.warn({ key, error: String(error) }, "캐시 조회 실패 - 네트워크 요청으로 진행");
      return undefined;
    }
  }

  /**
   * fire-and-forget 캐시 저장 (에러는 로그만)
   */
  private writeCache(key: string, result: FetchResult): void {
    const { cache, cacheTtlMs } = this.options;
    if (!cache) return;

    const write = cache
      .put(key, result, cacheTtlMs)
      .catch((error: unknown) => {
        logger.warn({ key, error: String(error) }, "캐시 저장 실패");
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }
}
