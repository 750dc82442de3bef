/**
 * 브라우저 렌더링 전략
 * 스크립트 실행이 필요한 페이지용 (Playwright + Stealth)
 *
 * SOLID 원칙:
 * - SRP: 페이지 렌더링 후 HTML 수집만 담당
 * - DIP: IBrowserPool 추상화에 의존 (테스트에서 가짜 Pool 주입)
 */

import type { ITransportStrategy } from "@/core/interfaces/ITransportStrategy";
import type { IBrowserPool, WaitUntil } from "@/core/interfaces/IBrowserPool";
import type { FetchRequest, FetchResult } from "@/core/domain/FetchResult";
import { TransportError } from "@/core/errors";
import { logger } from "@/config/logger";
import { getTimestampWithTimezone } from "@/utils/timestamp";

export interface BrowserRenderOptions {
  /** 페이지 이동 타임아웃 (Transport의 wall-clock 타임아웃과 별개) */
  navigationTimeoutMs: number;
  waitUntil?: WaitUntil;
}

export class BrowserRenderStrategy implements ITransportStrategy {
  readonly name = "browser";

  constructor(
    private readonly pool: IBrowserPool,
    private readonly options: BrowserRenderOptions,
  ) {}

  async fetch(request: FetchRequest, signal: AbortSignal): Promise<FetchResult> {
    const pooled = await this.pool.acquirePage();
    const { page } = pooled;

    // 브라우저 대기 중 타임아웃/취소된 요청은 이동하지 않고 반납
    if (signal.aborted) {
      await pooled.release();
      throw signal.reason;
    }

    // 취소 시 페이지를 닫아 진행 중인 navigation 중단
    const onAbort = () => {
      page.close().catch((error: unknown) => {
        logger.debug({ error: String(error) }, "취소된 페이지 종료 실패");
      });
    };
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      let status: number;
      let body: string;
      try {
        if (Object.keys(request.headers).length > 0) {
          await page.setExtraHTTPHeaders({ ...request.headers });
        }
        const response = await page.goto(request.url, {
          timeout: this.options.navigationTimeoutMs,
          waitUntil: this.options.waitUntil ?? "domcontentloaded",
        });
        // 같은 문서 내 이동 등 응답이 없으면 렌더링 성공으로 간주
        status = response ? response.status() : 200;
        body = await page.content();
      } catch (error) {
        if (signal.aborted) {
          throw signal.reason;
        }
        throw new TransportError("render_failed", request.url, {
          message: `Render failed for ${request.url}: ${error instanceof Error ? error.message : String(error)}`,
          cause: error,
        });
      }

      if (status >= 400) {
        throw new TransportError("http_status", request.url, { status });
      }

      return {
        url: request.url,
        status,
        body,
        fetchedAt: getTimestampWithTimezone(),
        fromCache: false,
      };
    } finally {
      signal.removeEventListener("abort", onAbort);
      await pooled.release();
    }
  }
}
