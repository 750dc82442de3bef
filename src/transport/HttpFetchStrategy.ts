/**
 * HTTP Fetch 전략
 * 정적 HTML / JSON 엔드포인트용 (Node fetch)
 *
 * SOLID 원칙:
 * - SRP: HTTP 요청 실행과 응답 분류만 담당
 * - LSP: ITransportStrategy 구현체로 대체 가능
 */

import type { ITransportStrategy } from "@/core/interfaces/ITransportStrategy";
import type { FetchRequest, FetchResult } from "@/core/domain/FetchResult";
import { TransportError } from "@/core/errors";
import { TRANSPORT_CONFIG } from "@/config/constants";
import { getTimestampWithTimezone } from "@/utils/timestamp";
import { parseRetryAfter } from "./RetryAfter";

/**
 * Retry-After 를 해석하는 상태 코드
 */
const RETRY_AFTER_STATUSES = new Set([429, 503]);

export class HttpFetchStrategy implements ITransportStrategy {
  readonly name = "http";

  constructor(private readonly userAgent: string = TRANSPORT_CONFIG.USER_AGENT) {}

  async fetch(request: FetchRequest, signal: AbortSignal): Promise<FetchResult> {
    let response: Response;
    let body: string;

    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: { "User-Agent": this.userAgent, ...request.headers },
        redirect: "follow",
        signal,
      });
      body = await response.text();
    } catch (error) {
      // 타임아웃/취소는 Transport가 신호의 reason으로 분류
      if (signal.aborted) {
        throw signal.reason;
      }
      throw new TransportError("connection_failed", request.url, {
        message: `Connection failed for ${request.url}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }

    if (!response.ok) {
      throw new TransportError("http_status", request.url, {
        status: response.status,
        retryAfterMs: RETRY_AFTER_STATUSES.has(response.status)
          ? parseRetryAfter(response.headers.get("retry-after"))
          : undefined,
      });
    }

    return {
      url: response.url || request.url,
      status: response.status,
      body,
      fetchedAt: getTimestampWithTimezone(),
      fromCache: false,
    };
  }
}
