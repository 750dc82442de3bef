/**
 * 에러 분류
 *
 * - timeout / connection_failed / render_failed / HTTP 5xx → transient
 * - HTTP 429 → transient (Retry-After 가 있으면 그 지연을 사용)
 * - 그 외 HTTP 4xx → permanent
 * - cancelled → permanent (재시도 안 함)
 * - 알 수 없는 에러 → permanent
 */

import {
  CircuitOpenError,
  ExportError,
  ExtractionError,
  TransportError,
} from "@/core/errors";

export type ErrorClass = "transient" | "permanent";

export interface Classification {
  kind: ErrorClass;
  /** 서버가 제시한 재시도 지연 (밀리초) */
  delayMs?: number;
  /**
   * 서킷 브레이커 집계 방식
   * - failure: 호스트 장애로 집계
   * - success: 호스트가 정상 응답함 (예: 404)
   * - neutral: 집계하지 않음 (취소, 내부 에러)
   */
  hostHealth: "failure" | "success" | "neutral";
}

export function classifyError(error: unknown): Classification {
  if (!(error instanceof TransportError)) {
    return { kind: "permanent", hostHealth: "neutral" };
  }

  switch (error.kind) {
    case "timeout":
    case "connection_failed":
    case "render_failed":
      return { kind: "transient", hostHealth: "failure" };

    case "cancelled":
      return { kind: "permanent", hostHealth: "neutral" };

    case "http_status": {
      const status = error.status ?? 0;
      if (status === 429 || status >= 500) {
        return {
          kind: "transient",
          delayMs: error.retryAfterMs,
          hostHealth: "failure",
        };
      }
      return { kind: "permanent", hostHealth: "success" };
    }
  }
}

/**
 * 리포트/데드레터용 실패 사유 라벨
 */
export function describeFailure(error: unknown): string {
  if (error instanceof TransportError) {
    return error.kind === "http_status" ? `http_${error.status ?? "unknown"}` : error.kind;
  }
  if (error instanceof CircuitOpenError) {
    return "circuit_open";
  }
  if (error instanceof ExtractionError) {
    return error.reason.toLowerCase();
  }
  if (error instanceof ExportError) {
    return `export_${error.reason.toLowerCase()}`;
  }
  return "unknown";
}
