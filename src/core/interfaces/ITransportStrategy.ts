/**
 * Transport 전략 인터페이스
 *
 * SOLID 원칙:
 * - OCP: 새로운 fetch 방식은 전략 추가로 확장
 * - LSP: HTTP/브라우저 전략은 서로 대체 가능
 */

import type { FetchRequest, FetchResult } from "@/core/domain/FetchResult";

export interface ITransportStrategy {
  readonly name: string;

  /**
   * 요청 실행
   * @param signal 타임아웃 + 실행 취소가 결합된 신호
   * @throws {TransportError} http_status / connection_failed / render_failed
   */
  fetch(request: FetchRequest, signal: AbortSignal): Promise<FetchResult>;
}
