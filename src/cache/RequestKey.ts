/**
 * 캐시 키 생성
 *
 * 원본 URL 문자열이 아닌 정규화된 요청 식별자 기준
 * (쿼리 파라미터 순서만 다른 요청은 같은 키)
 */

import type { FetchRequest } from "@/core/domain/FetchResult";
import { normalizeUrl } from "@/utils/url";

export function createRequestKey(
  request: Pick<FetchRequest, "url" | "method" | "render">,
): string {
  const mode = request.render ? "render" : "http";
  return `${request.method.toUpperCase()} ${normalizeUrl(request.url)} ${mode}`;
}
