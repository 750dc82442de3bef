/**
 * URL 정규화 유틸리티
 *
 * 규칙:
 * 1. 호스트 소문자화
 * 2. 기본 포트 제거 (http:80, https:443)
 * 3. fragment(#...) 제거
 * 4. 쿼리 파라미터 정렬 (순서만 다른 URL은 동일 취급)
 */

import { createHash } from "crypto";

/**
 * URL 정규화
 * @throws {TypeError} 유효하지 않은 URL
 */
export function normalizeUrl(url: string): string {
  const parsed = new URL(url);

  // WHATWG URL은 hostname을 이미 소문자화하고 기본 포트를 비움
  parsed.hostname = parsed.hostname.toLowerCase();
  if (
    (parsed.protocol === "http:" && parsed.port === "80") ||
    (parsed.protocol === "https:" && parsed.port === "443")
  ) {
    parsed.port = "";
  }

  parsed.hash = "";
  parsed.searchParams.sort();

  return parsed.toString();
}

/**
 * 호스트 추출 (호스트별 동시성/서킷 상태 키)
 */
export function getHost(url: string): string {
  return new URL(url).host.toLowerCase();
}

/**
 * 상대 URL을 기준 URL로 해석 (실패 시 undefined)
 */
export function resolveUrl(href: string, baseUrl: string): string | undefined {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("javascript:") || trimmed.startsWith("data:")) {
    return undefined;
  }

  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
      return undefined;
    }
    return resolved.toString();
  } catch {
    return undefined;
  }
}

/**
 * http(s) URL 여부
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Job ID: 정규화된 URL의 SHA-1
 */
export function createJobId(url: string): string {
  return createHash("sha1").update(normalizeUrl(url)).digest("hex");
}
