/**
 * 응답 캐시 인터페이스
 *
 * SOLID 원칙:
 * - ISP: 캐시 읽기/쓰기 전용
 * - DIP: Transport는 구현체가 아닌 추상화에 의존
 */

import type { FetchResult } from "@/core/domain/FetchResult";

export interface ICacheStore {
  /**
   * 만료되지 않은 항목 조회 (만료 항목은 반환하지 않고 삭제)
   * @returns 캐시 히트 시 fromCache=true 인 FetchResult
   */
  get(key: string): Promise<FetchResult | undefined>;

  /**
   * 항목 저장 (키 단위 원자적 쓰기)
   */
  put(key: string, result: FetchResult, ttlMs: number): Promise<void>;

  /**
   * 전체 삭제 (--reset)
   */
  clear(): Promise<void>;
}
