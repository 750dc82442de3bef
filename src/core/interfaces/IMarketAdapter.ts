/**
 * Market Adapter 인터페이스
 *
 * Orchestrator는 이 계약에만 의존하며 특정 마켓 로직을 알지 못함.
 * 어댑터는 반환 데이터로만 엔진과 소통 (엔진 콜백 없음)
 */

import type { PageKind } from "@/core/domain/CrawlJob";
import type { FetchResult } from "@/core/domain/FetchResult";
import type { RawProductFields } from "@/core/domain/ProductRecord";

export interface PageLink {
  url: string;
  kind: PageKind;
  /** 카테고리 이름 (없으면 발견한 페이지의 카테고리를 이어받음) */
  category?: string;
}

/**
 * 발견된 링크: 문자열은 상세 페이지
 */
export type DiscoveredLink = string | PageLink;

/**
 * 어댑터에 전달되는 페이지 (fetch 결과 + 페이지 종류)
 */
export interface MarketPage extends FetchResult {
  readonly kind: PageKind;
  /** 시작 URL에서 이어받은 카테고리 이름 */
  readonly category?: string;
}

export interface IMarketAdapter {
  readonly id: string;

  /**
   * 시작 URL 목록 (카테고리/목록 페이지)
   */
  seedUrls(): PageLink[];

  /**
   * 페이지에서 추가로 방문할 URL (상품 링크, 다음 페이지)
   */
  nextUrls(page: MarketPage): DiscoveredLink[];

  /**
   * 페이지에서 원시 상품 필드 추출 (목록 페이지는 보통 빈 배열)
   */
  extract(page: MarketPage): RawProductFields[];

  /**
   * 페이지 종류별 브라우저 렌더링 필요 여부 (미구현 시 false)
   */
  renderFor?(kind: PageKind): boolean;

  /**
   * 요청 헤더 (미구현 시 기본 헤더)
   */
  headersFor?(kind: PageKind): Record<string, string>;
}
