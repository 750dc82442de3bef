/**
 * CrawlJob 도메인 타입
 *
 * 상태 전이:
 *   pending → in_flight → { succeeded | retrying | permanently_failed }
 *   retrying → in_flight (재시도 한도 도달 시 permanently_failed)
 */

/**
 * 페이지 종류
 * - listing/category: 상품 링크를 발견하는 페이지
 * - detail: 상품 레코드를 추출하는 페이지
 */
export type PageKind = "listing" | "detail" | "category";

export const PAGE_KINDS = ["listing", "detail", "category"] as const;

/**
 * Job 상태
 */
export type JobState =
  | "pending"
  | "in_flight"
  | "retrying"
  | "succeeded"
  | "permanently_failed";

export interface CrawlJob {
  /** 정규화된 URL의 해시 (재발견된 URL은 동일 Job으로 합쳐짐) */
  readonly id: string;
  readonly marketId: string;
  readonly url: string;
  readonly pageKind: PageKind;
  readonly depth: number;
  /** 시작 URL의 카테고리 이름 (상품 category 필드가 비었을 때 사용) */
  readonly category?: string;
  /** Resilience 계층이 증가시킴 (연기 후에도 초기화되지 않음) */
  attemptCount: number;
  state: JobState;
  /** CircuitOpenError로 연기된 횟수 */
  deferrals: number;
  failureReason?: string;
}

/**
 * 상품 링크를 발견하는 페이지인지 여부
 */
export function isDiscoveryPage(kind: PageKind): boolean {
  return kind === "listing" || kind === "category";
}
