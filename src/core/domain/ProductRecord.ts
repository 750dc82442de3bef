/**
 * 상품 레코드 도메인 타입
 */

/**
 * 어댑터가 페이지에서 뽑아낸 원시 필드
 * 값이 없으면 undefined (추출 단계에서 필수 필드 검증)
 */
export interface RawProductFields {
  sku?: string;
  name?: string;
  price?: string;
  currency?: string;
  category?: string;
  brand?: string;
  imageUrls?: string[];
  attributes?: Record<string, string>;
}

/**
 * 정규화된 상품 레코드 (Export에서는 읽기 전용)
 */
export interface ProductRecord {
  readonly sku: string;
  readonly name: string;
  readonly price: number;
  readonly currency: string;
  readonly categoryRaw: string;
  readonly categoryNormalized: string;
  /** false면 임계값 미달로 원본 값 유지 */
  readonly categoryMatched: boolean;
  readonly brandRaw: string;
  readonly brandNormalized: string;
  readonly brandMatched: boolean;
  readonly imageUrls: readonly string[];
  readonly attributes: Readonly<Record<string, string>>;
  readonly sourceUrl: string;
}

/**
 * 컬럼 매핑에서 참조 가능한 최상위 필드
 */
export const PRODUCT_RECORD_FIELDS = [
  "sku",
  "name",
  "price",
  "currency",
  "categoryRaw",
  "categoryNormalized",
  "categoryMatched",
  "brandRaw",
  "brandNormalized",
  "brandMatched",
  "imageUrls",
  "attributes",
  "sourceUrl",
] as const;

export type ProductRecordField = (typeof PRODUCT_RECORD_FIELDS)[number];
