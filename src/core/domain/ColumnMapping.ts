/**
 * 컬럼 매핑 도메인 타입
 *
 * 필드 경로 → { 컬럼 (문자 "C" 또는 헤더 라벨), transform? }
 * 필드 경로: ProductRecord 필드, imageUrls.<n>, attributes.<key>
 */

export const COLUMN_TRANSFORMS = [
  "currency",
  "integer",
  "join",
  "imagesHtml",
  "uppercase",
  "lowercase",
] as const;

export type ColumnTransform = (typeof COLUMN_TRANSFORMS)[number];

export interface ColumnRule {
  /** 원본 매핑 파일의 컬럼 식별자 */
  readonly column: string;
  /** 템플릿 헤더 기준 0-based 컬럼 인덱스 */
  readonly columnIndex: number;
  readonly transform?: ColumnTransform;
}

/**
 * imagesHtml 변환 옵션 (상세 이미지 HTML 블록)
 */
export interface ImagesHtmlOptions {
  readonly top: string;
  readonly bottom: string;
}

export interface ColumnMapping {
  readonly fields: Readonly<Record<string, ColumnRule>>;
  /** join 변환 구분자 */
  readonly joinSeparator: string;
  readonly imagesHtml: ImagesHtmlOptions;
}
