/**
 * 필드 값 해석 + 컬럼 변환
 */

import type { ColumnMapping, ColumnTransform } from "@/core/domain/ColumnMapping";
import type { ProductRecord } from "@/core/domain/ProductRecord";

export type CellValue = string | number | boolean;

type FieldValue =
  | string
  | number
  | boolean
  | readonly string[]
  | Readonly<Record<string, string>>
  | undefined;

/**
 * 소수점 없는 통화
 */
const ZERO_DECIMAL_CURRENCIES = new Set(["KRW", "JPY", "VND", "CLP", "ISK"]);

/**
 * 필드 경로로 값 조회 (imageUrls.<n>, attributes.<key> 지원)
 */
export function resolveFieldValue(record: ProductRecord, fieldPath: string): FieldValue {
  if (fieldPath.startsWith("imageUrls.")) {
    return record.imageUrls[Number(fieldPath.slice("imageUrls.".length))];
  }
  if (fieldPath.startsWith("attributes.")) {
    return record.attributes[fieldPath.slice("attributes.".length)];
  }

  switch (fieldPath) {
    case "sku":
      return record.sku;
    case "name":
      return record.name;
    case "price":
      return record.price;
    case "currency":
      return record.currency;
    case "categoryRaw":
      return record.categoryRaw;
    case "categoryNormalized":
      return record.categoryNormalized;
    case "categoryMatched":
      return record.categoryMatched;
    case "brandRaw":
      return record.brandRaw;
    case "brandNormalized":
      return record.brandNormalized;
    case "brandMatched":
      return record.brandMatched;
    case "imageUrls":
      return record.imageUrls;
    case "attributes":
      return record.attributes;
    case "sourceUrl":
      return record.sourceUrl;
    default:
      return undefined;
  }
}

function isStringList(value: FieldValue): value is readonly string[] {
  return Array.isArray(value);
}

function toList(value: FieldValue): string[] {
  if (value === undefined || value === "") return [];
  if (isStringList(value)) return [...value];
  if (typeof value === "object") {
    return Object.entries(value).map(([key, v]) => `${key}: ${v}`);
  }
  return [String(value)];
}

function toNumber(value: FieldValue): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return NaN;
}

function toText(value: FieldValue, separator: string): string {
  if (value === undefined) return "";
  if (typeof value === "object") return toList(value).join(separator);
  return String(value);
}

/**
 * 상세 이미지 HTML 블록 (상단 + <img> 목록 + 하단)
 * URL 중복은 순서 유지하며 제거
 */
export function buildImagesHtml(urls: readonly string[], top: string, bottom: string): string {
  const images = [...new Set(urls)]
    .map((url) => `<img src='${url.replace(/'/g, "%27")}' /><br />`)
    .join("");
  return `${top}${images}${bottom}`.trim();
}

/**
 * 통화별 소수 자리 반올림
 */
export function roundCurrency(amount: number, currency: string): number {
  const digits = ZERO_DECIMAL_CURRENCIES.has(currency.toUpperCase()) ? 0 : 2;
  const factor = 10 ** digits;
  return Math.round(amount * factor) / factor;
}

/**
 * 매핑된 필드 하나를 셀 값으로 변환
 */
export function toCellValue(
  record: ProductRecord,
  fieldPath: string,
  transform: ColumnTransform | undefined,
  mapping: Pick<ColumnMapping, "joinSeparator" | "imagesHtml">,
): CellValue {
  const value = resolveFieldValue(record, fieldPath);

  switch (transform) {
    case "currency": {
      const amount = toNumber(value);
      return Number.isFinite(amount) ? roundCurrency(amount, record.currency) : "";
    }
    case "integer": {
      const amount = toNumber(value);
      return Number.isFinite(amount) ? Math.round(amount) : "";
    }
    case "join":
      return toList(value).join(mapping.joinSeparator);
    case "imagesHtml":
      return buildImagesHtml(toList(value), mapping.imagesHtml.top, mapping.imagesHtml.bottom);
    case "uppercase":
      return toText(value, mapping.joinSeparator).toUpperCase();
    case "lowercase":
      return toText(value, mapping.joinSeparator).toLowerCase();
    case undefined:
      if (typeof value === "number" || typeof value === "boolean") return value;
      return toText(value, mapping.joinSeparator);
  }
}

/**
 * 레코드 → 템플릿 헤더 너비의 행
 */
export function buildRow(
  record: ProductRecord,
  mapping: ColumnMapping,
  width: number,
): CellValue[] {
  const row: CellValue[] = new Array<CellValue>(width).fill("");
  for (const [fieldPath, rule] of Object.entries(mapping.fields)) {
    row[rule.columnIndex] = toCellValue(record, fieldPath, rule.transform, mapping);
  }
  return row;
}
