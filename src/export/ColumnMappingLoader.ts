/**
 * Column Mapping Loader
 *
 * 매핑 파일 형식 (둘 다 지원):
 * 1. { "columns": { "<필드 경로>": "헤더 라벨" | { "column": "C", "transform": "currency" } },
 *      "joinSeparator": "|", "imagesHtml": { "top": "...", "bottom": "..." } }
 * 2. { "<필드 경로>": "헤더 라벨", ... }  (columns 키 없이 평면 매핑)
 *
 * 필드 경로: ProductRecord 필드, imageUrls.<n>, attributes.<key>
 * 컬럼 식별자: 템플릿 헤더 라벨 (공백 차이 무시) 또는 대문자 열 문자(A, AB)
 *   헤더 라벨이 우선 ("SKU", "URL" 같은 라벨도 라벨로 해석)
 *
 * 로드 시 검증:
 * - sku, sourceUrl 미매핑 → ExportError(UNMAPPED_REQUIRED_FIELD)
 * - 알 수 없는 필드 경로/헤더 라벨, 헤더 범위 밖 열, 열 중복 → ConfigError
 */

import * as fs from "fs";
import { z } from "zod";
import {
  COLUMN_TRANSFORMS,
  ColumnMapping,
  ColumnRule,
} from "@/core/domain/ColumnMapping";
import { PRODUCT_RECORD_FIELDS } from "@/core/domain/ProductRecord";
import { ConfigError, ExportError } from "@/core/errors";

export const REQUIRED_FIELDS = ["sku", "sourceUrl"] as const;

const ColumnRuleSchema = z.union([
  z.string().min(1),
  z.object({
    column: z.string().min(1),
    transform: z.enum(COLUMN_TRANSFORMS).optional(),
  }),
]);

const ColumnMappingFileSchema = z.object({
  columns: z.record(ColumnRuleSchema),
  joinSeparator: z.string().default("|"),
  imagesHtml: z
    .object({
      top: z.string().default(""),
      bottom: z.string().default(""),
    })
    .default({}),
});

const COLUMN_LETTERS = /^[A-Z]{1,3}$/;
const FIELD_PATH = new RegExp(
  `^(?:${PRODUCT_RECORD_FIELDS.join("|")}|imageUrls\\.\\d+|attributes\\..+)$`,
);

/**
 * 열 문자 → 0-based 인덱스 (A=0, Z=25, AA=26)
 */
export function columnLetterToIndex(letters: string): number {
  let index = 0;
  for (const char of letters) {
    index = index * 26 + (char.charCodeAt(0) - 64);
  }
  return index - 1;
}

function normalizeLabel(label: string): string {
  return label.replace(/\s+/g, " ").trim();
}

export class ColumnMappingLoader {
  /**
   * 파일에서 매핑 로드
   * @param header 템플릿 헤더 (라벨 해석용)
   */
  static load(filePath: string, header: readonly string[]): ColumnMapping {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Column mapping file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Invalid column mapping JSON: ${filePath}`, { cause: error });
    }
    return this.parse(raw, header);
  }

  /**
   * 파싱 + 검증 (불변 객체 반환)
   */
  static parse(raw: unknown, header: readonly string[]): ColumnMapping {
    const candidate =
      typeof raw === "object" && raw !== null && !("columns" in raw)
        ? { columns: raw }
        : raw;

    const parsed = ColumnMappingFileSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid column mapping: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      );
    }

    const labels = new Map<string, number>();
    header.forEach((label, index) => {
      const key = normalizeLabel(label);
      if (key && !labels.has(key)) labels.set(key, index);
    });

    const fields: Record<string, ColumnRule> = {};
    const usedColumns = new Map<number, string>();

    for (const [fieldPath, rule] of Object.entries(parsed.data.columns)) {
      if (!FIELD_PATH.test(fieldPath)) {
        throw new ConfigError(`Unknown field path in column mapping: ${fieldPath}`);
      }

      const { column, transform } = typeof rule === "string" ? { column: rule, transform: undefined } : rule;
      const columnIndex = this.resolveColumn(column, labels, header.length);

      const previous = usedColumns.get(columnIndex);
      if (previous !== undefined) {
        throw new ConfigError(`Column ${column} is mapped twice (${previous}, ${fieldPath})`);
      }
      usedColumns.set(columnIndex, fieldPath);

      fields[fieldPath] = Object.freeze({ column, columnIndex, transform });
    }

    for (const required of REQUIRED_FIELDS) {
      if (!fields[required]) {
        throw new ExportError(
          "UNMAPPED_REQUIRED_FIELD",
          `Required field is not mapped: ${required}`,
          true,
        );
      }
    }

    return Object.freeze({
      fields: Object.freeze(fields),
      joinSeparator: parsed.data.joinSeparator,
      imagesHtml: Object.freeze({ ...parsed.data.imagesHtml }),
    });
  }

  private static resolveColumn(
    column: string,
    labels: ReadonlyMap<string, number>,
    headerWidth: number,
  ): number {
    const index =
      labels.get(normalizeLabel(column)) ??
      (COLUMN_LETTERS.test(column) ? columnLetterToIndex(column) : undefined);

    if (index === undefined) {
      throw new ConfigError(`Unknown header label in column mapping: ${JSON.stringify(column)}`);
    }
    if (index >= headerWidth) {
      throw new ConfigError(`Column ${column} is outside the template header (${headerWidth} columns)`);
    }
    return index;
  }
}
