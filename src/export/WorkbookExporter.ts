/**
 * Workbook Exporter
 *
 * SOLID 원칙:
 * - SRP: 레코드 → 행 변환 후 잠금 하에 추가
 * - DIP: WorkbookHandle 에 저장 위임
 *
 * 동작:
 * - 출력 경로별 배타 잠금 (Mutex.runExclusive, 모든 종료 경로에서 해제)
 * - 쓰기 실패 시 잠금을 다시 획득해 1회 재시도, 그래도 실패하면 ExportError(fatal)
 * - dedupeFields 지정 시 같은 조합의 행은 건너뜀 (기존 행으로 시드)
 * - flush: 실행 종료 시 저장되지 않은 행을 잠금 하에 저장 (재시도 규칙 동일)
 */

import type { ColumnMapping } from "@/core/domain/ColumnMapping";
import type { ProductRecord } from "@/core/domain/ProductRecord";
import { ConfigError, ExportError } from "@/core/errors";
import { logger } from "@/config/logger";
import { REQUIRED_FIELDS } from "./ColumnMappingLoader";
import { buildRow, CellValue } from "./ValueTransforms";
import { WorkbookHandle } from "./WorkbookHandle";
import { getWorkbookLock } from "./WorkbookLocks";

export type ExportOutcome = "appended" | "duplicate";

export interface WorkbookExporterOptions {
  /** 조합이 유일해야 하는 필드 경로 (매핑된 필드만 가능) */
  dedupeFields?: readonly string[];
}

export class WorkbookExporter {
  private readonly dedupeFields: readonly string[];
  private readonly seenKeys = new WeakMap<WorkbookHandle, Set<string>>();

  constructor(options: WorkbookExporterOptions = {}) {
    this.dedupeFields = options.dedupeFields ?? [];
  }

  /**
   * 레코드 1건을 워크북에 추가
   * @throws {ExportError} 필수 필드 누락 (fatal=false) / 쓰기 실패 (fatal=true)
   */
  async export(
    record: ProductRecord,
    mapping: ColumnMapping,
    workbook: WorkbookHandle,
  ): Promise<ExportOutcome> {
    for (const field of REQUIRED_FIELDS) {
      if (!record[field]) {
        throw new ExportError(
          "UNMAPPED_REQUIRED_FIELD",
          `Record is missing required field ${field}: ${record.sourceUrl || record.sku}`,
          false,
        );
      }
    }

    this.assertDedupeFieldsMapped(mapping);
    const row = buildRow(record, mapping, workbook.header.length);
    const lock = getWorkbookLock(workbook.outputPath);

    try {
      return await lock.runExclusive(() => this.appendUnlocked(row, mapping, workbook));
    } catch (firstError) {
      if (firstError instanceof ExportError && firstError.reason !== "WRITE_FAILED") {
        throw firstError;
      }
      logger.warn(
        { outputPath: workbook.outputPath, sku: record.sku, error: String(firstError) },
        "워크북 쓰기 실패 - 잠금 재획득 후 재시도",
      );
    }

    try {
      return await lock.runExclusive(() => this.appendUnlocked(row, mapping, workbook));
    } catch (error) {
      throw new ExportError(
        "WRITE_FAILED",
        `Failed to append row to ${workbook.outputPath}: ${error instanceof Error ? error.message : String(error)}`,
        true,
        { cause: error },
      );
    }
  }

  /**
   * 저장되지 않은 행 저장
   * @throws {ExportError} 재시도 후에도 실패 (fatal=true)
   */
  async flush(workbook: WorkbookHandle): Promise<void> {
    if (workbook.pendingRows === 0) return;
    const lock = getWorkbookLock(workbook.outputPath);

    try {
      await lock.runExclusive(() => workbook.flush());
      return;
    } catch (firstError) {
      logger.warn(
        { outputPath: workbook.outputPath, pending: workbook.pendingRows, error: String(firstError) },
        "워크북 저장 실패 - 잠금 재획득 후 재시도",
      );
    }

    try {
      await lock.runExclusive(() => workbook.flush());
    } catch (error) {
      throw new ExportError(
        "WRITE_FAILED",
        `Failed to flush ${workbook.outputPath}: ${error instanceof Error ? error.message : String(error)}`,
        true,
        { cause: error },
      );
    }
  }

  private async appendUnlocked(
    row: CellValue[],
    mapping: ColumnMapping,
    workbook: WorkbookHandle,
  ): Promise<ExportOutcome> {
    const seen = this.seenFor(workbook, mapping);
    const key = seen ? this.dedupeKey(row, mapping) : undefined;

    if (seen && key !== undefined && seen.has(key)) {
      logger.debug({ key }, "중복 행 건너뜀");
      return "duplicate";
    }

    await workbook.append(row);
    if (seen && key !== undefined) {
      seen.add(key);
    }
    return "appended";
  }

  /**
   * 워크북별 중복 키 집합 (첫 사용 시 기존 행으로 시드)
   */
  private seenFor(workbook: WorkbookHandle, mapping: ColumnMapping): Set<string> | undefined {
    if (this.dedupeFields.length === 0) {
      return undefined;
    }

    let seen = this.seenKeys.get(workbook);
    if (!seen) {
      seen = new Set(workbook.getRows().map((row) => this.dedupeKey(row, mapping)));
      this.seenKeys.set(workbook, seen);
    }
    return seen;
  }

  private assertDedupeFieldsMapped(mapping: ColumnMapping): void {
    for (const field of this.dedupeFields) {
      if (!mapping.fields[field]) {
        throw new ConfigError(`Dedupe field is not mapped to a column: ${field}`);
      }
    }
  }

  private dedupeKey(row: readonly CellValue[], mapping: ColumnMapping): string {
    return this.dedupeFields
      .map((field) => {
        const rule = mapping.fields[field];
        return rule ? String(row[rule.columnIndex] ?? "") : "";
      })
      .join("\u0000");
  }
}
