/**
 * Workbook Handle
 *
 * 실행당 한 번 템플릿(xlsx/csv) 워크북을 읽어 출력 워크북으로 사용
 * - 첫 시트: 헤더 행과 시트 속성(열 너비, 헤더 병합, 서식)만 남기고 데이터 행은 제거
 * - 나머지 시트는 그대로 유지
 * - 이후에는 데이터 행 추가만 허용 (sheet_add_aoa, origin: -1)
 *
 * 저장:
 * - flushEveryRows 행마다 워크북 전체를 원자적으로 저장 (임시 파일 + rename)
 * - 그 사이 추가된 행은 저널(JSONL)에 한 줄씩 기록, 저장 후 저널 삭제
 * - 재개 시 기존 출력 + 저널 행을 합쳐 다시 저장
 * - 저장 실패 시 메모리 상태를 되돌림 (재시도 시 중복 행 방지)
 * - 동시 추가 직렬화는 호출자(WorkbookExporter)의 잠금이 담당
 */

import * as fs from "fs";
import * as fsPromises from "fs/promises";
import * as path from "path";
import * as XLSX from "xlsx";
import { z } from "zod";
import { ExportError } from "@/core/errors";
import { isNotFoundError, writeFileAtomic } from "@/utils/fileSystem";
import { logger } from "@/config/logger";
import type { CellValue } from "./ValueTransforms";

export type WorkbookFileWriter = (filePath: string, data: Uint8Array) => Promise<void>;
export type JournalWriter = (filePath: string, line: string) => Promise<void>;

export interface OpenWorkbookOptions {
  templatePath: string;
  outputPath: string;
  /** 기존 출력 파일이 있으면 이어서 추가 */
  resume?: boolean;
  /** 워크북 저장 간격 (행 수, 기본 1 = 매 행 저장) */
  flushEveryRows?: number;
  /** 테스트용 저장 함수 주입 */
  writeFile?: WorkbookFileWriter;
  appendJournal?: JournalWriter;
}

const JournalRowSchema = z.array(z.union([z.string(), z.number(), z.boolean()]));

async function appendLine(filePath: string, line: string): Promise<void> {
  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
  await fsPromises.appendFile(filePath, line, "utf-8");
}

function readWorkbook(filePath: string): XLSX.WorkBook {
  return path.extname(filePath).toLowerCase() === ".csv"
    ? XLSX.read(fs.readFileSync(filePath, "utf-8").replace(/^\uFEFF/, ""), { type: "string" })
    : XLSX.read(fs.readFileSync(filePath), { type: "buffer", cellStyles: true });
}

function firstSheet(workbook: XLSX.WorkBook, filePath: string): XLSX.WorkSheet {
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new ExportError("TEMPLATE_INVALID", `Workbook has no sheet: ${filePath}`, true);
  }
  return sheet;
}

function sheetRows(sheet: XLSX.WorkSheet): string[][] {
  return XLSX.utils
    .sheet_to_json<unknown[]>(sheet, { header: 1, defval: "", raw: false, blankrows: false })
    .map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
}

/**
 * 시트의 마지막 행 인덱스 (0-based, 빈 시트면 -1)
 */
function lastRowIndex(sheet: XLSX.WorkSheet): number {
  const ref = sheet["!ref"];
  return ref ? XLSX.utils.decode_range(ref).e.r : -1;
}

/**
 * lastRow 아래의 셀/병합 제거
 */
function truncateSheet(sheet: XLSX.WorkSheet, lastRow: number): void {
  const ref = sheet["!ref"];
  if (!ref) return;

  const range = XLSX.utils.decode_range(ref);
  if (range.e.r <= lastRow) return;

  for (const address of Object.keys(sheet)) {
    if (address.startsWith("!")) continue;
    if (XLSX.utils.decode_cell(address).r > lastRow) {
      delete sheet[address];
    }
  }
  sheet["!ref"] = XLSX.utils.encode_range({ s: range.s, e: { r: Math.max(lastRow, range.s.r), c: range.e.c } });

  const merges = sheet["!merges"];
  if (merges) {
    sheet["!merges"] = merges.filter((merge) => merge.e.r <= lastRow);
  }
}

function sameHeader(a: readonly string[], b: readonly string[]): boolean {
  const normalize = (label: string) => label.replace(/\s+/g, " ").trim();
  return a.length === b.length && a.every((label, i) => normalize(label) === normalize(b[i]));
}

interface HandleState {
  outputPath: string;
  header: readonly string[];
  workbook: XLSX.WorkBook;
  sheet: XLSX.WorkSheet;
  rows: CellValue[][];
  flushEveryRows: number;
  writeFile: WorkbookFileWriter;
  appendJournal: JournalWriter;
}

export class WorkbookHandle {
  readonly outputPath: string;
  readonly header: readonly string[];
  readonly journalPath: string;

  private readonly workbook: XLSX.WorkBook;
  private readonly sheet: XLSX.WorkSheet;
  private readonly rows: CellValue[][];
  private readonly flushEveryRows: number;
  private readonly writeFile: WorkbookFileWriter;
  private readonly appendJournal: JournalWriter;
  /** 시트에 반영된 데이터 행 수 */
  private rowsInSheet: number;

  private constructor(state: HandleState) {
    this.outputPath = state.outputPath;
    this.header = state.header;
    this.journalPath = `${state.outputPath}.journal.jsonl`;
    this.workbook = state.workbook;
    this.sheet = state.sheet;
    this.rows = state.rows;
    this.flushEveryRows = state.flushEveryRows;
    this.writeFile = state.writeFile;
    this.appendJournal = state.appendJournal;
    this.rowsInSheet = state.rows.length;
  }

  /**
   * 템플릿 복제 (또는 재개 시 기존 출력 로드)
   * @throws {ExportError} 템플릿 헤더가 없거나 기존 출력과 헤더가 다를 때 (fatal)
   */
  static async open(options: OpenWorkbookOptions): Promise<WorkbookHandle> {
    const outputPath = path.resolve(options.outputPath);
    const flushEveryRows = options.flushEveryRows ?? 1;
    if (!Number.isInteger(flushEveryRows) || flushEveryRows < 1) {
      throw new Error(`flushEveryRows must be a positive integer: ${flushEveryRows}`);
    }

    if (!fs.existsSync(options.templatePath)) {
      throw new ExportError("TEMPLATE_INVALID", `Template file not found: ${options.templatePath}`, true);
    }

    const template = readWorkbook(options.templatePath);
    const templateSheet = firstSheet(template, options.templatePath);
    const header = sheetRows(templateSheet)[0];
    if (!header || header.every((label) => label.trim() === "")) {
      throw new ExportError("TEMPLATE_INVALID", `Template has no header row: ${options.templatePath}`, true);
    }

    const common = {
      outputPath,
      header,
      flushEveryRows,
      writeFile: options.writeFile ?? writeFileAtomic,
      appendJournal: options.appendJournal ?? appendLine,
    };

    if (options.resume && fs.existsSync(outputPath)) {
      return this.resume(common);
    }

    // 템플릿의 데이터 행 제거 (헤더 + 추가 행만 허용)
    const headerRow = XLSX.utils.decode_range(templateSheet["!ref"] ?? "A1").s.r;
    truncateSheet(templateSheet, headerRow);

    const handle = new WorkbookHandle({ ...common, workbook: template, sheet: templateSheet, rows: [] });
    await fsPromises.rm(handle.journalPath, { force: true });
    try {
      await handle.writeWorkbook();
    } catch (error) {
      throw new ExportError("WRITE_FAILED", `Failed to create output workbook: ${outputPath}`, true, { cause: error });
    }

    logger.info({ outputPath, columns: header.length }, "템플릿 복제 완료");
    return handle;
  }

  private static async resume(
    common: Omit<HandleState, "workbook" | "sheet" | "rows">,
  ): Promise<WorkbookHandle> {
    const { outputPath, header } = common;
    const existing = readWorkbook(outputPath);
    const sheet = firstSheet(existing, outputPath);
    const [existingHeader = [], ...dataRows] = sheetRows(sheet);
    if (!sameHeader(existingHeader, header)) {
      throw new ExportError(
        "TEMPLATE_INVALID",
        `Existing output header does not match template: ${outputPath}`,
        true,
      );
    }

    const rows = dataRows.map((row) =>
      Array.from({ length: header.length }, (_, i): CellValue => row[i] ?? ""),
    );
    const handle = new WorkbookHandle({ ...common, workbook: existing, sheet, rows });

    const journalRows = await handle.readJournal();
    if (journalRows.length > 0) {
      handle.rows.push(...journalRows);
      try {
        await handle.flush();
      } catch (error) {
        throw new ExportError("WRITE_FAILED", `Failed to merge journal into ${outputPath}`, true, { cause: error });
      }
    }

    logger.info(
      { outputPath, existingRows: handle.rows.length, journalRows: journalRows.length },
      "기존 출력 워크북 이어쓰기",
    );
    return handle;
  }

  /**
   * 데이터 행 수 (헤더 제외)
   */
  get rowCount(): number {
    return this.rows.length;
  }

  /**
   * 아직 워크북 파일에 저장되지 않은 행 수
   */
  get pendingRows(): number {
    return this.rows.length - this.rowsInSheet;
  }

  /**
   * 기존 데이터 행 (중복 제거 시드용)
   */
  getRows(): ReadonlyArray<readonly CellValue[]> {
    return this.rows;
  }

  /**
   * 행 추가 (실패 시 메모리 상태 복구 후 에러 전파)
   *
   * 저장 간격에 도달하면 워크북 저장, 아니면 저널에만 기록
   */
  async append(row: readonly CellValue[]): Promise<void> {
    if (row.length !== this.header.length) {
      throw new ExportError(
        "WRITE_FAILED",
        `Row width ${row.length} does not match header width ${this.header.length}`,
        true,
      );
    }

    this.rows.push([...row]);
    try {
      if (this.pendingRows >= this.flushEveryRows) {
        await this.flush();
      } else {
        await this.appendJournal(this.journalPath, `${JSON.stringify(row)}\n`);
      }
    } catch (error) {
      this.rows.pop();
      throw error;
    }
  }

  /**
   * 저장되지 않은 행을 시트에 반영하고 워크북 저장 (실패 시 시트 복구)
   */
  async flush(): Promise<void> {
    if (this.pendingRows === 0) return;

    const lastRow = lastRowIndex(this.sheet);
    XLSX.utils.sheet_add_aoa(this.sheet, this.rows.slice(this.rowsInSheet), { origin: -1 });
    try {
      await this.writeWorkbook();
    } catch (error) {
      truncateSheet(this.sheet, lastRow);
      throw error;
    }

    this.rowsInSheet = this.rows.length;
    await fsPromises.rm(this.journalPath, { force: true });
  }

  private async writeWorkbook(): Promise<void> {
    const data: Uint8Array = XLSX.write(this.workbook, { type: "buffer", bookType: "xlsx" });
    await this.writeFile(this.outputPath, data);
  }

  private async readJournal(): Promise<CellValue[][]> {
    let raw: string;
    try {
      raw = await fsPromises.readFile(this.journalPath, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }

    const rows: CellValue[][] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        // 마지막 줄이 기록 도중 끊긴 경우
        logger.warn({ journalPath: this.journalPath }, "손상된 저널 행 건너뜀");
        continue;
      }
      const parsed = JournalRowSchema.safeParse(json);
      if (parsed.success && parsed.data.length === this.header.length) {
        rows.push(parsed.data);
      } else {
        logger.warn({ journalPath: this.journalPath }, "형식이 다른 저널 행 건너뜀");
      }
    }
    return rows;
  }
}
