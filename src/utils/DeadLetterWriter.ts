/**
 * Dead Letter Writer
 *
 * SOLID 원칙:
 * - SRP: 영구 실패 Job의 JSONL 스트리밍 저장만 담당
 *
 * 목적:
 * - 실패 Job을 메모리에 쌓지 않고 실시간 파일 append
 * - 중단 시에도 이미 기록된 실패 보존
 * - 첫 실패가 기록될 때 파일 생성 (실패가 없으면 파일 없음)
 *
 * 파일 구조:
 * - 첫 줄: 메타데이터 헤더 ({ _meta: true, type: "header", ... })
 * - 본문: 실패 Job 1건당 1줄
 * - 마지막 줄: 사유별 집계 푸터
 */

import * as fs from "fs/promises";
import * as path from "path";
import { Mutex } from "async-mutex";
import { logger } from "@/config/logger";
import { getTimestampWithTimezone } from "@/utils/timestamp";

export interface DeadLetterEntry {
  jobId: string;
  url: string;
  pageKind: string;
  depth: number;
  attemptCount: number;
  reason: string;
  message: string;
}

export interface DeadLetterWriterOptions {
  filePath: string;
  runId: string;
  marketId: string;
}

export class DeadLetterWriter {
  private fileHandle: fs.FileHandle | null = null;
  private readonly mutex = new Mutex();
  private readonly countsByReason: Record<string, number> = {};
  private writeCount = 0;

  constructor(private readonly options: DeadLetterWriterOptions) {}

  /**
   * 실패 Job 1건 추가
   */
  async append(entry: DeadLetterEntry): Promise<void> {
    await this.mutex.runExclusive(async () => {
      try {
        const handle = await this.open();
        await handle.write(
          JSON.stringify({ ...entry, failed_at: getTimestampWithTimezone() }) + "\n",
          null,
          "utf-8",
        );
        this.countsByReason[entry.reason] = (this.countsByReason[entry.reason] ?? 0) + 1;
        this.writeCount++;
      } catch (error) {
        logger.error(
          { error: error instanceof Error ? error.message : String(error), filePath: this.options.filePath },
          "Dead letter 기록 실패",
        );
        throw error;
      }
    });
  }

  /**
   * 푸터 작성 후 파일 닫기 (기록이 없으면 아무것도 하지 않음)
   */
  async finalize(): Promise<{ filePath: string; recordCount: number } | null> {
    return this.mutex.runExclusive(async () => {
      if (!this.fileHandle) {
        return null;
      }

      const footer = {
        _meta: true,
        type: "footer",
        completed_at: getTimestampWithTimezone(),
        total: this.writeCount,
        by_reason: this.countsByReason,
      };
      await this.fileHandle.write(JSON.stringify(footer) + "\n", null, "utf-8");
      await this.fileHandle.close();
      this.fileHandle = null;

      logger.info(
        { filePath: this.options.filePath, recordCount: this.writeCount },
        "Dead letter 파일 저장 완료",
      );
      return { filePath: this.options.filePath, recordCount: this.writeCount };
    });
  }

  getFilePath(): string {
    return this.options.filePath;
  }

  private async open(): Promise<fs.FileHandle> {
    if (this.fileHandle) {
      return this.fileHandle;
    }

    await fs.mkdir(path.dirname(this.options.filePath), { recursive: true });
    const handle = await fs.open(this.options.filePath, "a");

    const header = {
      _meta: true,
      type: "header",
      run_id: this.options.runId,
      market_id: this.options.marketId,
      started_at: getTimestampWithTimezone(),
    };
    await handle.write(JSON.stringify(header) + "\n", null, "utf-8");

    this.fileHandle = handle;
    return handle;
  }
}
