/**
 * Export 체크포인트 저장소
 *
 * - 성공한 Export 이후에만 갱신 (fetch 이후가 아님)
 * - JSON 원자적 쓰기, 저장 순서는 Mutex로 직렬화
 */

import * as fs from "fs/promises";
import { Mutex } from "async-mutex";
import { z } from "zod";
import type { ExportCheckpoint } from "@/core/domain/ExportCheckpoint";
import { isNotFoundError, writeFileAtomic } from "@/utils/fileSystem";
import { getTimestampWithTimezone } from "@/utils/timestamp";
import { logger } from "@/config/logger";

const ExportCheckpointSchema = z.object({
  marketId: z.string(),
  lastCompletedJobId: z.string().nullable(),
  rowsWritten: z.number().int().nonnegative(),
  completedJobIds: z.array(z.string()).default([]),
  updatedAt: z.string(),
});

export class CheckpointStore {
  private readonly mutex = new Mutex();
  private state: ExportCheckpoint;
  private readonly completed = new Set<string>();

  constructor(
    private readonly filePath: string,
    marketId: string,
  ) {
    this.state = {
      marketId,
      lastCompletedJobId: null,
      rowsWritten: 0,
      completedJobIds: [],
      updatedAt: getTimestampWithTimezone(),
    };
  }

  /**
   * 저장된 체크포인트 로드 (없거나 손상되면 빈 상태 유지)
   */
  async load(): Promise<ExportCheckpoint> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) {
        return this.snapshot();
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = undefined;
    }
    const parsed = ExportCheckpointSchema.safeParse(json);
    if (!parsed.success || parsed.data.marketId !== this.state.marketId) {
      logger.warn({ filePath: this.filePath }, "체크포인트 파일 손상 또는 마켓 불일치 - 새로 시작");
      return this.snapshot();
    }

    this.state = { ...parsed.data, completedJobIds: [...parsed.data.completedJobIds] };
    this.completed.clear();
    for (const id of this.state.completedJobIds) this.completed.add(id);

    logger.info(
      { filePath: this.filePath, rowsWritten: this.state.rowsWritten, completed: this.completed.size },
      "체크포인트 로드 완료",
    );
    return this.snapshot();
  }

  isCompleted(jobId: string): boolean {
    return this.completed.has(jobId);
  }

  /**
   * Job의 Export 완료 기록
   * @param rowsAdded 이번 Job에서 실제로 추가된 행 수
   */
  async markCompleted(jobId: string, rowsAdded: number): Promise<ExportCheckpoint> {
    return this.mutex.runExclusive(async () => {
      if (!this.completed.has(jobId)) {
        this.completed.add(jobId);
        this.state.completedJobIds.push(jobId);
      }
      this.state.lastCompletedJobId = jobId;
      this.state.rowsWritten += rowsAdded;
      this.state.updatedAt = getTimestampWithTimezone();

      await writeFileAtomic(this.filePath, JSON.stringify(this.state, null, 2));
      return this.snapshot();
    });
  }

  /**
   * 체크포인트 삭제 (--reset)
   */
  async reset(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await fs.rm(this.filePath, { force: true });
      this.completed.clear();
      this.state = {
        marketId: this.state.marketId,
        lastCompletedJobId: null,
        rowsWritten: 0,
        completedJobIds: [],
        updatedAt: getTimestampWithTimezone(),
      };
    });
  }

  snapshot(): ExportCheckpoint {
    return { ...this.state, completedJobIds: [...this.state.completedJobIds] };
  }
}
