/**
 * Export 체크포인트 (마켓 + 실행 날짜별 JSON)
 */
export interface ExportCheckpoint {
  marketId: string;
  lastCompletedJobId: string | null;
  rowsWritten: number;
  /** 재개 시 이미 내보낸 상세 페이지를 건너뛰기 위한 목록 */
  completedJobIds: string[];
  updatedAt: string;
}
