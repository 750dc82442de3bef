/**
 * 실행 결과 리포트
 */
export interface CrawlReport {
  runId: string;
  marketId: string;
  outputFile: string;
  /** 발견된 전체 Job 수 (중복 제외) */
  discovered: number;
  succeeded: number;
  /** permanently_failed 로 분류된 Job 수 */
  skipped: number;
  /** 이번 실행에서 추가된 행 수 */
  rowsWritten: number;
  failuresByReason: Record<string, number>;
  cancelled: boolean;
  durationMs: number;
}
