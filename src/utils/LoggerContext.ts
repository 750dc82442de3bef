/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Run ID, Market ID, Job ID 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * Run 전용 로거 생성
 * @param runId - 실행 ID (UUID)
 * @param marketId - 마켓 ID
 */
export function createRunLogger(runId: string, marketId: string): Logger {
  return logger.child({
    run_id: runId,
    market_id: marketId,
  });
}

/**
 * Job 전용 로거 생성 (Run 로거의 자식)
 */
export function createJobLogger(
  runLogger: Logger,
  jobId: string,
  url: string,
): Logger {
  return runLogger.child({
    job_id: jobId,
    url,
  });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
