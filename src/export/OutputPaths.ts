/**
 * 실행 산출물 경로 규칙
 *
 * - 출력 워크북: {outputDir}/products_{marketId}_{YYYYMMDD}.xlsx
 * - 체크포인트: {stateDir}/{marketId}/{YYYYMMDD}/checkpoint.json
 * - 데드레터: {stateDir}/{marketId}/{YYYYMMDD}/dead_letters.jsonl
 */

import * as path from "path";

export interface RunPaths {
  outputFile: string;
  checkpointFile: string;
  deadLetterFile: string;
}

/**
 * 파일명에 쓸 수 없는 문자 치환
 */
export function sanitizeFileComponent(value: string): string {
  return value.replace(/[\\/:*?"<>|\s]+/g, "_");
}

export function resolveRunPaths(options: {
  outputDir: string;
  stateDir: string;
  marketId: string;
  runDate: string;
}): RunPaths {
  const market = sanitizeFileComponent(options.marketId);
  const stateDir = path.resolve(options.stateDir, market, options.runDate);

  return {
    outputFile: path.resolve(options.outputDir, `products_${market}_${options.runDate}.xlsx`),
    checkpointFile: path.join(stateDir, "checkpoint.json"),
    deadLetterFile: path.join(stateDir, "dead_letters.jsonl"),
  };
}
