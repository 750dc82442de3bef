/**
 * DeadLetterWriter 테스트
 *
 * 목적: 헤더/본문/푸터 JSONL 구조, 지연 파일 생성 검증
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DeadLetterEntry, DeadLetterWriter } from "@/utils/DeadLetterWriter";

function entry(jobId: string, reason: string): DeadLetterEntry {
  return {
    jobId,
    url: `https://shop.example/p/${jobId}`,
    pageKind: "detail",
    depth: 1,
    attemptCount: 4,
    reason,
    message: "failed",
  };
}

describe("DeadLetterWriter", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dead-letter-"));
    filePath = path.join(dir, "state", "dead_letters.jsonl");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("실패가 없으면 파일을 만들지 않아야 함", async () => {
    const writer = new DeadLetterWriter({ filePath, runId: "run-1", marketId: "shop.example" });

    await expect(writer.finalize()).resolves.toBeNull();
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("헤더, 실패 Job, 사유별 집계 푸터를 순서대로 기록해야 함", async () => {
    const writer = new DeadLetterWriter({ filePath, runId: "run-1", marketId: "shop.example" });

    await writer.append(entry("a", "server_error"));
    await writer.append(entry("b", "timeout"));
    await writer.append(entry("c", "server_error"));
    const result = await writer.finalize();

    expect(result).toEqual({ filePath, recordCount: 3 });

    const lines = fs
      .readFileSync(filePath, "utf-8")
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));

    expect(lines).toHaveLength(5);
    expect(lines[0]).toMatchObject({ _meta: true, type: "header", run_id: "run-1", market_id: "shop.example" });
    expect(lines[1]).toMatchObject({ jobId: "a", reason: "server_error", attemptCount: 4 });
    expect(lines[3]).toMatchObject({ jobId: "c" });
    expect(lines[4]).toMatchObject({
      _meta: true,
      type: "footer",
      total: 3,
      by_reason: { server_error: 2, timeout: 1 },
    });
  });
});
