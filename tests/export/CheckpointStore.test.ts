/**
 * CheckpointStore 테스트
 *
 * 목적: Export 완료 기록, 재개용 로드, 손상/마켓 불일치 처리 검증
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CheckpointStore } from "@/export/CheckpointStore";

describe("CheckpointStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "checkpoint-"));
    filePath = path.join(dir, "shop.example", "20260101", "checkpoint.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("파일이 없으면 빈 상태로 로드해야 함", async () => {
    const state = await new CheckpointStore(filePath, "shop.example").load();

    expect(state).toMatchObject({
      marketId: "shop.example",
      lastCompletedJobId: null,
      rowsWritten: 0,
      completedJobIds: [],
    });
  });

  it("완료 기록을 누적하고 파일에 저장해야 함", async () => {
    const store = new CheckpointStore(filePath, "shop.example");

    await Promise.all([store.markCompleted("job-1", 1), store.markCompleted("job-2", 2)]);
    const state = await store.markCompleted("job-1", 0);

    expect(state.rowsWritten).toBe(3);
    expect(state.completedJobIds).toEqual(["job-1", "job-2"]);
    expect(state.lastCompletedJobId).toBe("job-1");
    expect(store.isCompleted("job-2")).toBe(true);
    expect(store.isCompleted("job-3")).toBe(false);

    const saved: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    expect(saved).toMatchObject({ rowsWritten: 3, completedJobIds: ["job-1", "job-2"] });
  });

  it("저장된 체크포인트에서 재개해야 함", async () => {
    await new CheckpointStore(filePath, "shop.example").markCompleted("job-1", 4);

    const resumed = new CheckpointStore(filePath, "shop.example");
    const state = await resumed.load();

    expect(state.rowsWritten).toBe(4);
    expect(resumed.isCompleted("job-1")).toBe(true);
  });

  it("다른 마켓의 체크포인트나 손상 파일은 무시해야 함", async () => {
    await new CheckpointStore(filePath, "other.market").markCompleted("job-1", 4);
    const otherMarket = await new CheckpointStore(filePath, "shop.example").load();

    fs.writeFileSync(filePath, "{not json");
    const corrupted = await new CheckpointStore(filePath, "shop.example").load();

    expect(otherMarket.rowsWritten).toBe(0);
    expect(corrupted.completedJobIds).toEqual([]);
  });

  it("reset 은 파일과 메모리 상태를 지워야 함", async () => {
    const store = new CheckpointStore(filePath, "shop.example");
    await store.markCompleted("job-1", 1);

    await store.reset();

    expect(fs.existsSync(filePath)).toBe(false);
    expect(store.isCompleted("job-1")).toBe(false);
    expect(store.snapshot().rowsWritten).toBe(0);
  });

  it("snapshot 은 내부 상태와 분리된 복사본이어야 함", async () => {
    const store = new CheckpointStore(filePath, "shop.example");
    await store.markCompleted("job-1", 1);

    store.snapshot().completedJobIds.push("tampered");

    expect(store.snapshot().completedJobIds).toEqual(["job-1"]);
  });
});
