/**
 * DiskCache 테스트
 *
 * 목적: TTL 기반 저장/조회/만료, 손상 파일 처리 검증
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DiskCache } from "@/cache/DiskCache";
import type { FetchResult } from "@/core/domain/FetchResult";

const KEY = "GET https://shop.example/p/1 http";

const result: FetchResult = {
  url: "https://shop.example/p/1",
  status: 200,
  body: "<html><h1>상품</h1></html>",
  fetchedAt: "2026-01-01T00:00:00.000+09:00",
  fromCache: false,
};

function listCacheFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { recursive: true, encoding: "utf-8" })
    .filter((name) => name.endsWith(".json"));
}

describe("DiskCache", () => {
  let cacheDir: string;
  let now: number;
  let cache: DiskCache;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "disk-cache-"));
    now = 1_000_000;
    cache = new DiskCache({ cacheDir, now: () => now });
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  it("TTL 이내에 조회하면 저장한 응답을 그대로 반환해야 함", async () => {
    await cache.put(KEY, result, 60_000);
    now += 59_999;

    const hit = await cache.get(KEY);

    expect(hit).toEqual({ ...result, fromCache: true });
  });

  it("TTL 이 지나면 undefined 를 반환하고 파일을 삭제해야 함", async () => {
    await cache.put(KEY, result, 60_000);
    now += 60_000;

    expect(await cache.get(KEY)).toBeUndefined();
    expect(listCacheFiles(cacheDir)).toHaveLength(0);
  });

  it("없는 키는 undefined 를 반환해야 함", async () => {
    expect(await cache.get("GET https://shop.example/none http")).toBeUndefined();
  });

  it("캐시 히트가 아닌 응답으로 저장해야 함 (fromCache=false)", async () => {
    await cache.put(KEY, { ...result, fromCache: true }, 60_000);

    const [file] = listCacheFiles(cacheDir);
    const stored = JSON.parse(fs.readFileSync(path.join(cacheDir, file), "utf-8"));

    expect(stored.key).toBe(KEY);
    expect(stored.expiresAt).toBe(1_060_000);
    expect(stored.payload.fromCache).toBe(false);
  });

  it("손상된 파일은 미스로 처리하고 삭제해야 함", async () => {
    await cache.put(KEY, result, 60_000);
    const [file] = listCacheFiles(cacheDir);
    fs.writeFileSync(path.join(cacheDir, file), "{not json");

    expect(await cache.get(KEY)).toBeUndefined();
    expect(listCacheFiles(cacheDir)).toHaveLength(0);
  });

  it("같은 키에 다시 저장하면 덮어써야 함", async () => {
    await cache.put(KEY, result, 60_000);
    await cache.put(KEY, { ...result, body: "updated" }, 60_000);

    const hit = await cache.get(KEY);

    expect(hit?.body).toBe("updated");
    expect(listCacheFiles(cacheDir)).toHaveLength(1);
  });

  it("clear() 는 모든 항목을 삭제해야 함", async () => {
    await cache.put(KEY, result, 60_000);
    await cache.clear();

    expect(await cache.get(KEY)).toBeUndefined();
    expect(fs.existsSync(cacheDir)).toBe(false);
  });
});
