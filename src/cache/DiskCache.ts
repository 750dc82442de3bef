/**
 * Disk Cache
 *
 * SOLID 원칙:
 * - SRP: 응답 캐시 영속화만 담당
 * - DIP: ICacheStore 인터페이스 구현
 *
 * 저장 구조:
 * - {cacheDir}/{sha256 앞 2자리}/{sha256}.json
 * - 키 단위 원자적 쓰기 (임시 파일 + rename)
 * - 만료는 읽을 때 확인 (만료 항목은 반환하지 않고 삭제)
 */

import * as fs from "fs/promises";
import * as path from "path";
import { createHash } from "crypto";
import { z } from "zod";
import type { ICacheStore } from "@/core/interfaces/ICacheStore";
import type { FetchResult } from "@/core/domain/FetchResult";
import { isNotFoundError, writeFileAtomic } from "@/utils/fileSystem";
import { logger } from "@/config/logger";

/**
 * 캐시 파일 스키마
 */
const CacheEntrySchema = z.object({
  key: z.string(),
  expiresAt: z.number(),
  payload: z.object({
    url: z.string(),
    status: z.number().int(),
    body: z.string(),
    fetchedAt: z.string(),
    fromCache: z.boolean(),
  }),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface DiskCacheOptions {
  cacheDir: string;
  /** 테스트용 시계 주입 */
  now?: () => number;
}

export class DiskCache implements ICacheStore {
  private readonly cacheDir: string;
  private readonly now: () => number;

  constructor(options: DiskCacheOptions) {
    this.cacheDir = path.resolve(options.cacheDir);
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<FetchResult | undefined> {
    const filePath = this.filePathFor(key);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }

    const entry = this.parseEntry(raw);
    // 손상된 파일 또는 해시 충돌
    if (!entry || entry.key !== key) {
      logger.warn({ key, filePath }, "캐시 항목 손상 - 삭제");
      await fs.rm(filePath, { force: true });
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      logger.debug({ key }, "캐시 만료 - 삭제");
      await fs.rm(filePath, { force: true });
      return undefined;
    }

    return { ...entry.payload, fromCache: true };
  }

  async put(key: string, result: FetchResult, ttlMs: number): Promise<void> {
    const entry: CacheEntry = {
      key,
      expiresAt: this.now() + ttlMs,
      payload: { ...result, fromCache: false },
    };

    await writeFileAtomic(this.filePathFor(key), JSON.stringify(entry));
  }

  async clear(): Promise<void> {
    await fs.rm(this.cacheDir, { recursive: true, force: true });
    logger.info({ cacheDir: this.cacheDir }, "캐시 디렉토리 초기화 완료");
  }

  private filePathFor(key: string): string {
    const hash = createHash("sha256").update(key).digest("hex");
    return path.join(this.cacheDir, hash.slice(0, 2), `${hash}.json`);
  }

  private parseEntry(raw: string): CacheEntry | undefined {
    try {
      const parsed = CacheEntrySchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : undefined;
    } catch {
      return undefined;
    }
  }
}
