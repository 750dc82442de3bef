/**
 * 정규화 어휘 로더
 *
 * {vocabulariesDir}/{name}.json 을 실행당 한 번 읽어 스냅샷으로 보관
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "@/core/errors";
import { logger } from "@/config/logger";
import type { VocabularySnapshot } from "./FuzzyMatcher";

const VocabularySchema = z.object({
  entries: z.array(z.string().min(1)).min(1),
  aliases: z.record(z.string()).optional(),
});

export class VocabularyLoader {
  private readonly cache = new Map<string, VocabularySnapshot>();

  constructor(private readonly vocabulariesDir: string) {}

  load(name: string): VocabularySnapshot {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const filePath = path.join(this.vocabulariesDir, `${name}.json`);
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Vocabulary file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Invalid vocabulary JSON: ${filePath}`, { cause: error });
    }

    const parsed = VocabularySchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid vocabulary ${name}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      );
    }

    const snapshot: VocabularySnapshot = Object.freeze({
      entries: Object.freeze([...parsed.data.entries]),
      aliases: Object.freeze({ ...(parsed.data.aliases ?? {}) }),
    });
    this.cache.set(name, snapshot);

    logger.debug({ name, entries: snapshot.entries.length }, "어휘 로드 완료");
    return snapshot;
  }
}
