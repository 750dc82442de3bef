/**
 * Crawler 실행 설정
 *
 * 우선순위 (뒤가 우선):
 *   constants.ts 기본값(환경변수) → 마켓 YAML settings → CLI 플래그
 */

import { z } from "zod";
import { ConfigError } from "@/core/errors";
import {
  CACHE_CONFIG,
  CRAWLER_CONFIG,
  NORMALIZATION_CONFIG,
  RESILIENCE_CONFIG,
  TRANSPORT_CONFIG,
} from "./constants";

const CrawlerSettingsFields = z.object({
  jobConcurrency: z.number().int().positive(),
  maxDepth: z.number().int().nonnegative(),
  maxDeferrals: z.number().int().nonnegative(),
  maxAttempts: z.number().int().positive(),
  baseDelayMs: z.number().nonnegative(),
  maxDelayMs: z.number().nonnegative(),
  jitterRatio: z.number().min(0).max(1),
  circuitFailureThreshold: z.number().int().positive(),
  circuitWindowMs: z.number().positive(),
  circuitCooldownMs: z.number().nonnegative(),
  fuzzyThreshold: z.number().min(0).max(100),
  cacheTtlMs: z.number().nonnegative(),
  hostConcurrency: z.number().int().positive(),
  fetchTimeoutMs: z.number().positive(),
  headless: z.boolean(),
  browserPoolSize: z.number().int().positive(),
  defaultCurrency: z.string().length(3),
});

// 지연 범위는 병합된 전체 설정에서만 검사
export const CrawlerSettingsSchema = CrawlerSettingsFields.refine((s) => s.baseDelayMs <= s.maxDelayMs, {
  message: "baseDelayMs must not exceed maxDelayMs",
});

export type CrawlerSettings = z.infer<typeof CrawlerSettingsSchema>;

/**
 * 마켓 YAML / CLI 에서 덮어쓸 수 있는 부분 설정
 */
export const CrawlerSettingsOverrideSchema = CrawlerSettingsFields.partial().strict();

export type CrawlerSettingsOverride = z.infer<typeof CrawlerSettingsOverrideSchema>;

export const DEFAULT_CRAWLER_SETTINGS: CrawlerSettings = {
  jobConcurrency: CRAWLER_CONFIG.JOB_CONCURRENCY,
  maxDepth: CRAWLER_CONFIG.MAX_DEPTH,
  maxDeferrals: CRAWLER_CONFIG.MAX_DEFERRALS,
  maxAttempts: RESILIENCE_CONFIG.MAX_ATTEMPTS,
  baseDelayMs: RESILIENCE_CONFIG.BASE_DELAY_MS,
  maxDelayMs: RESILIENCE_CONFIG.MAX_DELAY_MS,
  jitterRatio: RESILIENCE_CONFIG.JITTER_RATIO,
  circuitFailureThreshold: RESILIENCE_CONFIG.CIRCUIT_FAILURE_THRESHOLD,
  circuitWindowMs: RESILIENCE_CONFIG.CIRCUIT_WINDOW_MS,
  circuitCooldownMs: RESILIENCE_CONFIG.CIRCUIT_COOLDOWN_MS,
  fuzzyThreshold: NORMALIZATION_CONFIG.FUZZY_MATCH_THRESHOLD,
  cacheTtlMs: CACHE_CONFIG.TTL_MS,
  hostConcurrency: TRANSPORT_CONFIG.HOST_CONCURRENCY,
  fetchTimeoutMs: TRANSPORT_CONFIG.FETCH_TIMEOUT_MS,
  headless: TRANSPORT_CONFIG.HEADLESS,
  browserPoolSize: TRANSPORT_CONFIG.BROWSER_POOL_SIZE,
  defaultCurrency: "USD",
};

/**
 * 기본값 + 덮어쓰기 병합 후 검증
 * @throws {ConfigError}
 */
export function buildCrawlerSettings(
  ...overrides: Array<CrawlerSettingsOverride | undefined>
): CrawlerSettings {
  const merged: Record<string, unknown> = { ...DEFAULT_CRAWLER_SETTINGS };
  for (const override of overrides) {
    if (!override) continue;
    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const parsed = CrawlerSettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid crawler settings: ${parsed.error.issues.map((i) => `${i.path.join(".") || "settings"}: ${i.message}`).join("; ")}`,
    );
  }
  return parsed.data;
}
