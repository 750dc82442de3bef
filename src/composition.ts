/**
 * 실행 구성 (Composition Root)
 *
 * CLI 옵션 → 마켓/설정 해석 → 각 계층 인스턴스 생성 → CrawlOrchestrator
 */

import { v4 as uuidv4 } from "uuid";
import { DiskCache } from "@/cache/DiskCache";
import {
  buildCrawlerSettings,
  CrawlerSettings,
  CrawlerSettingsOverride,
} from "@/config/CrawlerSettings";
import { PATH_CONFIG, TRANSPORT_CONFIG, WORKBOOK_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type { IMarketAdapter } from "@/core/interfaces/IMarketAdapter";
import { CheckpointStore } from "@/export/CheckpointStore";
import { ColumnMappingLoader } from "@/export/ColumnMappingLoader";
import { resolveRunPaths, RunPaths } from "@/export/OutputPaths";
import { WorkbookExporter } from "@/export/WorkbookExporter";
import { WorkbookHandle } from "@/export/WorkbookHandle";
import { FuzzyMatcher } from "@/extraction/FuzzyMatcher";
import { ProductExtractor } from "@/extraction/ProductExtractor";
import { VocabularyLoader } from "@/extraction/VocabularyLoader";
import { CategoryRange, CategoryRangeAdapter } from "@/markets/CategoryRangeAdapter";
import { CustomUrlsAdapter, loadUrlList } from "@/markets/CustomUrlsAdapter";
import { MarketRegistry } from "@/markets/MarketRegistry";
import { CrawlOrchestrator } from "@/orchestrator/CrawlOrchestrator";
import { BackoffPolicy } from "@/resilience/BackoffPolicy";
import { CircuitBreaker } from "@/resilience/CircuitBreaker";
import { ResilienceExecutor } from "@/resilience/ResilienceExecutor";
import { BrowserPool } from "@/transport/BrowserPool";
import { BrowserRenderStrategy } from "@/transport/BrowserRenderStrategy";
import { HostConcurrencyLimiter } from "@/transport/HostConcurrencyLimiter";
import { HttpFetchStrategy } from "@/transport/HttpFetchStrategy";
import { Transport } from "@/transport/Transport";
import { DeadLetterWriter } from "@/utils/DeadLetterWriter";
import { getDateString } from "@/utils/timestamp";

export interface CrawlRunOptions {
  marketId: string;
  columnMappingPath: string;
  templatePath: string;
  outputDir?: string;
  stateDir?: string;
  cacheDir?: string;
  vocabulariesDir?: string;
  /** YYYYMMDD (기본: 오늘) */
  runDate?: string;
  /** 지정 URL 목록 파일 (한 줄에 하나) */
  urlsFile?: string;
  /** 시작 카테고리 범위 */
  categoryRange?: CategoryRange;
  /** 체크포인트와 기존 출력에서 이어서 실행 */
  resume?: boolean;
  /** 캐시와 체크포인트 삭제 후 실행 */
  reset?: boolean;
  dedupeFields?: readonly string[];
  /** CLI 에서 받은 설정 (마켓 YAML 보다 우선) */
  overrides?: CrawlerSettingsOverride;
  registry?: MarketRegistry;
}

export interface CrawlRun {
  runId: string;
  orchestrator: CrawlOrchestrator;
  adapter: IMarketAdapter;
  settings: CrawlerSettings;
  paths: RunPaths;
  /** 브라우저 등 외부 자원 정리 */
  dispose: () => Promise<void>;
}

/**
 * 카테고리/브랜드 어휘 → FuzzyMatcher
 */
function createMatchers(vocabulariesDir: string, threshold: number) {
  const loader = new VocabularyLoader(vocabulariesDir);
  return {
    categoryMatcher: new FuzzyMatcher(loader.load("category"), threshold),
    brandMatcher: new FuzzyMatcher(loader.load("brand"), threshold),
  };
}

/**
 * @throws {MarketNotFoundError} 알 수 없는 마켓
 * @throws {ConfigError} 설정/매핑/URL 목록 오류
 * @throws {ExportError} 템플릿 오류 (fatal)
 */
export async function createCrawlRun(options: CrawlRunOptions): Promise<CrawlRun> {
  const runId = uuidv4();
  const registry = options.registry ?? new MarketRegistry();
  const market = registry.resolve(options.marketId);

  const settings = buildCrawlerSettings(
    market.definition?.currency ? { defaultCurrency: market.definition.currency } : undefined,
    market.definition?.settings,
    options.overrides,
  );

  let adapter: IMarketAdapter = market.adapter;
  if (options.categoryRange) {
    adapter = new CategoryRangeAdapter(adapter, options.categoryRange);
    logger.info({ ...options.categoryRange, seeds: adapter.seedUrls().length }, "카테고리 범위 적용");
  }

  if (options.urlsFile) {
    const urls = await loadUrlList(options.urlsFile);
    adapter = new CustomUrlsAdapter(adapter, urls);
    logger.info({ file: options.urlsFile, count: urls.length }, "지정 URL 목록 사용");
  }

  const paths = resolveRunPaths({
    outputDir: options.outputDir ?? PATH_CONFIG.OUTPUT_DIR,
    stateDir: options.stateDir ?? PATH_CONFIG.STATE_DIR,
    marketId: options.marketId,
    runDate: options.runDate ?? getDateString(),
  });

  // Cache
  const cache = new DiskCache({ cacheDir: options.cacheDir ?? PATH_CONFIG.CACHE_DIR });

  // Checkpoint
  const checkpoint = new CheckpointStore(paths.checkpointFile, options.marketId);
  if (options.reset) {
    await cache.clear();
    logger.info("캐시 초기화");
  }
  if (options.resume && !options.reset) {
    const state = await checkpoint.load();
    logger.info(
      { completed: state.completedJobIds.length, rows_written: state.rowsWritten },
      "체크포인트에서 재개",
    );
  } else {
    await checkpoint.reset();
  }

  // Export
  const workbook = await WorkbookHandle.open({
    templatePath: options.templatePath,
    outputPath: paths.outputFile,
    resume: options.resume && !options.reset,
    flushEveryRows: WORKBOOK_CONFIG.FLUSH_EVERY_ROWS,
  });
  const mapping = ColumnMappingLoader.load(options.columnMappingPath, workbook.header);
  const exporter = new WorkbookExporter({ dedupeFields: options.dedupeFields });

  // Transport
  const browserPool = new BrowserPool({
    poolSize: settings.browserPoolSize,
    headless: settings.headless,
    userAgent: TRANSPORT_CONFIG.USER_AGENT,
  });
  const transport = new Transport({
    http: new HttpFetchStrategy(),
    browser: new BrowserRenderStrategy(browserPool, {
      navigationTimeoutMs: settings.fetchTimeoutMs,
    }),
    cache,
    cacheTtlMs: settings.cacheTtlMs,
    limiter: new HostConcurrencyLimiter(settings.hostConcurrency),
    timeoutMs: settings.fetchTimeoutMs,
  });

  // Resilience
  const executor = new ResilienceExecutor({
    maxAttempts: settings.maxAttempts,
    backoff: new BackoffPolicy({
      baseDelayMs: settings.baseDelayMs,
      maxDelayMs: settings.maxDelayMs,
      jitterRatio: settings.jitterRatio,
    }),
    circuitBreaker: new CircuitBreaker({
      failureThreshold: settings.circuitFailureThreshold,
      windowMs: settings.circuitWindowMs,
      cooldownMs: settings.circuitCooldownMs,
    }),
  });

  // Extraction
  const extractor = new ProductExtractor({
    ...createMatchers(options.vocabulariesDir ?? PATH_CONFIG.VOCABULARIES_DIR, settings.fuzzyThreshold),
    defaultCurrency: settings.defaultCurrency,
  });

  const orchestrator = new CrawlOrchestrator({
    adapter,
    transport,
    executor,
    extractor,
    exporter,
    mapping,
    workbook,
    checkpoint,
    deadLetters: new DeadLetterWriter({
      filePath: paths.deadLetterFile,
      runId,
      marketId: options.marketId,
    }),
    settings,
  });

  return {
    runId,
    orchestrator,
    adapter,
    settings,
    paths,
    dispose: () => browserPool.cleanup(),
  };
}
