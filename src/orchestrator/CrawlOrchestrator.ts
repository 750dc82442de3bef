/**
 * Crawl Orchestrator
 *
 * SOLID 원칙:
 * - SRP: Job 상태 머신과 동시성 제어만 담당
 * - DIP: 어댑터/전송/추출/내보내기는 주입받은 구현에 위임
 *
 * 흐름 (Job 1건):
 *   fetch (Resilience + Transport) → 링크 발견 → 추출 → 내보내기 → 체크포인트
 *
 * - Job ID 는 정규화 URL 해시, 재발견된 URL 은 무시
 * - CircuitOpenError 는 실패가 아니라 연기 (타이머 후 재투입, maxDeferrals 까지)
 * - 체크포인트는 fetch 후가 아니라 내보내기 후 갱신
 * - 취소 시 진행 중 fetch 는 즉시 실패, 남은 Job 은 cancelled
 * - fatal ExportError 만 실행 전체를 중단 (진행 중 작업 정리 후 run() 에서 재throw)
 */

import { v4 as uuidv4 } from "uuid";
import type { Logger } from "@/config/logger";
import type { CrawlerSettings } from "@/config/CrawlerSettings";
import type { ColumnMapping } from "@/core/domain/ColumnMapping";
import { CrawlJob, isDiscoveryPage } from "@/core/domain/CrawlJob";
import type { CrawlReport } from "@/core/domain/CrawlReport";
import { createFetchRequest } from "@/core/domain/FetchResult";
import type { ProductRecord } from "@/core/domain/ProductRecord";
import {
  CircuitOpenError,
  ExportError,
  ExtractionError,
  TransportError,
} from "@/core/errors";
import type {
  DiscoveredLink,
  IMarketAdapter,
  MarketPage,
  PageLink,
} from "@/core/interfaces/IMarketAdapter";
import type { CheckpointStore } from "@/export/CheckpointStore";
import type { WorkbookExporter } from "@/export/WorkbookExporter";
import type { WorkbookHandle } from "@/export/WorkbookHandle";
import type { ProductExtractor } from "@/extraction/ProductExtractor";
import { describeFailure } from "@/resilience/ErrorClassifier";
import type { ResilienceExecutor } from "@/resilience/ResilienceExecutor";
import type { Transport } from "@/transport/Transport";
import type { DeadLetterWriter } from "@/utils/DeadLetterWriter";
import {
  createJobLogger,
  createRunLogger,
  logImportant,
} from "@/utils/LoggerContext";
import { createJobId, getHost, isValidUrl } from "@/utils/url";

export type OrchestratorSettings = Pick<
  CrawlerSettings,
  "jobConcurrency" | "maxDepth" | "maxDeferrals"
>;

export interface CrawlOrchestratorDeps {
  adapter: IMarketAdapter;
  transport: Transport;
  executor: ResilienceExecutor;
  extractor: ProductExtractor;
  exporter: WorkbookExporter;
  mapping: ColumnMapping;
  workbook: WorkbookHandle;
  checkpoint: CheckpointStore;
  deadLetters?: DeadLetterWriter;
  settings: OrchestratorSettings;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
}

const CANCELLED_REASON = "cancelled";

/**
 * 실행 1회의 가변 상태
 */
interface RunState {
  runId: string;
  logger: Logger;
  controller: AbortController;
  jobs: Map<string, CrawlJob>;
  queue: CrawlJob[];
  inFlight: Set<Promise<void>>;
  deferred: Map<string, NodeJS.Timeout>;
  rowsWritten: number;
  fatalError?: ExportError;
  wake?: () => void;
  dirty: boolean;
}

export class CrawlOrchestrator {
  private running = false;

  constructor(private readonly deps: CrawlOrchestratorDeps) {
    const { jobConcurrency } = deps.settings;
    if (!Number.isInteger(jobConcurrency) || jobConcurrency < 1) {
      throw new Error(`jobConcurrency must be a positive integer: ${jobConcurrency}`);
    }
  }

  /**
   * 실행
   * @throws {ExportError} fatal 쓰기 실패
   */
  async run(options: RunOptions = {}): Promise<CrawlReport> {
    if (this.running) {
      throw new Error("Orchestrator is already running");
    }
    this.running = true;

    const startedAt = Date.now();
    const runId = options.runId ?? uuidv4();
    const state: RunState = {
      runId,
      logger: createRunLogger(runId, this.deps.adapter.id),
      controller: new AbortController(),
      jobs: new Map(),
      queue: [],
      inFlight: new Set(),
      deferred: new Map(),
      rowsWritten: 0,
      dirty: false,
    };

    const onExternalAbort = () => this.abortRun(state, options.signal?.reason);
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    try {
      logImportant(state.logger, "크롤링 시작", {
        output_file: this.deps.workbook.outputPath,
        concurrency: this.deps.settings.jobConcurrency,
        max_depth: this.deps.settings.maxDepth,
      });

      for (const seed of this.deps.adapter.seedUrls()) {
        this.enqueue(state, seed, 0);
      }

      await this.loop(state);
      await this.flushWorkbook(state);
      await this.deps.transport.drain();
      await this.finalizeDeadLetters(state);

      if (state.fatalError) {
        state.logger.error(
          { error: state.fatalError.toLogObject() },
          "치명적 내보내기 오류로 실행 중단",
        );
        throw state.fatalError;
      }

      const report = this.buildReport(state, startedAt, options.signal?.aborted ?? false);
      logImportant(state.logger, "크롤링 완료", {
        discovered: report.discovered,
        succeeded: report.succeeded,
        skipped: report.skipped,
        rows_written: report.rowsWritten,
        cancelled: report.cancelled,
        duration_ms: report.durationMs,
      });
      return report;
    } finally {
      options.signal?.removeEventListener("abort", onExternalAbort);
      for (const timer of state.deferred.values()) clearTimeout(timer);
      this.running = false;
    }
  }

  /**
   * 대기열이 비고, 진행 중/연기된 Job 이 없을 때까지 실행
   */
  private async loop(state: RunState): Promise<void> {
    const { jobConcurrency } = this.deps.settings;

    for (;;) {
      while (
        !state.controller.signal.aborted &&
        state.queue.length > 0 &&
        state.inFlight.size < jobConcurrency
      ) {
        const job = state.queue.shift();
        if (job) this.start(state, job);
      }

      if (state.inFlight.size === 0 && state.deferred.size === 0 && state.queue.length === 0) {
        return;
      }
      if (state.controller.signal.aborted && state.inFlight.size === 0) {
        return;
      }

      await this.waitForProgress(state);
    }
  }

  private start(state: RunState, job: CrawlJob): void {
    const task = this.processJob(state, job).finally(() => {
      state.inFlight.delete(task);
      this.notify(state);
    });
    state.inFlight.add(task);
  }

  private waitForProgress(state: RunState): Promise<void> {
    if (state.dirty) {
      state.dirty = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      state.wake = resolve;
    });
  }

  private notify(state: RunState): void {
    const wake = state.wake;
    state.wake = undefined;
    if (wake) {
      wake();
    } else {
      state.dirty = true;
    }
  }

  /**
   * 외부 취소 또는 fatal 오류 시 실행 중단
   * 대기/연기 중인 Job 은 즉시 cancelled
   */
  private abortRun(state: RunState, reason: unknown): void {
    if (state.controller.signal.aborted) return;
    state.controller.abort(reason);

    for (const [jobId, timer] of state.deferred) {
      clearTimeout(timer);
      const job = state.jobs.get(jobId);
      if (job) this.markCancelled(job);
    }
    state.deferred.clear();

    for (const job of state.queue) this.markCancelled(job);
    state.queue.length = 0;

    state.logger.warn({ reason: String(reason) }, "실행 중단 - 남은 Job 취소");
    this.notify(state);
  }

  private markCancelled(job: CrawlJob): void {
    job.state = "permanently_failed";
    job.failureReason = CANCELLED_REASON;
  }

  private enqueue(state: RunState, link: PageLink, depth: number): void {
    const { url, kind, category } = link;
    if (depth > this.deps.settings.maxDepth) {
      state.logger.debug({ url, depth }, "최대 깊이 초과 - 건너뜀");
      return;
    }
    if (!isValidUrl(url)) {
      state.logger.warn({ url }, "유효하지 않은 URL - 건너뜀");
      return;
    }

    const id = createJobId(url);
    if (state.jobs.has(id)) return;

    const job: CrawlJob = {
      id,
      marketId: this.deps.adapter.id,
      url,
      pageKind: kind,
      depth,
      category,
      attemptCount: 0,
      state: "pending",
      deferrals: 0,
    };
    state.jobs.set(id, job);

    if (state.controller.signal.aborted) {
      this.markCancelled(job);
      return;
    }
    state.queue.push(job);
  }

  private async processJob(state: RunState, job: CrawlJob): Promise<void> {
    const { checkpoint } = this.deps;
    const jobLogger = createJobLogger(state.logger, job.id, job.url);

    // 재개: 이미 내보낸 상세 페이지는 다시 가져오지 않음
    if (job.pageKind === "detail" && checkpoint.isCompleted(job.id)) {
      job.state = "succeeded";
      jobLogger.debug("체크포인트에 완료된 페이지 - 건너뜀");
      return;
    }

    try {
      const page = await this.fetchPage(state, job, jobLogger);

      for (const link of this.discover(page)) {
        const target: PageLink = typeof link === "string" ? { url: link, kind: "detail" } : link;
        // 같은 종류 링크(페이지네이션)는 깊이를 늘리지 않음
        const depth =
          isDiscoveryPage(job.pageKind) && target.kind === job.pageKind ? job.depth : job.depth + 1;
        this.enqueue(state, { ...target, category: target.category ?? job.category }, depth);
      }

      const records = this.deps.extractor.extract(page, this.deps.adapter);

      // 재개 시 목록 페이지는 링크 발견용으로만 다시 가져옴
      if (!checkpoint.isCompleted(job.id)) {
        await this.exportRecords(state, job, records, jobLogger);
      }

      job.state = "succeeded";
      jobLogger.debug(
        { kind: job.pageKind, records: records.length, attempts: job.attemptCount },
        "Job 완료",
      );
    } catch (error) {
      await this.handleFailure(state, job, error, jobLogger);
    }
  }

  private async fetchPage(state: RunState, job: CrawlJob, jobLogger: Logger): Promise<MarketPage> {
    const { adapter, executor, transport } = this.deps;
    const request = createFetchRequest(job.url, {
      headers: adapter.headersFor?.(job.pageKind) ?? {},
      render: adapter.renderFor?.(job.pageKind) ?? false,
    });
    const signal = state.controller.signal;

    // 캐시 응답은 호스트 상태(서킷)와 시도 횟수에 영향 없음
    const cached = await transport.lookup(request);
    if (cached) {
      return { ...cached, kind: job.pageKind, category: job.category };
    }

    const result = await executor.execute(
      getHost(job.url),
      () => {
        job.state = "in_flight";
        return transport.fetch(request, { signal });
      },
      {
        attempts: job,
        signal,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          job.state = "retrying";
          jobLogger.info(
            { attempt, max_attempts: maxAttempts, delay_ms: delayMs, reason: describeFailure(error) },
            "재시도 예정",
          );
        },
      },
    );

    return { ...result, kind: job.pageKind, category: job.category };
  }

  private discover(page: MarketPage): DiscoveredLink[] {
    try {
      return this.deps.adapter.nextUrls(page);
    } catch (error) {
      throw new ExtractionError(
        "INVALID_RECORD",
        page.url,
        `Adapter ${this.deps.adapter.id} failed to discover links on ${page.url}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async exportRecords(
    state: RunState,
    job: CrawlJob,
    records: ProductRecord[],
    jobLogger: Logger,
  ): Promise<void> {
    if (records.length === 0 && job.pageKind !== "detail") return;

    const { exporter, mapping, workbook, checkpoint } = this.deps;
    let appended = 0;
    for (const record of records) {
      const outcome = await exporter.export(record, mapping, workbook);
      if (outcome === "appended") {
        appended++;
      } else {
        jobLogger.info({ sku: record.sku }, "중복 레코드 - 건너뜀");
      }
    }

    state.rowsWritten += appended;
    await checkpoint.markCompleted(job.id, appended);
  }

  /**
   * 저장 간격 사이에 남은 행 저장 (취소된 실행 포함)
   */
  private async flushWorkbook(state: RunState): Promise<void> {
    try {
      await this.deps.exporter.flush(this.deps.workbook);
    } catch (error) {
      if (!(error instanceof ExportError)) throw error;
      state.fatalError ??= error;
    }
  }

  private async handleFailure(
    state: RunState,
    job: CrawlJob,
    error: unknown,
    jobLogger: Logger,
  ): Promise<void> {
    if (error instanceof CircuitOpenError && !state.controller.signal.aborted) {
      await this.defer(state, job, error, jobLogger);
      return;
    }

    if (error instanceof ExportError && error.fatal) {
      state.fatalError ??= error;
      job.state = "permanently_failed";
      job.failureReason = describeFailure(error);
      this.abortRun(state, error);
      return;
    }

    job.state = "permanently_failed";
    job.failureReason =
      state.controller.signal.aborted &&
      (error instanceof CircuitOpenError ||
        (error instanceof TransportError && error.kind === "cancelled"))
        ? CANCELLED_REASON
        : describeFailure(error);

    if (job.failureReason === CANCELLED_REASON) {
      jobLogger.debug("취소된 Job");
      return;
    }

    jobLogger.warn(
      {
        reason: job.failureReason,
        attempts: job.attemptCount,
        error: error instanceof Error ? error.message : String(error),
      },
      "Job 영구 실패",
    );
    await this.writeDeadLetter(state, job, error);
  }

  /**
   * 서킷 open: retryAfterMs 후 재투입 (시도 횟수는 유지)
   */
  private async defer(
    state: RunState,
    job: CrawlJob,
    error: CircuitOpenError,
    jobLogger: Logger,
  ): Promise<void> {
    job.deferrals++;
    if (job.deferrals > this.deps.settings.maxDeferrals) {
      job.state = "permanently_failed";
      job.failureReason = describeFailure(error);
      jobLogger.warn({ deferrals: job.deferrals, host: error.host }, "연기 한도 초과");
      await this.writeDeadLetter(state, job, error);
      return;
    }

    job.state = "pending";
    jobLogger.info(
      { host: error.host, retry_after_ms: error.retryAfterMs, deferrals: job.deferrals },
      "서킷 open - Job 연기",
    );

    const timer = setTimeout(() => {
      state.deferred.delete(job.id);
      state.queue.push(job);
      this.notify(state);
    }, error.retryAfterMs);
    state.deferred.set(job.id, timer);
  }

  private async writeDeadLetter(state: RunState, job: CrawlJob, error: unknown): Promise<void> {
    const { deadLetters } = this.deps;
    if (!deadLetters) return;

    try {
      await deadLetters.append({
        jobId: job.id,
        url: job.url,
        pageKind: job.pageKind,
        depth: job.depth,
        attemptCount: job.attemptCount,
        reason: job.failureReason ?? "unknown",
        message: error instanceof Error ? error.message : String(error),
      });
    } catch (writeError) {
      state.logger.error(
        { job_id: job.id, error: writeError instanceof Error ? writeError.message : String(writeError) },
        "데드레터 기록 실패",
      );
    }
  }

  private async finalizeDeadLetters(state: RunState): Promise<void> {
    const result = await this.deps.deadLetters?.finalize();
    if (result) {
      state.logger.info(
        { file: result.filePath, count: result.recordCount },
        "데드레터 파일 저장",
      );
    }
  }

  private buildReport(state: RunState, startedAt: number, cancelled: boolean): CrawlReport {
    let succeeded = 0;
    let skipped = 0;
    const failuresByReason: Record<string, number> = {};

    for (const job of state.jobs.values()) {
      if (job.state === "succeeded") {
        succeeded++;
        continue;
      }
      // 중단으로 끝나지 못한 Job 포함
      if (job.state !== "permanently_failed") this.markCancelled(job);
      skipped++;
      const reason = job.failureReason ?? "unknown";
      failuresByReason[reason] = (failuresByReason[reason] ?? 0) + 1;
    }

    return {
      runId: state.runId,
      marketId: this.deps.adapter.id,
      outputFile: this.deps.workbook.outputPath,
      discovered: state.jobs.size,
      succeeded,
      skipped,
      rowsWritten: state.rowsWritten,
      failuresByReason,
      cancelled,
      durationMs: Date.now() - startedAt,
    };
  }
}
