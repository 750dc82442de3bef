#!/usr/bin/env node
/**
 * Market Crawler CLI
 *
 * 사용법:
 *   npx tsx src/cli.ts --market shop.example
 *   npx tsx src/cli.ts --market shop.example --resume
 *   npx tsx src/cli.ts --market shop.example --urls urls.txt --dedupe sku
 *
 * 종료 코드: 0 완료 (취소 포함), 1 치명적 오류
 */

import "dotenv/config";

import { logger } from "@/config/logger";
import { CrawlerError } from "@/core/errors";
import { MarketRegistry } from "@/markets/MarketRegistry";
import { getUsage, parseCliArgs } from "@/cliArgs";
import { createCrawlRun } from "@/composition";
import { createRunLogger, logImportant } from "@/utils/LoggerContext";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(getUsage());
    return 0;
  }

  const registry = new MarketRegistry();
  if (args.listMarkets || !args.marketId) {
    console.log(registry.list().join("\n"));
    return 0;
  }

  const run = await createCrawlRun({
    marketId: args.marketId,
    columnMappingPath: args.columnMappingPath,
    templatePath: args.templatePath,
    outputDir: args.outputDir,
    runDate: args.runDate,
    urlsFile: args.urlsFile,
    categoryRange: args.categoryRange,
    resume: args.resume,
    reset: args.reset,
    dedupeFields: args.dedupeFields,
    overrides: args.overrides,
    registry,
  });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`${signal} 수신, 크롤링 중지 중...`);
    controller.abort(new Error(`Received ${signal}`));
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const report = await run.orchestrator.run({ signal: controller.signal, runId: run.runId });
    logImportant(createRunLogger(report.runId, report.marketId), "실행 리포트", { ...report });
    return 0;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await run.dispose();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(
      {
        error: error instanceof CrawlerError ? error.toLogObject() : error instanceof Error ? error.message : String(error),
      },
      "크롤러 비정상 종료",
    );
    process.exitCode = 1;
  });
