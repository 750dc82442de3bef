/**
 * CLI 인자 파싱 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { DEFAULT_COLUMN_MAPPING, DEFAULT_TEMPLATE, getUsage, parseCliArgs } from "@/cliArgs";
import { ConfigError } from "@/core/errors";

describe("parseCliArgs", () => {
  it("--market 만 주면 기본값을 채워야 함", () => {
    expect(parseCliArgs(["--market", "shop.example"])).toEqual({
      help: false,
      listMarkets: false,
      marketId: "shop.example",
      columnMappingPath: DEFAULT_COLUMN_MAPPING,
      templatePath: DEFAULT_TEMPLATE,
      resume: false,
      reset: false,
      overrides: {},
    });
  });

  it("--flag value 와 --flag=value 형식을 모두 해석해야 함", () => {
    const args = parseCliArgs([
      "--market=shop.example",
      "--date",
      "20260101",
      "--concurrency=4",
      "--max-depth",
      "0",
      "--dedupe",
      "sku, name,",
      "--headful",
      "--urls",
      "urls.txt",
      "--output-dir",
      "out",
      "--template",
      "template.xlsx",
      "--column-mapping=mapping.json",
      "--resume",
    ]);

    expect(args).toEqual({
      help: false,
      listMarkets: false,
      marketId: "shop.example",
      columnMappingPath: "mapping.json",
      templatePath: "template.xlsx",
      outputDir: "out",
      runDate: "20260101",
      urlsFile: "urls.txt",
      resume: true,
      reset: false,
      dedupeFields: ["sku", "name"],
      overrides: { jobConcurrency: 4, maxDepth: 0, headless: false },
    });
  });

  it("--help 와 --list-markets 는 --market 없이 허용해야 함", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
    expect(parseCliArgs(["--list-markets"]).listMarkets).toBe(true);
  });

  it("--market 이 없으면 ConfigError 여야 함", () => {
    expect(() => parseCliArgs([])).toThrow("--market is required");
  });

  it("알 수 없는 옵션은 ConfigError 여야 함", () => {
    expect(() => parseCliArgs(["--market", "a", "--verbose"])).toThrow("Unknown option: --verbose");
  });

  it("값이 빠진 옵션은 ConfigError 여야 함", () => {
    expect(() => parseCliArgs(["--market", "--resume"])).toThrow("Missing value for --market");
    expect(() => parseCliArgs(["--market="])).toThrow("Missing value for --market");
  });

  it("--resume 과 --reset 은 함께 쓸 수 없어야 함", () => {
    expect(() => parseCliArgs(["--market", "a", "--resume", "--reset"])).toThrow(ConfigError);
  });

  it("카테고리 범위 옵션을 시작/끝으로 모아야 함", () => {
    expect(parseCliArgs(["--market", "a", "--start-category", "TV & Audio", "--end-category=3"]).categoryRange).toEqual({
      start: "TV & Audio",
      end: "3",
    });
    expect(parseCliArgs(["--market", "a", "--end-category", "Phones"]).categoryRange).toEqual({ end: "Phones" });
    expect(parseCliArgs(["--market", "a"]).categoryRange).toBeUndefined();
  });

  it("--urls 와 카테고리 범위는 함께 쓸 수 없어야 함", () => {
    expect(() => parseCliArgs(["--market", "a", "--urls", "urls.txt", "--start-category", "Phones"])).toThrow(
      "--urls cannot be combined with --start-category/--end-category",
    );
  });

  it("잘못된 숫자/날짜 값은 ConfigError 여야 함", () => {
    expect(() => parseCliArgs(["--market", "a", "--concurrency", "0"])).toThrow(
      "--concurrency expects a positive integer: 0",
    );
    expect(() => parseCliArgs(["--market", "a", "--max-depth", "-1"])).toThrow(
      "--max-depth expects a non-negative integer: -1",
    );
    expect(() => parseCliArgs(["--market", "a", "--date", "20260231"])).toThrow(
      "--date expects YYYYMMDD: 20260231",
    );
  });
});

describe("getUsage", () => {
  it("모든 옵션을 안내해야 함", () => {
    const usage = getUsage();

    for (const flag of ["--market <id>", "--resume", "--reset", "--urls <file>", "--start-category", "--end-category", "--dedupe", "--list-markets"]) {
      expect(usage).toContain(flag);
    }
  });
});
