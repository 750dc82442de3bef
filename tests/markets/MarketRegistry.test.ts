/**
 * ConfigLoader / MarketRegistry 테스트
 *
 * 목적: 마켓 YAML 로드/검증, 코드 어댑터 우선순위, 미지원 마켓 에러 검증
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigLoader } from "@/config/ConfigLoader";
import { ConfigError, MarketNotFoundError } from "@/core/errors";
import type { IMarketAdapter } from "@/core/interfaces/IMarketAdapter";
import { ConfigDrivenMarketAdapter } from "@/markets/ConfigDrivenMarketAdapter";
import { MarketRegistry } from "@/markets/MarketRegistry";

const VALID_YAML = `
id: alpha
name: Alpha
baseUrl: https://alpha.example
currency: EUR
seeds:
  - https://alpha.example/c
listing:
  productLink: a.product
detail:
  fields:
    sku: .sku
settings:
  maxAttempts: 2
`;

const codeAdapter: IMarketAdapter = {
  id: "beta",
  seedUrls: () => [],
  nextUrls: () => [],
  extract: () => [],
};

describe("ConfigLoader", () => {
  let dir: string;
  let loader: ConfigLoader;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "markets-"));
    fs.writeFileSync(path.join(dir, "alpha.yaml"), VALID_YAML);
    fs.writeFileSync(path.join(dir, "README.md"), "not a market");
    loader = new ConfigLoader(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("YAML 마켓 정의를 기본값과 함께 로드해야 함", () => {
    const definition = loader.loadMarket("alpha");

    expect(definition.currency).toBe("EUR");
    expect(definition.render).toEqual({ category: false, listing: false, detail: false });
    expect(definition.listing.productLinkAttribute).toBe("href");
    expect(definition.detail.jsonLd).toBe(true);
    expect(definition.settings).toEqual({ maxAttempts: 2 });
    expect(Object.isFrozen(definition)).toBe(true);
    expect(loader.loadMarket("alpha")).toBe(definition);
  });

  it("YAML 파일만 마켓으로 나열해야 함", () => {
    fs.writeFileSync(path.join(dir, "gamma.yml"), VALID_YAML.replace("id: alpha", "id: gamma"));

    expect(loader.getAvailableMarkets()).toEqual(["alpha", "gamma"]);
    expect(new ConfigLoader(path.join(dir, "missing")).getAvailableMarkets()).toEqual([]);
  });

  it("파일명과 id 가 다르면 ConfigError 여야 함", () => {
    fs.writeFileSync(path.join(dir, "delta.yaml"), VALID_YAML);

    expect(() => loader.loadMarket("delta")).toThrow(
      "Market id mismatch in " + path.join(dir, "delta.yaml") + ": expected delta, got alpha",
    );
  });

  it("스키마 위반과 알 수 없는 설정 키는 ConfigError 여야 함", () => {
    fs.writeFileSync(path.join(dir, "bad.yaml"), VALID_YAML.replace("id: alpha", "id: bad").replace("maxAttempts: 2", "retries: 2"));

    expect(() => loader.loadMarket("bad")).toThrow(ConfigError);
  });

  it("경로 탈출 ID 는 파일을 찾지 않아야 함", () => {
    expect(() => loader.loadMarket("../alpha")).toThrow("Market config file not found: ../alpha");
  });
});

describe("MarketRegistry", () => {
  let dir: string;
  let registry: MarketRegistry;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "registry-"));
    fs.writeFileSync(path.join(dir, "alpha.yaml"), VALID_YAML);
    registry = new MarketRegistry(new ConfigLoader(dir)).register("beta", () => codeAdapter);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("코드와 YAML 마켓을 합쳐 정렬해 나열해야 함", () => {
    expect(registry.list()).toEqual(["alpha", "beta"]);
  });

  it("YAML 마켓은 설정 기반 어댑터와 정의를 반환해야 함", () => {
    const resolved = registry.resolve("alpha");

    expect(resolved.adapter).toBeInstanceOf(ConfigDrivenMarketAdapter);
    expect(resolved.adapter.id).toBe("alpha");
    expect(resolved.definition?.currency).toBe("EUR");
  });

  it("코드 어댑터는 같은 ID 의 YAML 보다 우선해야 함", () => {
    registry.register("alpha", () => codeAdapter);

    const resolved = registry.resolve("alpha");

    expect(resolved.adapter).toBe(codeAdapter);
    expect(resolved.definition).toBeUndefined();
  });

  it("미지원 마켓은 지원 목록을 담은 MarketNotFoundError 여야 함", () => {
    expect.assertions(2);
    try {
      registry.resolve("omega");
    } catch (error) {
      expect(error).toBeInstanceOf(MarketNotFoundError);
      expect(error).toHaveProperty("message", "Market not found: omega. Supported markets: alpha, beta");
    }
  });
});
