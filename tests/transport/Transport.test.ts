/**
 * Transport 테스트
 *
 * 목적: 캐시 우선 조회, 타임아웃, 취소, 전략 선택 검증 (가짜 전략/캐시 사용)
 */

import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { Transport } from "@/transport/Transport";
import { HostConcurrencyLimiter } from "@/transport/HostConcurrencyLimiter";
import { createFetchRequest, FetchRequest, FetchResult } from "@/core/domain/FetchResult";
import type { ICacheStore } from "@/core/interfaces/ICacheStore";
import type { ITransportStrategy } from "@/core/interfaces/ITransportStrategy";
import { TransportError } from "@/core/errors";

const URL_1 = "https://shop.example/p/1";

function okResult(url: string, body = "<html></html>"): FetchResult {
  return { url, status: 200, body, fetchedAt: "2026-01-01T00:00:00.000+00:00", fromCache: false };
}

class FakeStrategy implements ITransportStrategy {
  readonly name = "fake";
  readonly fetch = jest.fn<(request: FetchRequest, signal: AbortSignal) => Promise<FetchResult>>();
}

class MemoryCache implements ICacheStore {
  readonly entries = new Map<string, FetchResult>();
  readonly put = jest.fn(async (key: string, result: FetchResult, _ttlMs: number) => {
    this.entries.set(key, result);
  });

  async get(key: string): Promise<FetchResult | undefined> {
    const entry = this.entries.get(key);
    return entry ? { ...entry, fromCache: true } : undefined;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected rejection");
}

describe("Transport", () => {
  let http: FakeStrategy;
  let cache: MemoryCache;
  let transport: Transport;

  beforeEach(() => {
    http = new FakeStrategy();
    cache = new MemoryCache();
    transport = new Transport({
      http,
      cache,
      cacheTtlMs: 60_000,
      limiter: new HostConcurrencyLimiter(2),
      timeoutMs: 50,
    });
  });

  it("캐시 미스면 전략으로 가져오고 캐시에 저장해야 함", async () => {
    http.fetch.mockResolvedValue(okResult(URL_1, "fresh"));

    const result = await transport.fetch(createFetchRequest(URL_1));
    await transport.drain();

    expect(result.body).toBe("fresh");
    expect(http.fetch).toHaveBeenCalledTimes(1);
    expect(cache.put).toHaveBeenCalledWith(`GET ${URL_1} http`, result, 60_000);
  });

  it("캐시 히트면 네트워크 요청 없이 fromCache=true 로 반환해야 함", async () => {
    http.fetch.mockResolvedValue(okResult(URL_1, "fresh"));
    await transport.fetch(createFetchRequest(URL_1));
    await transport.drain();

    const second = await transport.fetch(createFetchRequest(`${URL_1}#reviews`));

    expect(second.fromCache).toBe(true);
    expect(second.body).toBe("fresh");
    expect(http.fetch).toHaveBeenCalledTimes(1);
  });

  it("lookup 은 캐시만 조회하고 전략을 호출하지 않아야 함", async () => {
    await expect(transport.lookup(createFetchRequest(URL_1))).resolves.toBeUndefined();

    cache.entries.set(`GET ${URL_1} http`, okResult(URL_1, "stored"));
    const hit = await transport.lookup(createFetchRequest(URL_1));

    expect(hit).toMatchObject({ body: "stored", fromCache: true });
    expect(http.fetch).not.toHaveBeenCalled();
  });

  it("응답이 timeoutMs 를 넘으면 timeout 에러여야 함", async () => {
    // 신호를 무시하는 전략
    http.fetch.mockImplementation(() => new Promise<FetchResult>(() => undefined));

    const error = await catchError(transport.fetch(createFetchRequest(URL_1)));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: "timeout", url: URL_1 });
    expect(cache.put).not.toHaveBeenCalled();
  });

  it("진행 중 취소되면 cancelled 에러여야 함", async () => {
    http.fetch.mockImplementation(() => new Promise<FetchResult>(() => undefined));
    const controller = new AbortController();

    const pending = catchError(transport.fetch(createFetchRequest(URL_1), { signal: controller.signal }));
    setTimeout(() => controller.abort(), 5);

    expect(await pending).toMatchObject({ kind: "cancelled" });
  });

  it("이미 취소된 신호면 전략을 호출하지 않아야 함", async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await catchError(transport.fetch(createFetchRequest(URL_1), { signal: controller.signal }));

    expect(error).toMatchObject({ kind: "cancelled" });
    expect(http.fetch).not.toHaveBeenCalled();
  });

  it("전략 에러는 그대로 전달해야 함", async () => {
    const failure = new TransportError("http_status", URL_1, { status: 503 });
    http.fetch.mockRejectedValue(failure);

    await expect(transport.fetch(createFetchRequest(URL_1))).rejects.toBe(failure);
  });

  it("브라우저 전략이 없으면 렌더링 요청은 render_failed 여야 함", async () => {
    const error = await catchError(transport.fetch(createFetchRequest(URL_1, { render: true })));

    expect(error).toMatchObject({ kind: "render_failed" });
    expect(http.fetch).not.toHaveBeenCalled();
  });

  it("렌더링 요청은 브라우저 전략으로 보내야 함", async () => {
    const browser = new FakeStrategy();
    browser.fetch.mockResolvedValue(okResult(URL_1, "rendered"));
    const withBrowser = new Transport({
      http,
      browser,
      cacheTtlMs: 60_000,
      limiter: new HostConcurrencyLimiter(1),
      timeoutMs: 50,
    });

    const result = await withBrowser.fetch(createFetchRequest(URL_1, { render: true }));

    expect(result.body).toBe("rendered");
    expect(http.fetch).not.toHaveBeenCalled();
  });

  it("캐시 조회 실패는 미스로 처리해야 함", async () => {
    jest.spyOn(cache, "get").mockRejectedValue(new Error("disk error"));
    http.fetch.mockResolvedValue(okResult(URL_1, "fresh"));

    await expect(transport.fetch(createFetchRequest(URL_1))).resolves.toMatchObject({ body: "fresh" });
  });
});
