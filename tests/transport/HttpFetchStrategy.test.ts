/**
 * HttpFetchStrategy 테스트
 *
 * 목적: 응답 상태 분류와 Retry-After 해석 검증 (global fetch mock)
 */

import { describe, it, expect, afterEach, jest } from "@jest/globals";
import { HttpFetchStrategy } from "@/transport/HttpFetchStrategy";
import { createFetchRequest } from "@/core/domain/FetchResult";
import { TransportError } from "@/core/errors";

const URL_1 = "https://shop.example/p/1";

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected rejection");
}

describe("HttpFetchStrategy", () => {
  const strategy = new HttpFetchStrategy("test-agent/1.0");

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("200 응답 본문을 FetchResult 로 반환해야 함", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("<html>ok</html>", { status: 200 }));

    const result = await strategy.fetch(
      createFetchRequest(URL_1, { headers: { "Accept-Language": "ko-KR" } }),
      new AbortController().signal,
    );

    expect(result.url).toBe(URL_1);
    expect(result.status).toBe(200);
    expect(result.body).toBe("<html>ok</html>");
    expect(result.fromCache).toBe(false);

    const init = fetchSpy.mock.calls[0][1];
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({ "User-Agent": "test-agent/1.0", "Accept-Language": "ko-KR" });
  });

  it("429 응답은 Retry-After 를 포함한 http_status 에러여야 함", async () => {
    jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("slow down", { status: 429, headers: { "Retry-After": "3" } }));

    const error = await catchError(strategy.fetch(createFetchRequest(URL_1), new AbortController().signal));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: "http_status", status: 429, retryAfterMs: 3000 });
  });

  it("404 응답은 Retry-After 없이 http_status 에러여야 함", async () => {
    jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("missing", { status: 404, headers: { "Retry-After": "3" } }));

    const error = await catchError(strategy.fetch(createFetchRequest(URL_1), new AbortController().signal));

    expect(error).toMatchObject({ kind: "http_status", status: 404, retryAfterMs: undefined });
  });

  it("네트워크 에러는 connection_failed 여야 함", async () => {
    jest.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));

    const error = await catchError(strategy.fetch(createFetchRequest(URL_1), new AbortController().signal));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: "connection_failed", url: URL_1 });
  });

  it("신호가 중단된 경우 신호의 reason 을 그대로 던져야 함", async () => {
    const controller = new AbortController();
    const reason = new TransportError("timeout", URL_1);
    controller.abort(reason);
    jest.spyOn(globalThis, "fetch").mockRejectedValue(new Error("aborted"));

    await expect(strategy.fetch(createFetchRequest(URL_1), controller.signal)).rejects.toBe(reason);
  });
});
