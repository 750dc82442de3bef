/**
 * BrowserRenderStrategy 테스트
 *
 * 목적: 가짜 Browser Pool 로 렌더링 결과 분류와 페이지 반환 검증
 */

import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { BrowserRenderStrategy } from "@/transport/BrowserRenderStrategy";
import type {
  IBrowserPool,
  PooledPage,
  RenderPage,
  RenderResponse,
  WaitUntil,
} from "@/core/interfaces/IBrowserPool";
import { createFetchRequest } from "@/core/domain/FetchResult";
import { TransportError } from "@/core/errors";

const URL_1 = "https://shop.example/p/1";

class FakePage implements RenderPage {
  readonly goto = jest.fn<
    (url: string, options: { timeout: number; waitUntil: WaitUntil }) => Promise<RenderResponse | null>
  >();
  readonly setExtraHTTPHeaders = jest.fn<(headers: Record<string, string>) => Promise<void>>(async () => undefined);
  readonly content = jest.fn<() => Promise<string>>(async () => "<html>rendered</html>");
  readonly close = jest.fn<() => Promise<void>>(async () => undefined);
}

class FakePool implements IBrowserPool {
  readonly page = new FakePage();
  released = 0;
  /** 브라우저가 빌 때까지 대기 */
  available: Promise<void> = Promise.resolve();

  async initialize(): Promise<void> {}

  async acquirePage(): Promise<PooledPage> {
    await this.available;
    return {
      page: this.page,
      release: async () => {
        this.released++;
      },
    };
  }

  async cleanup(): Promise<void> {}

  getStatus() {
    return { poolSize: 1, available: 1, inUse: 0 };
  }
}

function respond(status: number): RenderResponse {
  return { status: () => status };
}

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected rejection");
}

describe("BrowserRenderStrategy", () => {
  let pool: FakePool;
  let strategy: BrowserRenderStrategy;

  beforeEach(() => {
    pool = new FakePool();
    strategy = new BrowserRenderStrategy(pool, { navigationTimeoutMs: 1000 });
  });

  it("렌더링된 HTML 을 반환하고 페이지를 반납해야 함", async () => {
    pool.page.goto.mockResolvedValue(respond(200));

    const result = await strategy.fetch(
      createFetchRequest(URL_1, { render: true, headers: { "Accept-Language": "ko-KR" } }),
      new AbortController().signal,
    );

    expect(result).toMatchObject({ url: URL_1, status: 200, body: "<html>rendered</html>", fromCache: false });
    expect(pool.page.setExtraHTTPHeaders).toHaveBeenCalledWith({ "Accept-Language": "ko-KR" });
    expect(pool.page.goto).toHaveBeenCalledWith(URL_1, { timeout: 1000, waitUntil: "domcontentloaded" });
    expect(pool.released).toBe(1);
  });

  it("헤더가 없으면 setExtraHTTPHeaders 를 호출하지 않아야 함", async () => {
    pool.page.goto.mockResolvedValue(null);

    const result = await strategy.fetch(createFetchRequest(URL_1, { render: true }), new AbortController().signal);

    expect(result.status).toBe(200);
    expect(pool.page.setExtraHTTPHeaders).not.toHaveBeenCalled();
  });

  it("4xx/5xx 응답은 http_status 에러여야 함", async () => {
    pool.page.goto.mockResolvedValue(respond(503));

    const error = await catchError(strategy.fetch(createFetchRequest(URL_1, { render: true }), new AbortController().signal));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: "http_status", status: 503 });
    expect(pool.released).toBe(1);
  });

  it("navigation 실패는 render_failed 여야 함", async () => {
    pool.page.goto.mockRejectedValue(new Error("net::ERR_CONNECTION_RESET"));

    const error = await catchError(strategy.fetch(createFetchRequest(URL_1, { render: true }), new AbortController().signal));

    expect(error).toMatchObject({ kind: "render_failed", url: URL_1 });
    expect(pool.released).toBe(1);
  });

  it("취소되면 페이지를 닫고 신호의 reason 을 던져야 함", async () => {
    const controller = new AbortController();
    const reason = new TransportError("cancelled", URL_1);
    pool.page.goto.mockImplementation(
      () =>
        new Promise<RenderResponse | null>((_, reject) => {
          pool.page.close.mockImplementation(async () => {
            reject(new Error("Target closed"));
          });
        }),
    );

    const pending = catchError(strategy.fetch(createFetchRequest(URL_1, { render: true }), controller.signal));
    await new Promise((resolve) => setTimeout(resolve, 0));
    controller.abort(reason);

    expect(await pending).toBe(reason);
    expect(pool.page.close).toHaveBeenCalledTimes(1);
    expect(pool.released).toBe(1);
  });

  it("브라우저 대기 중 중단된 요청은 이동하지 않고 페이지를 반납해야 함", async () => {
    const controller = new AbortController();
    const reason = new TransportError("timeout", URL_1);
    let handOut: () => void = () => undefined;
    pool.available = new Promise<void>((resolve) => {
      handOut = resolve;
    });

    const pending = catchError(strategy.fetch(createFetchRequest(URL_1, { render: true }), controller.signal));
    controller.abort(reason);
    handOut();

    expect(await pending).toBe(reason);
    expect(pool.page.goto).not.toHaveBeenCalled();
    expect(pool.released).toBe(1);
  });
});
