import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigError } from "@/core/errors";
import type { IMarketAdapter, MarketPage } from "@/core/interfaces/IMarketAdapter";
import { CustomUrlsAdapter, loadUrlList, parseUrlList } from "@/markets/CustomUrlsAdapter";

describe("parseUrlList", () => {
  it("빈 줄과 주석을 건너뛰고 정규화 기준으로 중복 제거해야 함", () => {
    const content = [
      "# 수집 대상",
      "https://shop.example/p/1?b=2&a=1",
      "",
      "  https://SHOP.example/p/1?a=1&b=2#reviews  ",
      "https://shop.example/p/2",
    ].join("\r\n");

    expect(parseUrlList(content)).toEqual([
      "https://shop.example/p/1?b=2&a=1",
      "https://shop.example/p/2",
    ]);
  });

  it("잘못된 URL 은 줄 번호와 함께 ConfigError 여야 함", () => {
    expect(() => parseUrlList("https://shop.example/p/1\nftp://shop.example/file")).toThrow(
      "Invalid URL at line 2: ftp://shop.example/file",
    );
  });

  it("URL 이 하나도 없으면 ConfigError 여야 함", () => {
    expect(() => parseUrlList("# only comments\n\n")).toThrow("URL list is empty");
  });
});

describe("loadUrlList", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "url-list-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("파일에서 URL 목록을 읽어야 함", async () => {
    const filePath = path.join(dir, "urls.txt");
    fs.writeFileSync(filePath, "https://shop.example/p/1\n");

    await expect(loadUrlList(filePath)).resolves.toEqual(["https://shop.example/p/1"]);
  });

  it("파일이 없으면 ConfigError 여야 함", async () => {
    await expect(loadUrlList(path.join(dir, "none.txt"))).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("CustomUrlsAdapter", () => {
  const extract = jest.fn((page: MarketPage) => [{ sku: "A1", price: "10", name: page.url }]);
  const inner: IMarketAdapter = {
    id: "shop.example",
    seedUrls: () => [{ url: "https://shop.example/c", kind: "category" }],
    nextUrls: () => ["https://shop.example/p/9"],
    extract,
    renderFor: (kind) => kind === "detail",
  };
  const adapter = new CustomUrlsAdapter(inner, ["https://shop.example/p/1", "https://shop.example/p/2"]);
  const detailPage: MarketPage = {
    url: "https://shop.example/p/1",
    status: 200,
    body: "",
    fetchedAt: "2026-01-01T00:00:00.000+00:00",
    fromCache: false,
    kind: "detail",
  };

  it("지정 URL 을 상세 페이지 시드로 사용하고 링크를 발견하지 않아야 함", () => {
    expect(adapter.id).toBe("shop.example");
    expect(adapter.seedUrls()).toEqual([
      { url: "https://shop.example/p/1", kind: "detail" },
      { url: "https://shop.example/p/2", kind: "detail" },
    ]);
    expect(adapter.nextUrls(detailPage)).toEqual([]);
  });

  it("추출과 렌더링 여부는 원래 어댑터에 위임해야 함", () => {
    expect(adapter.extract(detailPage)).toEqual([{ sku: "A1", price: "10", name: "https://shop.example/p/1" }]);
    expect(extract).toHaveBeenCalledWith(detailPage);
    expect(adapter.renderFor("detail")).toBe(true);
    expect(adapter.headersFor("detail")).toEqual({});
  });
});
