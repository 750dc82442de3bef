/**
 * 지정 URL 목록 어댑터 (--urls)
 *
 * Decorator Pattern: 마켓 어댑터의 추출 로직은 그대로 쓰고
 * 시작 URL만 상세 페이지 목록으로 교체
 */

import * as fs from "fs/promises";
import type { PageKind } from "@/core/domain/CrawlJob";
import type { RawProductFields } from "@/core/domain/ProductRecord";
import { ConfigError } from "@/core/errors";
import type {
  DiscoveredLink,
  IMarketAdapter,
  MarketPage,
  PageLink,
} from "@/core/interfaces/IMarketAdapter";
import { isValidUrl, normalizeUrl } from "@/utils/url";

export class CustomUrlsAdapter implements IMarketAdapter {
  readonly id: string;

  constructor(
    private readonly inner: IMarketAdapter,
    private readonly urls: readonly string[],
  ) {
    this.id = inner.id;
  }

  seedUrls(): PageLink[] {
    return this.urls.map((url): PageLink => ({ url, kind: "detail" }));
  }

  /**
   * 지정 URL만 수집 (목록 탐색 없음)
   */
  nextUrls(_page: MarketPage): DiscoveredLink[] {
    return [];
  }

  extract(page: MarketPage): RawProductFields[] {
    return this.inner.extract(page);
  }

  renderFor(kind: PageKind): boolean {
    return this.inner.renderFor?.(kind) ?? false;
  }

  headersFor(kind: PageKind): Record<string, string> {
    return this.inner.headersFor?.(kind) ?? {};
  }
}

/**
 * URL 목록 파일 파싱
 *
 * 한 줄에 하나, 빈 줄과 # 주석 무시, 정규화 기준 중복 제거
 * @throws {ConfigError} 잘못된 URL 또는 빈 목록
 */
export function parseUrlList(content: string): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    const url = line.trim();
    if (!url || url.startsWith("#")) return;
    if (!isValidUrl(url)) {
      throw new ConfigError(`Invalid URL at line ${index + 1}: ${url}`);
    }

    const key = normalizeUrl(url);
    if (seen.has(key)) return;
    seen.add(key);
    urls.push(url);
  });

  if (urls.length === 0) {
    throw new ConfigError("URL list is empty");
  }
  return urls;
}

export async function loadUrlList(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read URL list: ${filePath}`, { cause: error });
  }
  return parseUrlList(content);
}
