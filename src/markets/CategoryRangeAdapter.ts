/**
 * 카테고리 범위 어댑터 (--start-category / --end-category)
 *
 * Decorator Pattern: 시작 URL 중 지정 범위(양 끝 포함)의 카테고리만 수집
 * - 카테고리 이름(대소문자/공백 무시) 우선, 일치하는 이름이 없으면 1부터 시작하는 순번
 * - 한쪽만 지정하면 처음/끝까지
 */

import type { PageKind } from "@/core/domain/CrawlJob";
import type { RawProductFields } from "@/core/domain/ProductRecord";
import { ConfigError } from "@/core/errors";
import type {
  DiscoveredLink,
  IMarketAdapter,
  MarketPage,
  PageLink,
} from "@/core/interfaces/IMarketAdapter";

export interface CategoryRange {
  start?: string;
  end?: string;
}

function normalizeName(name: string): string {
  return name.replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * 범위에 해당하는 시작 URL 선택
 * @throws {ConfigError} 알 수 없는 카테고리 또는 시작이 끝보다 뒤일 때
 */
export function selectCategoryRange(seeds: readonly PageLink[], range: CategoryRange): PageLink[] {
  const names = seeds.map((seed) => seed.category ?? seed.url);

  const resolve = (ref: string, flag: string): number => {
    const byName = seeds.findIndex(
      (seed) => seed.category !== undefined && normalizeName(seed.category) === normalizeName(ref),
    );
    if (byName >= 0) return byName;

    if (/^\d+$/.test(ref.trim())) {
      const position = Number(ref.trim());
      if (position >= 1 && position <= seeds.length) return position - 1;
    }
    throw new ConfigError(`Unknown category for ${flag}: ${ref}. Available: ${names.join(", ")}`);
  };

  const start = range.start !== undefined ? resolve(range.start, "--start-category") : 0;
  const end = range.end !== undefined ? resolve(range.end, "--end-category") : seeds.length - 1;
  if (start > end) {
    throw new ConfigError(`--start-category ${names[start]} comes after --end-category ${names[end]}`);
  }

  return seeds.slice(start, end + 1);
}

export class CategoryRangeAdapter implements IMarketAdapter {
  readonly id: string;
  private readonly seeds: PageLink[];

  constructor(
    private readonly inner: IMarketAdapter,
    range: CategoryRange,
  ) {
    this.id = inner.id;
    this.seeds = selectCategoryRange(inner.seedUrls(), range);
  }

  seedUrls(): PageLink[] {
    return [...this.seeds];
  }

  nextUrls(page: MarketPage): DiscoveredLink[] {
    return this.inner.nextUrls(page);
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
