/**
 * Product Extractor
 *
 * 어댑터가 뽑은 원시 필드를 ProductRecord 로 변환
 *
 * - SKU/가격 누락은 해당 페이지(Job)의 실패 (실행 전체는 계속)
 * - 한 페이지의 레코드 중 하나라도 결함이 있으면 페이지 전체를 실패 처리
 * - 이미지 URL은 페이지 URL 기준으로 해석, 순서 유지 중복 제거
 * - 카테고리/브랜드는 FuzzyMatcher 로 정규화
 */

import type { IMarketAdapter, MarketPage } from "@/core/interfaces/IMarketAdapter";
import type { ProductRecord, RawProductFields } from "@/core/domain/ProductRecord";
import { ExtractionError } from "@/core/errors";
import { resolveUrl } from "@/utils/url";
import { FuzzyMatcher, MatchResult } from "./FuzzyMatcher";
import { PriceParser } from "./PriceParser";

export interface ProductExtractorOptions {
  categoryMatcher?: FuzzyMatcher;
  brandMatcher?: FuzzyMatcher;
  /** 가격 텍스트/어댑터에 통화 정보가 없을 때 */
  defaultCurrency: string;
}

export class ProductExtractor {
  constructor(private readonly options: ProductExtractorOptions) {}

  /**
   * @throws {ExtractionError} SKU_NOT_FOUND / PRICE_NOT_FOUND / INVALID_RECORD
   */
  extract(page: MarketPage, adapter: IMarketAdapter): ProductRecord[] {
    let raws: RawProductFields[];
    try {
      raws = adapter.extract(page);
    } catch (error) {
      throw new ExtractionError(
        "INVALID_RECORD",
        page.url,
        `Adapter ${adapter.id} failed to extract ${page.url}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    return raws.map((raw) => this.toRecord(raw, page));
  }

  private toRecord(raw: RawProductFields, page: MarketPage): ProductRecord {
    const pageUrl = page.url;
    const sku = raw.sku?.trim();
    if (!sku) {
      throw new ExtractionError("SKU_NOT_FOUND", pageUrl);
    }

    const parsed = PriceParser.parseWithCurrency(raw.price);
    if (!parsed) {
      throw new ExtractionError("PRICE_NOT_FOUND", pageUrl, `Price not found for SKU ${sku} at ${pageUrl}`);
    }

    // 페이지에 카테고리가 없으면 시작 URL의 카테고리 이름 사용
    const categoryRaw = raw.category?.trim() || page.category?.trim() || "";
    const brandRaw = raw.brand?.trim() ?? "";
    const category = this.normalize(categoryRaw, this.options.categoryMatcher);
    const brand = this.normalize(brandRaw, this.options.brandMatcher);

    return {
      sku,
      name: raw.name?.trim() ?? "",
      price: parsed.amount,
      currency:
        raw.currency?.trim().toUpperCase() ||
        parsed.currency ||
        this.options.defaultCurrency,
      categoryRaw,
      categoryNormalized: category.value,
      categoryMatched: category.matched,
      brandRaw,
      brandNormalized: brand.value,
      brandMatched: brand.matched,
      imageUrls: this.resolveImages(raw.imageUrls ?? [], pageUrl),
      attributes: this.cleanAttributes(raw.attributes ?? {}),
      sourceUrl: pageUrl,
    };
  }

  private normalize(raw: string, matcher: FuzzyMatcher | undefined): MatchResult {
    if (!matcher || !raw) {
      return { value: raw, matched: false, score: 0 };
    }
    return matcher.match(raw);
  }

  private resolveImages(urls: readonly string[], pageUrl: string): string[] {
    const seen = new Set<string>();
    const resolved: string[] = [];
    for (const url of urls) {
      const absolute = resolveUrl(url, pageUrl);
      if (absolute && !seen.has(absolute)) {
        seen.add(absolute);
        resolved.push(absolute);
      }
    }
    return resolved;
  }

  private cleanAttributes(attributes: Record<string, string>): Record<string, string> {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(attributes)) {
      const trimmedKey = key.trim();
      if (trimmedKey) {
        cleaned[trimmedKey] = value.trim();
      }
    }
    return cleaned;
  }
}
