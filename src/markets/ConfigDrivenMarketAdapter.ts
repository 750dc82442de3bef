/**
 * YAML 마켓 정의 기반 어댑터
 *
 * 카테고리/목록 페이지: 상품 링크 + 다음 페이지(셀렉터 또는 page 파라미터)
 * 상세 페이지: CSS 셀렉터 값 우선, 비어 있는 필드는 JSON-LD 값으로 채움
 */

import * as cheerio from "cheerio";
import type { PageKind } from "@/core/domain/CrawlJob";
import type { FieldSelector, MarketDefinition } from "@/core/domain/MarketDefinition";
import type { RawProductFields } from "@/core/domain/ProductRecord";
import { ConfigError } from "@/core/errors";
import type {
  DiscoveredLink,
  IMarketAdapter,
  MarketPage,
  PageLink,
} from "@/core/interfaces/IMarketAdapter";
import { resolveUrl } from "@/utils/url";
import { extractJsonLdProduct } from "./JsonLd";

const SELECTOR_FIELDS = ["sku", "name", "price", "currency", "category", "brand"] as const;
type SelectorField = (typeof SELECTOR_FIELDS)[number];

function collapseWhitespace(value: string | undefined): string | undefined {
  const collapsed = value?.replace(/\s+/g, " ").trim();
  return collapsed || undefined;
}

export class ConfigDrivenMarketAdapter implements IMarketAdapter {
  readonly id: string;
  private readonly urlPatterns = new Map<SelectorField, RegExp>();

  constructor(private readonly definition: MarketDefinition) {
    this.id = definition.id;

    for (const field of SELECTOR_FIELDS) {
      const fieldSelector = definition.detail.fields[field];
      if (typeof fieldSelector !== "object" || fieldSelector.urlPattern === undefined) continue;
      try {
        this.urlPatterns.set(field, new RegExp(fieldSelector.urlPattern));
      } catch (error) {
        throw new ConfigError(
          `Invalid urlPattern for ${definition.id}.detail.fields.${field}: ${fieldSelector.urlPattern}`,
          { cause: error },
        );
      }
    }
  }

  seedUrls(): PageLink[] {
    return this.definition.seeds.map((seed): PageLink => {
      if (typeof seed === "string") return { url: seed, kind: "category" };
      const link: PageLink = { url: seed.url, kind: seed.kind };
      if (seed.category) link.category = seed.category;
      return link;
    });
  }

  nextUrls(page: MarketPage): DiscoveredLink[] {
    if (page.kind === "detail") return [];

    const { listing } = this.definition;
    const $ = cheerio.load(page.body);
    const links: DiscoveredLink[] = [];

    const productUrls = this.collectUrls($, listing.productLink, listing.productLinkAttribute, page.url);
    links.push(...productUrls);

    if (page.kind === "category" && listing.subcategoryLink) {
      for (const url of this.collectUrls($, listing.subcategoryLink, "href", page.url)) {
        links.push({ url, kind: "listing" });
      }
    }

    // 상품이 없는 페이지에서 페이지네이션 중단
    if (productUrls.length > 0) {
      const next = this.findNextPage($, page.url);
      if (next) links.push({ url: next, kind: page.kind });
    }

    return links;
  }

  extract(page: MarketPage): RawProductFields[] {
    if (page.kind !== "detail") return [];

    const $ = cheerio.load(page.body);
    const jsonLd = this.definition.detail.jsonLd ? extractJsonLdProduct($) : undefined;

    const fields: RawProductFields = {};
    for (const field of SELECTOR_FIELDS) {
      const value = this.readField($, field, page.url) ?? jsonLd?.[field];
      if (value !== undefined) fields[field] = value;
    }

    const imageUrls = this.readImages($);
    if (imageUrls.length > 0) {
      fields.imageUrls = imageUrls;
    } else if (jsonLd?.imageUrls) {
      fields.imageUrls = jsonLd.imageUrls;
    }

    const attributes = this.readAttributes($);
    if (attributes) fields.attributes = attributes;

    return [fields];
  }

  renderFor(kind: PageKind): boolean {
    return this.definition.render[kind];
  }

  headersFor(): Record<string, string> {
    return { ...this.definition.headers };
  }

  /**
   * 다음 페이지 URL
   * 1. nextPage 셀렉터
   * 2. pagination.param 값 +1 (maxPages 까지)
   */
  private findNextPage($: cheerio.CheerioAPI, pageUrl: string): string | undefined {
    const { listing, pagination } = this.definition;

    if (listing.nextPage) {
      const href = $(listing.nextPage).first().attr("href");
      const resolved = href ? resolveUrl(href, pageUrl) : undefined;
      if (resolved && resolved !== pageUrl) return resolved;
    }

    if (!pagination) return undefined;

    const url = new URL(pageUrl);
    const current = Number(url.searchParams.get(pagination.param) ?? "1");
    const page = Number.isInteger(current) && current > 0 ? current : 1;
    if (page >= pagination.maxPages) return undefined;

    url.searchParams.set(pagination.param, String(page + 1));
    return url.toString();
  }

  private collectUrls(
    $: cheerio.CheerioAPI,
    selector: string,
    attribute: string,
    pageUrl: string,
  ): string[] {
    const urls = new Set<string>();
    $(selector).each((_, el) => {
      const value = $(el).attr(attribute);
      const resolved = value ? resolveUrl(value.trim(), pageUrl) : undefined;
      if (resolved) urls.add(resolved);
    });
    return [...urls];
  }

  private readField(
    $: cheerio.CheerioAPI,
    field: SelectorField,
    pageUrl: string,
  ): string | undefined {
    const fieldSelector: FieldSelector | undefined = this.definition.detail.fields[field];
    if (fieldSelector === undefined) return undefined;

    if (typeof fieldSelector === "string") {
      return collapseWhitespace($(fieldSelector).first().text());
    }

    if (fieldSelector.selector) {
      const el = $(fieldSelector.selector).first();
      const value = collapseWhitespace(fieldSelector.attribute ? el.attr(fieldSelector.attribute) : el.text());
      if (value) return value;
    }

    const pattern = this.urlPatterns.get(field);
    return collapseWhitespace(pattern?.exec(pageUrl)?.[1]);
  }

  private readImages($: cheerio.CheerioAPI): string[] {
    const images = this.definition.detail.images;
    if (!images) return [];

    const urls: string[] = [];
    $(images.selector).each((_, el) => {
      const value = collapseWhitespace($(el).attr(images.attribute));
      if (value) urls.push(value);
    });
    return urls;
  }

  private readAttributes($: cheerio.CheerioAPI): Record<string, string> | undefined {
    const table = this.definition.detail.attributes;
    if (!table) return undefined;

    const attributes: Record<string, string> = {};
    $(table.row).each((_, row) => {
      const key = collapseWhitespace($(row).find(table.key).first().text());
      const value = collapseWhitespace($(row).find(table.value).first().text());
      if (key && value !== undefined) attributes[key] = value;
    });
    return Object.keys(attributes).length > 0 ? attributes : undefined;
  }
}
