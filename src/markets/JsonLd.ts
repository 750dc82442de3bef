/**
 * JSON-LD (schema.org Product) 추출
 *
 * <script type="application/ld+json"> 블록을 펼쳐(@graph 포함)
 * 첫 Product 와 그 offers 에서 원시 필드를 만든다.
 */

import * as cheerio from "cheerio";
import { logger } from "@/config/logger";
import type { RawProductFields } from "@/core/domain/ProductRecord";

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * @type 은 문자열 또는 배열, "http://schema.org/Product" 형태도 허용
 */
function isTypeMatch(value: unknown, target: string): boolean {
  return toArray(value).some(
    (type) =>
      typeof type === "string" &&
      (type === target || type.endsWith(`/${target}`)),
  );
}

function flattenJsonLd(value: unknown): JsonObject[] {
  const output: JsonObject[] = [];
  const queue: unknown[] = [value];

  while (queue.length > 0) {
    const current = queue.shift();
    if (Array.isArray(current)) {
      queue.push(...current);
      continue;
    }
    if (!isJsonObject(current)) continue;
    if (current["@graph"] !== undefined) {
      queue.push(...toArray(current["@graph"]));
    }
    output.push(current);
  }

  return output;
}

function extractJsonLdObjects($: cheerio.CheerioAPI): JsonObject[] {
  const objects: JsonObject[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).contents().text().trim();
    if (!raw) return;
    try {
      objects.push(...flattenJsonLd(JSON.parse(raw)));
    } catch (error) {
      // 깨진 블록은 건너뛰고 셀렉터 추출로 진행
      logger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "JSON-LD 파싱 실패",
      );
    }
  });
  return objects;
}

function asText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/**
 * brand: "Acme" | { name: "Acme" }
 */
function asName(value: unknown): string | undefined {
  const first = toArray(value)[0];
  if (isJsonObject(first)) return asText(first["name"]);
  return asText(first);
}

function asImageUrls(value: unknown): string[] {
  const urls: string[] = [];
  for (const item of toArray(value)) {
    const url = isJsonObject(item)
      ? asText(item["url"]) ?? asText(item["contentUrl"])
      : asText(item);
    if (url) urls.push(url);
  }
  return urls;
}

function resolveOffer(
  product: JsonObject,
  objects: JsonObject[],
): JsonObject | undefined {
  let offers = toArray(product["offers"]).filter(isJsonObject);
  if (offers.length === 0) {
    offers = objects.filter((obj) => isTypeMatch(obj["@type"], "Offer"));
  }

  // AggregateOffer 는 lowPrice 사용
  return offers.find(
    (offer) =>
      asText(offer["price"]) !== undefined ||
      asText(offer["lowPrice"]) !== undefined,
  );
}

/**
 * 첫 Product 객체에서 원시 필드 추출 (Product 가 없으면 undefined)
 */
export function extractJsonLdProduct(
  $: cheerio.CheerioAPI,
): RawProductFields | undefined {
  const objects = extractJsonLdObjects($);
  const product = objects.find((obj) => isTypeMatch(obj["@type"], "Product"));
  if (!product) return undefined;

  const offer = resolveOffer(product, objects);
  const imageUrls = asImageUrls(product["image"]);

  return {
    sku:
      asText(product["sku"]) ??
      asText(product["productID"]) ??
      asText(product["mpn"]),
    name: asText(product["name"]),
    price: offer
      ? asText(offer["price"]) ?? asText(offer["lowPrice"])
      : undefined,
    currency: offer ? asText(offer["priceCurrency"]) : undefined,
    category: asName(product["category"]),
    brand: asName(product["brand"]),
    imageUrls: imageUrls.length > 0 ? imageUrls : undefined,
  };
}
