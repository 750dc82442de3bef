/**
 * 마켓 정의 (src/config/markets/<id>.yaml)
 *
 * YAML 로 기술되는 마켓의 시작 URL, 페이지네이션, CSS 셀렉터, 렌더링 여부
 */

import { z } from "zod";
import { CrawlerSettingsOverrideSchema } from "@/config/CrawlerSettings";
import { PAGE_KINDS } from "./CrawlJob";

/**
 * 필드 셀렉터
 * - 문자열: CSS 셀렉터, 텍스트 사용
 * - 객체: attribute 지정 시 속성값, urlPattern 지정 시 페이지 URL 에서 첫 캡처 그룹
 */
export const FieldSelectorSchema = z.union([
  z.string().min(1),
  z
    .object({
      selector: z.string().min(1).optional(),
      attribute: z.string().min(1).optional(),
      urlPattern: z.string().min(1).optional(),
    })
    .strict()
    .refine((s) => s.selector !== undefined || s.urlPattern !== undefined, {
      message: "selector or urlPattern is required",
    }),
]);

export type FieldSelector = z.infer<typeof FieldSelectorSchema>;

const SeedSchema = z.union([
  z.string().url(),
  z
    .object({
      url: z.string().url(),
      kind: z.enum(PAGE_KINDS).default("category"),
      /** 상품 category 가 비었을 때 채울 카테고리 이름 (--start-category/--end-category 기준) */
      category: z.string().trim().min(1).optional(),
    })
    .strict(),
]);

export const MarketDefinitionSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, "lowercase id expected"),
    name: z.string().min(1),
    baseUrl: z.string().url(),
    currency: z.string().length(3).optional(),
    seeds: z.array(SeedSchema).min(1),
    pagination: z
      .object({
        param: z.string().min(1).default("page"),
        maxPages: z.number().int().positive(),
      })
      .strict()
      .optional(),
    render: z
      .object({
        category: z.boolean().default(false),
        listing: z.boolean().default(false),
        detail: z.boolean().default(false),
      })
      .strict()
      .default({}),
    headers: z.record(z.string()).default({}),
    listing: z
      .object({
        productLink: z.string().min(1),
        productLinkAttribute: z.string().min(1).default("href"),
        nextPage: z.string().min(1).optional(),
        subcategoryLink: z.string().min(1).optional(),
      })
      .strict(),
    detail: z
      .object({
        jsonLd: z.boolean().default(true),
        fields: z
          .object({
            sku: FieldSelectorSchema.optional(),
            name: FieldSelectorSchema.optional(),
            price: FieldSelectorSchema.optional(),
            currency: FieldSelectorSchema.optional(),
            category: FieldSelectorSchema.optional(),
            brand: FieldSelectorSchema.optional(),
          })
          .strict()
          .default({}),
        images: z
          .object({
            selector: z.string().min(1),
            attribute: z.string().min(1).default("src"),
          })
          .strict()
          .optional(),
        attributes: z
          .object({
            row: z.string().min(1),
            key: z.string().min(1),
            value: z.string().min(1),
          })
          .strict()
          .optional(),
      })
      .strict(),
    settings: CrawlerSettingsOverrideSchema.optional(),
  })
  .strict();

export type MarketDefinition = z.infer<typeof MarketDefinitionSchema>;
export type MarketDefinitionInput = z.input<typeof MarketDefinitionSchema>;
