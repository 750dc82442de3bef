import { CrawlerError } from "./CrawlerError";

export type ExtractionErrorReason =
  | "SKU_NOT_FOUND"
  | "PRICE_NOT_FOUND"
  | "INVALID_RECORD";

/**
 * 페이지 단위 데이터 결함 (해당 Job만 실패, 실행은 계속)
 */
export class ExtractionError extends CrawlerError {
  constructor(
    public readonly reason: ExtractionErrorReason,
    public readonly url: string,
    message?: string,
  ) {
    super(reason, message ?? `Extraction failed (${reason}) for ${url}`);
    this.name = "ExtractionError";
  }

  override toLogObject(): Record<string, unknown> {
    return { ...super.toLogObject(), reason: this.reason, url: this.url };
  }
}
