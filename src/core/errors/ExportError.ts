import { CrawlerError } from "./CrawlerError";

export type ExportErrorReason =
  | "UNMAPPED_REQUIRED_FIELD"
  | "TEMPLATE_INVALID"
  | "WRITE_FAILED";

/**
 * 워크북 Export 실패
 * fatal=true 이면 실행 전체를 중단 (출력 파일 무결성 위협)
 */
export class ExportError extends CrawlerError {
  constructor(
    public readonly reason: ExportErrorReason,
    message: string,
    public readonly fatal: boolean,
    options?: { cause?: unknown },
  ) {
    super(reason, message, options);
    this.name = "ExportError";
  }

  override toLogObject(): Record<string, unknown> {
    return { ...super.toLogObject(), reason: this.reason, fatal: this.fatal };
  }
}
