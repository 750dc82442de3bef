import { CrawlerError } from "./CrawlerError";

/**
 * 호스트 서킷이 열려 있어 네트워크 요청 없이 거절됨
 */
export class CircuitOpenError extends CrawlerError {
  constructor(
    public readonly host: string,
    public readonly retryAfterMs: number,
  ) {
    super(
      "CIRCUIT_OPEN",
      `Circuit open for host ${host} (retry after ${retryAfterMs}ms)`,
    );
    this.name = "CircuitOpenError";
  }

  override toLogObject(): Record<string, unknown> {
    return {
      ...super.toLogObject(),
      host: this.host,
      retryAfterMs: this.retryAfterMs,
    };
  }
}
