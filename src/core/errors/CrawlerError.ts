/**
 * Crawler 에러 기본 클래스
 *
 * 모든 도메인 에러는 code 를 가지며 toLogObject() 로 로깅
 */
export class CrawlerError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CrawlerError";
    this.code = code;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      code: this.code,
      name: this.name,
      message: this.message,
    };
  }
}

/**
 * 설정 파일/옵션 오류 (실행 시작 전 발생)
 */
export class ConfigError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
    this.name = "ConfigError";
  }
}

/**
 * 등록되지 않은 마켓 ID
 */
export class MarketNotFoundError extends CrawlerError {
  constructor(
    public readonly marketId: string,
    public readonly supportedMarkets: readonly string[],
  ) {
    super(
      "MARKET_NOT_FOUND",
      `Market not found: ${marketId}. Supported markets: ${supportedMarkets.join(", ") || "(none)"}`,
    );
    this.name = "MarketNotFoundError";
  }
}
