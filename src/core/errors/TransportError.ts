import { CrawlerError } from "./CrawlerError";

/**
 * Transport 실패 종류
 */
export type TransportErrorKind =
  | "timeout"
  | "connection_failed"
  | "http_status"
  | "render_failed"
  | "cancelled";

export class TransportError extends CrawlerError {
  public readonly kind: TransportErrorKind;
  public readonly url: string;
  /** kind === "http_status" 일 때 응답 코드 */
  public readonly status?: number;
  /** 429/503 응답의 Retry-After (밀리초) */
  public readonly retryAfterMs?: number;

  constructor(
    kind: TransportErrorKind,
    url: string,
    options: {
      status?: number;
      retryAfterMs?: number;
      message?: string;
      cause?: unknown;
    } = {},
  ) {
    super(
      `TRANSPORT_${kind.toUpperCase()}`,
      options.message ??
        (kind === "http_status"
          ? `HTTP ${options.status ?? "?"} for ${url}`
          : `Transport ${kind} for ${url}`),
      { cause: options.cause },
    );
    this.name = "TransportError";
    this.kind = kind;
    this.url = url;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }

  override toLogObject(): Record<string, unknown> {
    return {
      ...super.toLogObject(),
      kind: this.kind,
      url: this.url,
      status: this.status,
      retryAfterMs: this.retryAfterMs,
    };
  }
}
