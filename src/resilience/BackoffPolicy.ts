/**
 * 지수 백오프 + jitter
 *
 * delay = min(cap, base × 2^(attempt-1))
 * total = min(cap, delay + jitterRatio × delay × random())
 */

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
  /** 테스트용 난수 주입 (0~1) */
  random?: () => number;
}

export class BackoffPolicy {
  private readonly random: () => number;

  constructor(private readonly options: BackoffOptions) {
    this.random = options.random ?? Math.random;
  }

  /**
   * @param attempt 방금 실패한 시도 번호 (1부터)
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs } = this.options;
    const exponent = Math.max(0, attempt - 1);
    const delay = Math.min(maxDelayMs, baseDelayMs * 2 ** exponent);

    const jitterRatio = Math.min(1, Math.max(0, this.options.jitterRatio));
    const random = Math.min(1, Math.max(0, this.random()));
    const jitter = Math.floor(delay * jitterRatio * random);

    return Math.min(maxDelayMs, delay + jitter);
  }

  /**
   * 서버가 제시한 지연을 상한으로 제한
   */
  clamp(delayMs: number): number {
    return Math.min(this.options.maxDelayMs, Math.max(0, delayMs));
  }
}
