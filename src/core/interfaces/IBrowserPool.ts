/**
 * Browser Pool 인터페이스
 *
 * SOLID 원칙:
 * - ISP: 렌더링에 필요한 페이지 조작만 노출
 * - DIP: BrowserRenderStrategy는 Playwright 구현체가 아닌 추상화에 의존
 */

export type WaitUntil = "load" | "domcontentloaded" | "networkidle" | "commit";

/**
 * 렌더링 응답 (Playwright Response 의 부분집합)
 */
export interface RenderResponse {
  status(): number;
}

/**
 * 렌더링 페이지 (Playwright Page 의 부분집합)
 */
export interface RenderPage {
  goto(
    url: string,
    options: { timeout: number; waitUntil: WaitUntil },
  ): Promise<RenderResponse | null>;
  setExtraHTTPHeaders(headers: Record<string, string>): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
}

/**
 * Pool에서 대여한 페이지
 * release()는 페이지를 닫고 Browser를 Pool에 반환
 */
export interface PooledPage {
  page: RenderPage;
  release(): Promise<void>;
}

export interface IBrowserPool {
  /**
   * Pool 초기화 (브라우저 인스턴스 미리 생성)
   */
  initialize(): Promise<void>;

  /**
   * 새 페이지 대여 (사용 가능한 Browser가 생길 때까지 대기)
   */
  acquirePage(): Promise<PooledPage>;

  /**
   * 모든 Browser 정리
   */
  cleanup(): Promise<void>;

  getStatus(): {
    poolSize: number;
    available: number;
    inUse: number;
  };
}
