/**
 * Transport 요청/응답 도메인 타입
 */

export type HttpMethod = "GET" | "POST" | "HEAD";

export interface FetchRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  /** true면 헤드리스 브라우저로 렌더링 */
  readonly render: boolean;
}

/**
 * fetch 결과 (생성 후 불변)
 */
export type FetchResult = Readonly<{
  url: string;
  status: number;
  body: string;
  /** ISO 8601 */
  fetchedAt: string;
  fromCache: boolean;
}>;

/**
 * 기본값을 채운 FetchRequest 생성
 */
export function createFetchRequest(
  url: string,
  options: Partial<Omit<FetchRequest, "url">> = {},
): FetchRequest {
  return {
    url,
    method: options.method ?? "GET",
    headers: options.headers ?? {},
    render: options.render ?? false,
  };
}
