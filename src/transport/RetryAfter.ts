/**
 * Retry-After 헤더 파싱
 *
 * 형식:
 * - delta-seconds: "120"
 * - HTTP-date: "Wed, 21 Oct 2015 07:28:00 GMT"
 *
 * @returns 대기 시간 (밀리초), 해석 불가 시 undefined
 */
export function parseRetryAfter(
  value: string | null | undefined,
  nowMs: number = Date.now(),
): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  // HTTP-date 는 요일/월 이름을 포함 ("-5", "2026" 같은 값은 거부)
  if (!/^[A-Za-z]/.test(trimmed)) {
    return undefined;
  }

  const dateMs = Date.parse(trimmed);
  if (Number.isNaN(dateMs)) {
    return undefined;
  }

  return Math.max(0, dateMs - nowMs);
}
