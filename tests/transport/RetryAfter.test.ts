import { describe, it, expect } from "@jest/globals";
import { parseRetryAfter } from "@/transport/RetryAfter";

describe("parseRetryAfter", () => {
  const now = Date.parse("2026-03-01T00:00:00Z");

  it("초 단위 값을 밀리초로 변환해야 함", () => {
    expect(parseRetryAfter("120", now)).toBe(120_000);
    expect(parseRetryAfter(" 0 ", now)).toBe(0);
  });

  it("HTTP-date 는 현재 시각과의 차이여야 함", () => {
    expect(parseRetryAfter("Sun, 01 Mar 2026 00:00:30 GMT", now)).toBe(30_000);
  });

  it("과거 날짜는 0 으로 고정해야 함", () => {
    expect(parseRetryAfter("Sat, 28 Feb 2026 23:59:00 GMT", now)).toBe(0);
  });

  it("값이 없거나 해석할 수 없으면 undefined 여야 함", () => {
    expect(parseRetryAfter(null, now)).toBeUndefined();
    expect(parseRetryAfter("", now)).toBeUndefined();
    expect(parseRetryAfter("soon", now)).toBeUndefined();
    expect(parseRetryAfter("-5", now)).toBeUndefined();
    expect(parseRetryAfter("+30", now)).toBeUndefined();
    expect(parseRetryAfter("2026-03-01T00:00:30Z", now)).toBeUndefined();
  });
});
