import { describe, it, expect } from "@jest/globals";
import { BackoffPolicy } from "@/resilience/BackoffPolicy";

describe("BackoffPolicy", () => {
  const options = { baseDelayMs: 500, maxDelayMs: 30_000, jitterRatio: 0.2 };

  it("jitter 가 0 이면 지수적으로 증가해야 함", () => {
    const backoff = new BackoffPolicy({ ...options, random: () => 0 });

    expect([1, 2, 3, 4].map((attempt) => backoff.delayFor(attempt))).toEqual([500, 1000, 2000, 4000]);
  });

  it("jitter 는 지연의 jitterRatio 비율까지 더해야 함", () => {
    const backoff = new BackoffPolicy({ ...options, random: () => 1 });

    expect(backoff.delayFor(1)).toBe(600);
    expect(backoff.delayFor(3)).toBe(2400);
  });

  it("상한을 넘지 않아야 함 (jitter 포함)", () => {
    const backoff = new BackoffPolicy({ ...options, random: () => 1 });

    expect(backoff.delayFor(7)).toBe(30_000);
    expect(backoff.delayFor(20)).toBe(30_000);
  });

  it("clamp() 는 서버 지연을 0 ~ 상한으로 제한해야 함", () => {
    const backoff = new BackoffPolicy(options);

    expect(backoff.clamp(5000)).toBe(5000);
    expect(backoff.clamp(120_000)).toBe(30_000);
    expect(backoff.clamp(-1)).toBe(0);
  });
});
