/**
 * 호스트별 서킷 브레이커
 *
 * 상태:
 * - closed: 정상. 윈도우 내 연속 일시적 실패가 threshold 에 도달하면 open
 * - open: cooldown 동안 요청 거절 (네트워크 요청 없음)
 * - half_open: cooldown 후 probe 1건만 허용. 성공 시 closed, 실패 시 다시 open
 */

import { logger } from "@/config/logger";

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
  /** 테스트용 시계 주입 */
  now?: () => number;
}

export type CircuitGate =
  | { allowed: true }
  | { allowed: false; retryAfterMs: number };

interface HostCircuit {
  state: CircuitState;
  /** 연속 일시적 실패 시각 (윈도우 밖은 제거) */
  failures: number[];
  openUntil: number;
  probeInFlight: boolean;
}

export class CircuitBreaker {
  private readonly circuits = new Map<string, HostCircuit>();
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * 요청 가능 여부 확인 (half_open 전환 시 probe 슬롯 점유)
   */
  tryAcquire(host: string): CircuitGate {
    const circuit = this.circuitFor(host);
    const now = this.now();

    if (circuit.state === "open") {
      if (now < circuit.openUntil) {
        return { allowed: false, retryAfterMs: circuit.openUntil - now };
      }
      circuit.state = "half_open";
      circuit.probeInFlight = false;
      logger.info({ host }, "서킷 half-open - probe 요청 허용");
    }

    if (circuit.state === "half_open") {
      if (circuit.probeInFlight) {
        return { allowed: false, retryAfterMs: this.options.cooldownMs };
      }
      circuit.probeInFlight = true;
    }

    return { allowed: true };
  }

  recordSuccess(host: string): void {
    const circuit = this.circuitFor(host);
    if (circuit.state !== "closed") {
      logger.info({ host }, "서킷 closed - 호스트 복구");
    }
    circuit.state = "closed";
    circuit.failures = [];
    circuit.probeInFlight = false;
  }

  recordFailure(host: string): void {
    const circuit = this.circuitFor(host);
    const now = this.now();

    if (circuit.state === "half_open") {
      this.open(host, circuit, now);
      return;
    }

    circuit.failures = circuit.failures.filter(
      (at) => now - at < this.options.windowMs,
    );
    circuit.failures.push(now);

    if (circuit.failures.length >= this.options.failureThreshold) {
      this.open(host, circuit, now);
    }
  }

  /**
   * 집계하지 않는 결과 (취소 등) - probe 슬롯만 반환
   */
  recordNeutral(host: string): void {
    this.circuitFor(host).probeInFlight = false;
  }

  getState(host: string): CircuitState {
    return this.circuits.get(host)?.state ?? "closed";
  }

  private open(host: string, circuit: HostCircuit, now: number): void {
    circuit.state = "open";
    circuit.openUntil = now + this.options.cooldownMs;
    circuit.failures = [];
    circuit.probeInFlight = false;

    logger.warn(
      { host, cooldownMs: this.options.cooldownMs },
      "서킷 open - 호스트 요청 일시 중단",
    );
  }

  private circuitFor(host: string): HostCircuit {
    let circuit = this.circuits.get(host);
    if (!circuit) {
      circuit = { state: "closed", failures: [], openUntil: 0, probeInFlight: false };
      this.circuits.set(host, circuit);
    }
    return circuit;
  }
}
