/**
 * 호스트별 동시 요청 제한
 *
 * 호스트마다 async-mutex Semaphore 하나씩 유지
 * (한 마켓이 느려도 다른 호스트의 요청은 막히지 않음)
 */

import { Semaphore } from "async-mutex";

export class HostConcurrencyLimiter {
  private readonly semaphores = new Map<string, Semaphore>();

  constructor(private readonly maxPerHost: number) {
    if (!Number.isInteger(maxPerHost) || maxPerHost < 1) {
      throw new Error(`maxPerHost must be a positive integer: ${maxPerHost}`);
    }
  }

  /**
   * 호스트 슬롯을 점유한 상태로 task 실행 (모든 종료 경로에서 반환)
   */
  async run<T>(host: string, task: () => Promise<T>): Promise<T> {
    return this.semaphoreFor(host).runExclusive(task);
  }

  /**
   * 현재 대기 중이거나 실행 중인 요청이 있는 호스트 수 (모니터링용)
   */
  getStatus(): { hosts: number; busyHosts: number } {
    let busyHosts = 0;
    for (const semaphore of this.semaphores.values()) {
      if (semaphore.getValue() < this.maxPerHost) busyHosts++;
    }
    return { hosts: this.semaphores.size, busyHosts };
  }

  private semaphoreFor(host: string): Semaphore {
    let semaphore = this.semaphores.get(host);
    if (!semaphore) {
      semaphore = new Semaphore(this.maxPerHost);
      this.semaphores.set(host, semaphore);
    }
    return semaphore;
  }
}
