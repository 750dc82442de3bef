/**
 * Browser Pool 구현
 *
 * Object Pool Pattern
 *
 * SOLID 원칙:
 * - SRP: Browser 인스턴스 풀 관리만 담당
 * - DIP: IBrowserPool 인터페이스 구현
 *
 * 핵심 기능:
 * - 첫 사용 시 N개 Browser 생성 (launch 병목 제거)
 * - 페이지 대여/반환 (빈 Browser가 없으면 Semaphore로 대기)
 * - Browser 크래시 시 자동 재생성
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser } from "playwright-core";
import { Mutex, Semaphore } from "async-mutex";
import type { IBrowserPool, PooledPage } from "@/core/interfaces/IBrowserPool";
import { logger } from "@/config/logger";
import { resolveBrowserArgs } from "@/config/BrowserArgs";
import { TRANSPORT_CONFIG } from "@/config/constants";

// Stealth 플러그인 적용
chromium.use(StealthPlugin());

export interface BrowserPoolOptions {
  /** Pool 크기 (동시 렌더링 가능한 Browser 수) */
  poolSize: number;
  headless?: boolean;
  userAgent?: string;
}

interface PooledBrowser {
  browser: Browser;
  inUse: boolean;
  createdAt: number;
}

export class BrowserPool implements IBrowserPool {
  private pool: PooledBrowser[] = [];
  private initialized = false;
  private readonly mutex = new Mutex(); // 초기화/대여 경합 방지 (FIFO)
  private readonly slots: Semaphore;
  private readonly headless: boolean;

  constructor(private readonly options: BrowserPoolOptions) {
    this.slots = new Semaphore(options.poolSize);
    this.headless = options.headless ?? TRANSPORT_CONFIG.HEADLESS;
  }

  /**
   * Pool 초기화 (Browser 인스턴스 미리 생성)
   */
  async initialize(): Promise<void> {
    await this.mutex.runExclusive(() => this.initializeUnlocked());
  }

  /**
   * 새 페이지 대여
   * release() 호출 시 Context를 닫고 Browser를 반환
   */
  async acquirePage(): Promise<PooledPage> {
    const [, releaseSlot] = await this.slots.acquire();

    let pooled: PooledBrowser;
    try {
      pooled = await this.mutex.runExclusive(async () => {
        await this.initializeUnlocked();
        return this.takeBrowser();
      });
    } catch (error) {
      releaseSlot();
      throw error;
    }

    try {
      const context = await pooled.browser.newContext({
        userAgent: this.options.userAgent ?? TRANSPORT_CONFIG.USER_AGENT,
      });
      const page = await context.newPage();

      return {
        page,
        release: async () => {
          try {
            await context.close();
          } catch (error) {
            logger.warn({ error: String(error) }, "Browser Context 종료 실패");
          } finally {
            pooled.inUse = false;
            releaseSlot();
          }
        },
      };
    } catch (error) {
      pooled.inUse = false;
      releaseSlot();
      throw error;
    }
  }

  /**
   * 모든 Browser 정리
   */
  async cleanup(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.pool.length === 0) return;

      logger.info({ poolSize: this.pool.length }, "BrowserPool 정리 시작...");

      await Promise.all(
        this.pool.map(async (p) => {
          try {
            if (p.browser.isConnected()) {
              await p.browser.close();
            }
          } catch (error) {
            logger.warn({ error: String(error) }, "Browser 종료 실패");
          }
        }),
      );

      this.pool = [];
      this.initialized = false;

      logger.info("BrowserPool 정리 완료");
    });
  }

  getStatus(): { poolSize: number; available: number; inUse: number } {
    const inUse = this.pool.filter((p) => p.inUse).length;
    return {
      poolSize: this.pool.length,
      available: this.pool.length - inUse,
      inUse,
    };
  }

  private async initializeUnlocked(): Promise<void> {
    if (this.initialized) {
      return;
    }

    logger.info(
      { poolSize: this.options.poolSize, headless: this.headless },
      "BrowserPool 초기화 시작...",
    );
    const startTime = Date.now();

    // 병렬로 Browser 생성
    this.pool = await Promise.all(
      Array.from({ length: this.options.poolSize }, async () => ({
        browser: await this.launchBrowser(),
        inUse: false,
        createdAt: Date.now(),
      })),
    );
    this.initialized = true;

    logger.info(
      { poolSize: this.pool.length, elapsedMs: Date.now() - startTime },
      "BrowserPool 초기화 완료",
    );
  }

  /**
   * 사용 가능한 Browser 획득 (Semaphore 슬롯을 가진 상태에서만 호출)
   */
  private async takeBrowser(): Promise<PooledBrowser> {
    const available = this.pool.find((p) => !p.inUse);
    if (!available) {
      throw new Error(`No browser available (pool size: ${this.pool.length})`);
    }

    // Browser 연결 확인 (크래시 감지)
    if (!available.browser.isConnected()) {
      logger.warn(
        { createdAt: available.createdAt },
        "Browser 연결 끊김 감지 - 재생성",
      );
      available.browser = await this.launchBrowser();
      available.createdAt = Date.now();
    }

    available.inUse = true;
    return available;
  }

  private async launchBrowser(): Promise<Browser> {
    return chromium.launch({
      headless: this.headless,
      args: resolveBrowserArgs({ headless: this.headless }),
    });
  }
}
