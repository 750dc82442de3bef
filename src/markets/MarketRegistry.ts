/**
 * Market Registry
 *
 * SOLID 원칙:
 * - OCP: 코드 어댑터는 register(), YAML 마켓은 파일 추가만으로 등록
 * - DIP: Orchestrator 는 IMarketAdapter 만 받음
 */

import { ConfigLoader } from "@/config/ConfigLoader";
import type { MarketDefinition } from "@/core/domain/MarketDefinition";
import { MarketNotFoundError } from "@/core/errors";
import type { IMarketAdapter } from "@/core/interfaces/IMarketAdapter";
import { ConfigDrivenMarketAdapter } from "./ConfigDrivenMarketAdapter";

export type MarketAdapterFactory = () => IMarketAdapter;

export interface ResolvedMarket {
  adapter: IMarketAdapter;
  /** YAML 마켓일 때만 존재 (settings, currency 덮어쓰기) */
  definition?: MarketDefinition;
}

export class MarketRegistry {
  private readonly factories = new Map<string, MarketAdapterFactory>();

  constructor(private readonly configLoader: ConfigLoader = ConfigLoader.getInstance()) {}

  /**
   * 코드로 구현한 어댑터 등록 (같은 ID 의 YAML 보다 우선)
   */
  register(marketId: string, factory: MarketAdapterFactory): this {
    this.factories.set(marketId, factory);
    return this;
  }

  /**
   * 지원 마켓 ID 목록 (코드 + YAML)
   */
  list(): string[] {
    const ids = new Set<string>([
      ...this.factories.keys(),
      ...this.configLoader.getAvailableMarkets(),
    ]);
    return [...ids].sort();
  }

  /**
   * @throws {MarketNotFoundError} 등록되지 않은 마켓
   * @throws {ConfigError} YAML 정의 오류
   */
  resolve(marketId: string): ResolvedMarket {
    const factory = this.factories.get(marketId);
    if (factory) {
      return { adapter: factory() };
    }

    if (!this.configLoader.getAvailableMarkets().includes(marketId)) {
      throw new MarketNotFoundError(marketId, this.list());
    }

    const definition = this.configLoader.loadMarket(marketId);
    return { adapter: new ConfigDrivenMarketAdapter(definition), definition };
  }
}
