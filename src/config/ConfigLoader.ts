/**
 * 마켓 YAML 설정 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: 마켓 정의 YAML 로드/검증만 담당
 * - OCP: 새로운 마켓 추가 시 YAML만 추가
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import {
  MarketDefinition,
  MarketDefinitionSchema,
} from "@/core/domain/MarketDefinition";
import { ConfigError } from "@/core/errors";
import { isNotFoundError } from "@/utils/fileSystem";
import { PATH_CONFIG } from "./constants";
import { logger } from "./logger";

const MARKET_FILE_PATTERN = /\.ya?ml$/;

/**
 * Config Loader
 */
export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private configCache: Map<string, MarketDefinition> = new Map();

  constructor(private readonly marketsDir: string = PATH_CONFIG.MARKETS_DIR) {}

  /**
   * Singleton 인스턴스 반환 (기본 markets 디렉토리)
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 마켓 정의 로드
   * @throws {ConfigError} 파일 없음, YAML 문법 오류, 스키마 불일치
   */
  loadMarket(marketId: string): MarketDefinition {
    const cached = this.configCache.get(marketId);
    if (cached) return cached;

    const configPath = this.resolveMarketPath(marketId);
    if (!configPath) {
      throw new ConfigError(`Market config file not found: ${marketId}`);
    }

    let raw: unknown;
    try {
      raw = yaml.load(fs.readFileSync(configPath, "utf8"));
    } catch (error) {
      throw new ConfigError(`Failed to read market config: ${configPath}`, {
        cause: error,
      });
    }

    const parsed = MarketDefinitionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid market config ${configPath}: ${parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
      );
    }

    if (parsed.data.id !== marketId) {
      throw new ConfigError(
        `Market id mismatch in ${configPath}: expected ${marketId}, got ${parsed.data.id}`,
      );
    }

    const definition = Object.freeze(parsed.data);
    this.configCache.set(marketId, definition);

    logger.debug(
      { marketId, path: configPath, seeds: definition.seeds.length },
      "마켓 설정 로드 완료",
    );

    return definition;
  }

  /**
   * YAML 이 존재하는 마켓 ID 목록
   */
  getAvailableMarkets(): string[] {
    let files: string[];
    try {
      files = fs.readdirSync(this.marketsDir);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }

    return files
      .filter((file) => MARKET_FILE_PATTERN.test(file))
      .map((file) => file.replace(MARKET_FILE_PATTERN, ""))
      .sort();
  }

  /**
   * 캐시 초기화 (테스트용)
   */
  clearCache(): void {
    this.configCache.clear();
  }

  private resolveMarketPath(marketId: string): string | undefined {
    // 디렉토리 탈출 방지
    if (marketId.includes("/") || marketId.includes("\\") || marketId.startsWith(".")) {
      return undefined;
    }

    for (const ext of [".yaml", ".yml"]) {
      const candidate = path.join(this.marketsDir, `${marketId}${ext}`);
      if (fs.existsSync(candidate)) return candidate;
    }
    return undefined;
  }
}
