/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 실행 시 CLI 플래그/마켓 설정으로 덮어쓸 수 있음 (CrawlerSettings)
 */

import path from "path";

/**
 * 애플리케이션 메타데이터
 * ⚠️ package.json의 "version"과 동기화 필수
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Market Catalog Crawler",
} as const;

/**
 * 크롤링 실행 설정
 */
export const CRAWLER_CONFIG = {
  /**
   * 동시 실행 Job 수 (전체)
   * 환경변수: CRAWL_CONCURRENCY
   * 기본값: 8
   */
  JOB_CONCURRENCY: Number(process.env.CRAWL_CONCURRENCY) || 8,

  /**
   * 목록 페이지 탐색 최대 깊이 (seed = 0)
   * 환경변수: CRAWL_MAX_DEPTH
   * 기본값: 5
   */
  MAX_DEPTH: Number(process.env.CRAWL_MAX_DEPTH) || 5,

  /**
   * CircuitOpenError로 인한 Job 연기 최대 횟수
   * 초과 시 permanently_failed (circuit_open)
   */
  MAX_DEFERRALS: Number(process.env.CRAWL_MAX_DEFERRALS) || 3,
} as const;

/**
 * 캐시 설정
 */
export const CACHE_CONFIG = {
  /**
   * 응답 캐시 TTL (밀리초)
   * 환경변수: CACHE_TTL_MS
   * 기본값: 86400000 (24시간)
   */
  TTL_MS: Number(process.env.CACHE_TTL_MS) || 24 * 60 * 60 * 1000,
} as const;

/**
 * Transport 설정
 */
export const TRANSPORT_CONFIG = {
  /**
   * fetch 1회당 wall-clock 타임아웃 (밀리초)
   * 호스트 대기열을 빠져나온 시점부터 측정
   */
  FETCH_TIMEOUT_MS: Number(process.env.FETCH_TIMEOUT_MS) || 30000,

  /**
   * 호스트별 동시 요청 상한
   */
  HOST_CONCURRENCY: Number(process.env.HOST_CONCURRENCY) || 4,

  /**
   * 기본 User-Agent
   */
  USER_AGENT:
    process.env.CRAWLER_USER_AGENT ||
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",

  /**
   * 브라우저 풀 크기
   */
  BROWSER_POOL_SIZE: Number(process.env.BROWSER_POOL_SIZE) || 2,

  /**
   * Headless 모드 (HEADLESS=false 로 비활성화)
   */
  HEADLESS: process.env.HEADLESS !== "false",
} as const;

/**
 * Resilience 설정 (재시도/백오프/서킷 브레이커)
 */
export const RESILIENCE_CONFIG = {
  /** Job당 최대 시도 횟수 (첫 시도 포함) */
  MAX_ATTEMPTS: Number(process.env.RETRY_MAX_ATTEMPTS) || 4,

  /** 백오프 기본 지연 (밀리초) */
  BASE_DELAY_MS: Number(process.env.RETRY_BASE_DELAY_MS) || 500,

  /** 백오프 최대 지연 (밀리초) */
  MAX_DELAY_MS: Number(process.env.RETRY_MAX_DELAY_MS) || 30000,

  /** 지연 대비 jitter 비율 */
  JITTER_RATIO: Number(process.env.RETRY_JITTER_RATIO) || 0.2,

  /** 서킷 오픈 조건: 윈도우 내 연속 일시적 실패 횟수 */
  CIRCUIT_FAILURE_THRESHOLD: Number(process.env.CIRCUIT_FAILURE_THRESHOLD) || 5,

  /** 서킷 실패 집계 윈도우 (밀리초) */
  CIRCUIT_WINDOW_MS: Number(process.env.CIRCUIT_WINDOW_MS) || 60000,

  /** 서킷 오픈 유지 시간 (밀리초) */
  CIRCUIT_COOLDOWN_MS: Number(process.env.CIRCUIT_COOLDOWN_MS) || 30000,
} as const;

/**
 * 정규화 설정
 */
export const NORMALIZATION_CONFIG = {
  /**
   * 퍼지 매칭 임계값 (0~100, 이상이면 매칭)
   * 환경변수: FUZZY_MATCH_THRESHOLD
   */
  FUZZY_MATCH_THRESHOLD: Number(process.env.FUZZY_MATCH_THRESHOLD) || 80,
} as const;

/**
 * 출력 워크북 설정
 */
export const WORKBOOK_CONFIG = {
  /**
   * 워크북 파일 저장 간격 (행 수, 사이 행은 저널에 기록)
   * 환경변수: WORKBOOK_FLUSH_ROWS
   */
  FLUSH_EVERY_ROWS: Number(process.env.WORKBOOK_FLUSH_ROWS) || 50,
} as const;

/**
 * 경로 설정
 */
export const PATH_CONFIG = {
  /** 마켓 YAML 디렉토리 */
  MARKETS_DIR: process.env.MARKETS_DIR || path.join(__dirname, "markets"),

  /** 정규화 어휘 JSON 디렉토리 */
  VOCABULARIES_DIR:
    process.env.VOCABULARIES_DIR || path.join(__dirname, "vocabularies"),

  /** 응답 캐시 디렉토리 */
  CACHE_DIR: process.env.CACHE_DIR || path.join(process.cwd(), "cache"),

  /** 결과 워크북 디렉토리 */
  OUTPUT_DIR: process.env.OUTPUT_DIR || path.join(process.cwd(), "output"),

  /** 체크포인트/데드레터 디렉토리 */
  STATE_DIR: process.env.STATE_DIR || path.join(process.cwd(), "state"),
} as const;
