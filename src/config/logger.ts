/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 다중 출력 (콘솔 + 파일) - 동일 내용 출력
 * - 실행 단위 로그 파일 분리 (SERVICE_NAME 환경변수 기반)
 * - 일일 로그 로테이션
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - LOG_LEVEL 이상 모두 출력
 * - LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 파일 출력 (날짜별 디렉터리):
 * - logs/YYYY-MM-DD/crawler.log (SERVICE_NAME 기본값)
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 * - 일일 로테이션, 30일 보관
 *
 * 테스트 환경 (NODE_ENV=test):
 * - LOG_LEVEL 미지정 시 silent
 * - 파일 스트림 생성 안 함
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getDateStringWithDash, getTimestampWithTimezone } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const IS_TEST = NODE_ENV === "test";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (IS_TEST ? "silent" : NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = !IS_TEST && process.env.LOG_TO_FILE !== "false";
const SERVICE_NAME = process.env.SERVICE_NAME || "crawler";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      fs.mkdirSync(path.join(LOG_DIR, dateDir), { recursive: true });
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정(00:00) 기준 정렬
      initialRotation: true,
      immutable: true, // 과거 파일 수정 방지
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "market_crawler",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

type LogRecord = Record<string, unknown>;

function isLogRecord(value: unknown): value is LogRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * 파일 라우팅 스트림
 * - skip_file_log 플래그가 있는 로그는 파일에 저장하지 않음
 * - error 이상은 error.log에도 기록
 */
class FileRoutingStream implements DestinationStream {
  private readonly serviceStream = createRotatingStream(SERVICE_NAME);
  private readonly errorStream = createRotatingStream("error");

  write(chunk: string): boolean {
    let parsed: unknown;
    try {
      parsed = JSON.parse(chunk);
    } catch {
      // JSON이 아니면 서비스 로그에만 기록
      this.serviceStream.write(chunk);
      return true;
    }

    if (isLogRecord(parsed)) {
      if (parsed.skip_file_log === true) {
        return true;
      }
      if (parsed.level === "error" || parsed.level === "fatal") {
        this.errorStream.write(chunk);
      }
    }

    this.serviceStream.write(chunk);
    return true;
  }
}

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

type ConsoleFormatter = (logObj: LogRecord, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";
  const star = logObj.important ? " ⭐" : "";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m${star}${msg ? ` \x1b[36m${msg}\x1b[0m` : ""}`,
  );

  const excludedFields = ["msg", "important", "skip_file_log"];
  for (const [field, raw] of Object.entries(logObj)) {
    if (excludedFields.includes(field)) continue;
    const value =
      typeof raw === "object" && raw !== null
        ? JSON.stringify(raw, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(raw);
    console.error(`  ${field}: ${value}`);
  }
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level }));
};

/**
 * 콘솔 출력 Hook 생성
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second] = inputArgs;
      const logObj: LogRecord = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (first instanceof Error) {
        logObj.err = { message: first.message, name: first.name };
        if (typeof second === "string") logObj.msg = second;
      } else if (isLogRecord(first)) {
        Object.assign(logObj, first);
        if (typeof second === "string") logObj.msg = second;
      }

      formatter(logObj, level);
    },
  };
}

const streams: pino.StreamEntry[] = LOG_TO_FILE
  ? [{ level: "debug", stream: new FileRoutingStream() }]
  : [];

const hooks = createConsoleHook(
  LOG_PRETTY ? formatConsolePretty : formatConsoleJson,
);

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = pino({ ...baseConfig, hooks }, pino.multistream(streams));

export { logger };

export type Logger = pino.Logger;
