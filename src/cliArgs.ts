/**
 * CLI 인자 파싱
 *
 * `--flag value` 와 `--flag=value` 형식 모두 지원
 */

import { ConfigError } from "@/core/errors";
import type { CrawlerSettingsOverride } from "@/config/CrawlerSettings";
import type { CategoryRange } from "@/markets/CategoryRangeAdapter";
import { isValidDateString } from "@/utils/timestamp";

export const DEFAULT_COLUMN_MAPPING = "templates/column_mapping.json";
export const DEFAULT_TEMPLATE = "templates/template.csv";

export interface CliArgs {
  help: boolean;
  listMarkets: boolean;
  marketId?: string;
  columnMappingPath: string;
  templatePath: string;
  outputDir?: string;
  runDate?: string;
  urlsFile?: string;
  /** 수집할 시작 카테고리 범위 (이름 또는 1부터 시작하는 순번) */
  categoryRange?: CategoryRange;
  resume: boolean;
  reset: boolean;
  dedupeFields?: string[];
  overrides: CrawlerSettingsOverride;
}

const VALUE_FLAGS = [
  "--market",
  "--column-mapping",
  "--template",
  "--output-dir",
  "--date",
  "--urls",
  "--start-category",
  "--end-category",
  "--dedupe",
  "--concurrency",
  "--max-depth",
] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some((candidate) => candidate === flag);
}

function parsePositiveInt(flag: string, value: string, allowZero = false): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < (allowZero ? 0 : 1)) {
    throw new ConfigError(`${flag} expects ${allowZero ? "a non-negative" : "a positive"} integer: ${value}`);
  }
  return parsed;
}

/**
 * @param argv process.argv.slice(2)
 * @throws {ConfigError} 알 수 없는 옵션, 값 누락, 잘못된 값
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = {
    help: false,
    listMarkets: false,
    columnMappingPath: DEFAULT_COLUMN_MAPPING,
    templatePath: DEFAULT_TEMPLATE,
    resume: false,
    reset: false,
    overrides: {},
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.substring(0, eq) : arg;

    if (flag === "--help" || flag === "-h") {
      result.help = true;
      continue;
    }
    if (flag === "--list-markets") {
      result.listMarkets = true;
      continue;
    }
    if (flag === "--resume") {
      result.resume = true;
      continue;
    }
    if (flag === "--reset") {
      result.reset = true;
      continue;
    }
    if (flag === "--headful") {
      result.overrides.headless = false;
      continue;
    }

    if (!isValueFlag(flag)) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (flag !== arg) {
      value = arg.substring(eq + 1);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
      value = argv[++i];
    }
    if (!value) {
      throw new ConfigError(`Missing value for ${flag}`);
    }

    switch (flag) {
      case "--market":
        result.marketId = value;
        break;
      case "--column-mapping":
        result.columnMappingPath = value;
        break;
      case "--template":
        result.templatePath = value;
        break;
      case "--output-dir":
        result.outputDir = value;
        break;
      case "--date":
        if (!isValidDateString(value)) {
          throw new ConfigError(`--date expects YYYYMMDD: ${value}`);
        }
        result.runDate = value;
        break;
      case "--urls":
        result.urlsFile = value;
        break;
      case "--start-category":
        result.categoryRange = { ...result.categoryRange, start: value };
        break;
      case "--end-category":
        result.categoryRange = { ...result.categoryRange, end: value };
        break;
      case "--dedupe":
        result.dedupeFields = value
          .split(",")
          .map((field) => field.trim())
          .filter((field) => field.length > 0);
        break;
      case "--concurrency":
        result.overrides.jobConcurrency = parsePositiveInt(flag, value);
        break;
      case "--max-depth":
        result.overrides.maxDepth = parsePositiveInt(flag, value, true);
        break;
    }
  }

  if (result.resume && result.reset) {
    throw new ConfigError("--resume and --reset cannot be used together");
  }
  if (result.urlsFile && result.categoryRange) {
    throw new ConfigError("--urls cannot be combined with --start-category/--end-category");
  }
  if (!result.help && !result.listMarkets && !result.marketId) {
    throw new ConfigError("--market is required");
  }

  return result;
}

export function getUsage(): string {
  return `
Market Catalog Crawler

사용법:
  market-crawler --market <id> [OPTIONS]

옵션:
  --market <id>              마켓 ID (src/config/markets/<id>.yaml)
  --column-mapping <file>    컬럼 매핑 JSON (기본값: ${DEFAULT_COLUMN_MAPPING})
  --template <file>          엑셀/CSV 템플릿 (기본값: ${DEFAULT_TEMPLATE})
  --output-dir <dir>         결과 디렉토리 (기본값: ./output)
  --date <YYYYMMDD>          실행 날짜 (기본값: 오늘)
  --urls <file>              지정 URL 목록만 수집 (.txt, 한 줄에 하나)
  --start-category <name|n>  이 카테고리부터 수집 (시드의 category 이름 또는 순번)
  --end-category <name|n>    이 카테고리까지 수집
  --resume                   체크포인트에서 이어서 실행
  --reset                    체크포인트와 응답 캐시 삭제 후 실행
  --headful                  브라우저 창 표시
  --dedupe <field,...>       필드 조합이 중복인 행 건너뜀 (예: sku)
  --concurrency <n>          동시 Job 수
  --max-depth <n>            최대 탐색 깊이
  --list-markets             지원 마켓 목록 출력
  --help, -h                 이 도움말 출력
`;
}
