/**
 * Chromium 실행 인자
 *
 * - 컨테이너(headless)에서는 sandbox 해제 플래그 포함
 * - BROWSER_EXTRA_ARGS (공백 구분) 로 추가 플래그 지정
 * - 같은 플래그 이름(= 앞부분)은 뒤에 온 값이 우선
 */

const BASE_ARGS = [
  "--disable-dev-shm-usage", // /dev/shm 사용 최소화
  "--disable-gpu",
  "--disable-extensions",
  "--disable-background-networking",
  "--no-first-run",
  "--disable-blink-features=AutomationControlled",
];

const SANDBOX_ARGS = ["--no-sandbox", "--disable-setuid-sandbox"];

export interface BrowserArgsOptions {
  headless: boolean;
  /** 기본값: BROWSER_EXTRA_ARGS */
  extraArgs?: string;
}

function flagName(arg: string): string {
  const eq = arg.indexOf("=");
  return eq > 0 ? arg.substring(0, eq) : arg;
}

export function resolveBrowserArgs({
  headless,
  extraArgs = process.env.BROWSER_EXTRA_ARGS ?? "",
}: BrowserArgsOptions): string[] {
  const extra = extraArgs.split(/\s+/).filter((arg) => arg.startsWith("--"));
  const args = new Map<string, string>();
  for (const arg of [...(headless ? SANDBOX_ARGS : []), ...BASE_ARGS, ...extra]) {
    args.delete(flagName(arg));
    args.set(flagName(arg), arg);
  }
  return [...args.values()];
}
