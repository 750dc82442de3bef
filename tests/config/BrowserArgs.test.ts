import { describe, it, expect } from "@jest/globals";
import { resolveBrowserArgs } from "@/config/BrowserArgs";

describe("resolveBrowserArgs", () => {
  it("headless 에서는 sandbox 해제 플래그를 포함해야 함", () => {
    const args = resolveBrowserArgs({ headless: true, extraArgs: "" });

    expect(args.slice(0, 2)).toEqual(["--no-sandbox", "--disable-setuid-sandbox"]);
    expect(args).toContain("--disable-blink-features=AutomationControlled");
  });

  it("headful 에서는 sandbox 플래그를 빼야 함", () => {
    expect(resolveBrowserArgs({ headless: false, extraArgs: "" })).not.toContain("--no-sandbox");
  });

  it("추가 플래그는 같은 이름의 기본 플래그를 대체하고 뒤에 붙어야 함", () => {
    const args = resolveBrowserArgs({
      headless: false,
      extraArgs: " --lang=ko-KR  --disable-blink-features=Foo ignored ",
    });

    expect(args.slice(-2)).toEqual(["--lang=ko-KR", "--disable-blink-features=Foo"]);
    expect(args.filter((arg) => arg.startsWith("--disable-blink-features"))).toHaveLength(1);
  });
});
