import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { VocabularyLoader } from "@/extraction/VocabularyLoader";
import { ConfigError } from "@/core/errors";

describe("VocabularyLoader", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vocab-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("어휘를 로드하고 같은 이름은 캐시에서 반환해야 함", () => {
    fs.writeFileSync(
      path.join(dir, "color.json"),
      JSON.stringify({ entries: ["Black", "White"], aliases: { Noir: "Black" } }),
    );
    const loader = new VocabularyLoader(dir);

    const first = loader.load("color");

    expect(first.entries).toEqual(["Black", "White"]);
    expect(first.aliases).toEqual({ Noir: "Black" });
    expect(Object.isFrozen(first)).toBe(true);
    expect(loader.load("color")).toBe(first);
  });

  it("파일이 없으면 ConfigError 여야 함", () => {
    expect(() => new VocabularyLoader(dir).load("missing")).toThrow(ConfigError);
  });

  it("entries 가 비어 있으면 ConfigError 여야 함", () => {
    fs.writeFileSync(path.join(dir, "empty.json"), JSON.stringify({ entries: [] }));

    expect(() => new VocabularyLoader(dir).load("empty")).toThrow(ConfigError);
  });

  it("JSON 문법 오류는 ConfigError 여야 함", () => {
    fs.writeFileSync(path.join(dir, "broken.json"), "{entries:");

    expect(() => new VocabularyLoader(dir).load("broken")).toThrow(ConfigError);
  });
});
