/**
 * Fuzzy Matcher
 *
 * 자유 텍스트(카테고리, 브랜드)를 표준 어휘에 매칭하는 순수 함수 모음
 *
 * 점수: 대소문자/공백 정규화 후 편집 거리 기반 유사도 (0~100)
 *   score = (1 - distance / max(len(a), len(b))) × 100
 * 판정: 최고 점수 ≥ threshold 이면 매칭, 아니면 원본 유지 (matched=false)
 * 동점: 짧은 표준값 우선, 그 다음 사전순
 */

import { levenshtein } from "./levenshtein";

export interface MatchResult {
  /** 매칭 시 표준값, 미매칭 시 원본 값 */
  value: string;
  matched: boolean;
  /** 최고 점수 (0~100) */
  score: number;
}

export interface VocabularySnapshot {
  entries: readonly string[];
  /** 정규화된 별칭 → 표준값 (점수 100으로 취급) */
  aliases?: Readonly<Record<string, string>>;
}

/**
 * 비교용 텍스트 정규화 (NFKC + 소문자 + 공백 축약)
 */
export function normalizeText(value: string): string {
  return value.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * 정규화된 두 문자열의 유사도 (0~100)
 */
export function similarity(a: string, b: string): number {
  const left = normalizeText(a);
  const right = normalizeText(b);
  const maxLength = Math.max(left.length, right.length);
  if (maxLength === 0) return 100;

  return (1 - levenshtein(left, right) / maxLength) * 100;
}

function compareCandidates(
  a: { canonical: string; score: number },
  b: { canonical: string; score: number },
): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.canonical.length !== b.canonical.length) {
    return a.canonical.length - b.canonical.length;
  }
  return a.canonical < b.canonical ? -1 : a.canonical > b.canonical ? 1 : 0;
}

export class FuzzyMatcher {
  private readonly entries: ReadonlyArray<{ canonical: string; normalized: string }>;
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(
    vocabulary: VocabularySnapshot,
    private readonly threshold: number,
  ) {
    if (threshold < 0 || threshold > 100) {
      throw new Error(`threshold must be between 0 and 100: ${threshold}`);
    }
    this.entries = vocabulary.entries.map((canonical) => ({
      canonical,
      normalized: normalizeText(canonical),
    }));
    this.aliases = new Map(
      Object.entries(vocabulary.aliases ?? {}).map(([alias, canonical]) => [
        normalizeText(alias),
        canonical,
      ]),
    );
  }

  match(raw: string): MatchResult {
    const normalized = normalizeText(raw);
    if (!normalized || this.entries.length === 0) {
      return { value: raw, matched: false, score: 0 };
    }

    const alias = this.aliases.get(normalized);
    if (alias !== undefined) {
      return { value: alias, matched: true, score: 100 };
    }

    let best: { canonical: string; score: number } | undefined;
    for (const entry of this.entries) {
      const maxLength = Math.max(normalized.length, entry.normalized.length);
      const score =
        (1 - levenshtein(normalized, entry.normalized) / maxLength) * 100;
      const candidate = { canonical: entry.canonical, score };
      if (!best || compareCandidates(candidate, best) < 0) {
        best = candidate;
      }
    }

    if (best && best.score >= this.threshold) {
      return { value: best.canonical, matched: true, score: best.score };
    }
    return { value: raw, matched: false, score: best?.score ?? 0 };
  }
}
