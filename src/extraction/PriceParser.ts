/**
 * PriceParser Utility
 *
 * 목적: 가격 텍스트 파싱 유틸리티
 * 패턴: Utility Class (Static Methods)
 *
 * 지원 형식:
 * - 천 단위 구분자: "15,000원", "1.299,00 €", "1,234.56"
 * - 통화 기호/단어: $, €, £, ¥, ₩, 원, ISO 코드 (USD, KRW ...)
 */

/**
 * 가격 파싱 결과 (통화 포함)
 */
export interface ParsedPrice {
  amount: number;
  currency: string | undefined;
}

/**
 * 통화 기호/단어 → ISO 코드
 */
const CURRENCY_SYMBOLS: ReadonlyArray<[RegExp, string]> = [
  [/₩|원/, "KRW"],
  [/€/, "EUR"],
  [/£/, "GBP"],
  [/¥|円/, "JPY"],
  [/\$/, "USD"],
];

const ISO_CURRENCY = /\b(USD|EUR|GBP|JPY|KRW|CNY|CAD|AUD)\b/i;

export class PriceParser {
  /**
   * 텍스트에서 첫 번째 숫자 토큰 추출
   *
   * 예: "정가 20,000원 → 15,000원" → "20,000"
   */
  static extractAmountToken(text: string): string | undefined {
    const match = /\d[\d.,]*/.exec(text);
    return match ? match[0].replace(/[.,]+$/, "") : undefined;
  }

  /**
   * 숫자 토큰을 number로 변환 (구분자 해석)
   *
   * - "." 와 "," 가 모두 있으면 마지막 기호가 소수점
   * - 한 종류만 한 번 나오고 뒤가 3자리면 천 단위 구분자
   * - 한 종류만 한 번 나오고 뒤가 1~2자리면 소수점
   * - 여러 번 나오면 천 단위 구분자
   */
  static toNumber(token: string): number | undefined {
    const lastDot = token.lastIndexOf(".");
    const lastComma = token.lastIndexOf(",");
    let normalized: string;

    if (lastDot >= 0 && lastComma >= 0) {
      const decimalSep = lastDot > lastComma ? "." : ",";
      const groupSep = decimalSep === "." ? "," : ".";
      normalized = token.split(groupSep).join("").replace(decimalSep, ".");
    } else if (lastDot >= 0 || lastComma >= 0) {
      const sep = lastDot >= 0 ? "." : ",";
      const parts = token.split(sep);
      const fraction = parts[parts.length - 1];
      if (parts.length === 2 && fraction.length !== 3) {
        normalized = `${parts[0]}.${fraction}`;
      } else {
        normalized = parts.join("");
      }
    } else {
      normalized = token;
    }

    const value = Number(normalized);
    return Number.isFinite(value) ? value : undefined;
  }

  /**
   * 가격 문자열을 숫자로 변환
   *
   * "15,000원" → 15000
   * "$1,234.56" → 1234.56
   * 숫자 없음/null/undefined → undefined
   */
  static parse(text: string | null | undefined): number | undefined {
    if (!text || typeof text !== "string") {
      return undefined;
    }

    const token = this.extractAmountToken(text.trim());
    return token ? this.toNumber(token) : undefined;
  }

  /**
   * 텍스트에서 통화 코드 추정 (없으면 undefined)
   */
  static detectCurrency(text: string | null | undefined): string | undefined {
    if (!text) {
      return undefined;
    }

    const iso = ISO_CURRENCY.exec(text);
    if (iso) {
      return iso[1].toUpperCase();
    }

    for (const [pattern, code] of CURRENCY_SYMBOLS) {
      if (pattern.test(text)) {
        return code;
      }
    }
    return undefined;
  }

  /**
   * 통화 정보를 포함한 가격 파싱
   */
  static parseWithCurrency(text: string | null | undefined): ParsedPrice | undefined {
    const amount = this.parse(text);
    if (amount === undefined) {
      return undefined;
    }
    return { amount, currency: this.detectCurrency(text) };
  }
}
