import { describe, it, expect } from "@jest/globals";
import { classifyError, describeFailure } from "@/resilience/ErrorClassifier";
import { CircuitOpenError, ExportError, ExtractionError, TransportError } from "@/core/errors";

const URL_1 = "https://shop.example/p/1";

describe("ErrorClassifier", () => {
  describe("classifyError()", () => {
    it("타임아웃/연결 실패/렌더링 실패는 일시적 장애여야 함", () => {
      for (const kind of ["timeout", "connection_failed", "render_failed"] as const) {
        expect(classifyError(new TransportError(kind, URL_1))).toEqual({ kind: "transient", hostHealth: "failure" });
      }
    });

    it("429 와 5xx 는 Retry-After 지연을 포함한 일시적 장애여야 함", () => {
      expect(classifyError(new TransportError("http_status", URL_1, { status: 429, retryAfterMs: 2000 }))).toEqual({
        kind: "transient",
        delayMs: 2000,
        hostHealth: "failure",
      });
      expect(classifyError(new TransportError("http_status", URL_1, { status: 502 }))).toEqual({
        kind: "transient",
        delayMs: undefined,
        hostHealth: "failure",
      });
    });

    it("그 외 4xx 는 영구 실패이며 호스트는 정상으로 집계해야 함", () => {
      expect(classifyError(new TransportError("http_status", URL_1, { status: 404 }))).toEqual({
        kind: "permanent",
        hostHealth: "success",
      });
    });

    it("취소와 알 수 없는 에러는 집계하지 않는 영구 실패여야 함", () => {
      expect(classifyError(new TransportError("cancelled", URL_1))).toEqual({ kind: "permanent", hostHealth: "neutral" });
      expect(classifyError(new Error("bug"))).toEqual({ kind: "permanent", hostHealth: "neutral" });
    });
  });

  describe("describeFailure()", () => {
    it("에러 종류별 사유 라벨을 만들어야 함", () => {
      expect(describeFailure(new TransportError("http_status", URL_1, { status: 404 }))).toBe("http_404");
      expect(describeFailure(new TransportError("timeout", URL_1))).toBe("timeout");
      expect(describeFailure(new CircuitOpenError("shop.example", 1000))).toBe("circuit_open");
      expect(describeFailure(new ExtractionError("SKU_NOT_FOUND", URL_1))).toBe("sku_not_found");
      expect(describeFailure(new ExportError("WRITE_FAILED", "disk full", true))).toBe("export_write_failed");
      expect(describeFailure("???")).toBe("unknown");
    });
  });
});
