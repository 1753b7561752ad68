import { loadTaxonomy, silentLogger, type LedgerLogger } from "@receipt-ledger/contracts";
import { describe, expect, it, vi } from "vitest";
import { CLASSIFICATION_EXAMPLE_OUTPUT } from "./classification-prompt.js";
import { TextResponseParser } from "./response-parser.js";

const taxonomy = loadTaxonomy();

function recordingLogger(): LedgerLogger & {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
} {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function parser(logger: LedgerLogger = silentLogger): TextResponseParser {
  return new TextResponseParser({ taxonomy, logger });
}

describe("TextResponseParser", () => {
  it("parses a labelled response into a draft receipt", () => {
    const result = parser().parse({
      responseText: "가게명: 스타벅스\n날짜: 2024-03-15\n아메리카노: 음식:음료 (4,500원)\n총액: 4,500원",
    });

    expect(result).toEqual({
      ok: true,
      receipt: {
        storeName: "스타벅스",
        date: "2024-03-15",
        items: [{ name: "아메리카노", category: "음식", subcategory: "음료", amount: 4500 }],
        totalAmount: 4500,
      },
    });
  });

  it("reads back the example output of the classification prompt", () => {
    const result = parser().parse({ responseText: CLASSIFICATION_EXAMPLE_OUTPUT });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      throw new Error("expected a parsed receipt");
    }
    expect(result.receipt.items.map((item) => item.amount)).toEqual([4500, 5000]);
    expect(result.receipt.totalAmount).toBe(9500);
  });

  it("takes the first digit-free line as store name when no label is present", () => {
    const result = parser().parse({
      responseText: "\r\n스타벅스 강남점\r\n2024-03-15\r\n아메리카노: 음식:음료 (4,500원)\r\n합계 4,500\r\n",
    });

    expect(result.ok && result.receipt.storeName).toBe("스타벅스 강남점");
    expect(result.ok && result.receipt.date).toBe("2024-03-15");
    expect(result.ok && result.receipt.totalAmount).toBe(4500);
  });

  it("strips an embedded date from a labelled store line and consumes the line", () => {
    const result = parser().parse({
      responseText: "가게명: 이마트 2024-05-01\n날짜: 2024-05-02\n우유: 음식:유제품 (2,980원)\n총액: 2,980원",
    });

    expect(result.ok && result.receipt.storeName).toBe("이마트");
    expect(result.ok && result.receipt.date).toBe("2024-05-02");
  });

  it("keeps looking for a store name after an empty label", () => {
    const result = parser().parse({
      responseText: "가게명:\n스타벅스\n날짜: 2024-03-15\n아메리카노: 음식:음료 (4,500원)\n총액: 4,500원",
    });

    expect(result.ok && result.receipt.storeName).toBe("스타벅스");
  });

  it("locks the total on the first matching line", () => {
    const result = parser().parse({
      responseText: [
        "가게명: 편의점",
        "날짜: 2024-06-01",
        "과자: 음식:간식 (1,500원)",
        "총액: 1,000원",
        "총액: 2,000원",
      ].join("\n"),
    });

    expect(result.ok && result.receipt.totalAmount).toBe(1000);
  });

  it("drops items whose category pair is not an exact taxonomy member", () => {
    const logger = recordingLogger();
    const result = parser(logger).parse({
      responseText: [
        "가게명: 하이마트",
        "날짜: 2024-06-01",
        "전자레인지: 쇼핑:전자제품 (89,000원)",
        "콜라: 음식:음료수 (2,000원)",
        "멀티탭: 쇼핑:생필품 (12,000원)",
        "총액: 103,000원",
      ].join("\n"),
    });

    expect(result.ok && result.receipt.items).toEqual([
      { name: "멀티탭", category: "쇼핑", subcategory: "생필품", amount: 12000 },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('skipping item "콜라": invalid category 음식:음료수');
  });

  it("skips items with an unreadable amount", () => {
    const logger = recordingLogger();
    const result = parser(logger).parse({
      responseText: "가게명: 카페\n날짜: 2024-06-01\n라떼: 음식:음료 (오천원)\n총액: 5,000원",
    });

    expect(result).toEqual({ ok: false, missing: ["items"] });
    expect(logger.warn).toHaveBeenCalledWith('skipping item "라떼": unreadable amount "오천원"');
  });

  it("keeps scanning for a date when the first one is not a calendar day", () => {
    const result = parser().parse({
      responseText: [
        "가게명: 카페",
        "날짜: 2024-02-30",
        "라떼: 음식:음료 (5,000원)",
        "결제일 2024-03-01",
        "총액: 5,000원",
      ].join("\n"),
    });

    expect(result.ok && result.receipt.date).toBe("2024-03-01");
    expect(
      parser().parse({
        responseText: "가게명: 카페\n날짜: 2024-02-30\n라떼: 음식:음료 (5,000원)\n총액: 5,000원",
      }),
    ).toEqual({ ok: false, missing: ["date"] });
  });

  it("skips unnamed items and items whose name is too long to store", () => {
    const logger = recordingLogger();
    const result = parser(logger).parse({
      responseText: [
        "가게명: 카페",
        "날짜: 2024-03-15",
        ": 음식:음료 (4,500원)",
        `${"빵".repeat(241)}: 음식:간식 (3,000원)`,
        "라떼: 음식:음료 (5,000원)",
        "총액: 12,500원",
      ].join("\n"),
    });

    expect(result.ok && result.receipt.items).toEqual([
      { name: "라떼", category: "음식", subcategory: "음료", amount: 5000 },
    ]);
    expect(logger.warn).toHaveBeenCalledWith("skipping unnamed item 음식:음료");
    expect(logger.warn).toHaveBeenCalledWith("skipping item with a 241-character name");
  });

  it("does not take an overlong line as the store name", () => {
    const result = parser().parse({
      responseText: [
        "가".repeat(300),
        "날짜: 2024-03-15",
        "아메리카노: 음식:음료 (4,500원)",
        "총액: 4,500원",
      ].join("\n"),
    });

    expect(result).toEqual({ ok: false, missing: ["store"] });
  });

  it("recovers a missing total from the OCR text", () => {
    const logger = recordingLogger();
    const result = parser(logger).parse({
      responseText: "가게명: 스타벅스\n날짜: 2024-03-15\n아메리카노: 음식:음료 (4,500원)",
      ocrText: "STARBUCKS\n아메리카노 4,500\n합계: 9,500\n카드 9,500",
    });

    expect(result.ok && result.receipt.totalAmount).toBe(9500);
    expect(logger.info).toHaveBeenCalledWith("recovered total amount 9500 from OCR text");
  });

  it("names every missing field when extraction is incomplete", () => {
    expect(parser().parse({ responseText: "2024-03-15" })).toEqual({
      ok: false,
      missing: ["store", "items", "total"],
    });

    expect(
      parser().parse({
        responseText: "가게명: 스타벅스\n날짜: 2024-03-15\n아메리카노: 음식:음료 (4,500원)",
        ocrText: "아메리카노 4,500",
      }),
    ).toEqual({ ok: false, missing: ["total"] });
  });
});
