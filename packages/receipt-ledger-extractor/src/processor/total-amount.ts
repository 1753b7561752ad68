const AMOUNT_CAPTURE = String.raw`[ \t]*[:：]?[ \t]*(?:₩|￦|KRW)?[ \t]*(\d[\d, \t]*)`;

// Priority order: the first pattern that matches anywhere wins.
export const TOTAL_AMOUNT_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`총[ \t]*결제[ \t]*금액${AMOUNT_CAPTURE}`),
  new RegExp(String.raw`총결제금액${AMOUNT_CAPTURE}`),
  new RegExp(String.raw`합계${AMOUNT_CAPTURE}`),
  new RegExp(String.raw`총액${AMOUNT_CAPTURE}`),
  new RegExp(String.raw`결제금액${AMOUNT_CAPTURE}`),
  new RegExp(String.raw`총금액${AMOUNT_CAPTURE}`),
  new RegExp(String.raw`\btotal\b${AMOUNT_CAPTURE}`, "i"),
];

export function findTotalAmount(text: string): number | null {
  for (const pattern of TOTAL_AMOUNT_PATTERNS) {
    const captured = pattern.exec(text)?.[1];
    if (!captured) {
      continue;
    }

    const value = Number.parseInt(captured.replace(/[,\s]/g, ""), 10);
    if (Number.isSafeInteger(value)) {
      return value;
    }
  }
  return null;
}
