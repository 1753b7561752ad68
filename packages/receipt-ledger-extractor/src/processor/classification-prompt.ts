import type { Taxonomy } from "@receipt-ledger/contracts";

export const CLASSIFICATION_SYSTEM_PROMPT = [
  "당신은 영수증 분류 전문가입니다.",
  "반드시 지정된 형식으로만 출력하고 추가 설명은 포함하지 마세요.",
].join(" ");

export const CLASSIFICATION_EXAMPLE_OUTPUT = [
  "가게명: 스타벅스",
  "날짜: 2024-03-15",
  "아메리카노: 음식:음료 (4,500원)",
  "카페라떼: 음식:음료 (5,000원)",
  "총액: 9,500원",
].join("\n");

// Renders the line template that TextResponseParser reads back.
export function buildClassificationPrompt(ocrText: string, taxonomy: Taxonomy): string {
  const categories = taxonomy.categories();
  const subcategoryLines = categories.map(
    (category) => `   - ${category}: ${taxonomy.subcategoriesOf(category).join(", ")}`,
  );

  return [
    "다음 영수증 정보를 분석하여 각 품목의 카테고리와 서브카테고리를 분류해주세요.",
    "영수증 정보:",
    ocrText.trim(),
    "",
    "분류 규칙:",
    "1. 다음 형식을 정확히 지켜주세요:",
    "   가게명: [가게이름]",
    "   날짜: [YYYY-MM-DD]",
    "   [품목명]: [카테고리]:[서브카테고리] ([금액]원)",
    "   총액: [금액]원",
    `2. 카테고리는 다음 중 하나여야 함: ${categories.join(", ")}`,
    "3. 서브카테고리는 카테고리별로 다음 중 하나여야 함:",
    ...subcategoryLines,
    "4. 추가 설명이나 다른 내용은 포함하지 마세요.",
    "",
    "예시 출력:",
    CLASSIFICATION_EXAMPLE_OUTPUT,
  ].join("\n");
}
