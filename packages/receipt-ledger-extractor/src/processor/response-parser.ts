import {
  CalendarDateSchema,
  createConsoleLogger,
  NAME_MAX_LENGTH,
  RECEIPT_ITEMS_MAX,
  type ExtractionField,
  type LedgerLogger,
  type ParsedItem,
  type Taxonomy,
} from "@receipt-ledger/contracts";
import { findTotalAmount } from "./total-amount.js";
import type { ClassifiedResponseInput, ParseResult, ReceiptResponseParser } from "./types.js";

const STORE_NAME_LABELS = ["가게명:", "상호명:", "매장명:"];
const DATE_LABEL = "날짜:";
const DATE_PATTERN = /\d{4}-\d{2}-\d{2}/;
const DATE_PATTERN_GLOBAL = /\d{4}-\d{2}-\d{2}/g;
const AMOUNT_IN_PARENS = /\(([^)]+)\)/;

type TextResponseParserOptions = {
  taxonomy: Taxonomy;
  logger?: LedgerLogger;
};

type DraftState = {
  storeName: string | null;
  date: string | null;
  items: ParsedItem[];
  totalAmount: number | null;
};

/**
 * Reads the line-oriented text a classification model returns for a receipt.
 *
 * Store name, date and total lock on their first match; later lines never
 * overwrite them. Items are kept only when their category pair is an exact
 * taxonomy member. A successful draft always satisfies the save-request schema.
 */
export class TextResponseParser implements ReceiptResponseParser {
  private readonly taxonomy: Taxonomy;
  private readonly logger: LedgerLogger;

  constructor(options: TextResponseParserOptions) {
    this.taxonomy = options.taxonomy;
    this.logger = options.logger ?? createConsoleLogger("receipt-ledger-extractor");
  }

  parse(input: ClassifiedResponseInput): ParseResult {
    const state: DraftState = {
      storeName: null,
      date: null,
      items: [],
      totalAmount: null,
    };

    for (const line of splitLines(input.responseText)) {
      if (state.storeName === null && isStoreNameCandidate(line)) {
        const storeName = extractStoreName(line);
        if (storeName && storeName.length <= NAME_MAX_LENGTH) {
          state.storeName = storeName;
          continue;
        }
      }

      if (state.date === null && (line.includes(DATE_LABEL) || DATE_PATTERN.test(line))) {
        const date = findCalendarDate(line);
        if (date) {
          state.date = date;
          continue;
        }
      }

      const item = this.parseItemLine(line);
      if (item && state.items.length < RECEIPT_ITEMS_MAX) {
        state.items.push(item);
      } else if (item) {
        this.logger.warn(
          `skipping item "${item.name}": receipt already has ${RECEIPT_ITEMS_MAX} items`,
        );
      }

      if (state.totalAmount === null) {
        state.totalAmount = findTotalAmount(line);
      }
    }

    if (state.totalAmount === null && input.ocrText) {
      const recovered = findTotalAmount(input.ocrText);
      if (recovered !== null) {
        this.logger.info(`recovered total amount ${recovered} from OCR text`);
        state.totalAmount = recovered;
      }
    }

    const { storeName, date, items, totalAmount } = state;
    if (storeName === null || date === null || items.length === 0 || totalAmount === null) {
      return { ok: false, missing: missingFields(state) };
    }

    return {
      ok: true,
      receipt: { storeName, date, items, totalAmount },
    };
  }

  private parseItemLine(line: string): ParsedItem | null {
    if (!line.includes(":") || !line.includes("(") || !line.includes(")")) {
      return null;
    }

    const parts = line.split(":");
    if (parts.length < 3) {
      return null;
    }

    const name = (parts[0] ?? "").trim();
    const category = (parts[1] ?? "").trim();
    const subcategory = (parts[2] ?? "").split("(")[0]?.trim() ?? "";

    const rawAmount = line.match(AMOUNT_IN_PARENS)?.[1];
    if (rawAmount === undefined) {
      return null;
    }

    if (name.length === 0) {
      this.logger.warn(`skipping unnamed item ${category}:${subcategory}`);
      return null;
    }
    if (name.length > NAME_MAX_LENGTH) {
      this.logger.warn(`skipping item with a ${name.length}-character name`);
      return null;
    }

    const amount = parseWonAmount(rawAmount);
    if (amount === null) {
      this.logger.warn(`skipping item "${name}": unreadable amount "${rawAmount}"`);
      return null;
    }

    if (!this.taxonomy.validate(category, subcategory)) {
      this.logger.warn(`skipping item "${name}": invalid category ${category}:${subcategory}`);
      return null;
    }

    return { name, category, subcategory, amount };
  }
}

export function splitLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function isStoreNameCandidate(line: string): boolean {
  return STORE_NAME_LABELS.some((label) => line.includes(label)) || !/\d/.test(line);
}

function findCalendarDate(line: string): string | null {
  for (const match of line.matchAll(DATE_PATTERN_GLOBAL)) {
    if (CalendarDateSchema.safeParse(match[0]).success) {
      return match[0];
    }
  }
  return null;
}

function extractStoreName(line: string): string {
  let value = line;
  for (const label of STORE_NAME_LABELS) {
    value = value.replaceAll(label, "");
  }
  return value.replace(DATE_PATTERN_GLOBAL, "").trim();
}

function parseWonAmount(raw: string): number | null {
  const cleaned = raw.replace(/[,\s원]/g, "");
  if (!/^-?\d+$/.test(cleaned)) {
    return null;
  }
  const value = Number.parseInt(cleaned, 10);
  return Number.isSafeInteger(value) ? value : null;
}

function missingFields(state: DraftState): ExtractionField[] {
  const missing: ExtractionField[] = [];
  if (state.storeName === null) {
    missing.push("store");
  }
  if (state.date === null) {
    missing.push("date");
  }
  if (state.items.length === 0) {
    missing.push("items");
  }
  if (state.totalAmount === null) {
    missing.push("total");
  }
  return missing;
}
