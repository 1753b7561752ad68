import type { ExtractionField, ParsedReceipt } from "@receipt-ledger/contracts";

export type ClassifiedResponseInput = {
  responseText: string;
  ocrText?: string;
};

export type ParseResult =
  | { ok: true; receipt: ParsedReceipt }
  | { ok: false; missing: ExtractionField[] };

export type ReceiptResponseParser = {
  parse: (input: ClassifiedResponseInput) => ParseResult;
};
