import {
  createConsoleLogger,
  IncompleteExtractionError,
  type LedgerLogger,
  type ParsedReceipt,
} from "@receipt-ledger/contracts";
import type { ClassifiedResponseInput, ReceiptResponseParser } from "@receipt-ledger/extractor";
import type { ReceiptStore } from "../types/receipt-store.js";

type ReceiptIngestionServiceOptions = {
  parser: ReceiptResponseParser;
  store: ReceiptStore;
  logger?: LedgerLogger;
};

export type IngestedReceipt = {
  receiptId: number;
  receipt: ParsedReceipt;
};

export class ReceiptIngestionService {
  private readonly parser: ReceiptResponseParser;
  private readonly store: ReceiptStore;
  private readonly logger: LedgerLogger;

  constructor(options: ReceiptIngestionServiceOptions) {
    this.parser = options.parser;
    this.store = options.store;
    this.logger = options.logger ?? createConsoleLogger("receipt-ledger-api");
  }

  ingest(input: ClassifiedResponseInput): IngestedReceipt {
    const result = this.parser.parse(input);
    if (!result.ok) {
      this.logger.warn(`incomplete extraction: missing ${result.missing.join(", ")}`);
      throw new IncompleteExtractionError(result.missing);
    }

    const receiptId = this.store.add(result.receipt);
    this.logger.info(
      `stored receipt ${receiptId} from ${result.receipt.storeName} with ${result.receipt.items.length} items`,
    );
    return { receiptId, receipt: result.receipt };
  }
}
