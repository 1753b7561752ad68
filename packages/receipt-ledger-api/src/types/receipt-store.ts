import type {
  ReceiptRecord,
  SaveReceiptRequest,
  UpdateReceiptResponse,
} from "@receipt-ledger/contracts";

export type ItemFact = {
  receiptId: number;
  date: string;
  category: string;
  subcategory: string;
  amount: number;
};

export type LedgerReader = {
  itemFacts: () => ItemFact[];
};

export type ReceiptStore = LedgerReader & {
  add: (request: SaveReceiptRequest) => number;
  update: (receiptId: number, request: SaveReceiptRequest) => UpdateReceiptResponse;
  getReceipt: (receiptId: number) => ReceiptRecord | null;
  listReceipts: () => ReceiptRecord[];
};
