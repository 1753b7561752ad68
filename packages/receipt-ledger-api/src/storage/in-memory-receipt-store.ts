import {
  createConsoleLogger,
  LedgerError,
  OperationFailedError,
  SaveReceiptRequestSchema,
  ValidationError,
  type LedgerLogger,
  type ReceiptItemInput,
  type ReceiptRecord,
  type SaveReceiptRequest,
  type Taxonomy,
  type UpdateReceiptResponse,
} from "@receipt-ledger/contracts";
import type { ItemFact, ReceiptStore } from "../types/receipt-store.js";
import { LedgerTables, type ReceiptRow } from "./ledger-tables.js";

type InMemoryReceiptStoreOptions = {
  taxonomy: Taxonomy;
  logger?: LedgerLogger;
  now?: () => Date;
};

export class InMemoryReceiptStore implements ReceiptStore {
  private readonly taxonomy: Taxonomy;
  private readonly tables: LedgerTables;
  private readonly logger: LedgerLogger;
  private readonly now: () => Date;

  constructor(options: InMemoryReceiptStoreOptions) {
    this.taxonomy = options.taxonomy;
    this.tables = new LedgerTables(options.taxonomy);
    this.logger = options.logger ?? createConsoleLogger("receipt-ledger-api");
    this.now = options.now ?? (() => new Date());
  }

  add(request: SaveReceiptRequest): number {
    const receipt = parseSaveRequest(request);

    return this.runInTransaction("add receipt", () => {
      const createdAt = this.now().toISOString();
      const receiptId = this.tables.insertReceipt({
        storeName: receipt.storeName,
        date: receipt.date,
        totalAmount: receipt.totalAmount,
        createdAt,
      });
      this.insertItems(receiptId, receipt.items, createdAt);
      return receiptId;
    });
  }

  update(receiptId: number, request: SaveReceiptRequest): UpdateReceiptResponse {
    const receipt = parseSaveRequest(request);

    return this.runInTransaction("update receipt", () => {
      const found = this.tables.updateReceipt(receiptId, {
        storeName: receipt.storeName,
        date: receipt.date,
        totalAmount: receipt.totalAmount,
      });
      if (!found) {
        this.logger.warn(`update skipped: receipt ${receiptId} not found`);
        return { receiptId, applied: false, itemCount: 0 };
      }

      this.tables.deleteItemsOf(receiptId);
      const itemCount = this.insertItems(receiptId, receipt.items, this.now().toISOString());
      return { receiptId, applied: true, itemCount };
    });
  }

  getReceipt(receiptId: number): ReceiptRecord | null {
    const row = this.tables.findReceipt(receiptId);
    return row ? this.toRecord(row) : null;
  }

  listReceipts(): ReceiptRecord[] {
    return this.tables
      .allReceipts()
      .toSorted((a, b) => compareText(b.date, a.date) || b.id - a.id)
      .map((row) => this.toRecord(row));
  }

  itemFacts(): ItemFact[] {
    const facts: ItemFact[] = [];
    for (const item of this.tables.allItems()) {
      const receipt = this.tables.findReceipt(item.receiptId);
      const main = this.tables.mainCategories.get(item.mainCategoryId);
      const sub = this.tables.subCategories.get(item.subCategoryId);
      if (!receipt || !main || !sub) {
        continue;
      }
      facts.push({
        receiptId: receipt.id,
        date: receipt.date,
        category: main.name,
        subcategory: sub.name,
        amount: item.amount,
      });
    }
    return facts;
  }

  private insertItems(receiptId: number, items: ReceiptItemInput[], createdAt: string): number {
    items.forEach((item, index) => {
      const resolved = this.taxonomy.resolve(item.category, item.subcategory);
      if (!resolved) {
        throw new ValidationError(
          `cannot classify item "${item.name}" as ${item.category}:${item.subcategory}`,
          [{ path: `items.${index}`, message: "category pair not in taxonomy" }],
        );
      }

      if (resolved.corrected) {
        this.logger.info(
          `corrected subcategory "${item.subcategory}" to "${resolved.subcategory}" for item "${item.name}"`,
        );
      }

      this.tables.insertItem({
        receiptId,
        name: item.name,
        mainCategoryId: resolved.mainCategoryId,
        subCategoryId: resolved.subCategoryId,
        amount: item.amount,
        createdAt,
      });
    });
    return items.length;
  }

  private runInTransaction<T>(operation: string, work: () => T): T {
    try {
      return this.tables.transaction(work);
    } catch (error) {
      if (error instanceof LedgerError) {
        this.logger.warn(`${operation} rolled back: ${error.message}`);
        throw error;
      }
      const failure = new OperationFailedError(operation, error);
      this.logger.error(failure.message);
      throw failure;
    }
  }

  private toRecord(row: ReceiptRow): ReceiptRecord {
    return {
      receiptId: row.id,
      storeName: row.storeName,
      date: row.date,
      totalAmount: row.totalAmount,
      createdAt: row.createdAt,
      items: this.tables.itemsOf(row.id).map((item) => ({
        itemId: item.id,
        name: item.name,
        category: this.tables.mainCategories.get(item.mainCategoryId)?.name ?? "",
        subcategory: this.tables.subCategories.get(item.subCategoryId)?.name ?? "",
        amount: item.amount,
      })),
    };
  }
}

function parseSaveRequest(request: SaveReceiptRequest): SaveReceiptRequest {
  const result = SaveReceiptRequestSchema.safeParse(request);
  if (!result.success) {
    throw new ValidationError(
      "invalid receipt",
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      })),
    );
  }
  return result.data;
}

function compareText(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
