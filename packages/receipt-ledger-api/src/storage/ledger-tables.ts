import type { MainCategoryRow, SubCategoryRow, Taxonomy } from "@receipt-ledger/contracts";

export type ReceiptRow = {
  id: number;
  storeName: string;
  date: string;
  totalAmount: number;
  createdAt: string;
};

export type ItemRow = {
  id: number;
  receiptId: number;
  name: string;
  mainCategoryId: number;
  subCategoryId: number;
  amount: number;
  createdAt: string;
};

export type NewReceiptRow = Omit<ReceiptRow, "id">;
export type NewItemRow = Omit<ItemRow, "id">;
export type ReceiptFields = Omit<ReceiptRow, "id" | "createdAt">;

/**
 * Normalized in-process tables. Rows are frozen and replaced rather than
 * mutated, so a transaction snapshot only has to copy the maps.
 */
export class LedgerTables {
  readonly mainCategories: ReadonlyMap<number, MainCategoryRow>;
  readonly subCategories: ReadonlyMap<number, SubCategoryRow>;
  private receipts = new Map<number, ReceiptRow>();
  private items = new Map<number, ItemRow>();
  private nextReceiptId = 1;
  private nextItemId = 1;
  private inTransaction = false;

  constructor(taxonomy: Taxonomy) {
    this.mainCategories = new Map(taxonomy.mainCategories().map((row) => [row.id, row]));
    this.subCategories = new Map(taxonomy.subCategories().map((row) => [row.id, row]));
  }

  transaction<T>(work: () => T): T {
    if (this.inTransaction) {
      throw new Error("nested transactions are not supported");
    }

    const receiptsBefore = new Map(this.receipts);
    const itemsBefore = new Map(this.items);
    this.inTransaction = true;
    try {
      return work();
    } catch (error) {
      this.receipts = receiptsBefore;
      this.items = itemsBefore;
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  insertReceipt(row: NewReceiptRow): number {
    this.assertWritable();
    const id = this.nextReceiptId;
    this.nextReceiptId += 1;
    this.receipts.set(id, Object.freeze({ id, ...row }));
    return id;
  }

  updateReceipt(id: number, fields: ReceiptFields): boolean {
    this.assertWritable();
    const existing = this.receipts.get(id);
    if (!existing) {
      return false;
    }
    this.receipts.set(id, Object.freeze({ ...existing, ...fields }));
    return true;
  }

  insertItem(row: NewItemRow): number {
    this.assertWritable();
    if (!this.subCategories.has(row.subCategoryId) || !this.mainCategories.has(row.mainCategoryId)) {
      throw new Error(
        `unknown category reference ${row.mainCategoryId}/${row.subCategoryId} for item ${row.name}`,
      );
    }
    const id = this.nextItemId;
    this.nextItemId += 1;
    this.items.set(id, Object.freeze({ id, ...row }));
    return id;
  }

  deleteItemsOf(receiptId: number): number {
    this.assertWritable();
    let deleted = 0;
    for (const [id, item] of this.items) {
      if (item.receiptId === receiptId) {
        this.items.delete(id);
        deleted += 1;
      }
    }
    return deleted;
  }

  findReceipt(id: number): ReceiptRow | undefined {
    return this.receipts.get(id);
  }

  allReceipts(): ReceiptRow[] {
    return [...this.receipts.values()];
  }

  itemsOf(receiptId: number): ItemRow[] {
    return [...this.items.values()].filter((item) => item.receiptId === receiptId);
  }

  allItems(): ItemRow[] {
    return [...this.items.values()];
  }

  private assertWritable(): void {
    if (!this.inTransaction) {
      throw new Error("writes must run inside a transaction");
    }
  }
}
