import type {
  CreateCategoryRequest,
  CustomCategory,
  ParsedTransaction,
  StoredTransaction,
  TransactionOrigin,
} from "@receipt-ledger/receipt-contracts";

export type UpsertResult = {
  record: StoredTransaction;
  created: boolean;
};

/** Inclusive ISO calendar dates (`YYYY-MM-DD`). */
export type TransactionDateRange = {
  from?: string;
  to?: string;
};

export type TransactionStore = {
  /** Insert-or-update by transaction identifier, or by a fingerprint of the raw text. */
  upsert: (transaction: ParsedTransaction, origin: TransactionOrigin) => UpsertResult;
  get: (recordKey: string) => StoredTransaction | null;
  /** Newest first. */
  list: (range?: TransactionDateRange) => StoredTransaction[];
  updateCategory: (recordKey: string, category: string | null) => StoredTransaction | null;
  listCategories: () => CustomCategory[];
  /** Returns null when a category with the same name already exists. */
  createCategory: (request: CreateCategoryRequest) => CustomCategory | null;
  deleteCategory: (name: string) => boolean;
};
