import {
  UNCATEGORIZED,
  type CreateCategoryRequest,
  type CustomCategory,
  type ParsedTransaction,
  type StoredTransaction,
  type TransactionOrigin,
} from "@receipt-ledger/receipt-contracts";
import { createHash } from "node:crypto";
import { effectiveTimestamp } from "../domain/transaction-report.js";
import type {
  TransactionDateRange,
  TransactionStore,
  UpsertResult,
} from "../types/transaction-store.js";

type InMemoryTransactionStoreOptions = {
  now?: () => Date;
};

function clone<T>(value: T): T {
  return structuredClone(value);
}

export function fingerprint(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

/**
 * Receipts with an identifier are keyed by it. Otherwise the raw text decides,
 * and a manual entry without either falls back to its own fields.
 */
export function recordKeyFor(transaction: ParsedTransaction): string {
  if (transaction.transactionId) {
    return `id:${transaction.transactionId}`;
  }
  if (transaction.rawText.length > 0) {
    return `sha256:${fingerprint(transaction.rawText)}`;
  }
  return `sha256:${fingerprint(
    [
      transaction.occurredAt ?? "",
      transaction.description,
      transaction.amount.toFixed(2),
      transaction.merchant ?? "",
    ].join("\u001f"),
  )}`;
}

export class InMemoryTransactionStore implements TransactionStore {
  private readonly records = new Map<string, StoredTransaction>();
  private readonly categoryOverrides = new Set<string>();
  private readonly categories = new Map<string, CustomCategory>();
  private readonly now: () => Date;

  constructor(options: InMemoryTransactionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  upsert(transaction: ParsedTransaction, origin: TransactionOrigin): UpsertResult {
    const recordKey = recordKeyFor(transaction);
    const existing = this.records.get(recordKey);
    const now = this.now().toISOString();

    const record: StoredTransaction = {
      ...transaction,
      // a category set by hand survives re-ingesting the same receipt
      category:
        existing && this.categoryOverrides.has(recordKey) ? existing.category : transaction.category,
      recordKey,
      origin,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    this.records.set(recordKey, record);
    return { record: clone(record), created: !existing };
  }

  get(recordKey: string): StoredTransaction | null {
    const record = this.records.get(recordKey);
    return record ? clone(record) : null;
  }

  list(range: TransactionDateRange = {}): StoredTransaction[] {
    return [...this.records.values()]
      .filter((record) => {
        const day = effectiveTimestamp(record).slice(0, 10);
        return (!range.from || day >= range.from) && (!range.to || day <= range.to);
      })
      .sort((left, right) => {
        const byDate = effectiveTimestamp(right).localeCompare(effectiveTimestamp(left));
        return byDate !== 0 ? byDate : right.createdAt.localeCompare(left.createdAt);
      })
      .map(clone);
  }

  updateCategory(recordKey: string, category: string | null): StoredTransaction | null {
    const existing = this.records.get(recordKey);
    if (!existing) {
      return null;
    }

    const updated: StoredTransaction = {
      ...existing,
      category: category ?? UNCATEGORIZED,
      updatedAt: this.now().toISOString(),
    };
    this.records.set(recordKey, updated);
    if (category === null) {
      this.categoryOverrides.delete(recordKey);
    } else {
      this.categoryOverrides.add(recordKey);
    }
    return clone(updated);
  }

  listCategories(): CustomCategory[] {
    return [...this.categories.values()].map(clone);
  }

  createCategory(request: CreateCategoryRequest): CustomCategory | null {
    const key = request.name.toLowerCase();
    if (this.categories.has(key)) {
      return null;
    }

    const category: CustomCategory = {
      name: request.name,
      keywords: [...request.keywords],
      createdAt: this.now().toISOString(),
    };
    this.categories.set(key, category);
    return clone(category);
  }

  deleteCategory(name: string): boolean {
    return this.categories.delete(name.trim().toLowerCase());
  }
}
