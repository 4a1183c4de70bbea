import type {
  Confidence,
  FieldConfidence,
  RawReceiptRequest,
  ReceiptParseFailure,
  RowSinkStatus,
  StoredTransaction,
} from "@receipt-ledger/receipt-contracts";
import {
  parseReceiptText,
  type CategoryRule,
  type ExtractionResult,
  type ReceiptFields,
} from "@receipt-ledger/receipt-parser";
import type { ApiLogger } from "../logger.js";
import { deliverRow, type RowSink } from "../sinks/row-sink.js";
import type { TransactionStore } from "../types/transaction-store.js";
import { formatFailureSummary, formatReceiptSummary } from "./receipt-summary.js";

export type IngestDependencies = {
  store: TransactionStore;
  rowSink: RowSink;
  logger: ApiLogger;
  maxDocumentBytes: number;
};

export type IngestOutcome =
  | {
      ok: true;
      record: StoredTransaction;
      created: boolean;
      confidence: FieldConfidence;
      rowSink: RowSinkStatus;
      summary: string;
    }
  | { ok: false; error: "payload_too_large"; message: string }
  | { ok: false; error: "unparseable_receipt"; failure: ReceiptParseFailure; summary: string };

/** Size check, parse, upsert, then the row sink. */
export async function ingestReceipt(
  request: RawReceiptRequest,
  deps: IngestDependencies,
): Promise<IngestOutcome> {
  if (request.byteLength > deps.maxDocumentBytes) {
    return {
      ok: false,
      error: "payload_too_large",
      message: `document is ${request.byteLength} bytes; limit is ${deps.maxDocumentBytes}`,
    };
  }

  const outcome = parseReceiptText(request.text, {
    categoryRules: customCategoryRules(deps.store),
  });
  if (!outcome.ok) {
    deps.logger.warn(
      `unparseable receipt${request.source ? ` from ${request.source}` : ""}: ${outcome.failure.reason}`,
    );
    return {
      ok: false,
      error: "unparseable_receipt",
      failure: outcome.failure,
      summary: formatFailureSummary(outcome.failure),
    };
  }

  const { record, created } = deps.store.upsert(outcome.transaction, "parsed");
  const rowSink = await deliverRow({
    sink: deps.rowSink,
    transaction: record,
    recordKey: record.recordKey,
    logger: deps.logger,
  });
  deps.logger.info(`${created ? "stored" : "updated"} ${record.recordKey}`);

  return {
    ok: true,
    record,
    created,
    confidence: fieldConfidence(outcome.fields),
    rowSink,
    summary: formatReceiptSummary({ record, created, rowSink }),
  };
}

export function customCategoryRules(store: TransactionStore): CategoryRule[] {
  return store.listCategories().map((category) => ({
    category: category.name,
    keywords: category.keywords,
  }));
}

export function fieldConfidence(fields: ReceiptFields): FieldConfidence {
  return {
    transactionId: presentConfidence(fields.transactionId),
    occurredAt: presentConfidence(fields.occurredAt),
    amount: fields.amount.confidence,
    description: fields.description.value === null ? "low" : fields.description.confidence,
    merchant: presentConfidence(fields.merchant),
  };
}

function presentConfidence<T>(result: ExtractionResult<T>): Confidence | null {
  return result.value === null ? null : result.confidence;
}
