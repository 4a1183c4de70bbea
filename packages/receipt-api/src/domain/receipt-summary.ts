import type {
  ReceiptParseFailure,
  RowSinkStatus,
  StoredTransaction,
} from "@receipt-ledger/receipt-contracts";

const FAILURE_HINTS: Record<ReceiptParseFailure["reason"], string> = {
  EmptyInput: "The document had no readable text.",
  AmountNotFound: "No amount was found. Send the details manually to record it.",
};

/** Plain-text reply a messaging front-end sends back after an ingest. */
export function formatReceiptSummary(params: {
  record: StoredTransaction;
  created: boolean;
  rowSink: RowSinkStatus;
}): string {
  const { record } = params;
  const lines = [
    params.created ? "Transaction recorded" : "Transaction updated",
    `Amount: ${formatAmount(record.amount)} (${record.direction})`,
    `Description: ${record.description}`,
    `Category: ${record.category}`,
  ];
  if (record.merchant) {
    lines.push(`Merchant: ${record.merchant}`);
  }
  if (record.occurredAt) {
    lines.push(`Date: ${record.occurredAt.replace("T", " ")}`);
  }
  if (record.transactionId) {
    lines.push(`ID: ${record.transactionId}`);
  }
  if (params.rowSink === "failed") {
    lines.push("Warning: the row could not be added to the spreadsheet.");
  }
  return lines.join("\n");
}

export function formatFailureSummary(failure: ReceiptParseFailure): string {
  return `Could not read this receipt: ${failure.message}. ${FAILURE_HINTS[failure.reason]}`;
}

function formatAmount(amount: number): string {
  const sign = amount < 0 ? "-" : "+";
  return `${sign}$${Math.abs(amount).toFixed(2)}`;
}
