import type { StoredTransaction } from "@receipt-ledger/receipt-contracts";
import Papa from "papaparse";
import { SHEET_COLUMNS, toSheetRow } from "../sinks/row-sink.js";

export const CSV_COLUMNS = ["recordKey", ...SHEET_COLUMNS, "origin"];

/** One row per record in the sheet column order, framed by its key and origin. */
export function transactionsToCsv(transactions: StoredTransaction[]): string {
  return Papa.unparse(
    {
      fields: CSV_COLUMNS,
      data: transactions.map((record) => [record.recordKey, ...toSheetRow(record), record.origin]),
    },
    { newline: "\n" },
  );
}
