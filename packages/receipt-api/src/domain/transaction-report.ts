import type {
  StoredTransaction,
  SummaryPeriod,
  TransactionSummaryResponse,
} from "@receipt-ledger/receipt-contracts";
import { roundAmount } from "@receipt-ledger/receipt-parser";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Calendar position of a record: its receipt date, or when it was stored. */
export function effectiveTimestamp(record: StoredTransaction): string {
  return record.occurredAt ?? record.createdAt.slice(0, 19);
}

/**
 * First day of the reporting window ending on `asOf` (UTC calendar day).
 * `week` is the last seven days including today; `month` and `year` start at
 * the calendar boundary.
 */
export function periodStart(period: SummaryPeriod, asOf: Date): string | null {
  const today = toIsoDate(asOf);
  switch (period) {
    case "week":
      return toIsoDate(new Date(asOf.getTime() - 6 * DAY_MS));
    case "month":
      return `${today.slice(0, 7)}-01`;
    case "year":
      return `${today.slice(0, 4)}-01-01`;
    case "all":
      return null;
  }
}

export function summarizeTransactions(params: {
  transactions: StoredTransaction[];
  period: SummaryPeriod;
  asOf?: Date;
}): TransactionSummaryResponse {
  const asOf = params.asOf ?? new Date();
  const from = periodStart(params.period, asOf);
  const to = toIsoDate(asOf);

  let totalIncome = 0;
  let totalExpense = 0;
  let incomeCount = 0;
  let expenseCount = 0;

  for (const transaction of params.transactions) {
    const day = effectiveTimestamp(transaction).slice(0, 10);
    if ((from && day < from) || day > to) {
      continue;
    }

    if (transaction.direction === "income") {
      totalIncome += transaction.amount;
      incomeCount += 1;
    } else {
      totalExpense += Math.abs(transaction.amount);
      expenseCount += 1;
    }
  }

  return {
    period: params.period,
    from,
    to,
    totalIncome: roundAmount(totalIncome),
    totalExpense: roundAmount(totalExpense),
    netBalance: roundAmount(totalIncome - totalExpense),
    transactionCount: incomeCount + expenseCount,
    incomeCount,
    expenseCount,
  };
}

function toIsoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}
