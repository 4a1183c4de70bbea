import { describe, expect, it } from "vitest";
import { storedTransaction } from "./test-fixtures.js";
import { periodStart, summarizeTransactions } from "./transaction-report.js";

const asOf = new Date("2026-03-15T10:00:00.000Z");

function expense(key: string, amount: number, occurredAt: string) {
  return storedTransaction({
    recordKey: key,
    transactionId: key,
    amount,
    direction: "expense",
    occurredAt,
  });
}

describe("periodStart", () => {
  it("computes the start of each window", () => {
    expect(periodStart("week", asOf)).toBe("2026-03-09");
    expect(periodStart("month", asOf)).toBe("2026-03-01");
    expect(periodStart("year", asOf)).toBe("2026-01-01");
    expect(periodStart("all", asOf)).toBeNull();
  });
});

describe("summarizeTransactions", () => {
  const transactions = [
    storedTransaction({ occurredAt: "2026-03-10T08:00:00" }),
    expense("OP-2", -45.5, "2026-03-14T19:30:00"),
    expense("OP-3", -200, "2026-02-20T00:00:00"),
    expense("OP-4", -10, "2026-03-20T00:00:00"),
  ];

  it("totals the current month", () => {
    expect(summarizeTransactions({ transactions, period: "month", asOf })).toEqual({
      period: "month",
      from: "2026-03-01",
      to: "2026-03-15",
      totalIncome: 1000,
      totalExpense: 45.5,
      netBalance: 954.5,
      transactionCount: 2,
      incomeCount: 1,
      expenseCount: 1,
    });
  });

  it("leaves out records dated after today", () => {
    const summary = summarizeTransactions({ transactions, period: "all", asOf });

    expect(summary.from).toBeNull();
    expect(summary.totalExpense).toBe(245.5);
    expect(summary.netBalance).toBe(754.5);
    expect(summary.transactionCount).toBe(3);
  });

  it("dates undated records by when they were stored", () => {
    const undated = storedTransaction({ occurredAt: null, createdAt: "2026-03-15T09:00:00.000Z" });

    expect(summarizeTransactions({ transactions: [undated], period: "week", asOf }).incomeCount).toBe(1);
  });
});
