import { describe, expect, it } from "vitest";
import { transactionsToCsv } from "./csv-export.js";
import { storedTransaction } from "./test-fixtures.js";

describe("transactionsToCsv", () => {
  it("writes a header and quotes cells that need it", () => {
    const csv = transactionsToCsv([
      storedTransaction({
        recordKey: "id:OP-1",
        transactionId: "OP-1",
        description: "Pagaste $45,50 en Supermercado XYZ",
        amount: -45.5,
        direction: "expense",
        category: "groceries",
        merchant: null,
      }),
    ]);

    expect(csv.split("\n")).toEqual([
      "recordKey,transactionId,occurredAt,description,amount,direction,category,merchant,origin",
      'id:OP-1,OP-1,2024-03-05T00:00:00,"Pagaste $45,50 en Supermercado XYZ",-45.5,expense,groceries,,parsed',
    ]);
  });

  it("writes only the header without records", () => {
    expect(transactionsToCsv([])).toBe(
      "recordKey,transactionId,occurredAt,description,amount,direction,category,merchant,origin",
    );
  });
});
