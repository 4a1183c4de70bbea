import type { StoredTransaction } from "@receipt-ledger/receipt-contracts";

export function storedTransaction(overrides: Partial<StoredTransaction> = {}): StoredTransaction {
  return {
    recordKey: "id:ABC123",
    origin: "parsed",
    transactionId: "ABC123",
    occurredAt: "2024-03-05T00:00:00",
    description: "Recibiste un pago de $1.000,00 de Juan Perez el 05/03/2024",
    amount: 1000,
    direction: "income",
    category: "uncategorized",
    merchant: "Juan Perez",
    rawText: "Recibiste un pago de $1.000,00 de Juan Perez el 05/03/2024. ID: ABC123",
    createdAt: "2026-02-08T12:00:00.000Z",
    updatedAt: "2026-02-08T12:00:00.000Z",
    ...overrides,
  };
}
