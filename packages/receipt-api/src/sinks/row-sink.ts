import type { ParsedTransaction, RowSinkStatus } from "@receipt-ledger/receipt-contracts";
import { describeError, type ApiLogger } from "../logger.js";

export type SheetCell = string | number;
export type SheetRow = SheetCell[];

export const SHEET_COLUMNS = [
  "transactionId",
  "occurredAt",
  "description",
  "amount",
  "direction",
  "category",
  "merchant",
] as const;

export type RowSink = {
  readonly mode: "configured" | "disabled";
  append: (row: SheetRow) => Promise<void>;
};

export function toSheetRow(transaction: ParsedTransaction): SheetRow {
  return [
    transaction.transactionId ?? "",
    transaction.occurredAt ?? "",
    transaction.description,
    transaction.amount,
    transaction.direction,
    transaction.category,
    transaction.merchant ?? "",
  ];
}

export class NoopRowSink implements RowSink {
  readonly mode = "disabled";

  async append(): Promise<void> {}
}

export type HttpRowSinkOptions = {
  url: string;
  token?: string | null;
};

export class HttpRowSink implements RowSink {
  readonly mode = "configured";
  private readonly url: string;
  private readonly token: string | null;

  constructor(options: HttpRowSinkOptions) {
    this.url = options.url;
    this.token = options.token ?? null;
  }

  async append(row: SheetRow): Promise<void> {
    const response = await fetch(this.url, {
      method: "POST",
      headers: this.buildHeaders(),
      body: JSON.stringify({ values: row }),
    });

    if (!response.ok) {
      throw new Error(`row sink rejected append: ${response.status}`);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }
    return headers;
  }
}

export function createRowSink(config: { rowSinkUrl: string | null; rowSinkToken: string | null }): RowSink {
  if (!config.rowSinkUrl) {
    return new NoopRowSink();
  }
  return new HttpRowSink({ url: config.rowSinkUrl, token: config.rowSinkToken });
}

/** Forwards one record to the sink. A sink failure is logged, never thrown. */
export async function deliverRow(params: {
  sink: RowSink;
  transaction: ParsedTransaction;
  recordKey: string;
  logger: ApiLogger;
}): Promise<RowSinkStatus> {
  if (params.sink.mode === "disabled") {
    return "skipped";
  }

  try {
    await params.sink.append(toSheetRow(params.transaction));
    return "appended";
  } catch (error) {
    params.logger.error(`row sink failed for ${params.recordKey}: ${describeError(error)}`);
    return "failed";
  }
}
