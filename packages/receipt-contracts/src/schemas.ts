import { z } from "zod";

export const DirectionSchema = z.enum(["income", "expense"]);
export const ConfidenceSchema = z.enum(["high", "low"]);
export const ParseFailureReasonSchema = z.enum(["EmptyInput", "AmountNotFound"]);
export const TransactionOriginSchema = z.enum(["parsed", "manual"]);
export const RowSinkStatusSchema = z.enum(["appended", "skipped", "failed"]);
export const SummaryPeriodSchema = z.enum(["week", "month", "year", "all"]);

export const UNCATEGORIZED = "uncategorized";

export const RecordKeySchema = z.string().min(1).max(128);
export const CategoryNameSchema = z.string().trim().min(1).max(80);
export const LocalDateTimeSchema = z.iso.datetime({ local: true });

export const TextSpanSchema = z.object({
  start: z.number().int().min(0),
  end: z.number().int().min(0),
});

const TransactionFieldsSchema = z.object({
  transactionId: z.string().min(1).max(64).nullable(),
  occurredAt: LocalDateTimeSchema.nullable(),
  description: z.string().min(1).max(200),
  amount: z.number(),
  direction: DirectionSchema,
  category: CategoryNameSchema,
  merchant: z.string().min(1).max(100).nullable(),
  rawText: z.string(),
});

function hasConsistentSign(tx: { amount: number; direction: "income" | "expense" }): boolean {
  return tx.direction === "expense" ? tx.amount < 0 : tx.amount > 0;
}

const SIGN_MISMATCH = {
  message: "amount sign must match direction (expense < 0, income > 0)",
  path: ["amount"],
};

export const ParsedTransactionSchema = TransactionFieldsSchema.refine(
  hasConsistentSign,
  SIGN_MISMATCH,
);

export const ReceiptParseFailureSchema = z.object({
  reason: ParseFailureReasonSchema,
  message: z.string().min(1),
  rawText: z.string(),
});

export const StoredTransactionSchema = TransactionFieldsSchema.extend({
  recordKey: RecordKeySchema,
  origin: TransactionOriginSchema,
  createdAt: z.iso.datetime(),
  updatedAt: z.iso.datetime(),
}).refine(hasConsistentSign, SIGN_MISMATCH);

export const FieldConfidenceSchema = z.object({
  transactionId: ConfidenceSchema.nullable(),
  occurredAt: ConfidenceSchema.nullable(),
  amount: ConfidenceSchema,
  description: ConfidenceSchema,
  merchant: ConfidenceSchema.nullable(),
});

export const RawReceiptRequestSchema = z.object({
  text: z.string().max(1_000_000),
  byteLength: z.number().int().min(0),
  contentType: z.string().min(1).max(120),
  source: z.string().min(1).max(120).optional(),
});

export const IngestReceiptResponseSchema = z.object({
  record: StoredTransactionSchema,
  created: z.boolean(),
  confidence: FieldConfidenceSchema,
  rowSink: RowSinkStatusSchema,
  summary: z.string().min(1),
});

export const IngestFailureResponseSchema = z.object({
  error: z.literal("unparseable_receipt"),
  failure: ReceiptParseFailureSchema,
  summary: z.string().min(1),
});

export const BatchParseRequestSchema = z.object({
  receipts: z.array(RawReceiptRequestSchema).min(1).max(20),
});

export const BatchParseResultSchema = z.discriminatedUnion("ok", [
  z.object({
    index: z.number().int().min(0),
    ok: z.literal(true),
    record: StoredTransactionSchema,
    created: z.boolean(),
    rowSink: RowSinkStatusSchema,
  }),
  z.object({
    index: z.number().int().min(0),
    ok: z.literal(false),
    error: z.enum(["unparseable_receipt", "payload_too_large"]),
    failure: ReceiptParseFailureSchema.optional(),
    message: z.string().min(1),
  }),
]);

export const BatchParseResponseSchema = z.object({
  requested: z.number().int().min(1).max(20),
  stored: z.number().int().min(0).max(20),
  failed: z.number().int().min(0).max(20),
  results: z.array(BatchParseResultSchema),
});

export const ManualTransactionRequestSchema = z.object({
  transactionId: z.string().trim().min(1).max(64).nullable().default(null),
  occurredAt: LocalDateTimeSchema.nullable().default(null),
  description: z.string().trim().min(1).max(200),
  amount: z.number().positive(),
  direction: DirectionSchema,
  category: CategoryNameSchema.optional(),
  merchant: z.string().trim().min(1).max(100).nullable().default(null),
  rawText: z.string().max(1_000_000).default(""),
});

export const TransactionDetailsResponseSchema = z.object({
  transaction: StoredTransactionSchema,
});

export const TransactionListQuerySchema = z.object({
  from: z.iso.date().optional(),
  to: z.iso.date().optional(),
});

export const TransactionListResponseSchema = z.object({
  transactions: z.array(StoredTransactionSchema),
});

export const CategoryUpdateRequestSchema = z.object({
  category: CategoryNameSchema.nullable(),
});

export const TransactionSummaryQuerySchema = z.object({
  period: SummaryPeriodSchema.default("month"),
});

export const TransactionSummaryResponseSchema = z.object({
  period: SummaryPeriodSchema,
  from: z.iso.date().nullable(),
  to: z.iso.date(),
  totalIncome: z.number().min(0),
  totalExpense: z.number().min(0),
  netBalance: z.number(),
  transactionCount: z.number().int().min(0),
  incomeCount: z.number().int().min(0),
  expenseCount: z.number().int().min(0),
});

export const CustomCategorySchema = z.object({
  name: CategoryNameSchema,
  keywords: z.array(z.string().trim().min(1).max(80)).min(1).max(50),
  createdAt: z.iso.datetime(),
});

export const CreateCategoryRequestSchema = z.object({
  name: CategoryNameSchema,
  keywords: z.array(z.string().trim().min(1).max(80)).min(1).max(50),
});

export const CategoryListResponseSchema = z.object({
  categories: z.array(CustomCategorySchema),
});

export const HealthResponseSchema = z.object({
  ok: z.literal(true),
  service: z.literal("receipt-ledger-api"),
  now: z.iso.datetime(),
  rowSink: z.enum(["configured", "disabled"]),
});

export type Direction = z.infer<typeof DirectionSchema>;
export type Confidence = z.infer<typeof ConfidenceSchema>;
export type ParseFailureReason = z.infer<typeof ParseFailureReasonSchema>;
export type TransactionOrigin = z.infer<typeof TransactionOriginSchema>;
export type RowSinkStatus = z.infer<typeof RowSinkStatusSchema>;
export type SummaryPeriod = z.infer<typeof SummaryPeriodSchema>;
export type TextSpan = z.infer<typeof TextSpanSchema>;
export type ParsedTransaction = z.infer<typeof ParsedTransactionSchema>;
export type ReceiptParseFailure = z.infer<typeof ReceiptParseFailureSchema>;
export type StoredTransaction = z.infer<typeof StoredTransactionSchema>;
export type FieldConfidence = z.infer<typeof FieldConfidenceSchema>;
export type RawReceiptRequest = z.infer<typeof RawReceiptRequestSchema>;
export type IngestReceiptResponse = z.infer<typeof IngestReceiptResponseSchema>;
export type IngestFailureResponse = z.infer<typeof IngestFailureResponseSchema>;
export type BatchParseRequest = z.infer<typeof BatchParseRequestSchema>;
export type BatchParseResult = z.infer<typeof BatchParseResultSchema>;
export type BatchParseResponse = z.infer<typeof BatchParseResponseSchema>;
export type ManualTransactionRequest = z.infer<typeof ManualTransactionRequestSchema>;
export type TransactionDetailsResponse = z.infer<typeof TransactionDetailsResponseSchema>;
export type TransactionListQuery = z.infer<typeof TransactionListQuerySchema>;
export type TransactionListResponse = z.infer<typeof TransactionListResponseSchema>;
export type CategoryUpdateRequest = z.infer<typeof CategoryUpdateRequestSchema>;
export type TransactionSummaryQuery = z.infer<typeof TransactionSummaryQuerySchema>;
export type TransactionSummaryResponse = z.infer<typeof TransactionSummaryResponseSchema>;
export type CustomCategory = z.infer<typeof CustomCategorySchema>;
export type CreateCategoryRequest = z.infer<typeof CreateCategoryRequestSchema>;
export type CategoryListResponse = z.infer<typeof CategoryListResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
