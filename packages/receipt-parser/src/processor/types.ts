import type {
  Confidence,
  Direction,
  ParsedTransaction,
  ReceiptParseFailure,
  TextSpan,
} from "@receipt-ledger/receipt-contracts";

export type ExtractionResult<T> = {
  value: T | null;
  matchedSpan: TextSpan | null;
  confidence: Confidence;
};

export type FieldExtractor<T> = (normalizedText: string) => ExtractionResult<T>;

export type AmountSign = "negative" | "positive" | "none";

export type DirectionCue = {
  direction: Direction;
  keyword: string;
  span: TextSpan;
};

export type AmountReading = {
  magnitude: number;
  sign: AmountSign;
  cue: DirectionCue | null;
};

export type CategoryRule = {
  category: string;
  keywords?: string[];
  pattern?: RegExp;
};

export type ReceiptFields = {
  transactionId: ExtractionResult<string>;
  occurredAt: ExtractionResult<string>;
  amount: ExtractionResult<AmountReading>;
  description: ExtractionResult<string>;
  merchant: ExtractionResult<string>;
};

export type ReceiptParseOutcome =
  | { ok: true; transaction: ParsedTransaction; fields: ReceiptFields }
  | { ok: false; failure: ReceiptParseFailure };

export type ReceiptParseOptions = {
  /** Evaluated before the built-in table, in order. */
  categoryRules?: CategoryRule[];
};

export function absent<T>(confidence: Confidence = "low"): ExtractionResult<T> {
  return { value: null, matchedSpan: null, confidence };
}
