import {
  ParsedTransactionSchema,
  type ParseFailureReason,
  type ReceiptParseFailure,
} from "@receipt-ledger/receipt-contracts";
import { DEFAULT_CATEGORY_RULES } from "./category-rules.js";
import { applyDirectionSign, inferCategory, resolveDirection } from "./classifier.js";
import { extractAmount } from "./extractors/amount.js";
import { extractOccurredAt } from "./extractors/date.js";
import { DESCRIPTION_PLACEHOLDER, extractDescription } from "./extractors/description.js";
import { extractMerchant } from "./extractors/merchant.js";
import { extractTransactionId } from "./extractors/identifier.js";
import { roundAmount } from "./locale-number.js";
import { normalizeReceiptText } from "./text-normalizer.js";
import type { ReceiptFields, ReceiptParseOptions, ReceiptParseOutcome } from "./types.js";

const FAILURE_MESSAGES: Record<ParseFailureReason, string> = {
  EmptyInput: "receipt text is empty",
  AmountNotFound: "could not read an amount from this receipt",
};

/**
 * Turns raw receipt text into one transaction record.
 *
 * Pure and stateless: the same input always yields an equal outcome. Only an
 * empty text or a missing amount fail the parse; every other missing field
 * comes back as null (or its documented default). `rawText` is always the
 * untouched input, on success and on failure.
 */
export function parseReceiptText(
  rawText: string,
  options: ReceiptParseOptions = {},
): ReceiptParseOutcome {
  const text = normalizeReceiptText(rawText);
  if (text.length === 0) {
    return { ok: false, failure: parseFailure("EmptyInput", rawText) };
  }

  const fields: ReceiptFields = {
    transactionId: extractTransactionId(text),
    occurredAt: extractOccurredAt(text),
    amount: extractAmount(text),
    description: extractDescription(text),
    merchant: extractMerchant(text),
  };

  const reading = fields.amount.value;
  if (!reading) {
    return { ok: false, failure: parseFailure("AmountNotFound", rawText) };
  }

  const direction = resolveDirection(reading);
  const description = fields.description.value ?? DESCRIPTION_PLACEHOLDER;
  const merchant = fields.merchant.value;
  const category = inferCategory([description, merchant ?? ""].join(" ").trim(), [
    ...(options.categoryRules ?? []),
    ...DEFAULT_CATEGORY_RULES,
  ]);

  const transaction = ParsedTransactionSchema.parse({
    transactionId: fields.transactionId.value,
    occurredAt: fields.occurredAt.value,
    description,
    amount: roundAmount(applyDirectionSign(reading.magnitude, direction)),
    direction,
    category,
    merchant,
    rawText,
  });

  return { ok: true, transaction, fields };
}

export function parseFailure(reason: ParseFailureReason, rawText: string): ReceiptParseFailure {
  return { reason, message: FAILURE_MESSAGES[reason], rawText };
}
