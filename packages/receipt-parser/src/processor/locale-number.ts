import type { Confidence } from "@receipt-ledger/receipt-contracts";

export type LocaleNumber = {
  value: number;
  decimalSeparator: "." | "," | null;
  confidence: Confidence;
};

const NUMERIC_TOKEN = /^\d+(?:[.,]\d+)*$/;

/**
 * Resolves which mark in a numeric token is the decimal separator without a
 * locale hint:
 *
 * - both `.` and `,` present: the last mark is decimal, the rest group thousands;
 * - one kind repeated: every mark groups thousands when the last is followed by
 *   three digits, otherwise the last one is decimal;
 * - a single mark followed by one or two digits is decimal;
 * - a single mark followed by exactly three digits groups thousands. This is the
 *   ambiguous case ("1.000" could be one or one thousand) and comes back with
 *   `confidence: "low"`.
 *
 * Signs are not handled here; callers strip them first.
 */
export function parseLocaleNumber(token: string): LocaleNumber | null {
  const compact = token.replace(/\s+/g, "");
  if (!NUMERIC_TOKEN.test(compact)) {
    return null;
  }

  const markIndexes: number[] = [];
  for (let index = 0; index < compact.length; index += 1) {
    const char = compact[index];
    if (char === "." || char === ",") {
      markIndexes.push(index);
    }
  }

  const lastIndex = markIndexes.at(-1);
  if (lastIndex === undefined) {
    return build(compact, "", null, "high");
  }

  const lastMark = compact[lastIndex] === "," ? "," : ".";
  const integerPart = compact.slice(0, lastIndex).replace(/[.,]/g, "");
  const trailing = compact.slice(lastIndex + 1);
  const mixedMarks = compact.includes(".") && compact.includes(",");

  if (mixedMarks) {
    return build(integerPart, trailing, lastMark, trailing.length <= 2 ? "high" : "low");
  }

  if (markIndexes.length > 1) {
    if (trailing.length === 3) {
      return build(integerPart + trailing, "", null, "high");
    }
    return build(integerPart, trailing, lastMark, "low");
  }

  if (trailing.length <= 2) {
    return build(integerPart, trailing, lastMark, "high");
  }
  if (trailing.length === 3) {
    return build(integerPart + trailing, "", null, "low");
  }
  return build(integerPart, trailing, lastMark, "low");
}

export function roundAmount(value: number): number {
  return Number.parseFloat(value.toFixed(2));
}

function build(
  integerDigits: string,
  fractionDigits: string,
  decimalSeparator: LocaleNumber["decimalSeparator"],
  confidence: Confidence,
): LocaleNumber | null {
  const value = Number(`${integerDigits || "0"}.${fractionDigits || "0"}`);
  if (!Number.isFinite(value)) {
    return null;
  }
  return { value, decimalSeparator, confidence };
}
