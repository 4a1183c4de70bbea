import type { Direction, TextSpan } from "@receipt-ledger/receipt-contracts";
import { parseLocaleNumber, roundAmount } from "../locale-number.js";
import {
  groupSpan,
  matchSpan,
  runRules,
  type ExtractionRule,
  type RuleReading,
} from "../rule-runner.js";
import { keywordAlternation, WORD_END, WORD_START } from "../text-patterns.js";
import type { AmountReading, AmountSign, DirectionCue, ExtractionResult } from "../types.js";

const CURRENCY = `(?:US\\$|U\\$S|\\$|${WORD_START}(?:ARS|USD|CLP|MXN|COP|UYU)${WORD_END})`;
// space-grouped thousands ("1 234,56") or a run of digits and marks
const NUMBER = "(?:\\d{1,3}(?: \\d{3})+(?:[.,]\\d{1,2})?(?!\\d)|\\d(?:[\\d.,]*\\d)?)";

/**
 * `(`? sign? currency sign? number trailing-minus? `)`?
 *
 * A leading sign must touch the currency or the number, so "Total - $45" is
 * not read as negative.
 */
function amountSource(currency: "required" | "optional"): string {
  const currencyPart =
    currency === "required" ? `${CURRENCY} ?(?<inner>[-+])? ?` : `(?:${CURRENCY} ?)?(?<inner>[-+])? ?`;
  return (
    `(?<open>\\()?(?<lead>[-+])?${currencyPart}` +
    `(?<number>${NUMBER})(?<trail>-(?![\\p{L}\\p{N}]))?(?<close>\\))?`
  );
}

const AMOUNT_LABEL =
  "(?:total|monto|importe|valor|amount)(?: (?:pagado|cobrado|transferido|recibido|total|paid|received))?";

// "Total: 45,50" or "Total $45,50", never "Total 2 items"
const LABEL_FOLLOWS_WITH_AMOUNT = `(?= ?:| ?\\(?[-+]?${CURRENCY})`;

export const AMOUNT_RULES: ReadonlyArray<ExtractionRule<AmountReading>> = [
  {
    name: "labeled-amount",
    pattern: new RegExp(
      `${WORD_START}${AMOUNT_LABEL}${WORD_END}${LABEL_FOLLOWS_WITH_AMOUNT} ?:? ?${amountSource("optional")}`,
      "iu",
    ),
    confidence: "high",
    read: readAmount,
  },
  {
    name: "currency-amount",
    pattern: new RegExp(amountSource("required"), "iu"),
    confidence: "high",
    read: readAmount,
  },
  {
    name: "suffixed-amount",
    pattern: new RegExp(
      `(?<![\\d.,])(?<lead>[-+])?(?<number>${NUMBER}) ?(?:pesos|ARS|USD)${WORD_END}`,
      "iu",
    ),
    confidence: "high",
    read: readAmount,
  },
];

/**
 * Ordered cue table. Tiers are evaluated in order and the first tier with any
 * hit wins, so an explicit "recibiste" beats a generic "pago". Verb tiers are
 * `explicit` and count anywhere in the receipt; noun tiers only count on the
 * amount's line or the line above it.
 */
export const DIRECTION_CUES: ReadonlyArray<{
  direction: Direction;
  explicit: boolean;
  keywords: string[];
}> = [
  {
    direction: "income",
    explicit: true,
    keywords: [
      "recibiste",
      "cobraste",
      "te enviaron",
      "te transfirieron",
      "te pagaron",
      "te pagó",
      "te acreditaron",
      "recibido",
      "recibida",
      "acreditado",
      "acreditada",
      "you received",
      "received from",
      "payment received",
    ],
  },
  {
    direction: "expense",
    explicit: true,
    keywords: [
      "pagaste",
      "enviaste",
      "transferiste",
      "compraste",
      "retiraste",
      "you paid",
      "you sent",
    ],
  },
  {
    direction: "income",
    explicit: false,
    keywords: [
      "ingreso",
      "depósito",
      "acreditación",
      "reintegro",
      "reembolso",
      "devolución",
      "cobro",
      "refund",
      "deposit",
    ],
  },
  {
    direction: "expense",
    explicit: false,
    keywords: [
      "compra",
      "pago",
      "transferencia",
      "débito",
      "retiro",
      "cargo",
      "purchase",
      "payment",
    ],
  },
];

const CUE_PATTERNS = DIRECTION_CUES.map((tier) => ({
  direction: tier.direction,
  explicit: tier.explicit,
  pattern: new RegExp(`${WORD_START}(?:${keywordAlternation(tier.keywords)})${WORD_END}`, "giu"),
}));

/**
 * Finds the direction keyword for a receipt. With `amountSpan`, noun cues are
 * limited to the amount's line and the one before it; without it the whole
 * text is in scope.
 */
export function findDirectionCue(
  normalizedText: string,
  amountSpan?: TextSpan,
): DirectionCue | null {
  const nearby = amountSpan ? surroundingLines(normalizedText, amountSpan) : null;

  for (const tier of CUE_PATTERNS) {
    const scope = tier.explicit || !nearby ? { start: 0, end: normalizedText.length } : nearby;
    tier.pattern.lastIndex = scope.start;
    const match = tier.pattern.exec(normalizedText);
    if (match && match.index + match[0].length <= scope.end) {
      return { direction: tier.direction, keyword: match[0], span: matchSpan(match) };
    }
  }
  return null;
}

export function extractAmount(normalizedText: string): ExtractionResult<AmountReading> {
  const result = runRules(normalizedText, AMOUNT_RULES);
  if (!result.value) {
    return result;
  }
  return {
    ...result,
    value: {
      ...result.value,
      cue: findDirectionCue(normalizedText, result.matchedSpan ?? undefined),
    },
  };
}

function surroundingLines(text: string, span: TextSpan): TextSpan {
  const lineStart = text.lastIndexOf("\n", span.start - 1) + 1;
  const start = lineStart > 0 ? text.lastIndexOf("\n", lineStart - 2) + 1 : 0;
  const lineEnd = text.indexOf("\n", span.end);
  return { start, end: lineEnd === -1 ? text.length : lineEnd };
}

function readAmount(match: RegExpExecArray): RuleReading<AmountReading> | null {
  const groups = match.groups ?? {};
  const token = groups.number;
  const span = groupSpan(match, "number");
  if (!token || !span) {
    return null;
  }

  const parsed = parseLocaleNumber(token);
  if (!parsed) {
    return null;
  }

  const magnitude = roundAmount(parsed.value);
  if (magnitude <= 0) {
    return null;
  }

  return {
    value: { magnitude, sign: readSign(groups), cue: null },
    span,
    confidence: parsed.confidence,
  };
}

function readSign(groups: Record<string, string | undefined>): AmountSign {
  if (groups.open && groups.close) {
    return "negative";
  }
  const marks = [groups.lead, groups.inner, groups.trail];
  if (marks.includes("-")) {
    return "negative";
  }
  if (marks.includes("+")) {
    return "positive";
  }
  return "none";
}
