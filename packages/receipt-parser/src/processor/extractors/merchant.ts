import { monthFromName } from "../locale-date.js";
import { groupSpan, runRules, type ExtractionRule, type RuleReading } from "../rule-runner.js";
import { WORD_END, WORD_START } from "../text-patterns.js";
import { absent, type ExtractionResult } from "../types.js";

const MAX_MERCHANT_LENGTH = 100;

const COUNTERPARTY_LABEL =
  "vendedor|comercio|destinatario|remitente|beneficiario|titular|merchant|payee|para|desde|de|a|from|to";

// Capitalized words, optionally joined by lowercase Spanish connectors ("Tienda de Ropa").
const NAME_WORD = "\\p{Lu}[\\p{L}\\p{N}&'.-]*";
const NAME = `${NAME_WORD}(?: (?:(?:de|del|la|las|los|y|e) )?${NAME_WORD})*`;

const NOT_A_NAME = new Set([
  "id",
  "total",
  "fecha",
  "monto",
  "importe",
  "operacion",
  "operación",
  "comprobante",
  "referencia",
  "pago",
  "pagar",
  "transferencia",
]);

const LABELED_COUNTERPARTY: ExtractionRule<string> = {
  name: "labeled-counterparty",
  pattern: new RegExp(
    `${WORD_START}(?:${COUNTERPARTY_LABEL})${WORD_END} ?: ?(?<name>[^\\n]+)`,
    "iu",
  ),
  confidence: "high",
  read: (match) => readName(match),
};

const PREPOSITION_NAME: ExtractionRule<string> = {
  // case-sensitive on purpose: the name must start with a capital letter
  name: "preposition-name",
  pattern: new RegExp(
    `${WORD_START}(?:en|a|al|de|del|para|desde|at|from|to) (?<name>${NAME})`,
    "u",
  ),
  confidence: "high",
  read: (match) => readName(match),
};

/** Tried in order; a later rule only runs when the earlier ones found nothing. */
export const MERCHANT_RULES: ReadonlyArray<ExtractionRule<string>> = [
  LABELED_COUNTERPARTY,
  PREPOSITION_NAME,
];

export function extractMerchant(normalizedText: string): ExtractionResult<string> {
  for (const rule of MERCHANT_RULES) {
    const result = runRules(normalizedText, [rule]);
    if (result.value) {
      return result;
    }
  }
  return absent();
}

function readName(match: RegExpExecArray): RuleReading<string> | null {
  const raw = match.groups?.name ?? "";
  const span = groupSpan(match, "name");
  const value = raw.trim().replace(/[\s.,;:]+$/u, "").slice(0, MAX_MERCHANT_LENGTH).trim();
  if (!span || value.length < 2 || !/\p{L}/u.test(value)) {
    return null;
  }

  const firstWord = value.split(" ")[0] ?? "";
  if (monthFromName(firstWord) !== null || NOT_A_NAME.has(value.toLowerCase())) {
    return null;
  }

  return { value, span: { start: span.start, end: span.start + value.length } };
}
