import { groupSpan, runRules, type ExtractionRule } from "../rule-runner.js";
import { WORD_END, WORD_START } from "../text-patterns.js";
import type { ExtractionResult } from "../types.js";

const OPERATION_NOUN = "(?:operaci[oó]n|transacci[oó]n|comprobante|referencia)";
const NUMBER_MARK = "(?:n[uú]mero|nro\\.?|n[°º])";
const TOKEN = "(?<id>(?=[A-Za-z0-9-]*\\d)[A-Za-z0-9][A-Za-z0-9-]{2,30}[A-Za-z0-9])";
const SEPARATOR = "(?: ?(?:n[°º]|nro\\.?))?(?: ?[:#])? ?#?";

function labeledRule(name: string, label: string): ExtractionRule<string> {
  return {
    name,
    pattern: new RegExp(`${WORD_START}(?:${label})${WORD_END}${SEPARATOR}${TOKEN}${WORD_END}`, "iu"),
    confidence: "high",
    read: (match) => {
      const id = match.groups?.id;
      const span = groupSpan(match, "id");
      return id && span ? { value: id, span } : null;
    },
  };
}

export const TRANSACTION_ID_RULES: ReadonlyArray<ExtractionRule<string>> = [
  labeledRule("numbered-operation", `${NUMBER_MARK} de (?:${OPERATION_NOUN}|pago)`),
  labeledRule(
    "id-label",
    `(?:id|c[oó]digo)(?: de (?:${OPERATION_NOUN}|pago))?|transaction id|reference(?: number)?|n[°º]`,
  ),
  labeledRule("operation-label", OPERATION_NOUN),
];

export function extractTransactionId(normalizedText: string): ExtractionResult<string> {
  return runRules(normalizedText, TRANSACTION_ID_RULES);
}
