import { UNCATEGORIZED, type Direction } from "@receipt-ledger/receipt-contracts";
import { DEFAULT_CATEGORY_RULES } from "./category-rules.js";
import { keywordAlternation, WORD_END, WORD_START } from "./text-patterns.js";
import type { AmountReading, CategoryRule } from "./types.js";

/** Most receipts in this family record outgoing payments. */
export const DEFAULT_DIRECTION: Direction = "expense";

/**
 * Keyword cue first, then an explicit sign on the amount token, then the
 * default. A cue overrides a conflicting sign ("recibiste -$100" is income).
 */
export function resolveDirection(reading: AmountReading): Direction {
  if (reading.cue) {
    return reading.cue.direction;
  }
  if (reading.sign === "negative") {
    return "expense";
  }
  if (reading.sign === "positive") {
    return "income";
  }
  return DEFAULT_DIRECTION;
}

export function applyDirectionSign(magnitude: number, direction: Direction): number {
  const absolute = Math.abs(magnitude);
  return direction === "expense" ? -absolute : absolute;
}

/** Keywords up to this length must match a whole word ("bar" never matches "Barbería"). */
export const WHOLE_WORD_MAX_LENGTH = 5;

export function inferCategory(
  text: string,
  rules: ReadonlyArray<CategoryRule> = DEFAULT_CATEGORY_RULES,
): string {
  for (const rule of rules) {
    if (matchesRule(rule, text)) {
      return rule.category;
    }
  }
  return UNCATEGORIZED;
}

function matchesRule(rule: CategoryRule, text: string): boolean {
  if (rule.pattern) {
    // strip g/y so repeated calls never depend on lastIndex
    const pattern = new RegExp(rule.pattern.source, rule.pattern.flags.replace(/[gy]/g, ""));
    if (pattern.test(text)) {
      return true;
    }
  }

  const keywords =
    rule.keywords?.map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0) ?? [];
  if (keywords.length === 0) {
    return false;
  }
  return keywordPattern(keywords).test(text);
}

function keywordPattern(keywords: string[]): RegExp {
  const words = keywords.filter((keyword) => [...keyword].length <= WHOLE_WORD_MAX_LENGTH);
  const prefixes = keywords.filter((keyword) => [...keyword].length > WHOLE_WORD_MAX_LENGTH);
  const branches: string[] = [];
  if (words.length > 0) {
    branches.push(`(?:${keywordAlternation(words)})${WORD_END}`);
  }
  if (prefixes.length > 0) {
    branches.push(`(?:${keywordAlternation(prefixes)})`);
  }
  return new RegExp(`${WORD_START}(?:${branches.join("|")})`, "iu");
}
